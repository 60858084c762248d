import type { IntentCategory, IntentSource, ResponseEnvelope } from '../../../shared/schema.js';
import type { Dataset } from '../datasetLoader.js';
import { withDerivedColumns } from '../derivedColumns.js';
import { BaseHandler } from './handlers/baseHandler.js';
import { classifyIntent, type Intent, type OracleClient } from './intentClassifier.js';
import { createErrorResponse, getFallbackSuggestions } from './utils/errorRecovery.js';

export const DEGRADED_NOTICE =
  'The AI classifier is unavailable, so questions are being answered with keyword matching. Results may be less precise.';

export interface QueryOptions {
  // External classifier; null or absent means keyword classification only
  oracle?: OracleClient | null;
  // The caller's session already showed the degraded-mode notice
  degradedNoticeShown?: boolean;
}

export interface QueryResult {
  category: IntentCategory;
  source: IntentSource;
  response: ResponseEnvelope;
  notice?: string;
}

/**
 * Agent Orchestrator
 * Single pipeline: derived columns → intent → handler → response envelope.
 * Holds no dataset; every call gets the one it works on.
 */
export class AgentOrchestrator {
  private handlers: BaseHandler[] = [];

  getHandlerCount(): number {
    return this.handlers.length;
  }

  registerHandler(handler: BaseHandler): void {
    this.handlers.push(handler);
  }

  private findHandler(intent: Intent): BaseHandler | null {
    for (const handler of this.handlers) {
      if (handler.canHandle(intent)) {
        return handler;
      }
    }
    return null;
  }

  /**
   * Answer a question about a dataset. Never rejects: every failure becomes an error envelope.
   */
  async processQuery(question: string, dataset: Dataset, options: QueryOptions = {}): Promise<QueryResult> {
    try {
      console.log(`\n🔍 Processing query: "${question}"`);

      const view = withDerivedColumns(question, dataset);
      const { intent, source, degraded } = await classifyIntent(question, view, options.oracle ?? null);
      console.log(`🎯 ${intent.category} (${source}), columns: [${Array.from(intent.columns).join(', ')}]`);

      const handler = this.findHandler(intent);
      const response = handler
        ? handler.execute(intent, { question, dataset: view })
        : this.handleFallback(intent, view);

      const notice = degraded && !options.degradedNoticeShown ? DEGRADED_NOTICE : undefined;
      return { category: intent.category, source, response, ...(notice ? { notice } : {}) };
    } catch (error) {
      console.error('❌ Query pipeline failed:', error);
      return { category: 'general', source: 'keyword', response: createErrorResponse(error, 'general') };
    }
  }

  private handleFallback(intent: Intent, dataset: Dataset): ResponseEnvelope {
    console.warn(`⚠️ No handler registered for ${intent.category}`);
    const suggestions = getFallbackSuggestions(dataset);
    return {
      kind: 'error',
      error: `I can't answer ${intent.category} questions yet. Try: ${suggestions.join(' / ')}`,
    };
  }
}

// Singleton instance
let orchestratorInstance: AgentOrchestrator | null = null;

export function getOrchestrator(): AgentOrchestrator {
  if (!orchestratorInstance) {
    orchestratorInstance = new AgentOrchestrator();
  }
  return orchestratorInstance;
}
