import type { IntentCategory, ResponseEnvelope } from '../../../../shared/schema.js';
import { orderByDataset, type Column, type Dataset } from '../../datasetLoader.js';
import { AnalysisError } from '../../errors.js';
import type { Intent } from '../intentClassifier.js';
import { createErrorResponse } from '../utils/errorRecovery.js';

/**
 * Handler Context
 * Everything an executor reads: the question and the dataset it was asked about
 */
export interface HandlerContext {
  question: string;
  dataset: Dataset;
}

/**
 * Base Handler Class
 * One subclass per intent category
 */
export abstract class BaseHandler {
  abstract readonly category: IntentCategory;

  canHandle(intent: Intent): boolean {
    return intent.category === this.category;
  }

  /**
   * Build the response; may throw, execute() turns the throw into an error envelope
   */
  protected abstract handle(intent: Intent, context: HandlerContext): ResponseEnvelope;

  execute(intent: Intent, context: HandlerContext): ResponseEnvelope {
    try {
      return this.handle(intent, context);
    } catch (error) {
      if (error instanceof AnalysisError) {
        console.warn(`⚠️ ${this.constructor.name}: ${error.message}`);
      } else {
        console.error(`❌ ${this.constructor.name} failed:`, error);
      }
      return createErrorResponse(error, this.category, context.dataset);
    }
  }

  /**
   * Resolved columns in dataset order, so "first column" is deterministic
   */
  protected resolvedColumns(intent: Intent, context: HandlerContext): Column[] {
    return orderByDataset(context.dataset, intent.columns);
  }
}
