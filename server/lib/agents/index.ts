/**
 * Agent System Entry Point
 * Initializes and exports the orchestrator with all handlers registered
 */

import { AgentOrchestrator, getOrchestrator } from './orchestrator.js';
import { SummaryHandler } from './handlers/summaryHandler.js';
import { VisualizationHandler } from './handlers/visualizationHandler.js';
import { FilterHandler } from './handlers/filterHandler.js';
import { ComparisonHandler } from './handlers/comparisonHandler.js';
import { CorrelationHandler } from './handlers/correlationHandler.js';
import { GeneralHandler } from './handlers/generalHandler.js';

/**
 * Register one handler per intent category on the given orchestrator
 */
export function registerHandlers(orchestrator: AgentOrchestrator): AgentOrchestrator {
  orchestrator.registerHandler(new SummaryHandler());
  orchestrator.registerHandler(new VisualizationHandler());
  orchestrator.registerHandler(new FilterHandler());
  orchestrator.registerHandler(new ComparisonHandler());
  orchestrator.registerHandler(new CorrelationHandler());
  orchestrator.registerHandler(new GeneralHandler()); // catch-all overview

  console.log(`✅ Agent system initialized with ${orchestrator.getHandlerCount()} handlers`);
  return orchestrator;
}

let isInitialized = false;

export function getInitializedOrchestrator(): AgentOrchestrator {
  const orchestrator = getOrchestrator();
  if (!isInitialized) {
    registerHandlers(orchestrator);
    isInitialized = true;
  }
  return orchestrator;
}

export { AgentOrchestrator, DEGRADED_NOTICE } from './orchestrator.js';
export type { QueryOptions, QueryResult } from './orchestrator.js';
export { classifyIntent, classifyByKeywords } from './intentClassifier.js';
export type { Intent, OracleClient } from './intentClassifier.js';
