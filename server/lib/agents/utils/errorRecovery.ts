import type { IntentCategory, ResponseEnvelope } from '../../../../shared/schema.js';
import { columnsOfType, type Dataset } from '../../datasetLoader.js';
import { AnalysisError, InsufficientColumnsError, UnresolvedQueryError } from '../../errors.js';

export type ErrorEnvelope = Extract<ResponseEnvelope, { kind: 'error' }>;

const ERROR_PREFIXES: Record<IntentCategory, string> = {
  summary: 'Error processing summary query',
  filter: 'Error processing filter',
  visualization: 'Error creating visualization',
  comparison: 'Error creating comparison',
  correlation: 'Error calculating correlations',
  general: 'Error processing query',
};

function listColumns(dataset: Dataset): string {
  const names = dataset.columns.map((c) => c.originalName);
  return `${names.slice(0, 5).join(', ')}${names.length > 5 ? '...' : ''}`;
}

/**
 * Turn anything an executor threw into an error envelope.
 * Known failures keep their message; column problems also list what the dataset holds.
 */
export function createErrorResponse(error: unknown, category: IntentCategory, dataset?: Dataset): ErrorEnvelope {
  if (error instanceof AnalysisError) {
    let message = error.message;
    if (dataset && (error instanceof UnresolvedQueryError || error instanceof InsufficientColumnsError)) {
      message += ` Available columns: ${listColumns(dataset)}`;
    }
    return { kind: 'error', error: message };
  }

  const errorMessage = error instanceof Error ? error.message : String(error);
  return { kind: 'error', error: `${ERROR_PREFIXES[category]}: ${errorMessage}` };
}

/**
 * Example questions built from the dataset's own column names
 */
export function getFallbackSuggestions(dataset: Dataset): string[] {
  const numeric = columnsOfType(dataset, 'numeric').map((c) => c.originalName);
  const categorical = columnsOfType(dataset, 'categorical', 'binary').map((c) => c.originalName);
  const suggestions: string[] = [];

  if (numeric.length > 0) {
    suggestions.push(`What is the average ${numeric[0]}?`);
    suggestions.push(`Show me a histogram of ${numeric[0]}`);
  }
  if (numeric.length > 0 && categorical.length > 0) {
    suggestions.push(`Compare ${numeric[0]} by ${categorical[0]}`);
  }
  if (numeric.length > 1) {
    suggestions.push('Show me the correlation between numeric columns');
  }
  if (suggestions.length === 0) {
    suggestions.push('What is the average [column name]?', 'Show me a chart of [column name]');
  }

  return suggestions;
}
