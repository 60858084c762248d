import type { Column, Dataset } from '../datasetLoader.js';
import { formatNumber, isMissing, stringifyCell } from '../dataTransform.js';
import { numericValues } from '../statisticalSummary.js';

const SAMPLE_VALUE_COUNT = 5;

export interface ColumnContext {
  name: string;
  originalName: string;
  type: Column['type'];
  sampleValues?: string[];
  range?: string;
}

export function describeColumnForOracle(column: Column): ColumnContext {
  const context: ColumnContext = {
    name: column.normalizedName,
    originalName: column.originalName,
    type: column.type,
  };

  if (column.type === 'categorical' || column.type === 'binary') {
    // Distinct values in first-appearance order
    const ordered: string[] = [];
    for (const value of column.values) {
      if (isMissing(value)) continue;
      const label = stringifyCell(value);
      if (!ordered.includes(label)) ordered.push(label);
      if (ordered.length === SAMPLE_VALUE_COUNT) break;
    }
    context.sampleValues = ordered;
  } else if (column.type === 'numeric') {
    const nums = numericValues(column.values);
    if (nums.length > 0) {
      context.range = `${formatNumber(Math.min(...nums))} to ${formatNumber(Math.max(...nums))}`;
    }
  }

  return context;
}

export function buildColumnContext(dataset: Dataset): ColumnContext[] {
  return dataset.columns.map(describeColumnForOracle);
}

/**
 * Plain-text column listing sent with every oracle request
 */
export function formatColumnContext(contexts: readonly ColumnContext[]): string {
  return contexts
    .map((c) => {
      let line = `- ${c.name} (original: "${c.originalName}", type: ${c.type})`;
      if (c.sampleValues && c.sampleValues.length > 0) line += `, sample values: ${c.sampleValues.join(', ')}`;
      if (c.range) line += `, range: ${c.range}`;
      return line;
    })
    .join('\n');
}
