import type { CellValue, ResponseEnvelope, TableData } from '../../../../shared/schema.js';
import type { Column, Dataset } from '../../datasetLoader.js';
import { formatNumber, toCellValue } from '../../dataTransform.js';
import { getSummaryStatistics } from '../../metadataService.js';
import { describeCategorical, describeNumeric, valueCounts, type NumericStats } from '../../statisticalSummary.js';
import type { Intent } from '../intentClassifier.js';
import { BaseHandler, type HandlerContext } from './baseHandler.js';

export const MAX_SUMMARY_COLUMNS = 5;

// minValues: how many present values the statistic needs before describeNumeric reports it
const OPERATION_LABELS: ReadonlyArray<
  readonly [operation: string, label: string, stat: keyof NumericStats, minValues: number]
> = [
  ['average', 'Average', 'mean', 2],
  ['sum', 'Total', 'sum', 0],
  ['count', 'Count', 'count', 0],
  ['min', 'Minimum', 'min', 1],
  ['max', 'Maximum', 'max', 1],
  ['median', 'Median', 'median', 1],
  ['std', 'Standard deviation', 'std', 2],
];

const STATS_COLUMNS = ['Column', 'Type', 'Count', 'Mean', 'Median', 'Min', 'Max', 'Std', 'Unique', 'Most Common'];

/**
 * Whole-dataset counts as a Metric/Value table
 */
export function datasetCountsTable(dataset: Dataset): TableData {
  const summary = getSummaryStatistics(dataset);
  const rows: Array<[string, number]> = [
    ['Rows', summary.rowCount],
    ['Columns', summary.columnCount],
    ['Numeric columns', summary.numericColumns],
    ['Categorical columns', summary.categoricalColumns],
    ['Binary columns', summary.binaryColumns],
    ['Datetime columns', summary.datetimeColumns],
    ['Missing values', summary.missingValues],
  ];
  return {
    columns: ['Metric', 'Value'],
    rows: rows.map(([metric, value]) => ({ Metric: metric, Value: value })),
  };
}

function statsRow(column: Column): Record<string, CellValue> {
  const row: Record<string, CellValue> = Object.fromEntries(STATS_COLUMNS.map((name) => [name, null]));
  row.Column = column.originalName;
  row.Type = column.type;

  if (column.type === 'numeric') {
    const stats = describeNumeric(column.values);
    row.Count = stats.count;
    row.Mean = stats.mean;
    row.Median = stats.median;
    row.Min = stats.min;
    row.Max = stats.max;
    row.Std = stats.std;
  } else {
    const stats = describeCategorical(column.values);
    row.Count = stats.count;
    row.Unique = stats.uniqueValues;
    row['Most Common'] = toCellValue(stats.mostCommon);
  }
  return row;
}

function operationLines(column: Column, operations: ReadonlySet<string>): string[] {
  const name = column.originalName;

  if (column.type === 'numeric') {
    const stats = describeNumeric(column.values);
    return OPERATION_LABELS.filter(([operation]) => operations.has(operation)).map(([, label, stat, minValues]) => {
      const value = stats[stat];
      if (value !== null) return `${label} ${name}: ${formatNumber(value)}`;
      return `${label} ${name}: not available (needs at least ${minValues} ${minValues === 1 ? 'value' : 'values'})`;
    });
  }

  const lines: string[] = [];
  if (operations.has('count')) {
    lines.push(`Unique ${name} values: ${valueCounts(column.values).length}`);
  }
  if (Array.from(operations).some((operation) => operation !== 'count')) {
    const stats = describeCategorical(column.values);
    lines.push(
      stats.mostCommonCount > 0
        ? `Most common ${name}: ${String(toCellValue(stats.mostCommon))} (${stats.mostCommonCount} rows)`
        : `Most common ${name}: not available`
    );
  }
  return lines;
}

/**
 * Summary Handler
 * Descriptive statistics for the columns a question names, or dataset counts when it names none
 */
export class SummaryHandler extends BaseHandler {
  readonly category = 'summary' as const;

  protected handle(intent: Intent, context: HandlerContext): ResponseEnvelope {
    const { dataset } = context;
    const columns = this.resolvedColumns(intent, context).slice(0, MAX_SUMMARY_COLUMNS);
    console.log(`📊 SummaryHandler: [${columns.map((c) => c.normalizedName).join(', ')}] ops [${Array.from(intent.operations).join(', ')}]`);

    if (columns.length === 0) {
      return {
        kind: 'composite',
        text: `Your dataset has ${dataset.rowCount} rows and ${dataset.columns.length} columns.`,
        table: datasetCountsTable(dataset),
      };
    }

    if (intent.operations.size > 0) {
      const lines = columns.flatMap((column) => operationLines(column, intent.operations));
      return { kind: 'text', text: lines.join('\n') };
    }

    return {
      kind: 'composite',
      text: `Summary statistics for ${columns.map((c) => c.originalName).join(', ')}`,
      table: { columns: [...STATS_COLUMNS], rows: columns.map(statsRow) },
    };
  }
}
