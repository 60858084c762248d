import type { CellValue, ConditionOperator, FilterCondition, ResponseEnvelope } from '../../../../shared/schema.js';
import { columnsOfType, getColumn, type Column, type Dataset } from '../../datasetLoader.js';
import { isMissing, stringifyCell, toCellValue, toNumber, type CellData } from '../../dataTransform.js';
import { UnresolvedQueryError } from '../../errors.js';
import type { Intent } from '../intentClassifier.js';
import { BaseHandler, type HandlerContext } from './baseHandler.js';

export const MAX_DISPLAY_ROWS = 20;

const THRESHOLD_PATTERN = /\b(under|over|above|below)\s+(-?\d+(?:\.\d+)?)/;

const THRESHOLD_OPERATORS = new Map<string, ConditionOperator>([
  ['under', '<'],
  ['below', '<'],
  ['over', '>'],
  ['above', '>'],
]);

/**
 * "under 30" / "over 65" against the first numeric column whose name contains "age"
 */
export function findThresholdCondition(query: string, dataset: Dataset): FilterCondition | null {
  const match = query.match(THRESHOLD_PATTERN);
  if (!match) return null;

  const ageColumn = columnsOfType(dataset, 'numeric').find(
    (c) => c.normalizedName.includes('age') || c.originalName.toLowerCase().includes('age')
  );
  const operator = THRESHOLD_OPERATORS.get(match[1]);
  if (!ageColumn || !operator) return null;

  return { column: ageColumn.normalizedName, operator, value: Number(match[2]) };
}

/**
 * First categorical/binary column (dataset order) with a value the question names verbatim
 */
export function findEqualityCondition(query: string, dataset: Dataset): FilterCondition | null {
  for (const column of columnsOfType(dataset, 'categorical', 'binary')) {
    const seen = new Set<string>();
    for (const value of column.values) {
      if (isMissing(value)) continue;
      const label = stringifyCell(value).trim();
      const needle = label.toLowerCase();
      if (seen.has(needle)) continue;
      seen.add(needle);
      if (query.includes(needle)) {
        return { column: column.normalizedName, operator: '=', value: label };
      }
    }
  }
  return null;
}

function matchesCondition(value: CellData, condition: FilterCondition): boolean {
  if (isMissing(value)) return false;

  const { operator } = condition;
  if (operator === '=' || operator === '!=') {
    const equal =
      typeof value === 'number' || typeof condition.value === 'number'
        ? toNumber(value) === Number(condition.value)
        : stringifyCell(value).trim().toLowerCase() === String(condition.value).trim().toLowerCase();
    return operator === '=' ? equal : !equal;
  }

  const left = toNumber(value);
  const right = Number(condition.value);
  if (!Number.isFinite(left) || !Number.isFinite(right)) return false;
  switch (operator) {
    case '<':
      return left < right;
    case '<=':
      return left <= right;
    case '>':
      return left > right;
    case '>=':
      return left >= right;
  }
}

function describeCondition(condition: FilterCondition, column: Column): string {
  return `${column.originalName} ${condition.operator} ${condition.value}`;
}

/**
 * Filter Handler
 * At most one numeric threshold and one categorical equality; oracle conditions only when the text yields neither
 */
export class FilterHandler extends BaseHandler {
  readonly category = 'filter' as const;

  protected handle(intent: Intent, context: HandlerContext): ResponseEnvelope {
    const { dataset } = context;
    const query = context.question.toLowerCase();

    const conditions: FilterCondition[] = [];
    const threshold = findThresholdCondition(query, dataset);
    if (threshold) conditions.push(threshold);
    const equality = findEqualityCondition(query, dataset);
    if (equality) conditions.push(equality);

    if (conditions.length === 0 && intent.conditions && intent.conditions.length > 0) {
      const first = intent.conditions.find((c) => getColumn(dataset, c.column));
      if (first) conditions.push(first);
    }

    if (conditions.length === 0) {
      throw new UnresolvedQueryError(
        "I couldn't understand the filter conditions. Please try being more specific about what you want to filter."
      );
    }

    const applied = conditions.flatMap((condition) => {
      const column = getColumn(dataset, condition.column);
      return column ? [{ condition, column }] : [];
    });
    console.log(`🔎 FilterHandler conditions: ${applied.map(({ condition, column }) => describeCondition(condition, column)).join(' AND ')}`);

    const matching: number[] = [];
    for (let i = 0; i < dataset.rowCount; i++) {
      if (applied.every(({ condition, column }) => matchesCondition(column.values[i] ?? null, condition))) {
        matching.push(i);
      }
    }

    if (matching.length === 0) {
      return { kind: 'text', text: 'No records found matching your criteria.' };
    }

    const rows = matching.slice(0, MAX_DISPLAY_ROWS).map((index) => {
      const row: Record<string, CellValue> = {};
      for (const column of dataset.columns) {
        row[column.originalName] = toCellValue(column.values[index]);
      }
      return row;
    });

    const truncated = matching.length > MAX_DISPLAY_ROWS ? ` Showing the first ${MAX_DISPLAY_ROWS}.` : '';
    return {
      kind: 'composite',
      text: `Found ${matching.length} records matching your criteria.${truncated}`,
      table: {
        columns: dataset.columns.map((c) => c.originalName),
        rows,
        totalRows: matching.length,
      },
    };
  }
}
