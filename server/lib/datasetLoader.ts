import type { ColumnType } from '../../shared/schema.js';
import { parseFlexibleDate } from './dateUtils.js';
import { isMissing, type CellData } from './dataTransform.js';
import {
  ColumnCountError,
  DuplicateColumnError,
  EmptyDatasetError,
  TooManyRowsError,
} from './errors.js';

export const MAX_ROWS = 500;
export const MAX_COLUMNS = 20;
const DATETIME_SAMPLE_SIZE = 10;

// Canonical value pairs a binary column may draw from
const BINARY_PATTERNS: ReadonlyArray<ReadonlySet<string>> = [
  new Set(['yes', 'no']),
  new Set(['true', 'false']),
  new Set(['1', '0']),
  new Set(['y', 'n']),
  new Set(['1.0', '0.0']),
  new Set(['male', 'female']),
  new Set(['m', 'f']),
];

/**
 * A parsed sheet before any schema work: header row plus value rows
 */
export interface RawTable {
  headers: string[];
  rows: CellData[][];
}

export interface Column {
  readonly normalizedName: string;
  readonly originalName: string;
  readonly type: ColumnType;
  readonly values: readonly CellData[];
}

/**
 * Bidirectional normalized ↔ original column name map, fixed at load time
 */
export class ColumnNameMap {
  private readonly originalByNormalized: ReadonlyMap<string, string>;
  private readonly normalizedByOriginal: ReadonlyMap<string, string>;

  constructor(entries: Array<[normalized: string, original: string]>) {
    this.originalByNormalized = new Map(entries);
    this.normalizedByOriginal = new Map(entries.map(([normalized, original]): [string, string] => [original, normalized]));
  }

  toOriginal(normalizedName: string): string {
    return this.originalByNormalized.get(normalizedName) ?? normalizedName;
  }

  toNormalized(originalName: string): string | undefined {
    return this.normalizedByOriginal.get(originalName);
  }

  entries(): Array<[string, string]> {
    return Array.from(this.originalByNormalized.entries());
  }
}

export interface Dataset {
  readonly columns: readonly Column[];
  readonly rowCount: number;
  readonly columnNames: ColumnNameMap;
}

/**
 * Canonical column identifier: lowercase [a-z0-9_], no repeated or edge underscores
 */
export function normalizeColumnName(name: string): string {
  const normalized = name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '');
  return normalized || 'unnamed_column';
}

/**
 * Distinct value set in the canonical pairs, or (for numbers) within {0, 1}
 */
export function isBinaryColumn(values: readonly CellData[]): boolean {
  const present = values.filter((v) => !isMissing(v));
  const unique = new Set(present.map((v) => String(v).trim().toLowerCase()));

  if (unique.size > 0 && unique.size <= 2) {
    for (const pattern of BINARY_PATTERNS) {
      if (Array.from(unique).every((v) => pattern.has(v))) {
        return true;
      }
    }
  }

  if (present.length > 0 && present.every((v) => typeof v === 'number')) {
    const numeric = new Set(present);
    return numeric.size <= 2 && Array.from(numeric).every((v) => v === 0 || v === 1);
  }

  return false;
}

function isNumericColumn(values: readonly CellData[]): boolean {
  return values.every((v) => isMissing(v) || (typeof v === 'number' && Number.isFinite(v)));
}

function isDatetimeColumn(values: readonly CellData[]): boolean {
  const sample = values.filter((v) => !isMissing(v)).slice(0, DATETIME_SAMPLE_SIZE);
  if (sample.length === 0) return false;
  return sample.every((v) => parseFlexibleDate(v) !== null);
}

/**
 * Type tag for a column, first match wins: datetime, numeric, binary, categorical
 */
export function inferColumnType(values: readonly CellData[]): ColumnType {
  if (isDatetimeColumn(values)) return 'datetime';
  if (isNumericColumn(values)) return 'numeric';
  if (isBinaryColumn(values)) return 'binary';
  return 'categorical';
}

function coerceDatetimes(values: readonly CellData[]): CellData[] {
  return values.map((v) => (isMissing(v) ? null : parseFlexibleDate(v)));
}

/**
 * Validate a raw table and build the Dataset every later stage reads.
 * Throws a SchemaError subclass; nothing is returned for a rejected table.
 */
export function loadDataset(table: RawTable): Dataset {
  const columnCount = table.headers.length;
  if (columnCount < 1) {
    throw new ColumnCountError(columnCount, MAX_COLUMNS);
  }
  if (table.rows.length === 0) {
    throw new EmptyDatasetError();
  }
  if (table.rows.length > MAX_ROWS) {
    throw new TooManyRowsError(table.rows.length, MAX_ROWS);
  }
  if (columnCount > MAX_COLUMNS) {
    throw new ColumnCountError(columnCount, MAX_COLUMNS);
  }

  const normalizedNames = table.headers.map((header) => normalizeColumnName(String(header)));
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of normalizedNames) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  if (duplicates.size > 0) {
    throw new DuplicateColumnError(Array.from(duplicates));
  }

  const columns: Column[] = table.headers.map((header, index) => {
    const rawValues = table.rows.map((row) => row[index] ?? null);
    const type = inferColumnType(rawValues);
    return {
      normalizedName: normalizedNames[index],
      originalName: String(header),
      type,
      values: type === 'datetime' ? coerceDatetimes(rawValues) : rawValues,
    };
  });

  return {
    columns,
    rowCount: table.rows.length,
    columnNames: new ColumnNameMap(columns.map((c): [string, string] => [c.normalizedName, c.originalName])),
  };
}

export function getColumn(dataset: Dataset, normalizedName: string): Column | undefined {
  return dataset.columns.find((c) => c.normalizedName === normalizedName);
}

export function columnsOfType(dataset: Dataset, ...types: ColumnType[]): Column[] {
  return dataset.columns.filter((c) => types.includes(c.type));
}

/**
 * Resolve a set of column names to columns in dataset order (the canonical tie-break)
 */
export function orderByDataset(dataset: Dataset, names: Iterable<string>): Column[] {
  const wanted = new Set(names);
  return dataset.columns.filter((c) => wanted.has(c.normalizedName));
}
