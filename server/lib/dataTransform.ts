import type { CellValue } from '../../shared/schema.js';
import { formatDate } from './dateUtils.js';

/**
 * A value held by a dataset column; datetime columns hold Date instances
 */
export type CellData = string | number | boolean | Date | null;

export function isMissing(value: CellData | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  if (value instanceof Date) return Number.isNaN(value.getTime());
  return false;
}

/**
 * Numeric view of a cell: numbers as-is, booleans as 1/0, everything else NaN
 */
export function toNumber(value: CellData | undefined): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.getTime();
  return NaN;
}

/**
 * String form used for matching and grouping ("Yes", "42", "2024-01-15")
 */
export function stringifyCell(value: CellData | undefined): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return formatDate(value);
  return String(value);
}

/**
 * Convert a dataset value into the wire cell format
 */
export function toCellValue(value: CellData | undefined): CellValue {
  if (value === undefined || isMissing(value)) return null;
  if (value instanceof Date) return formatDate(value);
  return value;
}

/**
 * Print a number with at most 2 decimals and no grouping separators
 */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 100) / 100;
  return Object.is(rounded, -0) ? '0' : String(rounded);
}
