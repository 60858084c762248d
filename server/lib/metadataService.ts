/**
 * Metadata Service
 * Read-only views over a loaded dataset: per-column metadata, dataset counts, content search
 */

import type { CellValue, ColumnInfo, DataSummary } from '../../shared/schema.js';
import { columnsOfType, type Column, type Dataset } from './datasetLoader.js';
import { isMissing, stringifyCell, toCellValue } from './dataTransform.js';
import { formatDate } from './dateUtils.js';
import { describeCategorical, mean, numericValues, round2, valueCounts } from './statisticalSummary.js';

export const SAMPLE_ROW_COUNT = 5;

function describeColumn(column: Column): ColumnInfo {
  const nonNullCount = column.values.filter((v) => !isMissing(v)).length;
  const info: ColumnInfo = {
    name: column.originalName,
    normalizedName: column.normalizedName,
    type: column.type,
    nonNullCount,
    nullCount: column.values.length - nonNullCount,
    uniqueValues: valueCounts(column.values).length,
  };

  if (column.type === 'numeric') {
    const nums = numericValues(column.values);
    info.min = nums.length > 0 ? round2(Math.min(...nums)) : null;
    info.max = nums.length > 0 ? round2(Math.max(...nums)) : null;
    info.mean = nums.length > 0 ? round2(mean(nums)) : null;
  } else if (column.type === 'datetime') {
    const times = column.values.flatMap((v) => (v instanceof Date && !isMissing(v) ? [v.getTime()] : []));
    info.min = times.length > 0 ? formatDate(new Date(Math.min(...times))) : null;
    info.max = times.length > 0 ? formatDate(new Date(Math.max(...times))) : null;
  } else {
    info.mostCommon = toCellValue(describeCategorical(column.values).mostCommon);
  }

  return info;
}

export function getColumnInfo(dataset: Dataset): ColumnInfo[] {
  return dataset.columns.map(describeColumn);
}

export function getSummaryStatistics(dataset: Dataset): DataSummary {
  const missingValues = dataset.columns.reduce(
    (total, column) => total + column.values.filter((v) => isMissing(v)).length,
    0
  );

  return {
    rowCount: dataset.rowCount,
    columnCount: dataset.columns.length,
    numericColumns: columnsOfType(dataset, 'numeric').length,
    categoricalColumns: columnsOfType(dataset, 'categorical').length,
    binaryColumns: columnsOfType(dataset, 'binary').length,
    datetimeColumns: columnsOfType(dataset, 'datetime').length,
    missingValues,
  };
}

/**
 * Normalized names of columns holding a value that contains the term (case-insensitive)
 */
export function searchColumnsByContent(dataset: Dataset, term: string): string[] {
  const needle = term.trim().toLowerCase();
  if (!needle) return [];

  return dataset.columns
    .filter((column) =>
      column.values.some((v) => !isMissing(v) && stringifyCell(v).toLowerCase().includes(needle))
    )
    .map((column) => column.normalizedName);
}

/**
 * Normalized names of columns whose name (or a word of it) contains one of the keywords
 */
export function getColumnSuggestions(dataset: Dataset, keywords: string[]): string[] {
  const needles = keywords.map((k) => k.trim().toLowerCase()).filter(Boolean);

  return dataset.columns
    .filter((column) => {
      const haystacks = [
        column.normalizedName,
        column.originalName.toLowerCase(),
        ...column.normalizedName.split('_'),
      ];
      return needles.some((needle) => haystacks.some((h) => h.includes(needle)));
    })
    .map((column) => column.normalizedName);
}

/**
 * First rows keyed by original column names
 */
export function getSampleRows(dataset: Dataset, count = SAMPLE_ROW_COUNT): Record<string, CellValue>[] {
  const rows: Record<string, CellValue>[] = [];
  for (let i = 0; i < Math.min(count, dataset.rowCount); i++) {
    const row: Record<string, CellValue> = {};
    for (const column of dataset.columns) {
      row[column.originalName] = toCellValue(column.values[i]);
    }
    rows.push(row);
  }
  return rows;
}
