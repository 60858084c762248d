import { isMissing, stringifyCell, toNumber, type CellData } from './dataTransform.js';

export interface NumericStats {
  count: number;
  sum: number;
  mean: number | null;
  median: number | null;
  min: number | null;
  max: number | null;
  std: number | null;
}

export interface CategoricalStats {
  count: number;
  uniqueValues: number;
  mostCommon: CellData;
  mostCommonCount: number;
}

export interface ValueCount {
  label: string;
  value: CellData;
  count: number;
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Non-missing numeric values of a column, row order kept
 */
export function numericValues(values: readonly CellData[]): number[] {
  return values
    .filter((v) => !isMissing(v))
    .map((v) => toNumber(v))
    .filter((v) => Number.isFinite(v));
}

export function mean(values: readonly number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Linear-interpolated quantile of an ascending array
 */
export function quantile(sorted: readonly number[], p: number): number {
  const position = (sorted.length - 1) * p;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  if (lower === upper) return sorted[lower];
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

export function median(values: readonly number[]): number {
  return quantile([...values].sort((a, b) => a - b), 0.5);
}

/**
 * Sample standard deviation (n - 1 denominator)
 */
export function sampleStd(values: readonly number[]): number {
  const avg = mean(values);
  const variance = values.reduce((acc, v) => acc + (v - avg) ** 2, 0) / (values.length - 1);
  return Math.sqrt(variance);
}

/**
 * Count/mean/median/min/max/std of a numeric column, rounded to 2 dp.
 * Mean and std need at least two values; median/min/max need one.
 */
export function describeNumeric(values: readonly CellData[]): NumericStats {
  const nums = numericValues(values);
  const count = nums.length;
  const sum = nums.reduce((a, b) => a + b, 0);

  return {
    count,
    sum: round2(sum),
    mean: count >= 2 ? round2(mean(nums)) : null,
    median: count >= 1 ? round2(median(nums)) : null,
    min: count >= 1 ? round2(Math.min(...nums)) : null,
    max: count >= 1 ? round2(Math.max(...nums)) : null,
    std: count >= 2 ? round2(sampleStd(nums)) : null,
  };
}

/**
 * Frequency of each distinct value, most frequent first; ties keep first-appearance order
 */
export function valueCounts(values: readonly CellData[]): ValueCount[] {
  const counts = new Map<string, ValueCount>();
  for (const value of values) {
    if (isMissing(value)) continue;
    const label = stringifyCell(value);
    const entry = counts.get(label);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(label, { label, value, count: 1 });
    }
  }
  // Array.prototype.sort is stable, so equal counts stay in insertion order
  return Array.from(counts.values()).sort((a, b) => b.count - a.count);
}

export function describeCategorical(values: readonly CellData[]): CategoricalStats {
  const counts = valueCounts(values);
  const top = counts[0];
  return {
    count: values.filter((v) => !isMissing(v)).length,
    uniqueValues: counts.length,
    mostCommon: top ? top.value : null,
    mostCommonCount: top ? top.count : 0,
  };
}

/**
 * Pearson correlation over rows where both sides are present; null when undefined
 */
export function pearsonCorrelation(xValues: readonly CellData[], yValues: readonly CellData[]): number | null {
  const x: number[] = [];
  const y: number[] = [];
  const n = Math.min(xValues.length, yValues.length);
  for (let i = 0; i < n; i++) {
    if (isMissing(xValues[i]) || isMissing(yValues[i])) continue;
    const xv = toNumber(xValues[i]);
    const yv = toNumber(yValues[i]);
    if (Number.isFinite(xv) && Number.isFinite(yv)) {
      x.push(xv);
      y.push(yv);
    }
  }
  if (x.length < 2) return null;

  const meanX = mean(x);
  const meanY = mean(y);
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;
  for (let i = 0; i < x.length; i++) {
    const dx = x[i] - meanX;
    const dy = y[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  const denominator = Math.sqrt(varianceX * varianceY);
  return denominator === 0 ? null : covariance / denominator;
}

export interface GroupAggregate {
  label: string;
  value: CellData;
  mean: number | null;
  count: number;
}

/**
 * Mean and count of `values` per distinct `groups` entry, groups in first-appearance order.
 * Rows with a missing group are skipped; count only covers present numeric values.
 */
export function groupedMean(groups: readonly CellData[], values: readonly CellData[]): GroupAggregate[] {
  const buckets = new Map<string, { value: CellData; nums: number[] }>();
  groups.forEach((group, i) => {
    if (isMissing(group)) return;
    const label = stringifyCell(group);
    let bucket = buckets.get(label);
    if (!bucket) {
      bucket = { value: group, nums: [] };
      buckets.set(label, bucket);
    }
    const v = values[i];
    if (!isMissing(v)) {
      const num = toNumber(v);
      if (Number.isFinite(num)) bucket.nums.push(num);
    }
  });

  return Array.from(buckets.entries()).map(([label, { value, nums }]) => ({
    label,
    value,
    mean: nums.length > 0 ? round2(mean(nums)) : null,
    count: nums.length,
  }));
}

export interface CrossTab {
  rowLabels: string[];
  columnLabels: string[];
  counts: number[][];
}

/**
 * Co-occurrence counts of two categorical columns, labels in first-appearance order
 */
export function crossTabulate(rowValues: readonly CellData[], columnValues: readonly CellData[]): CrossTab {
  const rowIndex = new Map<string, number>();
  const columnIndex = new Map<string, number>();
  const pairs: Array<[number, number]> = [];

  rowValues.forEach((r, i) => {
    const c = columnValues[i];
    if (isMissing(r) || isMissing(c)) return;
    const rowLabel = stringifyCell(r);
    const columnLabel = stringifyCell(c);
    if (!rowIndex.has(rowLabel)) rowIndex.set(rowLabel, rowIndex.size);
    if (!columnIndex.has(columnLabel)) columnIndex.set(columnLabel, columnIndex.size);
    pairs.push([rowIndex.get(rowLabel) ?? 0, columnIndex.get(columnLabel) ?? 0]);
  });

  const counts = Array.from({ length: rowIndex.size }, () => new Array<number>(columnIndex.size).fill(0));
  for (const [r, c] of pairs) {
    counts[r][c] += 1;
  }

  return {
    rowLabels: Array.from(rowIndex.keys()),
    columnLabels: Array.from(columnIndex.keys()),
    counts,
  };
}
