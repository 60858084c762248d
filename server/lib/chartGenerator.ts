import type { CellValue, ChartKind, ChartSpec } from '../../shared/schema.js';
import { orderByDataset, type Column, type Dataset } from './datasetLoader.js';
import { formatNumber, isMissing, stringifyCell, toCellValue, type CellData } from './dataTransform.js';
import {
  crossTabulate,
  groupedMean,
  numericValues,
  quantile,
  round2,
  valueCounts,
} from './statisticalSummary.js';

const MAX_BINS = 10;
const BAR_TOP_CATEGORIES = 20;
const PIE_TOP_CATEGORIES = 10;

type ChartRow = Record<string, CellValue>;

// Sort helper for line charts: numbers and dates chronologically, everything else as text
function compareCells(a: CellData, b: CellData): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  return stringifyCell(a).localeCompare(stringifyCell(b));
}

/**
 * Equal-width bins between min and max; min(10, distinct values) bins, one bin for a constant column
 */
export function binNumericValues(values: readonly CellData[]): Array<{ label: string; count: number }> {
  const nums = numericValues(values);
  if (nums.length === 0) return [];

  const min = Math.min(...nums);
  const max = Math.max(...nums);
  const binCount = Math.min(MAX_BINS, new Set(nums).size);
  if (min === max || binCount <= 1) {
    return [{ label: `${formatNumber(min)}–${formatNumber(max)}`, count: nums.length }];
  }

  const width = (max - min) / binCount;
  const counts = new Array<number>(binCount).fill(0);
  for (const n of nums) {
    const index = Math.min(binCount - 1, Math.floor((n - min) / width));
    counts[index] += 1;
  }

  return counts.map((count, i) => {
    const lo = min + i * width;
    const hi = i === binCount - 1 ? max : min + (i + 1) * width;
    return { label: `${formatNumber(lo)}–${formatNumber(hi)}`, count };
  });
}

function binnedSpec(kind: 'bar' | 'histogram', column: Column): ChartSpec | null {
  const bins = binNumericValues(column.values);
  if (bins.length === 0) return null;
  return {
    type: kind,
    title: `Distribution of ${column.originalName}`,
    x: column.originalName,
    y: 'count',
    xLabel: column.originalName,
    yLabel: 'Count',
    aggregate: 'bins',
    data: bins.map((bin) => ({ [column.originalName]: bin.label, count: bin.count })),
  };
}

function countsSpec(kind: 'bar' | 'pie', column: Column, limit: number): ChartSpec | null {
  const counts = valueCounts(column.values).slice(0, limit);
  if (counts.length === 0) return null;
  return {
    type: kind,
    title: kind === 'pie' ? `${column.originalName} breakdown` : `${column.originalName} counts`,
    x: column.originalName,
    y: 'count',
    xLabel: column.originalName,
    yLabel: 'Count',
    aggregate: 'count',
    data: counts.map((entry) => ({ [column.originalName]: entry.label, count: entry.count })),
  };
}

/**
 * Bar over two columns: mean of a numeric column per group, or a cross-tab of two non-numeric ones
 */
export function groupedBarSpec(groupColumn: Column, valueColumn: Column): ChartSpec {
  const x = groupColumn.originalName;
  const y = valueColumn.originalName;

  if (valueColumn.type === 'numeric') {
    return {
      type: 'bar',
      title: `Average ${y} by ${x}`,
      x,
      y,
      xLabel: x,
      yLabel: `Average ${y}`,
      aggregate: 'mean',
      data: groupedMean(groupColumn.values, valueColumn.values).map((group) => ({ [x]: group.label, [y]: group.mean })),
    };
  }

  const tab = crossTabulate(groupColumn.values, valueColumn.values);
  return {
    type: 'bar',
    title: `${y} by ${x}`,
    x,
    y,
    xLabel: x,
    yLabel: 'Count',
    aggregate: 'count',
    data: tab.rowLabels.map((label, r) => {
      const row: ChartRow = { [x]: label };
      tab.columnLabels.forEach((columnLabel, c) => {
        row[columnLabel] = tab.counts[r][c];
      });
      return row;
    }),
  };
}

function barSpec(columns: readonly Column[]): ChartSpec | null {
  if (columns.length === 1) {
    const [column] = columns;
    return column.type === 'numeric' ? binnedSpec('bar', column) : countsSpec('bar', column, BAR_TOP_CATEGORIES);
  }

  let [group, value] = columns;
  // Group by the non-numeric side when only the first column is numeric
  if (group.type === 'numeric' && value.type !== 'numeric') {
    [group, value] = [value, group];
  }
  return groupedBarSpec(group, value);
}

function lineSpec(columns: readonly Column[]): ChartSpec | null {
  if (columns.length < 2) return null;
  const [xColumn, yColumn] = columns;

  const points: Array<[CellData, CellData]> = [];
  xColumn.values.forEach((xv, i) => {
    const yv = yColumn.values[i];
    if (!isMissing(xv) && !isMissing(yv)) points.push([xv, yv]);
  });
  points.sort((a, b) => compareCells(a[0], b[0]));

  return {
    type: 'line',
    title: `${yColumn.originalName} over ${xColumn.originalName}`,
    x: xColumn.originalName,
    y: yColumn.originalName,
    xLabel: xColumn.originalName,
    yLabel: yColumn.originalName,
    aggregate: 'none',
    data: points.map(([xv, yv]) => ({
      [xColumn.originalName]: toCellValue(xv),
      [yColumn.originalName]: toCellValue(yv),
    })),
  };
}

function scatterSpec(columns: readonly Column[]): ChartSpec | null {
  if (columns.length < 2) return null;
  const [xColumn, yColumn, colorColumn] = columns;

  const data: ChartRow[] = [];
  xColumn.values.forEach((xv, i) => {
    const yv = yColumn.values[i];
    if (isMissing(xv) || isMissing(yv)) return;
    const row: ChartRow = {
      [xColumn.originalName]: toCellValue(xv),
      [yColumn.originalName]: toCellValue(yv),
    };
    if (colorColumn) {
      row[colorColumn.originalName] = toCellValue(colorColumn.values[i]);
    }
    data.push(row);
  });

  return {
    type: 'scatter',
    title: `${yColumn.originalName} vs ${xColumn.originalName}`,
    x: xColumn.originalName,
    y: yColumn.originalName,
    ...(colorColumn ? { color: colorColumn.originalName } : {}),
    xLabel: xColumn.originalName,
    yLabel: yColumn.originalName,
    aggregate: 'none',
    data,
  };
}

function boxRow(group: string, values: readonly CellData[]): ChartRow | null {
  const sorted = numericValues(values).sort((a, b) => a - b);
  if (sorted.length === 0) return null;
  return {
    group,
    min: round2(sorted[0]),
    q1: round2(quantile(sorted, 0.25)),
    median: round2(quantile(sorted, 0.5)),
    q3: round2(quantile(sorted, 0.75)),
    max: round2(sorted[sorted.length - 1]),
  };
}

function boxSpec(columns: readonly Column[]): ChartSpec | null {
  const [first, second] = columns;
  let rows: Array<ChartRow | null>;
  let x: string;
  let y: string;

  if (!second) {
    if (first.type !== 'numeric') return null;
    rows = [boxRow(first.originalName, first.values)];
    x = first.originalName;
    y = first.originalName;
  } else if (first.type === 'numeric' && second.type === 'numeric') {
    // One box per column
    rows = [boxRow(first.originalName, first.values), boxRow(second.originalName, second.values)];
    x = 'column';
    y = 'value';
  } else if (first.type === 'numeric' || second.type === 'numeric') {
    const [group, value] = first.type === 'numeric' ? [second, first] : [first, second];
    const buckets = new Map<string, CellData[]>();
    group.values.forEach((g, i) => {
      if (isMissing(g)) return;
      const label = stringifyCell(g);
      const bucket = buckets.get(label) ?? [];
      bucket.push(value.values[i]);
      buckets.set(label, bucket);
    });
    rows = Array.from(buckets.entries()).map(([label, values]) => boxRow(label, values));
    x = group.originalName;
    y = value.originalName;
  } else {
    return null;
  }

  const data = rows.filter((row): row is ChartRow => row !== null);
  if (data.length === 0) return null;

  return {
    type: 'box',
    title: `Spread of ${y}`,
    x,
    y,
    xLabel: x,
    yLabel: y,
    aggregate: 'none',
    data,
  };
}

/**
 * Shape a chart for the named columns (taken in dataset order), or null when the kind does not fit their types:
 * histogram needs a numeric column, pie a non-numeric one, line and scatter two columns,
 * box a numeric value axis.
 */
export function buildChartSpec(dataset: Dataset, columnNames: Iterable<string>, kind: ChartKind): ChartSpec | null {
  const columns = orderByDataset(dataset, columnNames);
  console.log(`📊 Building ${kind} chart for [${columns.map((c) => c.originalName).join(', ')}]`);

  if (columns.length === 0) {
    console.warn(`❌ No columns for ${kind} chart`);
    return null;
  }

  let spec: ChartSpec | null = null;
  switch (kind) {
    case 'bar':
      spec = barSpec(columns);
      break;
    case 'histogram':
      spec = columns[0].type === 'numeric' ? binnedSpec('histogram', columns[0]) : null;
      break;
    case 'line':
      spec = lineSpec(columns);
      break;
    case 'scatter':
      spec = scatterSpec(columns);
      break;
    case 'pie':
      spec = columns[0].type === 'numeric' ? null : countsSpec('pie', columns[0], PIE_TOP_CATEGORIES);
      break;
    case 'box':
      spec = boxSpec(columns);
      break;
  }

  if (!spec) {
    console.warn(`❌ ${kind} chart does not fit columns [${columns.map((c) => `${c.originalName}:${c.type}`).join(', ')}]`);
  } else {
    console.log(`   ✅ ${spec.data.length} data points`);
  }
  return spec;
}

/**
 * Heatmap of a correlation matrix: one {x, y, value} cell per column pair
 */
export function buildHeatmapSpec(names: readonly string[], matrix: ReadonlyArray<ReadonlyArray<number | null>>): ChartSpec {
  const data: ChartRow[] = [];
  names.forEach((rowName, r) => {
    names.forEach((columnName, c) => {
      const value = matrix[r][c];
      data.push({ x: columnName, y: rowName, value: value === null ? null : round2(value) });
    });
  });

  return {
    type: 'heatmap',
    title: 'Correlation Heatmap',
    x: 'x',
    y: 'y',
    aggregate: 'none',
    data,
  };
}
