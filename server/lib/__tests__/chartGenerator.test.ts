import { describe, it, expect } from 'vitest';
import { binNumericValues, buildChartSpec, buildHeatmapSpec } from '../chartGenerator.js';
import { datasetFromRecords } from './fixtures.js';

const regional = () =>
  datasetFromRecords([
    { Region: 'North', Sales: 100, Units: 1 },
    { Region: 'South', Sales: 200, Units: 2 },
    { Region: 'North', Sales: 300, Units: 3 },
    { Region: 'East', Sales: 400, Units: 4 },
  ]);

describe('binNumericValues', () => {
  it('uses one equal-width bin per distinct value up to ten', () => {
    expect(binNumericValues([100, 200, 300, 400])).toEqual([
      { label: '100–175', count: 1 },
      { label: '175–250', count: 1 },
      { label: '250–325', count: 1 },
      { label: '325–400', count: 1 },
    ]);
  });

  it('puts a constant column in a single bin', () => {
    expect(binNumericValues([5, 5, null])).toEqual([{ label: '5–5', count: 2 }]);
  });

  it('caps the bin count at ten', () => {
    const values = Array.from({ length: 50 }, (_, i) => i);
    expect(binNumericValues(values)).toHaveLength(10);
  });
});

describe('buildChartSpec', () => {
  it('bins a numeric histogram, rows keyed by the column name and count', () => {
    const spec = buildChartSpec(regional(), ['sales'], 'histogram');

    expect(spec?.type).toBe('histogram');
    expect(spec?.x).toBe('Sales');
    expect(spec?.y).toBe('count');
    expect(spec?.data[0]).toEqual({ Sales: '100–175', count: 1 });
  });

  it('refuses a histogram of a categorical column and a pie of a numeric one', () => {
    expect(buildChartSpec(regional(), ['region'], 'histogram')).toBeNull();
    expect(buildChartSpec(regional(), ['sales'], 'pie')).toBeNull();
  });

  it('counts categories for a pie', () => {
    const spec = buildChartSpec(regional(), ['region'], 'pie');
    expect(spec?.data).toEqual([
      { Region: 'North', count: 2 },
      { Region: 'South', count: 1 },
      { Region: 'East', count: 1 },
    ]);
  });

  it('needs two columns for line and scatter', () => {
    expect(buildChartSpec(regional(), ['sales'], 'line')).toBeNull();
    expect(buildChartSpec(regional(), ['sales'], 'scatter')).toBeNull();
  });

  it('plots scatter points for two numeric columns', () => {
    const spec = buildChartSpec(regional(), ['sales', 'units'], 'scatter');
    expect(spec?.data).toHaveLength(4);
    expect(spec?.data[0]).toEqual({ Sales: 100, Units: 1 });
  });

  it('sorts line points by the x column', () => {
    const dataset = datasetFromRecords([
      { Day: 3, Value: 30 },
      { Day: 1, Value: 10 },
      { Day: 2, Value: 20 },
    ]);
    const spec = buildChartSpec(dataset, ['day', 'value'], 'line');
    expect(spec?.data).toEqual([
      { Day: 1, Value: 10 },
      { Day: 2, Value: 20 },
      { Day: 3, Value: 30 },
    ]);
  });

  it('averages a numeric column per category for a two-column bar, in dataset order', () => {
    const spec = buildChartSpec(regional(), new Set(['sales', 'region']), 'bar');

    expect(spec?.x).toBe('Region');
    expect(spec?.aggregate).toBe('mean');
    expect(spec?.data).toEqual([
      { Region: 'North', Sales: 200 },
      { Region: 'South', Sales: 200 },
      { Region: 'East', Sales: 400 },
    ]);
  });

  it('groups by the categorical side when the numeric column comes first', () => {
    const dataset = datasetFromRecords([
      { Sales: 10, Region: 'North' },
      { Sales: 30, Region: 'North' },
    ]);
    const spec = buildChartSpec(dataset, ['sales', 'region'], 'bar');
    expect(spec?.data).toEqual([{ Region: 'North', Sales: 20 }]);
  });

  it('summarises a numeric column as a box', () => {
    const spec = buildChartSpec(regional(), ['sales'], 'box');
    expect(spec?.data).toEqual([{ group: 'Sales', min: 100, q1: 175, median: 250, q3: 325, max: 400 }]);
  });

  it('draws one box per category for a categorical and numeric pair', () => {
    const spec = buildChartSpec(regional(), ['region', 'sales'], 'box');
    expect(spec?.x).toBe('Region');
    expect(spec?.data.map((row) => row.group)).toEqual(['North', 'South', 'East']);
    expect(spec?.data[0]).toEqual({ group: 'North', min: 100, q1: 150, median: 200, q3: 250, max: 300 });
  });

  it('has no box for a categorical column alone', () => {
    expect(buildChartSpec(regional(), ['region'], 'box')).toBeNull();
  });

  it('returns null without columns', () => {
    expect(buildChartSpec(regional(), [], 'bar')).toBeNull();
  });
});

describe('buildHeatmapSpec', () => {
  it('emits one cell per column pair', () => {
    const spec = buildHeatmapSpec(['A', 'B'], [
      [1, 0.456],
      [0.456, 1],
    ]);

    expect(spec.type).toBe('heatmap');
    expect(spec.data).toHaveLength(4);
    expect(spec.data[1]).toEqual({ x: 'B', y: 'A', value: 0.46 });
  });
});
