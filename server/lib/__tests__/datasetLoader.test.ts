import { describe, it, expect } from 'vitest';
import {
  columnsOfType,
  getColumn,
  inferColumnType,
  isBinaryColumn,
  loadDataset,
  MAX_COLUMNS,
  normalizeColumnName,
  orderByDataset,
} from '../datasetLoader.js';
import {
  ColumnCountError,
  DuplicateColumnError,
  EmptyDatasetError,
  SchemaError,
  TooManyRowsError,
} from '../errors.js';
import { datasetFromRecords, salesRecords } from './fixtures.js';

describe('normalizeColumnName', () => {
  it('lowercases and replaces spaces and punctuation with single underscores', () => {
    expect(normalizeColumnName('Customer Name')).toBe('customer_name');
    expect(normalizeColumnName('  Price ($) ')).toBe('price');
    expect(normalizeColumnName('Units--Sold')).toBe('units_sold');
  });

  it('falls back to unnamed_column when nothing survives', () => {
    expect(normalizeColumnName('%%%')).toBe('unnamed_column');
  });

  it('is idempotent', () => {
    for (const name of ['Customer Name', '  Price ($) ', '__Total__Sales__', 'Q1 2024 / Revenue', '%%%']) {
      const once = normalizeColumnName(name);
      expect(normalizeColumnName(once)).toBe(once);
    }
  });
});

describe('inferColumnType', () => {
  it('treats yes/no values as binary regardless of case and padding', () => {
    expect(inferColumnType(['Yes', 'No', ' yes ', null])).toBe('binary');
  });

  it('keeps 0/1 and 0/1/2 numbers numeric', () => {
    expect(inferColumnType([0, 1, 1, 0])).toBe('numeric');
    expect(inferColumnType([0, 1, 2])).toBe('numeric');
    expect(isBinaryColumn([0, 1, 1, 0])).toBe(true);
    expect(isBinaryColumn([0, 1, 2])).toBe(false);
  });

  it('detects date strings as datetime', () => {
    expect(inferColumnType(['2024-01-15', '2024-02-20'])).toBe('datetime');
    expect(inferColumnType(['Jan-24', 'Feb-24'])).toBe('datetime');
  });

  it('never treats plain numbers as dates', () => {
    expect(inferColumnType([20240115, 20240220])).toBe('numeric');
  });

  it('falls back to categorical', () => {
    expect(inferColumnType(['Laptop', 'Phone', 'Tablet'])).toBe('categorical');
    expect(inferColumnType(['Laptop', 3])).toBe('categorical');
  });

  it('classifies an all-missing column as numeric', () => {
    expect(inferColumnType([null, '', null])).toBe('numeric');
  });
});

describe('loadDataset', () => {
  it('builds columns with normalized and original names', () => {
    const dataset = datasetFromRecords(salesRecords());

    expect(dataset.rowCount).toBe(2);
    expect(dataset.columns.map((c) => c.normalizedName)).toEqual(['product', 'price', 'quantity']);
    expect(dataset.columns.map((c) => c.type)).toEqual(['categorical', 'numeric', 'numeric']);
    expect(getColumn(dataset, 'price')?.values).toEqual([1000, 800]);
  });

  it('round-trips names through the column name map', () => {
    const dataset = loadDataset({
      headers: ['Customer Name', 'Annual Income ($)', 'Region'],
      rows: [['Ann', 52000, 'North']],
    });

    for (const column of dataset.columns) {
      expect(dataset.columnNames.toOriginal(column.normalizedName)).toBe(column.originalName);
      expect(dataset.columnNames.toNormalized(column.originalName)).toBe(column.normalizedName);
    }
    expect(dataset.columnNames.toOriginal('annual_income')).toBe('Annual Income ($)');
  });

  it('gives every column exactly one of the four types', () => {
    const dataset = loadDataset({
      headers: ['When', 'Amount', 'Member', 'City'],
      rows: [
        ['2024-01-15', 10, 'Yes', 'Oslo'],
        ['2024-03-01', 12.5, 'No', 'Lima'],
      ],
    });

    expect(dataset.columns.map((c) => c.type)).toEqual(['datetime', 'numeric', 'binary', 'categorical']);
    expect(columnsOfType(dataset, 'numeric', 'binary').map((c) => c.normalizedName)).toEqual(['amount', 'member']);
  });

  it('coerces datetime columns to Date values', () => {
    const dataset = loadDataset({ headers: ['When'], rows: [['2024-01-15'], [null]] });
    const [first, second] = dataset.columns[0].values;

    expect(first).toBeInstanceOf(Date);
    expect(first instanceof Date && first.getFullYear()).toBe(2024);
    expect(first instanceof Date && first.getMonth()).toBe(0);
    expect(second).toBeNull();
  });

  it('only samples the first ten values to decide on datetime and nulls later failures', () => {
    const values = ['2024-01-01', '2024-01-02', '2024-01-03', '2024-01-04', '2024-01-05',
      '2024-01-06', '2024-01-07', '2024-01-08', '2024-01-09', '2024-01-10', 'not a date'];
    const dataset = loadDataset({ headers: ['Day'], rows: values.map((v) => [v]) });

    expect(dataset.columns[0].type).toBe('datetime');
    expect(dataset.columns[0].values[10]).toBeNull();
  });

  it('pads short rows with nulls', () => {
    const dataset = loadDataset({ headers: ['A', 'B'], rows: [[1], [2, 3]] });
    expect(getColumn(dataset, 'b')?.values).toEqual([null, 3]);
  });

  it('rejects names that collide after normalization', () => {
    const load = () => loadDataset({ headers: ['Total Sales', 'total_sales'], rows: [[1, 2]] });

    expect(load).toThrow(DuplicateColumnError);
    expect(load).toThrow(SchemaError);
    expect(load).toThrow(/total_sales/);
  });

  it('rejects an empty table', () => {
    expect(() => loadDataset({ headers: ['A'], rows: [] })).toThrow(EmptyDatasetError);
    expect(() => loadDataset({ headers: [], rows: [] })).toThrow(ColumnCountError);
  });

  it('rejects more than 500 rows', () => {
    const rows = Array.from({ length: 501 }, (_, i) => [i]);
    expect(() => loadDataset({ headers: ['N'], rows })).toThrow(TooManyRowsError);
    expect(() => loadDataset({ headers: ['N'], rows: rows.slice(0, 500) })).not.toThrow();
  });

  it('rejects more than 20 columns', () => {
    const headers = Array.from({ length: MAX_COLUMNS + 1 }, (_, i) => `col${i}`);
    expect(() => loadDataset({ headers, rows: [headers.map(() => 1)] })).toThrow(
      'File has 21 columns. Maximum allowed is 20 columns.'
    );
  });
});

describe('orderByDataset', () => {
  it('returns columns in dataset order whatever the set order', () => {
    const dataset = datasetFromRecords(salesRecords());
    const ordered = orderByDataset(dataset, new Set(['quantity', 'product', 'missing']));
    expect(ordered.map((c) => c.normalizedName)).toEqual(['product', 'quantity']);
  });
});
