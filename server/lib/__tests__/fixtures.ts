import { loadDataset, type Dataset, type RawTable } from '../datasetLoader.js';
import type { CellData } from '../dataTransform.js';

/**
 * Raw table from row objects; headers follow the first record's key order
 */
export function tableFromRecords(records: Array<Record<string, CellData>>): RawTable {
  const headers = Object.keys(records[0] ?? {});
  return {
    headers,
    rows: records.map((record) => headers.map((header) => record[header] ?? null)),
  };
}

export function datasetFromRecords(records: Array<Record<string, CellData>>): Dataset {
  return loadDataset(tableFromRecords(records));
}

export const salesRecords = (): Array<Record<string, CellData>> => [
  { Product: 'Laptop', Price: 1000, Quantity: 5 },
  { Product: 'Phone', Price: 800, Quantity: 10 },
];

export const customerRecords = (): Array<Record<string, CellData>> => [
  { Name: 'Ann', Age: 25, Region: 'North' },
  { Name: 'Ben', Age: 30, Region: 'South' },
  { Name: 'Cat', Age: 35, Region: 'North' },
  { Name: 'Dan', Age: 28, Region: 'East' },
  { Name: 'Eve', Age: 42, Region: 'North' },
];
