import { ColumnNameMap, getColumn, type Column, type Dataset } from './datasetLoader.js';
import { isMissing, toNumber, type CellData } from './dataTransform.js';

/**
 * Whether a question about revenue needs the derived Price × Quantity column
 */
export function needsRevenueColumn(question: string, dataset: Dataset): boolean {
  if (!question.toLowerCase().includes('revenue')) return false;
  if (dataset.columns.some((c) => c.normalizedName.includes('revenue') || c.originalName.toLowerCase().includes('revenue'))) {
    return false;
  }
  return getColumn(dataset, 'price')?.type === 'numeric' && getColumn(dataset, 'quantity')?.type === 'numeric';
}

/**
 * A view of the dataset with `revenue` appended when the question asks for it.
 * The dataset passed in is returned untouched otherwise; it is never modified.
 */
export function withDerivedColumns(question: string, dataset: Dataset): Dataset {
  if (!needsRevenueColumn(question, dataset)) return dataset;

  const price = getColumn(dataset, 'price');
  const quantity = getColumn(dataset, 'quantity');
  if (!price || !quantity) return dataset;

  const values: CellData[] = price.values.map((p, i) => {
    const q = quantity.values[i];
    if (isMissing(p) || isMissing(q)) return null;
    return toNumber(p) * toNumber(q);
  });

  const revenue: Column = {
    normalizedName: 'revenue',
    originalName: 'Revenue',
    type: 'numeric',
    values,
  };
  const columns = [...dataset.columns, revenue];

  console.log('➕ Derived Revenue = Price × Quantity for this question');

  return {
    columns,
    rowCount: dataset.rowCount,
    columnNames: new ColumnNameMap(columns.map((c): [string, string] => [c.normalizedName, c.originalName])),
  };
}
