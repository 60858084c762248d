/**
 * Column Matching Utility
 * Maps the words of a question to dataset columns
 */

import type { Dataset } from '../../datasetLoader.js';

/**
 * Trigger term → substrings a column name may contain; consulted only when no column is named directly
 */
export const TERM_SYNONYMS: ReadonlyArray<readonly [term: string, synonyms: readonly string[]]> = [
  ['age', ['age']],
  ['income', ['income', 'salary', 'wage']],
  ['sales', ['sales', 'revenue']],
  ['price', ['price', 'cost', 'amount']],
  ['gender', ['gender', 'sex']],
  ['region', ['region', 'location', 'area']],
  ['department', ['department', 'dept']],
  ['employee', ['employee', 'staff', 'worker']],
  ['customer', ['customer', 'client']],
  ['date', ['date', 'time']],
  ['status', ['status', 'state']],
];

function mentionsColumnDirectly(query: string, normalizedName: string, originalName: string): boolean {
  if (query.includes(normalizedName.replace(/_/g, ' ')) || query.includes(normalizedName)) return true;
  const original = originalName.trim().toLowerCase();
  if (original && query.includes(original)) return true;
  return normalizedName.split('_').some((token) => token !== '' && query.includes(token));
}

function matchBySynonyms(query: string, dataset: Dataset): Set<string> {
  const found = new Set<string>();
  for (const [term, synonyms] of TERM_SYNONYMS) {
    if (!query.includes(term)) continue;
    for (const column of dataset.columns) {
      const original = column.originalName.toLowerCase();
      if (synonyms.some((s) => column.normalizedName.includes(s) || original.includes(s))) {
        found.add(column.normalizedName);
      }
    }
  }
  return found;
}

/**
 * Normalized names of the columns a question refers to.
 * Returns a set: callers needing a "first" column must order it themselves (see orderByDataset).
 */
export function resolveColumns(question: string, dataset: Dataset): Set<string> {
  const query = question.toLowerCase();

  const direct = new Set<string>();
  for (const column of dataset.columns) {
    if (mentionsColumnDirectly(query, column.normalizedName, column.originalName)) {
      direct.add(column.normalizedName);
    }
  }
  if (direct.size > 0) return direct;

  return matchBySynonyms(query, dataset);
}

/**
 * Find a dataset column by a loosely written name (case, spaces, underscores and dashes ignored)
 */
export function findMatchingColumn(searchName: string, dataset: Dataset): string | null {
  const squash = (s: string) => s.trim().toLowerCase().replace(/[\s_-]/g, '');
  const wanted = squash(searchName);
  if (!wanted) return null;

  for (const column of dataset.columns) {
    if (squash(column.normalizedName) === wanted || squash(column.originalName) === wanted) {
      return column.normalizedName;
    }
  }
  return null;
}
