/**
 * Error taxonomy shared by dataset loading and query execution.
 * Every error carries a stable `code` so the HTTP layer and tests can tell them apart.
 */

export type AnalysisErrorCode =
  | 'SCHEMA_ERROR'
  | 'DUPLICATE_COLUMN'
  | 'EMPTY_DATASET'
  | 'TOO_MANY_ROWS'
  | 'COLUMN_COUNT'
  | 'UNRESOLVED_QUERY'
  | 'INSUFFICIENT_COLUMNS'
  | 'UNSUPPORTED_CHART'
  | 'CLASSIFIER_UNAVAILABLE';

export abstract class AnalysisError extends Error {
  abstract readonly code: AnalysisErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised while loading a dataset; the session keeps its previous dataset
 */
export class SchemaError extends AnalysisError {
  readonly code: AnalysisErrorCode = 'SCHEMA_ERROR';
}

export class DuplicateColumnError extends SchemaError {
  readonly code: AnalysisErrorCode = 'DUPLICATE_COLUMN';

  constructor(readonly duplicates: string[]) {
    super(
      `Column names result in duplicates after normalization (${duplicates.join(', ')}). Please ensure column names are distinct.`
    );
  }
}

export class EmptyDatasetError extends SchemaError {
  readonly code: AnalysisErrorCode = 'EMPTY_DATASET';

  constructor() {
    super('The file is empty.');
  }
}

export class TooManyRowsError extends SchemaError {
  readonly code: AnalysisErrorCode = 'TOO_MANY_ROWS';

  constructor(readonly rowCount: number, readonly maxRows: number) {
    super(`File has ${rowCount} rows. Maximum allowed is ${maxRows} rows.`);
  }
}

export class ColumnCountError extends SchemaError {
  readonly code: AnalysisErrorCode = 'COLUMN_COUNT';

  constructor(readonly columnCount: number, readonly maxColumns: number) {
    super(
      columnCount < 1
        ? 'File must have at least 1 column.'
        : `File has ${columnCount} columns. Maximum allowed is ${maxColumns} columns.`
    );
  }
}

export class UnresolvedQueryError extends AnalysisError {
  readonly code: AnalysisErrorCode = 'UNRESOLVED_QUERY';
}

export class InsufficientColumnsError extends AnalysisError {
  readonly code: AnalysisErrorCode = 'INSUFFICIENT_COLUMNS';
}

export class UnsupportedChartError extends AnalysisError {
  readonly code: AnalysisErrorCode = 'UNSUPPORTED_CHART';
}

/**
 * Internal only: triggers the keyword fallback and is never shown to the user
 */
export class ClassifierUnavailableError extends AnalysisError {
  readonly code: AnalysisErrorCode = 'CLASSIFIER_UNAVAILABLE';
}
