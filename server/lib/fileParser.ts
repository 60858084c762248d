import { parse } from 'csv-parse/sync';
import * as XLSX from 'xlsx';
import type { RawTable } from './datasetLoader.js';
import type { CellData } from './dataTransform.js';
import { EmptyDatasetError, SchemaError } from './errors.js';

export const SUPPORTED_EXTENSIONS = ['csv', 'xlsx', 'xls'] as const;

export function getFileExtension(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot === -1 ? '' : filename.slice(dot + 1).toLowerCase();
}

export async function parseFile(buffer: Buffer, filename: string): Promise<RawTable> {
  const ext = getFileExtension(filename);

  if (ext === 'csv') {
    return toRawTable(readRecords(() => parseCsv(buffer)));
  } else if (ext === 'xlsx' || ext === 'xls') {
    return toRawTable(readRecords(() => parseExcel(buffer)));
  } else {
    throw new SchemaError('Unsupported file format. Please upload CSV or Excel files.');
  }
}

// A file the parser cannot read is a rejected upload, not a server fault
function readRecords(read: () => unknown[]): unknown[] {
  try {
    return read();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SchemaError(`Could not read file: ${message}`);
  }
}

function parseCsv(buffer: Buffer): unknown[] {
  const content = buffer.toString('utf-8');
  const records: unknown = parse(content, {
    bom: true,
    cast: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return Array.isArray(records) ? records : [];
}

// First sheet only; date cells arrive as Date instances
function parseExcel(buffer: Buffer): unknown[] {
  const workbook = XLSX.read(buffer, { type: 'buffer', cellDates: true });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) return [];
  const worksheet = workbook.Sheets[sheetName];
  return XLSX.utils.sheet_to_json<unknown[]>(worksheet, { header: 1, raw: true, defval: null, blankrows: false });
}

function toCell(value: unknown): CellData {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value;
  if (typeof value === 'number' || typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.trim() === '' ? null : value;
  return String(value);
}

/**
 * Header row + value rows; blank headers become "Unnamed: <index>", fully empty rows are dropped
 */
function toRawTable(records: unknown[]): RawTable {
  const lines = records.map((record) => (Array.isArray(record) ? record.map(toCell) : []));
  const [headerLine, ...valueLines] = lines;
  if (!headerLine) {
    throw new EmptyDatasetError();
  }

  const rows = valueLines.filter((line) => line.some((cell) => cell !== null));
  const width = Math.max(headerLine.length, ...rows.map((row) => row.length));

  const headers: string[] = [];
  for (let i = 0; i < width; i++) {
    const cell = headerLine[i];
    const header = cell === null || cell === undefined ? '' : String(cell).trim();
    headers.push(header || `Unnamed: ${i}`);
  }

  return {
    headers,
    rows: rows.map((row) => headers.map((_, i) => row[i] ?? null)),
  };
}
