/**
 * CSV interchange for orders datasets and reports
 * Header row names the columns; comma delimited
 */

import Papa from 'papaparse';
import { NUMERIC_COLUMNS } from './constants/orders';
import { DatasetFormatError } from './errors';
import type { CellValue, Dataset, OrderRow, ReportColumn } from './types';

const DELIMITER = ',';
const NEWLINE = '\n';

function toCell(column: string, raw: string | undefined): CellValue {
  if (raw === undefined || raw === '') return null;
  if (!NUMERIC_COLUMNS.has(column)) return raw;

  const trimmed = raw.trim();
  const parsed = Number(trimmed);
  // Unparseable numbers stay as text
  return trimmed !== '' && Number.isFinite(parsed) ? parsed : raw;
}

/**
 * Parse an orders CSV into a dataset
 */
export function parseOrdersCsv(text: string): Dataset {
  if (text.trim() === '') {
    throw new DatasetFormatError('CSV is empty');
  }

  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    delimiter: DELIMITER,
    skipEmptyLines: true,
    transformHeader: header => header.trim(),
  });

  // Short rows are read with their missing trailing cells as null
  const fatal = result.errors.filter(error => error.code !== 'TooFewFields');
  if (fatal.length > 0) {
    const [first] = fatal;
    // Papa counts data rows from 0; report the file line, header being line 1
    const line = first.row === undefined ? null : first.row + 2;
    const where = line === null ? '' : ` (line ${line})`;
    throw new DatasetFormatError(`Could not parse CSV${where}: ${first.message}`, line);
  }

  const columns = result.meta.fields ?? [];
  if (columns.length === 0) {
    throw new DatasetFormatError('CSV has no header row');
  }

  const rows = result.data.map((record): OrderRow => {
    const row: Record<string, CellValue> = {};
    for (const column of columns) {
      row[column] = toCell(column, record[column]);
    }
    return row;
  });

  return { columns, rows };
}

// Every line, the last one included, ends with NEWLINE
function unparse(headers: string[], data: CellValue[][]): string {
  const csv = Papa.unparse({ fields: headers, data }, { delimiter: DELIMITER, newline: NEWLINE });
  return csv.endsWith(NEWLINE) ? csv : `${csv}${NEWLINE}`;
}

/**
 * Write a dataset as CSV, columns in dataset order
 */
export function datasetToCsv(dataset: Dataset): string {
  const headers = [...dataset.columns];
  const data = dataset.rows.map(row => headers.map(column => row[column] ?? null));
  return unparse(headers, data);
}

/**
 * Write report rows as CSV using the report's column layout
 */
export function reportToCsv<T>(
  rows: readonly T[],
  columns: readonly ReportColumn<T>[]
): string {
  const headers = columns.map(column => column.header);
  const data = rows.map(row => columns.map(column => toCellValue(row[column.key])));
  return unparse(headers, data);
}

function toCellValue(value: unknown): CellValue {
  if (typeof value === 'string' || typeof value === 'number') return value;
  return value == null ? null : String(value);
}
