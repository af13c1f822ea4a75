/**
 * Errors raised while reading or reporting on an orders dataset
 */

/**
 * A column the computation needs is absent, or holds a value it cannot use
 */
export class SchemaError extends Error {
  readonly missing: string[];
  readonly row: number | null;

  constructor(message: string, missing: string[], row: number | null = null) {
    super(message);
    this.name = 'SchemaError';
    this.missing = missing;
    this.row = row;
  }

  static missingColumns(columns: string[]): SchemaError {
    const label = columns.length === 1 ? 'column' : 'columns';
    return new SchemaError(`Missing required ${label}: ${columns.join(', ')}`, columns);
  }

  static invalidValue(column: string, row: number): SchemaError {
    return new SchemaError(`Column "${column}" holds a non-numeric value at row ${row}`, [column], row);
  }
}

/**
 * The payload could not be read as a delimited table
 */
export class DatasetFormatError extends Error {
  readonly line: number | null;

  constructor(message: string, line: number | null = null) {
    super(message);
    this.name = 'DatasetFormatError';
    this.line = line;
  }
}

/**
 * The upload exceeds the configured byte limit
 */
export class UploadTooLargeError extends Error {
  readonly limit: number;

  constructor(limit: number) {
    super(`file too large (limit ${limit} bytes)`);
    this.name = 'UploadTooLargeError';
    this.limit = limit;
  }
}
