/**
 * Column access helpers shared by the profit step and the aggregations
 */

import { SchemaError } from '../errors';
import type { Dataset, OrderRow } from '../types';

/**
 * Throw a SchemaError naming every required column the dataset lacks
 */
export function requireColumns(dataset: Dataset, required: readonly string[]): void {
  const missing = required.filter(column => !dataset.columns.includes(column));
  if (missing.length > 0) {
    throw SchemaError.missingColumns(missing);
  }
}

/**
 * Read a numeric cell; numeric text is accepted, anything else is a SchemaError
 */
export function readNumber(row: OrderRow, column: string, rowIndex: number): number {
  const value = row[column];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  throw SchemaError.invalidValue(column, rowIndex);
}

/**
 * Read a grouping key; null, absent and empty cells have no key
 */
export function readKey(row: OrderRow, column: string): string | null {
  const value = row[column];
  if (value === null || value === undefined || value === '') {
    return null;
  }
  return typeof value === 'number' ? String(value) : value;
}

/**
 * Plain code-point ordering, independent of locale
 */
export function compareText(a: string, b: string): number {
  let index = 0;
  while (index < a.length && index < b.length) {
    const left = a.codePointAt(index) ?? 0;
    const right = b.codePointAt(index) ?? 0;
    if (left !== right) return left < right ? -1 : 1;
    // Equal code points span the same number of units in both strings
    index += left > 0xffff ? 2 : 1;
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}
