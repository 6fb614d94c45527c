/**
 * Dataset materialization. Records are checked for a uniform column set and
 * scalar values before any check sees them.
 */

import { DataLoadError } from '@/core/errors';
import type { Dataset, Row, Scalar } from './types';

function isScalar(value: unknown): value is Scalar {
  return (
    value === null ||
    typeof value === 'string' ||
    (typeof value === 'number' && !Number.isNaN(value))
  );
}

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sameColumns(expected: readonly string[], actual: string[]): boolean {
  if (expected.length !== actual.length) return false;
  const expectedSet = new Set(expected);
  return actual.every((column) => expectedSet.has(column));
}

/**
 * Build a Dataset from raw records. Throws DataLoadError when a record is not
 * an object, carries a non-scalar value or deviates from the first record's
 * column set. `columns` declares the column set of an empty dataset.
 */
export function createDataset(rawRecords: readonly unknown[], columns?: readonly string[]): Dataset {
  const records: Row[] = [];
  let columnSet: readonly string[] | null = columns ? [...columns] : null;

  for (let index = 0; index < rawRecords.length; index++) {
    const raw = rawRecords[index];
    if (!isRecordObject(raw)) {
      throw new DataLoadError(`Record ${index} is not an object`);
    }

    const keys = Object.keys(raw);
    if (columnSet === null) {
      columnSet = keys;
    } else if (!sameColumns(columnSet, keys)) {
      throw new DataLoadError(
        `Record ${index} has columns [${keys.join(', ')}], expected [${columnSet.join(', ')}]`
      );
    }

    const row: Record<string, Scalar> = {};
    for (const key of keys) {
      const value = raw[key];
      if (value === undefined) {
        row[key] = null;
      } else if (isScalar(value)) {
        row[key] = value;
      } else {
        throw new DataLoadError(`Record ${index} column ${key} holds a non-scalar value`);
      }
    }
    records.push(Object.freeze(row));
  }

  return Object.freeze({
    columns: Object.freeze([...(columnSet ?? [])]),
    records: Object.freeze(records),
  });
}

export function columnValues(dataset: Dataset, column: string): Scalar[] {
  return dataset.records.map((record) => record[column] ?? null);
}

export function numericValues(values: readonly Scalar[]): number[] {
  return values.filter((value): value is number => typeof value === 'number');
}

/** Parse a numeric string; blank or non-finite text yields null. */
export function parseNumeric(value: string): number | null {
  if (value.trim().length === 0) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/** A column is numeric when it has at least one value and every non-null value is a number. */
export function isNumericColumn(dataset: Dataset, column: string): boolean {
  const values = columnValues(dataset, column).filter((value) => value !== null);
  return values.length > 0 && values.every((value) => typeof value === 'number');
}

/**
 * Read a column that must hold numbers only (nulls are not allowed).
 */
export function requireNumericColumn(dataset: Dataset, column: string): number[] {
  if (!dataset.columns.includes(column)) {
    throw new DataLoadError(`Column ${column} is not present in the dataset`);
  }
  return columnValues(dataset, column).map((value, index) => {
    if (typeof value !== 'number') {
      throw new DataLoadError(`Column ${column} record ${index} is not numeric`);
    }
    return value;
  });
}
