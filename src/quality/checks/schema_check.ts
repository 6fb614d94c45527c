import type { Check, CheckStatus, Dataset, Issue, Scalar } from '../types';
import type { ThresholdConfig } from '@/core/thresholds';
import { columnValues, parseNumeric } from '../dataset';
import { buildResult, createIssue, emptyDatasetResult } from '../result';

export const SCHEMA_CHECK_NAME = 'schema_check';

export type ColumnType = 'integer' | 'float' | 'string';

export type ExpectedSchema = Readonly<Record<string, ColumnType>>;

/** Column layout of the insurance dataset (patients joined with charges). */
export const INSURANCE_SCHEMA: ExpectedSchema = {
  age: 'integer',
  sex: 'string',
  bmi: 'float',
  children: 'integer',
  smoker: 'string',
  region: 'string',
  charges: 'float',
};

export const PATIENTS_SCHEMA: ExpectedSchema = {
  id: 'integer',
  age: 'integer',
  sex: 'string',
  bmi: 'float',
  children: 'integer',
  smoker: 'string',
  region: 'string',
};

export const INSURANCE_CHARGES_SCHEMA: ExpectedSchema = {
  id: 'integer',
  patient_id: 'integer',
  charges: 'float',
  recorded_date: 'string',
};

export function isCoercible(value: Scalar, type: ColumnType): boolean {
  if (value === null) return true;
  switch (type) {
    case 'string':
      return true;
    case 'float':
      return typeof value === 'number' ? Number.isFinite(value) : parseNumeric(value) !== null;
    case 'integer': {
      const numeric = typeof value === 'number' ? value : parseNumeric(value);
      return numeric !== null && Number.isInteger(numeric);
    }
  }
}

function normalizeCategory(value: Scalar): string {
  return String(value).trim().toLowerCase();
}

/**
 * Validate the column set against `expected` and every value against its
 * declared type. Columns listed in `allowed_categories` are also checked
 * against their allowed values, ignoring case.
 */
export function createSchemaCheck(expected: ExpectedSchema = INSURANCE_SCHEMA): Check {
  const expectedColumns = Object.keys(expected);

  return {
    name: SCHEMA_CHECK_NAME,
    run(dataset: Dataset, config: ThresholdConfig) {
      if (dataset.records.length === 0) {
        return emptyDatasetResult(SCHEMA_CHECK_NAME);
      }

      const failures: Issue[] = [];
      const warnings: Issue[] = [];
      const present = new Set(dataset.columns);

      for (const column of expectedColumns) {
        if (!present.has(column)) {
          failures.push(
            createIssue('missing_column', `Expected column ${column} (${expected[column]}) is missing`, {
              column,
            })
          );
        }
      }

      for (const column of dataset.columns) {
        if (!(column in expected)) {
          warnings.push(
            createIssue('unexpected_column', `Column ${column} is not declared in the schema`, {
              column,
            })
          );
        }
      }

      for (const column of expectedColumns) {
        if (!present.has(column)) continue;
        const values = columnValues(dataset, column);

        const mismatches = values.filter((value) => !isCoercible(value, expected[column])).length;
        if (mismatches > 0) {
          failures.push(
            createIssue(
              'type_mismatch',
              `${mismatches} values in ${column} are not coercible to ${expected[column]}`,
              { column, count: mismatches }
            )
          );
        }

        const allowed = config.allowed_categories[column];
        if (!allowed) continue;
        const allowedSet = new Set(allowed.map((value) => value.toLowerCase()));
        const invalid = values.filter(
          (value) => value !== null && !allowedSet.has(normalizeCategory(value))
        );
        if (invalid.length > 0) {
          const samples = Array.from(new Set(invalid.map((value) => String(value)))).slice(0, 5);
          failures.push(
            createIssue(
              'invalid_category',
              `${invalid.length} values in ${column} outside [${allowed.join(', ')}]: ${samples.join(', ')}`,
              { column, count: invalid.length }
            )
          );
        }
      }

      const status: CheckStatus =
        failures.length > 0 ? 'failed' : warnings.length > 0 ? 'warning' : 'passed';

      return buildResult(SCHEMA_CHECK_NAME, status, [...failures, ...warnings]);
    },
  };
}
