import type { Check, CheckStatus, Dataset, Issue, Scalar } from '../types';
import { columnValues } from '../dataset';
import { buildResult, createIssue, emptyDatasetResult } from '../result';

export const CONSISTENCY_CHECK_NAME = 'consistency_check';

export interface ConsistencyCheckOptions {
  /** Foreign key column in the checked dataset, e.g. patient_id. */
  column: string;
  reference: Dataset;
  /** Key column in the reference dataset, e.g. id. */
  referenceColumn: string;
  name?: string;
}

function keyOf(value: Scalar): string | null {
  return value === null ? null : String(value);
}

function distinctKeys(values: readonly Scalar[]): Set<string> {
  const keys = new Set<string>();
  for (const value of values) {
    const key = keyOf(value);
    if (key !== null) keys.add(key);
  }
  return keys;
}

/**
 * Referential integrity between two tables. Rows pointing at a key the
 * reference does not hold fail the check; reference keys nothing points at
 * are a warning.
 */
export function createConsistencyCheck(options: ConsistencyCheckOptions): Check {
  const name = options.name ?? CONSISTENCY_CHECK_NAME;

  return {
    name,
    run(dataset: Dataset) {
      if (dataset.records.length === 0) {
        return emptyDatasetResult(name);
      }

      const issues: Issue[] = [];
      if (!dataset.columns.includes(options.column)) {
        throw new Error(`Column ${options.column} is not present in the checked dataset`);
      }
      if (!options.reference.columns.includes(options.referenceColumn)) {
        throw new Error(`Column ${options.referenceColumn} is not present in the reference dataset`);
      }

      const referencedKeys = distinctKeys(columnValues(dataset, options.column));
      const referenceKeys = distinctKeys(columnValues(options.reference, options.referenceColumn));

      const missing = [...referencedKeys].filter((key) => !referenceKeys.has(key));
      const orphaned = [...referenceKeys].filter((key) => !referencedKeys.has(key));

      if (missing.length > 0) {
        issues.push(
          createIssue(
            'missing_reference',
            `${missing.length} distinct ${options.column} values have no matching ${options.referenceColumn} in the reference table`,
            { column: options.column, count: missing.length }
          )
        );
      }

      if (orphaned.length > 0) {
        issues.push(
          createIssue(
            'orphaned_record',
            `${orphaned.length} reference records are never referenced by ${options.column}`,
            { column: options.referenceColumn, count: orphaned.length }
          )
        );
      }

      const status: CheckStatus =
        missing.length > 0 ? 'failed' : orphaned.length > 0 ? 'warning' : 'passed';
      return buildResult(name, status, issues);
    },
  };
}
