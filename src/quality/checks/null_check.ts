import type { Check, CheckStatus, Dataset, Issue } from '../types';
import type { ThresholdConfig } from '@/core/thresholds';
import { buildResult, createIssue, emptyDatasetResult, formatPct } from '../result';

export const NULL_CHECK_NAME = 'null_check';

export interface ColumnNullStats {
  column: string;
  null_count: number;
  null_pct: number;
}

export function computeNullStats(dataset: Dataset): ColumnNullStats[] {
  const total = dataset.records.length;
  return dataset.columns.map((column) => {
    const nullCount = dataset.records.filter((record) => record[column] === null).length;
    return {
      column,
      null_count: nullCount,
      null_pct: total === 0 ? 0 : (nullCount * 100) / total,
    };
  });
}

export const nullCheck: Check = {
  name: NULL_CHECK_NAME,
  run(dataset: Dataset, config: ThresholdConfig) {
    const total = dataset.records.length;
    if (total === 0) {
      return emptyDatasetResult(NULL_CHECK_NAME);
    }

    const issues: Issue[] = [];
    let status: CheckStatus = 'passed';

    for (const stats of computeNullStats(dataset)) {
      if (stats.null_count === 0) continue;

      const exceeded = stats.null_pct > config.null_pct_max;
      if (exceeded) {
        status = 'failed';
      } else if (status === 'passed') {
        status = 'warning';
      }

      issues.push(
        createIssue(
          'null_values',
          `${formatPct(stats.null_pct)} null values (${stats.null_count} of ${total} records)` +
            (exceeded ? `, above limit ${formatPct(config.null_pct_max)}` : ''),
          { column: stats.column, count: stats.null_count }
        )
      );
    }

    return buildResult(NULL_CHECK_NAME, status, issues);
  },
};
