import type { CheckResult, CheckStatus, Issue, IssueType } from './types';

const STATUS_RANK: Record<CheckStatus, number> = {
  passed: 0,
  warning: 1,
  failed: 2,
};

/** Worst status of the given list (failed > warning > passed); passed when empty. */
export function overallStatus(statuses: readonly CheckStatus[]): CheckStatus {
  return statuses.reduce<CheckStatus>(
    (worst, status) => (STATUS_RANK[status] > STATUS_RANK[worst] ? status : worst),
    'passed'
  );
}

export function createIssue(
  type: IssueType,
  details: string,
  options: { column?: string; count?: number } = {}
): Issue {
  return Object.freeze({
    type,
    column: options.column ?? null,
    count: options.count ?? null,
    details,
  });
}

export function buildResult(
  checkName: string,
  status: CheckStatus,
  issues: Issue[],
  now: Date = new Date()
): CheckResult {
  return {
    check_name: checkName,
    status,
    issues,
    timestamp: now.toISOString(),
  };
}

export function emptyDatasetResult(checkName: string): CheckResult {
  return buildResult(checkName, 'passed', [
    createIssue('empty_dataset', 'Dataset contains no records; nothing to evaluate'),
  ]);
}

export function formatPct(value: number): string {
  return `${value.toFixed(2)}%`;
}
