/**
 * Check Runner
 * Executes checks against a dataset and aggregates their results
 */

import type { ThresholdConfig } from '@/core/thresholds';
import { errorMessage } from '@/core/errors';
import { systemClock, type Clock } from '@/core/time';
import { createChildLogger } from '@/utils/logger';
import { buildResult, createIssue, overallStatus } from './result';
import type { Check, CheckResult, CheckStatus, Dataset, QualityReport } from './types';

const logger = createChildLogger('check_runner');

export interface RunChecksOptions {
  /** Table name stamped onto every result. */
  table?: string;
  now?: Clock;
}

export interface ReportSummary {
  total: number;
  passed: number;
  warning: number;
  failed: number;
  overall_status: CheckStatus;
}

function runSingleCheck(check: Check, dataset: Dataset, config: ThresholdConfig): CheckResult {
  try {
    return check.run(dataset, config);
  } catch (error) {
    logger.error({ check: check.name, error: errorMessage(error) }, 'Check raised an error');
    return buildResult(
      check.name,
      'failed',
      [createIssue('check_error', `Check could not complete: ${errorMessage(error)}`)]
    );
  }
}

/**
 * Run every check in caller order. A check that throws becomes a failed
 * result; the remaining checks still run. Every result is stamped with the
 * run's clock and table.
 */
export function runChecks(
  checks: readonly Check[],
  dataset: Dataset,
  config: ThresholdConfig,
  options: RunChecksOptions = {}
): QualityReport {
  const now = options.now ?? systemClock;

  const results = checks.map((check) => {
    const result = { ...runSingleCheck(check, dataset, config), timestamp: now().toISOString() };
    return options.table === undefined ? result : { ...result, table: options.table };
  });

  const report = buildReport(results, now());
  logger.info(
    { table: options.table, records: dataset.records.length, ...summarizeReport(report) },
    'Quality checks complete'
  );
  return report;
}

export function buildReport(results: CheckResult[], generatedAt: Date = new Date()): QualityReport {
  return {
    results,
    overall_status: overallStatus(results.map((result) => result.status)),
    generated_at: generatedAt.toISOString(),
  };
}

/**
 * Merge reports from several runs (e.g. one per table) into one, keeping
 * result order.
 */
export function combineReports(reports: readonly QualityReport[], generatedAt: Date = new Date()): QualityReport {
  return buildReport(
    reports.flatMap((report) => report.results),
    generatedAt
  );
}

export function summarizeReport(report: QualityReport): ReportSummary {
  const summary: ReportSummary = {
    total: report.results.length,
    passed: 0,
    warning: 0,
    failed: 0,
    overall_status: report.overall_status,
  };
  for (const result of report.results) {
    summary[result.status] += 1;
  }
  return summary;
}
