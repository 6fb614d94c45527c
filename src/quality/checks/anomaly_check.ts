import type { Check, CheckStatus, Dataset, Issue } from '../types';
import type { ColumnRange, ThresholdConfig } from '@/core/thresholds';
import { columnValues, isNumericColumn, numericValues, parseNumeric } from '../dataset';
import { buildResult, createIssue, emptyDatasetResult } from '../result';
import { mean, populationStdDev } from '../stats';

export const ANOMALY_CHECK_NAME = 'anomaly_check';

export interface ColumnAnomalyStats {
  column: string;
  mean: number;
  std: number;
  /** Record indices whose |z| exceeds the threshold. */
  zscore_indices: number[];
  /** Record indices outside the column's hard bound, when one is configured. */
  out_of_range_indices: number[];
}

export interface AnomalyCheckOptions {
  /**
   * Columns to inspect; defaults to every numeric column. Columns with a
   * `valid_ranges` entry are always inspected.
   */
  columns?: readonly string[];
}

function zscoreOutliers(values: readonly (number | null)[], threshold: number) {
  const present = values.filter((value): value is number => value !== null);
  const avg = mean(present);
  const std = populationStdDev(present);
  const indices: number[] = [];

  // Constant column: every z-score is zero.
  if (std > 0) {
    values.forEach((value, index) => {
      if (value !== null && Math.abs((value - avg) / std) > threshold) {
        indices.push(index);
      }
    });
  }

  return { mean: avg, std, indices };
}

function boundViolations(values: readonly (number | null)[], range: ColumnRange): number[] {
  const indices: number[] = [];
  values.forEach((value, index) => {
    if (value !== null && (value < range.min || value > range.max)) {
      indices.push(index);
    }
  });
  return indices;
}

function readNumericColumn(dataset: Dataset, column: string): (number | null)[] {
  return columnValues(dataset, column).map((value, index) => {
    if (value === null || typeof value === 'number') return value;
    const parsed = parseNumeric(value);
    if (parsed !== null) return parsed;
    throw new Error(`Column ${column} record ${index} holds non-numeric value "${value}"`);
  });
}

export function computeAnomalyStats(
  dataset: Dataset,
  config: ThresholdConfig,
  options: AnomalyCheckOptions = {}
): ColumnAnomalyStats[] {
  const selected = options.columns
    ? options.columns.filter((column) => dataset.columns.includes(column))
    : dataset.columns.filter((column) => isNumericColumn(dataset, column));
  const bounded = dataset.columns.filter(
    (column) => config.valid_ranges[column] !== undefined && !selected.includes(column)
  );
  const columns = [...selected, ...bounded];

  const stats: ColumnAnomalyStats[] = [];
  for (const column of columns) {
    const values = readNumericColumn(dataset, column);
    if (numericValues(values).length === 0) continue;

    const zscores = zscoreOutliers(values, config.zscore_max);
    const range = config.valid_ranges[column];
    stats.push({
      column,
      mean: zscores.mean,
      std: zscores.std,
      zscore_indices: zscores.indices,
      out_of_range_indices: range ? boundViolations(values, range) : [],
    });
  }
  return stats;
}

/**
 * Soft z-score anomalies (warning) and hard clinical bound violations
 * (failed) over numeric columns. The two are reported independently: a
 * plausible value may be a statistical outlier and an impossible value may
 * not be.
 */
export function createAnomalyCheck(options: AnomalyCheckOptions = {}): Check {
  return {
    name: ANOMALY_CHECK_NAME,
    run(dataset: Dataset, config: ThresholdConfig) {
      if (dataset.records.length === 0) {
        return emptyDatasetResult(ANOMALY_CHECK_NAME);
      }

      const issues: Issue[] = [];
      let hasZscore = false;
      let hasOutOfRange = false;

      for (const stats of computeAnomalyStats(dataset, config, options)) {
        if (stats.zscore_indices.length > 0) {
          hasZscore = true;
          issues.push(
            createIssue(
              'zscore_anomaly',
              `${stats.zscore_indices.length} values with |z| > ${config.zscore_max} ` +
                `(mean=${stats.mean.toFixed(2)}, std=${stats.std.toFixed(2)})`,
              { column: stats.column, count: stats.zscore_indices.length }
            )
          );
        }

        if (stats.out_of_range_indices.length > 0) {
          hasOutOfRange = true;
          const range = config.valid_ranges[stats.column];
          issues.push(
            createIssue(
              'out_of_range',
              `${stats.out_of_range_indices.length} values outside range [${range.min}, ${range.max}]`,
              { column: stats.column, count: stats.out_of_range_indices.length }
            )
          );
        }
      }

      const status: CheckStatus = hasOutOfRange ? 'failed' : hasZscore ? 'warning' : 'passed';
      return buildResult(ANOMALY_CHECK_NAME, status, issues);
    },
  };
}

export const anomalyCheck: Check = createAnomalyCheck();
