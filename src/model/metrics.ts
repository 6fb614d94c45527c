import type { ThresholdConfig } from '@/core/thresholds';
import { DimensionMismatchError, InvalidInputError } from '@/core/errors';
import { mean } from '@/quality/stats';
import type {
  ClassificationMetrics,
  MetricThresholdCheck,
  PerformanceAssessment,
  RegressionMetrics,
} from './types';

export function assertSameLength(
  field: string,
  expected: number,
  values: { length: number }
): void {
  if (values.length !== expected) {
    throw new DimensionMismatchError(field, expected, values.length);
  }
}

function assertPaired(predictions: readonly number[], actual: readonly number[]): void {
  if (predictions.length === 0) {
    throw new DimensionMismatchError('predictions', 1, 0);
  }
  assertSameLength('actual', predictions.length, actual);
}

export function computeRegressionMetrics(
  predictions: readonly number[],
  actual: readonly number[]
): RegressionMetrics {
  assertPaired(predictions, actual);

  const errors = predictions.map((prediction, idx) => prediction - actual[idx]);
  const mse = mean(errors.map((error) => error ** 2));
  const mae = mean(errors.map((error) => Math.abs(error)));

  const actualMean = mean(actual);
  const ssRes = errors.reduce((total, error) => total + error ** 2, 0);
  const ssTot = actual.reduce((total, value) => total + (value - actualMean) ** 2, 0);

  return {
    mse,
    rmse: Math.sqrt(mse),
    mae,
    r2: ssTot === 0 ? null : 1 - ssRes / ssTot,
  };
}

/**
 * Compare metrics with the configured limits. rmse and mae are upper bounds,
 * r2 is a lower bound; limits set to null are not evaluated.
 */
export function assessPerformance(
  metrics: RegressionMetrics,
  config: ThresholdConfig
): PerformanceAssessment {
  const checks: MetricThresholdCheck[] = [];

  if (config.rmse_threshold !== null) {
    checks.push({
      metric: 'rmse',
      value: metrics.rmse,
      threshold: config.rmse_threshold,
      comparison: 'max',
      passed: metrics.rmse <= config.rmse_threshold,
    });
  }

  if (config.mae_threshold !== null) {
    checks.push({
      metric: 'mae',
      value: metrics.mae,
      threshold: config.mae_threshold,
      comparison: 'max',
      passed: metrics.mae <= config.mae_threshold,
    });
  }

  if (config.r2_threshold !== null) {
    checks.push({
      metric: 'r2',
      value: metrics.r2,
      threshold: config.r2_threshold,
      comparison: 'min',
      passed: metrics.r2 !== null && metrics.r2 >= config.r2_threshold,
    });
  }

  return {
    status: checks.every((check) => check.passed) ? 'passed' : 'failed',
    checks,
  };
}

export function isBinaryLabels(values: readonly number[]): boolean {
  return values.every((value) => value === 0 || value === 1);
}

function safeDivide(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Binary classification metrics over 0/1 labels, positive class 1.
 * Undefined precision/recall/f1 (empty denominators) are reported as 0.
 */
export function computeClassificationMetrics(
  predicted: readonly number[],
  actual: readonly number[]
): ClassificationMetrics {
  assertPaired(predicted, actual);
  if (!isBinaryLabels(predicted) || !isBinaryLabels(actual)) {
    throw new InvalidInputError('Classification metrics require binary 0/1 labels');
  }

  let tp = 0;
  let tn = 0;
  let fp = 0;
  let fn = 0;
  predicted.forEach((prediction, idx) => {
    const truth = actual[idx];
    if (prediction === 1 && truth === 1) tp += 1;
    else if (prediction === 0 && truth === 0) tn += 1;
    else if (prediction === 1) fp += 1;
    else fn += 1;
  });

  const precision = safeDivide(tp, tp + fp);
  const recall = safeDivide(tp, tp + fn);

  return {
    accuracy: (tp + tn) / predicted.length,
    precision,
    recall,
    f1: safeDivide(2 * precision * recall, precision + recall),
    confusion_matrix: [
      [tn, fp],
      [fn, tp],
    ],
  };
}
