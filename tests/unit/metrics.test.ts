import { describe, expect, it } from 'vitest';
import { DimensionMismatchError, InvalidInputError } from '@/core/errors';
import { createThresholdConfig } from '@/core/thresholds';
import {
  assessPerformance,
  computeClassificationMetrics,
  computeRegressionMetrics,
} from '@/model/metrics';

describe('computeRegressionMetrics', () => {
  it('returns perfect scores for identical sequences', () => {
    expect(computeRegressionMetrics([100, 200, 300], [100, 200, 300])).toEqual({
      mse: 0,
      rmse: 0,
      mae: 0,
      r2: 1,
    });
  });

  it('computes error metrics', () => {
    const metrics = computeRegressionMetrics([110, 190, 300], [100, 200, 300]);

    expect(metrics.mse).toBeCloseTo(200 / 3, 10);
    expect(metrics.rmse).toBeCloseTo(Math.sqrt(200 / 3), 10);
    expect(metrics.mae).toBeCloseTo(20 / 3, 10);
    expect(metrics.r2).toBeCloseTo(0.99, 10);
  });

  it('leaves r2 undefined for a constant ground truth', () => {
    expect(computeRegressionMetrics([1, 2, 3], [5, 5, 5]).r2).toBeNull();
  });

  it('rejects unequal and empty sequences', () => {
    expect(() => computeRegressionMetrics([1, 2, 3], [1, 2])).toThrow(
      new DimensionMismatchError('actual', 3, 2)
    );
    expect(() => computeRegressionMetrics([1, 2, 3], [1, 2])).toThrow('Length mismatch for actual: expected 3, got 2');
    expect(() => computeRegressionMetrics([], [])).toThrow(DimensionMismatchError);
  });
});

describe('assessPerformance', () => {
  const metrics = computeRegressionMetrics([110, 190, 300], [100, 200, 300]);

  it('checks rmse and mae as upper bounds and r2 as lower bound', () => {
    const config = createThresholdConfig({ rmse_threshold: 5, mae_threshold: 10, r2_threshold: 0.9 });
    const assessment = assessPerformance(metrics, config);

    expect(assessment.status).toBe('failed');
    expect(assessment.checks.map((check) => [check.metric, check.comparison, check.passed])).toEqual([
      ['rmse', 'max', false],
      ['mae', 'max', true],
      ['r2', 'min', true],
    ]);
  });

  it('skips limits that are not configured', () => {
    const assessment = assessPerformance(metrics, createThresholdConfig());
    expect(assessment).toEqual({ status: 'passed', checks: [] });
  });

  it('fails the r2 limit when r2 is undefined', () => {
    const flat = computeRegressionMetrics([1, 2, 3], [5, 5, 5]);
    const assessment = assessPerformance(flat, createThresholdConfig({ r2_threshold: 0.5 }));

    expect(assessment.status).toBe('failed');
    expect(assessment.checks).toEqual([
      { metric: 'r2', value: null, threshold: 0.5, comparison: 'min', passed: false },
    ]);
  });
});

describe('computeClassificationMetrics', () => {
  it('computes binary metrics and the confusion matrix', () => {
    const metrics = computeClassificationMetrics([1, 0, 1, 1, 0, 0], [1, 0, 0, 1, 1, 0]);

    expect(metrics.accuracy).toBeCloseTo(4 / 6, 10);
    expect(metrics.precision).toBeCloseTo(2 / 3, 10);
    expect(metrics.recall).toBeCloseTo(2 / 3, 10);
    expect(metrics.f1).toBeCloseTo(2 / 3, 10);
    expect(metrics.confusion_matrix).toEqual([
      [2, 1],
      [1, 2],
    ]);
  });

  it('reports 0 for undefined precision and recall', () => {
    const metrics = computeClassificationMetrics([0, 0, 0], [1, 0, 1]);
    expect(metrics.precision).toBe(0);
    expect(metrics.recall).toBe(0);
    expect(metrics.f1).toBe(0);
    expect(metrics.accuracy).toBeCloseTo(1 / 3, 10);
  });

  it('rejects non-binary labels', () => {
    expect(() => computeClassificationMetrics([0.4, 1], [0, 1])).toThrow(InvalidInputError);
  });
});
