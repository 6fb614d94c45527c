import { describe, expect, it } from 'vitest';
import { compareModelVersions } from '@/model/version_compare';
import type { ModelValidationReport, RegressionMetrics } from '@/model/types';

function report(version: string, metrics: RegressionMetrics): ModelValidationReport {
  return {
    model_name: 'charges_gbm',
    model_version: version,
    timestamp: '2026-01-05T10:00:00.000Z',
    task: 'regression',
    metrics,
    performance: { status: 'passed', checks: [] },
    classification_metrics: null,
    bias_analysis: {},
    healthcare_validation: null,
    compliance_status: 'compliant',
  };
}

describe('compareModelVersions', () => {
  it('computes deltas relative to the compared version', () => {
    const comparison = compareModelVersions(
      report('v2', { mse: 100, rmse: 10, mae: 8, r2: 0.8 }),
      report('v1', { mse: 100, rmse: 8, mae: 7.8, r2: 0.8 })
    );

    expect(comparison.base_version).toBe('v2');
    expect(comparison.compare_version).toBe('v1');
    expect(comparison.metric_deltas.rmse).toEqual({ absolute_change: 2, percentage_change: 25 });
    expect(comparison.metric_deltas.mse).toEqual({ absolute_change: 0, percentage_change: 0 });
    expect(comparison.significant_changes).toEqual([{ metric: 'rmse', change: 25, severity: 'high' }]);
  });

  it('grades changes between 5% and 10% as medium', () => {
    const comparison = compareModelVersions(
      report('v2', { mse: 100, rmse: 10.8, mae: 8, r2: 0.8 }),
      report('v1', { mse: 100, rmse: 10, mae: 8, r2: 0.8 })
    );
    expect(comparison.significant_changes).toHaveLength(1);
    expect(comparison.significant_changes[0].metric).toBe('rmse');
    expect(comparison.significant_changes[0].severity).toBe('medium');
    expect(comparison.significant_changes[0].change).toBeCloseTo(8, 10);
  });

  it('treats any change from a zero baseline as high severity', () => {
    const comparison = compareModelVersions(
      report('v2', { mse: 100, rmse: 10, mae: 8, r2: 0.5 }),
      report('v1', { mse: 100, rmse: 10, mae: 8, r2: 0 })
    );
    expect(comparison.metric_deltas.r2).toEqual({ absolute_change: 0.5, percentage_change: null });
    expect(comparison.significant_changes).toEqual([{ metric: 'r2', change: null, severity: 'high' }]);
  });

  it('skips metrics that are undefined on either side', () => {
    const comparison = compareModelVersions(
      report('v2', { mse: 100, rmse: 10, mae: 8, r2: null }),
      report('v1', { mse: 100, rmse: 10, mae: 8, r2: 0.8 })
    );
    expect(Object.keys(comparison.metric_deltas)).toEqual(['mse', 'rmse', 'mae']);
    expect(comparison.significant_changes).toEqual([]);
  });
});
