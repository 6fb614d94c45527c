import type { ModelValidationReport } from './types';

export interface MetricDelta {
  absolute_change: number;
  /** null when the compared value is 0. */
  percentage_change: number | null;
}

export interface SignificantChange {
  metric: string;
  change: number | null;
  severity: 'medium' | 'high';
}

export interface VersionComparison {
  model_name: string;
  base_version: string;
  compare_version: string;
  metric_deltas: Record<string, MetricDelta>;
  significant_changes: SignificantChange[];
}

const SIGNIFICANT_PCT = 5;
const HIGH_SEVERITY_PCT = 10;

function numericMetrics(report: ModelValidationReport): Record<string, number> {
  const values: Record<string, number> = {};
  for (const [metric, value] of Object.entries(report.metrics)) {
    if (typeof value === 'number') values[metric] = value;
  }
  if (report.classification_metrics) {
    const { accuracy, precision, recall, f1 } = report.classification_metrics;
    Object.assign(values, { accuracy, precision, recall, f1 });
  }
  return values;
}

/**
 * Metric deltas of `base` relative to `other`. Changes beyond 5% are
 * significant, beyond 10% (or against a zero baseline) high severity.
 */
export function compareModelVersions(
  base: ModelValidationReport,
  other: ModelValidationReport
): VersionComparison {
  const baseMetrics = numericMetrics(base);
  const otherMetrics = numericMetrics(other);

  const metricDeltas: Record<string, MetricDelta> = {};
  const significantChanges: SignificantChange[] = [];

  for (const [metric, baseValue] of Object.entries(baseMetrics)) {
    const otherValue = otherMetrics[metric];
    if (otherValue === undefined) continue;

    const delta = baseValue - otherValue;
    const pct = otherValue !== 0 ? (delta / otherValue) * 100 : null;
    metricDeltas[metric] = { absolute_change: delta, percentage_change: pct };

    if (pct === null) {
      if (delta !== 0) {
        significantChanges.push({ metric, change: null, severity: 'high' });
      }
    } else if (Math.abs(pct) > SIGNIFICANT_PCT) {
      significantChanges.push({
        metric,
        change: pct,
        severity: Math.abs(pct) > HIGH_SEVERITY_PCT ? 'high' : 'medium',
      });
    }
  }

  return {
    model_name: base.model_name,
    base_version: base.model_version,
    compare_version: other.model_version,
    metric_deltas: metricDeltas,
    significant_changes: significantChanges,
  };
}
