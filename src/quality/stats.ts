/**
 * Descriptive statistics over plain number arrays.
 * Callers guarantee non-empty input where a mean is needed.
 */

export function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  return sum(values) / values.length;
}

/** Population standard deviation (divides by n). */
export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const avg = mean(values);
  const variance = values.reduce((total, value) => total + (value - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function median(values: readonly number[]): number {
  if (values.length === 0) return NaN;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 0) {
    return (sorted[mid - 1] + sorted[mid]) / 2;
  }
  return sorted[mid];
}

export interface SummaryStatistics {
  mean: number;
  std: number;
  min: number;
  max: number;
  median: number;
}

export function summarize(values: readonly number[]): SummaryStatistics {
  return {
    mean: mean(values),
    std: populationStdDev(values),
    min: Math.min(...values),
    max: Math.max(...values),
    median: median(values),
  };
}
