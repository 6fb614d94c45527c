/**
 * Cross-group disparity of model predictions over protected attributes.
 *
 * Records are grouped by the raw attribute value (so continuous attributes
 * such as age produce one group per distinct value) unless bin edges are
 * configured for the attribute in `attribute_bins`. Groups smaller than
 * `min_group_size` are marked low_confidence. The analysis reports
 * magnitudes only.
 */

import type { ThresholdConfig } from '@/core/thresholds';
import type { Scalar } from '@/quality/types';
import { mean, populationStdDev } from '@/quality/stats';
import { assertSameLength, isBinaryLabels } from './metrics';
import type {
  AttributeBiasAnalysis,
  BiasAnalysis,
  ComplianceStatus,
  DisparityMetric,
  DisparityStatistic,
  ProtectedAttributeGroup,
} from './types';

/**
 * Label for a value given ascending edges: "<e0", "e0-e1" meaning [e0, e1),
 * ..., "eN+".
 */
export function binLabel(value: number, edges: readonly number[]): string {
  if (value < edges[0]) {
    return `<${edges[0]}`;
  }
  for (let idx = 1; idx < edges.length; idx++) {
    if (value < edges[idx]) {
      return `${edges[idx - 1]}-${edges[idx]}`;
    }
  }
  return `${edges[edges.length - 1]}+`;
}

export function groupKey(value: Scalar, edges?: readonly number[]): string {
  if (edges && edges.length > 0 && typeof value === 'number') {
    return binLabel(value, edges);
  }
  return value === null ? 'null' : String(value);
}

export function computeDisparity(values: readonly number[]): DisparityMetric {
  const max = Math.max(...values);
  const min = Math.min(...values);
  return {
    ratio: min > 0 ? max / min : null,
    difference: max - min,
  };
}

function falsePositiveRate(predictions: readonly number[], actual: readonly number[]): number {
  let negatives = 0;
  let falsePositives = 0;
  actual.forEach((truth, idx) => {
    if (truth !== 0) return;
    negatives += 1;
    if (predictions[idx] === 1) falsePositives += 1;
  });
  return negatives === 0 ? 0 : falsePositives / negatives;
}

export function analyzeAttribute(
  attributeName: string,
  attributeValues: readonly Scalar[],
  predictions: readonly number[],
  actual: readonly number[],
  config: ThresholdConfig
): AttributeBiasAnalysis {
  const edges = config.attribute_bins[attributeName];
  const binary = isBinaryLabels(predictions) && isBinaryLabels(actual);

  const indicesByGroup = new Map<string, number[]>();
  attributeValues.forEach((value, idx) => {
    const key = groupKey(value, edges);
    const indices = indicesByGroup.get(key) ?? [];
    indices.push(idx);
    indicesByGroup.set(key, indices);
  });

  const groupList = [...indicesByGroup].map(([key, indices]): ProtectedAttributeGroup => {
    const groupPredictions = indices.map((idx) => predictions[idx]);
    const groupActual = indices.map((idx) => actual[idx]);
    const meanPrediction = mean(groupPredictions);

    return {
      attribute_name: attributeName,
      group_value: key,
      size: indices.length,
      mean_prediction: meanPrediction,
      std_prediction: populationStdDev(groupPredictions),
      outcome_rate: mean(groupActual),
      prediction_rate: meanPrediction,
      false_positive_rate: binary ? falsePositiveRate(groupPredictions, groupActual) : 0,
      low_confidence: indices.length < config.min_group_size,
    };
  });
  // fromEntries defines own keys, so a "__proto__" group is kept.
  const groups = Object.fromEntries(
    groupList.map((group): [string, ProtectedAttributeGroup] => [group.group_value, group])
  );

  const disparityMetrics: Partial<Record<DisparityStatistic, DisparityMetric>> = {};
  if (groupList.length > 1) {
    const statistics: DisparityStatistic[] = binary
      ? ['mean_prediction', 'prediction_rate', 'false_positive_rate']
      : ['mean_prediction', 'prediction_rate'];
    for (const statistic of statistics) {
      disparityMetrics[statistic] = computeDisparity(groupList.map((group) => group[statistic]));
    }
  }

  const ratio = disparityMetrics.mean_prediction?.ratio ?? null;

  return {
    groups,
    disparity_metrics: disparityMetrics,
    flagged: ratio !== null && ratio > config.bias_threshold,
    binned: edges !== undefined && edges.length > 0,
  };
}

export function analyzeBias(
  predictions: readonly number[],
  actual: readonly number[],
  protectedAttributes: Readonly<Record<string, readonly Scalar[]>>,
  config: ThresholdConfig
): BiasAnalysis {
  assertSameLength('actual', predictions.length, actual);
  for (const [attribute, values] of Object.entries(protectedAttributes)) {
    assertSameLength(`protected_attributes.${attribute}`, predictions.length, values);
  }

  return Object.fromEntries(
    Object.entries(protectedAttributes).map(([attribute, values]): [string, AttributeBiasAnalysis] => [
      attribute,
      analyzeAttribute(attribute, values, predictions, actual, config),
    ])
  );
}

export function complianceStatus(bias: BiasAnalysis): ComplianceStatus {
  return Object.values(bias).some((attribute) => attribute.flagged) ? 'non_compliant' : 'compliant';
}

/** Largest mean_prediction ratio over all attributes; null when none is defined. */
export function maxDisparityRatio(bias: BiasAnalysis): number | null {
  const ratios = Object.values(bias)
    .map((attribute) => attribute.disparity_metrics.mean_prediction?.ratio ?? null)
    .filter((ratio): ratio is number => ratio !== null);
  return ratios.length > 0 ? Math.max(...ratios) : null;
}
