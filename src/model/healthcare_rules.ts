/**
 * Healthcare domain rules over model outputs: distribution shape against a
 * reference, clinical bounds, regulatory limits and clinical-context checks.
 * Every rule carries the compared numbers in `details`.
 */

import type { ThresholdConfig } from '@/core/thresholds';
import { InvalidInputError } from '@/core/errors';
import { summarize, type SummaryStatistics } from '@/quality/stats';
import { buildResult, createIssue } from '@/quality/result';
import type { CheckResult } from '@/quality/types';
import { maxDisparityRatio } from './bias';
import type {
  BiasAnalysis,
  ClassificationMetrics,
  ClinicalContext,
  ClinicalOutputType,
  HealthcareRuleResult,
  HealthcareValidation,
} from './types';

export const HEALTHCARE_RULES_CHECK_NAME = 'healthcare_rules';

export const CLINICAL_OUTPUT_TYPES: readonly ClinicalOutputType[] = ['age', 'bmi', 'children', 'charges'];

export function isClinicalOutputType(value: string): value is ClinicalOutputType {
  return CLINICAL_OUTPUT_TYPES.some((type) => type === value);
}

export interface HealthcareValidationOptions {
  output_type: ClinicalOutputType;
  bias?: BiasAnalysis;
  classification?: ClassificationMetrics | null;
  clinical_context?: ClinicalContext;
}

export function checkDistributionShape(
  statistics: SummaryStatistics,
  outputType: ClinicalOutputType,
  config: ThresholdConfig
): HealthcareRuleResult | null {
  const reference = config.output_distributions[outputType];
  if (!reference) return null;

  const allowedDeviation = reference.expected_std * config.distribution_tolerance;
  const meanDeviation = Math.abs(statistics.mean - reference.expected_mean);
  const stdDeviation = Math.abs(statistics.std - reference.expected_std);

  return {
    rule: 'distribution_shape',
    passed: meanDeviation <= allowedDeviation && stdDeviation <= allowedDeviation,
    details: {
      expected_mean: reference.expected_mean,
      actual_mean: statistics.mean,
      expected_std: reference.expected_std,
      actual_std: statistics.std,
      mean_deviation: meanDeviation,
      std_deviation: stdDeviation,
      allowed_deviation: allowedDeviation,
    },
  };
}

export function checkClinicalRange(
  outputs: readonly number[],
  outputType: ClinicalOutputType,
  config: ThresholdConfig
): HealthcareRuleResult | null {
  const range = config.valid_ranges[outputType];
  if (!range) return null;

  const outOfRange = outputs.filter((value) => value < range.min || value > range.max).length;

  return {
    rule: 'clinical_range',
    passed: outOfRange === 0,
    details: {
      min: range.min,
      max: range.max,
      out_of_range_count: outOfRange,
      within_range_pct: ((outputs.length - outOfRange) / outputs.length) * 100,
    },
  };
}

export function checkRegulatoryBounds(
  config: ThresholdConfig,
  bias?: BiasAnalysis,
  classification?: ClassificationMetrics | null
): HealthcareRuleResult[] {
  const rules: HealthcareRuleResult[] = [
    {
      rule: 'bias_threshold_ceiling',
      passed: config.bias_threshold <= config.regulatory.max_bias_ratio,
      details: {
        bias_threshold: config.bias_threshold,
        ceiling: config.regulatory.max_bias_ratio,
      },
    },
  ];

  if (bias) {
    const maxRatio = maxDisparityRatio(bias);
    rules.push({
      rule: 'maximum_bias',
      passed: maxRatio === null || maxRatio <= config.bias_threshold,
      details: {
        max_disparity_ratio: maxRatio,
        threshold: config.bias_threshold,
      },
    });
  }

  if (classification) {
    rules.push({
      rule: 'minimum_accuracy',
      passed: classification.accuracy >= config.regulatory.minimum_accuracy,
      details: {
        accuracy: classification.accuracy,
        threshold: config.regulatory.minimum_accuracy,
      },
    });
  }

  return rules;
}

export function checkClinicalContext(
  outputs: readonly number[],
  outputType: ClinicalOutputType,
  context: ClinicalContext,
  config: ThresholdConfig
): HealthcareRuleResult[] {
  const rules: HealthcareRuleResult[] = [];

  if (context.setting === 'emergency' && outputType === 'charges') {
    const limit = config.clinical_context.emergency_high_cost;
    const above = outputs.filter((value) => value > limit).length;
    rules.push({
      rule: 'emergency_cost',
      passed: above === 0,
      details: { high_cost_threshold: limit, above_threshold_count: above },
    });
  }

  if (context.population === 'pediatric' && outputType === 'bmi') {
    const limit = config.clinical_context.pediatric_bmi_max;
    const above = outputs.filter((value) => value > limit).length;
    rules.push({
      rule: 'pediatric_bmi',
      passed: above === 0,
      details: { pediatric_bmi_max: limit, above_threshold_count: above },
    });
  }

  return rules;
}

export function validateHealthcareOutputs(
  outputs: readonly number[],
  options: HealthcareValidationOptions,
  config: ThresholdConfig
): HealthcareValidation {
  if (outputs.length === 0) {
    throw new InvalidInputError('Healthcare validation requires at least one output');
  }
  if (!isClinicalOutputType(options.output_type)) {
    throw new InvalidInputError(
      `Invalid output_type: ${options.output_type}. Must be one of: ${CLINICAL_OUTPUT_TYPES.join(', ')}`
    );
  }

  const statistics = summarize(outputs);
  const rules: HealthcareRuleResult[] = [];

  const distribution = checkDistributionShape(statistics, options.output_type, config);
  if (distribution) rules.push(distribution);

  const range = checkClinicalRange(outputs, options.output_type, config);
  if (range) rules.push(range);

  rules.push(...checkRegulatoryBounds(config, options.bias, options.classification));

  if (options.clinical_context) {
    rules.push(...checkClinicalContext(outputs, options.output_type, options.clinical_context, config));
  }

  return {
    output_type: options.output_type,
    total_outputs: outputs.length,
    statistics,
    rules,
    passed: rules.every((rule) => rule.passed),
  };
}

function formatDetails(details: HealthcareRuleResult['details']): string {
  return Object.entries(details)
    .map(([key, value]) => `${key}=${typeof value === 'number' ? Number(value.toFixed(4)) : value}`)
    .join(', ');
}

/**
 * Express a healthcare validation in the standard check result shape so it
 * can sit in a QualityReport next to the dataset checks.
 */
export function healthcareValidationToCheckResult(validation: HealthcareValidation): CheckResult {
  const issues = validation.rules
    .filter((rule) => !rule.passed)
    .map((rule) =>
      createIssue('rule_violation', `${rule.rule} failed for ${validation.output_type}: ${formatDetails(rule.details)}`)
    );
  return buildResult(HEALTHCARE_RULES_CHECK_NAME, issues.length > 0 ? 'failed' : 'passed', issues);
}
