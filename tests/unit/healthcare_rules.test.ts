import { describe, expect, it } from 'vitest';
import { InvalidInputError } from '@/core/errors';
import { createThresholdConfig } from '@/core/thresholds';
import { analyzeBias } from '@/model/bias';
import {
  checkRegulatoryBounds,
  healthcareValidationToCheckResult,
  isClinicalOutputType,
  validateHealthcareOutputs,
} from '@/model/healthcare_rules';
import { computeClassificationMetrics } from '@/model/metrics';

const config = createThresholdConfig();

describe('validateHealthcareOutputs', () => {
  it('passes charges that match the reference distribution', () => {
    const validation = validateHealthcareOutputs([8000, 18000], { output_type: 'charges' }, config);

    expect(validation.passed).toBe(true);
    expect(validation.total_outputs).toBe(2);
    expect(validation.statistics).toEqual({ mean: 13000, std: 5000, min: 8000, max: 18000, median: 13000 });
    expect(validation.rules.map((rule) => rule.rule)).toEqual([
      'distribution_shape',
      'clinical_range',
      'bias_threshold_ceiling',
    ]);
    expect(validation.rules[0].details).toEqual({
      expected_mean: 13000,
      actual_mean: 13000,
      expected_std: 5000,
      actual_std: 5000,
      mean_deviation: 0,
      std_deviation: 0,
      allowed_deviation: 500,
    });
  });

  it('fails a shifted distribution and out-of-range outputs', () => {
    const validation = validateHealthcareOutputs([-2000, 8000, 18000, 120000], { output_type: 'charges' }, config);
    const failed = validation.rules.filter((rule) => !rule.passed).map((rule) => rule.rule);

    expect(validation.passed).toBe(false);
    expect(failed).toEqual(['distribution_shape', 'clinical_range']);
    expect(validation.rules[1].details).toEqual({
      min: 0,
      max: 100000,
      out_of_range_count: 2,
      within_range_pct: 50,
    });
  });

  it('skips the distribution rule when no reference is configured', () => {
    const validation = validateHealthcareOutputs([22, 31], { output_type: 'bmi' }, config);
    expect(validation.rules.map((rule) => rule.rule)).toEqual(['clinical_range', 'bias_threshold_ceiling']);
    expect(validation.passed).toBe(true);
  });

  it('applies emergency cost limits', () => {
    const validation = validateHealthcareOutputs(
      [8000, 60000],
      { output_type: 'charges', clinical_context: { setting: 'emergency' } },
      config
    );
    const rule = validation.rules.find((entry) => entry.rule === 'emergency_cost');

    expect(rule).toEqual({
      rule: 'emergency_cost',
      passed: false,
      details: { high_cost_threshold: 50000, above_threshold_count: 1 },
    });
  });

  it('applies pediatric bmi limits', () => {
    const validation = validateHealthcareOutputs(
      [20, 45],
      { output_type: 'bmi', clinical_context: { population: 'pediatric' } },
      config
    );

    expect(validation.passed).toBe(false);
    expect(validation.rules.at(-1)).toEqual({
      rule: 'pediatric_bmi',
      passed: false,
      details: { pediatric_bmi_max: 40, above_threshold_count: 1 },
    });
  });

  it('rejects empty outputs', () => {
    expect(() => validateHealthcareOutputs([], { output_type: 'charges' }, config)).toThrow(
      new InvalidInputError('Healthcare validation requires at least one output')
    );
  });

  it('recognizes clinical output types', () => {
    expect(isClinicalOutputType('charges')).toBe(true);
    expect(isClinicalOutputType('weight')).toBe(false);
  });
});

describe('checkRegulatoryBounds', () => {
  it('fails a bias threshold above the regulatory ceiling', () => {
    const [ceiling] = checkRegulatoryBounds(createThresholdConfig({ bias_threshold: 1.2 }));
    expect(ceiling).toEqual({
      rule: 'bias_threshold_ceiling',
      passed: false,
      details: { bias_threshold: 1.2, ceiling: 1.15 },
    });
  });

  it('checks observed bias and accuracy', () => {
    const bias = analyzeBias([100, 1000], [100, 1000], { sex: ['male', 'female'] }, config);
    const classification = computeClassificationMetrics([1, 0, 1, 0], [1, 1, 0, 0]);
    const rules = checkRegulatoryBounds(config, bias, classification);

    expect(rules.map((rule) => [rule.rule, rule.passed])).toEqual([
      ['bias_threshold_ceiling', true],
      ['maximum_bias', false],
      ['minimum_accuracy', false],
    ]);
    expect(rules[1].details).toEqual({ max_disparity_ratio: 10, threshold: 1.1 });
    expect(rules[2].details).toEqual({ accuracy: 0.5, threshold: 0.9 });
  });

  it('passes maximum_bias when no ratio is defined', () => {
    const rules = checkRegulatoryBounds(config, {});
    expect(rules[1]).toEqual({
      rule: 'maximum_bias',
      passed: true,
      details: { max_disparity_ratio: null, threshold: 1.1 },
    });
  });
});

describe('healthcareValidationToCheckResult', () => {
  it('turns failed rules into rule_violation issues', () => {
    const validation = validateHealthcareOutputs(
      [20, 45],
      { output_type: 'bmi', clinical_context: { population: 'pediatric' } },
      config
    );
    const result = healthcareValidationToCheckResult(validation);

    expect(result.check_name).toBe('healthcare_rules');
    expect(result.status).toBe('failed');
    expect(result.issues).toEqual([
      {
        type: 'rule_violation',
        column: null,
        count: null,
        details: 'pediatric_bmi failed for bmi: pediatric_bmi_max=40, above_threshold_count=1',
      },
    ]);
  });

  it('passes when every rule passes', () => {
    const validation = validateHealthcareOutputs([8000, 18000], { output_type: 'charges' }, config);
    const result = healthcareValidationToCheckResult(validation);
    expect(result.status).toBe('passed');
    expect(result.issues).toEqual([]);
  });
});
