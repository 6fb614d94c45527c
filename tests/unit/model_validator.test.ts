import { describe, expect, it } from 'vitest';
import { DataLoadError, DimensionMismatchError } from '@/core/errors';
import { createThresholdConfig } from '@/core/thresholds';
import { createDataset } from '@/quality/dataset';
import { validateModel, validateModelOnDataset, type PredictionModel } from '@/model/validator';
import { validateModelValidationReport } from '@/validation/ajv_instance';

const config = createThresholdConfig({ rmse_threshold: 6000, r2_threshold: 0.7, mae_threshold: 4000 });
const fixedNow = () => new Date('2026-01-05T10:00:00.000Z');

describe('validateModel', () => {
  it('builds a complete report for a regression model', () => {
    const report = validateModel(
      {
        model_name: 'charges_gbm',
        model_version: 'v1',
        predictions: [100, 200, 300],
        actual: [100, 200, 300],
        protected_attributes: { sex: ['male', 'female', 'male'] },
      },
      config,
      { now: fixedNow }
    );

    expect(report.model_name).toBe('charges_gbm');
    expect(report.model_version).toBe('v1');
    expect(report.timestamp).toBe('2026-01-05T10:00:00.000Z');
    expect(report.task).toBe('regression');
    expect(report.metrics).toEqual({ mse: 0, rmse: 0, mae: 0, r2: 1 });
    expect(report.performance.status).toBe('passed');
    expect(report.performance.checks).toHaveLength(3);
    expect(report.classification_metrics).toBeNull();
    expect(report.healthcare_validation).toBeNull();
    expect(report.bias_analysis.sex.disparity_metrics.mean_prediction).toEqual({ ratio: 1, difference: 0 });
    expect(report.compliance_status).toBe('compliant');
  });

  it('produces reports that satisfy the model validation schema', () => {
    const report = validateModel(
      {
        model_name: 'charges_gbm',
        model_version: 'v2',
        predictions: [9000, 17000, 14000, 12000],
        actual: [8000, 18000, 15000, 11000],
        protected_attributes: { smoker: ['no', 'yes', 'yes', 'no'], age: [23, 45, 61, null] },
        output_type: 'charges',
        clinical_context: { setting: 'emergency' },
      },
      config,
      { now: fixedNow }
    );
    const validation = validateModelValidationReport(report);

    expect(validation.errors).toBeNull();
    expect(report.healthcare_validation?.output_type).toBe('charges');
    expect(Object.keys(report.bias_analysis.age.groups)).toEqual(['23', '45', '61', 'null']);
  });

  it('flags non-compliance when an attribute exceeds the bias threshold', () => {
    const report = validateModel(
      {
        model_name: 'charges_gbm',
        model_version: 'v3',
        predictions: [100, 100, 1000, 1000],
        actual: [100, 100, 1000, 1000],
        protected_attributes: { sex: ['male', 'male', 'female', 'female'] },
      },
      config
    );
    expect(report.bias_analysis.sex.flagged).toBe(true);
    expect(report.compliance_status).toBe('non_compliant');
  });

  it('adds classification metrics for classification tasks', () => {
    const report = validateModel(
      {
        model_name: 'readmission',
        model_version: 'v1',
        predictions: [1, 0, 1, 1],
        actual: [1, 0, 0, 1],
        task: 'classification',
      },
      config
    );
    expect(report.classification_metrics?.accuracy).toBe(0.75);
    expect(report.classification_metrics?.confusion_matrix).toEqual([
      [1, 1],
      [0, 2],
    ]);
  });

  it('rejects sequences of unequal length', () => {
    expect(() =>
      validateModel(
        { model_name: 'm', model_version: 'v1', predictions: [1, 2, 3], actual: [1, 2] },
        config
      )
    ).toThrow(new DimensionMismatchError('actual', 3, 2));
    expect(() =>
      validateModel(
        {
          model_name: 'm',
          model_version: 'v1',
          predictions: [1, 2],
          actual: [1, 2],
          protected_attributes: { sex: ['male'] },
        },
        config
      )
    ).toThrow(DimensionMismatchError);
  });
});

describe('validateModelOnDataset', () => {
  const dataset = createDataset([
    { age: 19, sex: 'female', smoker: 'yes', charges: 16884.92 },
    { age: 33, sex: 'male', smoker: 'no', charges: 4449.46 },
  ]);

  const echoModel: PredictionModel = {
    name: 'echo',
    version: 'v1',
    predict: (records) => records.map((record) => (typeof record.charges === 'number' ? record.charges : 0)),
  };

  it('predicts over the dataset and validates against the target column', () => {
    const report = validateModelOnDataset(
      echoModel,
      dataset,
      { target: 'charges', protected_attributes: ['sex', 'smoker'], now: fixedNow },
      config
    );

    expect(report.model_name).toBe('echo');
    expect(report.metrics.rmse).toBe(0);
    expect(Object.keys(report.bias_analysis)).toEqual(['sex', 'smoker']);
    expect(report.timestamp).toBe('2026-01-05T10:00:00.000Z');
  });

  it('rejects a prediction count that does not match the records', () => {
    const silentModel: PredictionModel = { name: 'silent', version: 'v1', predict: () => [] };
    expect(() => validateModelOnDataset(silentModel, dataset, { target: 'charges' }, config)).toThrow(
      'Length mismatch for predictions: expected 2, got 0'
    );
  });

  it('requires protected attribute columns to exist', () => {
    expect(() =>
      validateModelOnDataset(echoModel, dataset, { target: 'charges', protected_attributes: ['region'] }, config)
    ).toThrow(DataLoadError);
  });
});
