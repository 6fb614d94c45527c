/**
 * Model Validator
 * Builds a ModelValidationReport from predictions, ground truth and
 * protected attributes
 */

import type { ThresholdConfig } from '@/core/thresholds';
import { DataLoadError, DimensionMismatchError } from '@/core/errors';
import { systemClock, type Clock } from '@/core/time';
import { columnValues, requireNumericColumn } from '@/quality/dataset';
import type { Dataset, Row, Scalar } from '@/quality/types';
import { createChildLogger } from '@/utils/logger';
import { analyzeBias, complianceStatus } from './bias';
import { validateHealthcareOutputs } from './healthcare_rules';
import {
  assertSameLength,
  assessPerformance,
  computeClassificationMetrics,
  computeRegressionMetrics,
} from './metrics';
import type {
  ClinicalContext,
  ClinicalOutputType,
  ModelValidationInput,
  ModelValidationReport,
} from './types';

const logger = createChildLogger('model_validator');

export interface ValidateModelOptions {
  now?: Clock;
}

export function validateModel(
  input: ModelValidationInput,
  config: ThresholdConfig,
  options: ValidateModelOptions = {}
): ModelValidationReport {
  const now = options.now ?? systemClock;
  const task = input.task ?? 'regression';
  const protectedAttributes = input.protected_attributes ?? {};

  // Every sequence must line up before anything is computed.
  assertSameLength('actual', input.predictions.length, input.actual);
  for (const [attribute, values] of Object.entries(protectedAttributes)) {
    assertSameLength(`protected_attributes.${attribute}`, input.predictions.length, values);
  }

  const metrics = computeRegressionMetrics(input.predictions, input.actual);
  const performance = assessPerformance(metrics, config);
  const classification =
    task === 'classification' ? computeClassificationMetrics(input.predictions, input.actual) : null;
  const bias = analyzeBias(input.predictions, input.actual, protectedAttributes, config);

  const healthcare = input.output_type
    ? validateHealthcareOutputs(
        input.predictions,
        {
          output_type: input.output_type,
          bias,
          classification,
          clinical_context: input.clinical_context,
        },
        config
      )
    : null;

  const report: ModelValidationReport = {
    model_name: input.model_name,
    model_version: input.model_version,
    timestamp: now().toISOString(),
    task,
    metrics,
    performance,
    classification_metrics: classification,
    bias_analysis: bias,
    healthcare_validation: healthcare,
    compliance_status: complianceStatus(bias),
  };

  logger.info(
    {
      model: input.model_name,
      version: input.model_version,
      records: input.predictions.length,
      rmse: metrics.rmse,
      r2: metrics.r2,
      performance: performance.status,
      flaggedAttributes: Object.keys(bias).filter((attribute) => bias[attribute].flagged),
      complianceStatus: report.compliance_status,
    },
    'Model validation complete'
  );

  return report;
}

/**
 * A trained model supplied by the serving collaborator.
 */
export interface PredictionModel {
  readonly name: string;
  readonly version: string;
  predict(records: readonly Row[]): readonly number[];
}

export interface DatasetValidationOptions {
  /** Column holding the ground truth. */
  target: string;
  protected_attributes?: readonly string[];
  task?: ModelValidationInput['task'];
  output_type?: ClinicalOutputType;
  clinical_context?: ClinicalContext;
  now?: Clock;
}

/**
 * Run `model` over the dataset and validate its predictions against the
 * target column.
 */
export function validateModelOnDataset(
  model: PredictionModel,
  dataset: Dataset,
  options: DatasetValidationOptions,
  config: ThresholdConfig
): ModelValidationReport {
  const actual = requireNumericColumn(dataset, options.target);
  const predictions = model.predict(dataset.records);
  if (predictions.length !== dataset.records.length) {
    throw new DimensionMismatchError('predictions', dataset.records.length, predictions.length);
  }

  const protectedAttributes: Record<string, Scalar[]> = {};
  for (const attribute of options.protected_attributes ?? []) {
    if (!dataset.columns.includes(attribute)) {
      throw new DataLoadError(`Protected attribute column ${attribute} is not present in the dataset`);
    }
    protectedAttributes[attribute] = columnValues(dataset, attribute);
  }

  return validateModel(
    {
      model_name: model.name,
      model_version: model.version,
      predictions,
      actual,
      protected_attributes: protectedAttributes,
      task: options.task,
      output_type: options.output_type,
      clinical_context: options.clinical_context,
    },
    config,
    { now: options.now }
  );
}
