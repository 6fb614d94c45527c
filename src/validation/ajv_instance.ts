/**
 * Ajv validation instance with schema validators
 * Every report handed to a collaborator must validate against its schema
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { loadSchema, type SchemaName } from './schema_loader';
import type { ThresholdOverrides } from '@/core/thresholds';
import type { QualityReport } from '@/quality/types';
import type { ModelValidationInput, ModelValidationReport } from '@/model/types';

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

// Lazy-loaded validators
let thresholdValidator: ValidateFunction<ThresholdOverrides> | null = null;
let qualityReportValidator: ValidateFunction<QualityReport> | null = null;
let modelValidationValidator: ValidateFunction<ModelValidationReport> | null = null;
let modelInputValidator: ValidateFunction<ModelValidationInput> | null = null;

function compile<T>(schemaName: SchemaName): ValidateFunction<T> {
  return ajv.compile<T>(loadSchema(schemaName));
}

export function getThresholdValidator(): ValidateFunction<ThresholdOverrides> {
  if (!thresholdValidator) {
    thresholdValidator = compile<ThresholdOverrides>('threshold_config.v1');
  }
  return thresholdValidator;
}

export function getQualityReportValidator(): ValidateFunction<QualityReport> {
  if (!qualityReportValidator) {
    qualityReportValidator = compile<QualityReport>('quality_report.v1');
  }
  return qualityReportValidator;
}

export function getModelValidationValidator(): ValidateFunction<ModelValidationReport> {
  if (!modelValidationValidator) {
    modelValidationValidator = compile<ModelValidationReport>('model_validation.v1');
  }
  return modelValidationValidator;
}

export function getModelInputValidator(): ValidateFunction<ModelValidationInput> {
  if (!modelInputValidator) {
    modelInputValidator = compile<ModelValidationInput>('model_input.v1');
  }
  return modelInputValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateThresholdOverrides(data: unknown): ValidationResult<ThresholdOverrides> {
  return runValidator(getThresholdValidator(), data);
}

export function validateQualityReport(data: unknown): ValidationResult<QualityReport> {
  return runValidator(getQualityReportValidator(), data);
}

export function validateModelValidationReport(
  data: unknown
): ValidationResult<ModelValidationReport> {
  return runValidator(getModelValidationValidator(), data);
}

export function validateModelInput(data: unknown): ValidationResult<ModelValidationInput> {
  return runValidator(getModelInputValidator(), data);
}
