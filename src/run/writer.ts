/**
 * Report Writer
 * Saves quality and model validation reports to disk
 */

import { writeFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import { getEnvConfig } from '@/core/env';
import { InvalidInputError } from '@/core/errors';
import { formatFileStamp, systemClock, type Clock } from '@/core/time';
import type { ModelValidationReport } from '@/model/types';
import type { QualityReport } from '@/quality/types';
import { contentHash } from '@/utils/hash';
import { createChildLogger } from '@/utils/logger';
import {
  validateModelValidationReport,
  validateQualityReport,
  type ValidationResult,
} from '@/validation/ajv_instance';

const logger = createChildLogger('report_writer');

export interface WriteResult {
  filePath: string;
  contentHash: string;
}

export interface WriteOptions {
  /** Target directory; defaults to the directory configured in the environment. */
  dir?: string;
  now?: Clock;
}

function assertValid<T>(kind: string, validation: ValidationResult<T>): void {
  if (!validation.valid) {
    throw new InvalidInputError(
      `${kind} failed schema validation: ${(validation.errors ?? []).join('; ')}`
    );
  }
}

function writeJson(dir: string, fileName: string, value: unknown): WriteResult {
  // Ensure directory exists
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const filePath = join(dir, fileName);
  const hash = contentHash(value);
  writeFileSync(filePath, JSON.stringify(value, null, 2), 'utf-8');

  return { filePath, contentHash: hash };
}

export function writeQualityReport(report: QualityReport, options: WriteOptions = {}): WriteResult {
  assertValid('Quality report', validateQualityReport(report));

  const dir = options.dir ?? getEnvConfig().qualityResultsDir;
  const now = options.now ?? systemClock;
  const result = writeJson(dir, `${formatFileStamp(now())}_quality_report.json`, report);

  logger.info(
    { filePath: result.filePath, overallStatus: report.overall_status, checks: report.results.length },
    'Quality report written'
  );
  return result;
}

export function writeModelValidationReport(
  report: ModelValidationReport,
  options: WriteOptions = {}
): WriteResult {
  assertValid('Model validation report', validateModelValidationReport(report));

  const dir = options.dir ?? getEnvConfig().validationResultsDir;
  const now = options.now ?? systemClock;
  const fileName = `${report.model_name}_${report.model_version}_${formatFileStamp(now())}.json`;
  const result = writeJson(dir, fileName, report);

  logger.info(
    {
      filePath: result.filePath,
      model: report.model_name,
      version: report.model_version,
      complianceStatus: report.compliance_status,
    },
    'Model validation report written'
  );
  return result;
}
