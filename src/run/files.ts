import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join } from 'path';
import { getEnvConfig } from '@/core/env';
import { errorMessage } from '@/core/errors';
import type { ModelValidationReport } from '@/model/types';
import { createChildLogger } from '@/utils/logger';
import { validateModelValidationReport } from '@/validation/ajv_instance';

const logger = createChildLogger('report_files');

export interface ReportFileInfo {
  filePath: string;
  report: ModelValidationReport;
  mtimeMs: number;
}

export interface LoadReportOptions {
  dir?: string;
  modelName?: string;
  limit?: number;
}

function parseReportFile(filePath: string): ModelValidationReport | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    logger.warn({ filePath, error: errorMessage(error) }, 'Skipping unreadable report file');
    return null;
  }

  const validation = validateModelValidationReport(parsed);
  if (!validation.valid || !validation.data) {
    logger.warn({ filePath, errors: validation.errors }, 'Skipping invalid report file');
    return null;
  }
  return validation.data;
}

/**
 * Saved model validation reports, newest first (by timestamp, then mtime,
 * then file name).
 */
export function loadValidationReports(options: LoadReportOptions = {}): ReportFileInfo[] {
  const dir = options.dir ?? getEnvConfig().validationResultsDir;
  const limit = options.limit ?? 20;

  if (!existsSync(dir)) {
    return [];
  }

  const parsed: ReportFileInfo[] = [];
  for (const file of readdirSync(dir).filter((f) => f.endsWith('.json'))) {
    const filePath = join(dir, file);
    const report = parseReportFile(filePath);
    if (!report) continue;
    if (options.modelName && report.model_name !== options.modelName) continue;
    parsed.push({ filePath, report, mtimeMs: statSync(filePath).mtimeMs });
  }

  return parsed
    .sort((a, b) => {
      const aDate = Date.parse(a.report.timestamp);
      const bDate = Date.parse(b.report.timestamp);
      if (bDate !== aDate) {
        return bDate - aDate;
      }
      if (b.mtimeMs !== a.mtimeMs) {
        return b.mtimeMs - a.mtimeMs;
      }
      return b.filePath.localeCompare(a.filePath);
    })
    .slice(0, limit);
}

export function getLatestValidationReport(
  modelName: string,
  version?: string,
  dir?: string
): ReportFileInfo | null {
  const reports = loadValidationReports({ dir, modelName, limit: Number.MAX_SAFE_INTEGER });
  const match = version ? reports.find((info) => info.report.model_version === version) : reports[0];
  return match ?? null;
}
