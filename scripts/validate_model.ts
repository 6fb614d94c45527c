/**
 * Model Validation Script
 * Validates saved predictions against ground truth and writes the report
 *
 * Usage: npx tsx scripts/validate_model.ts <input.json> [--out dir] [--compare version]
 *
 * The input file holds model_name, model_version, predictions, actual and
 * optionally protected_attributes, task, output_type and clinical_context.
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getEnvConfig } from '../src/core/env';
import { errorMessage } from '../src/core/errors';
import { getThresholdConfig } from '../src/core/thresholds';
import { loadModelInputFile } from '../src/data/files';
import { healthcareValidationToCheckResult } from '../src/model/healthcare_rules';
import { validateModel } from '../src/model/validator';
import { compareModelVersions } from '../src/model/version_compare';
import { getLatestValidationReport } from '../src/run/files';
import { writeModelValidationReport } from '../src/run/writer';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('validate_model');

interface CliOptions {
  inputPath: string;
  outDir: string;
  compareVersion?: string;
}

function parseArgs(argv: string[]): CliOptions {
  const flags: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const eq = arg.indexOf('=');
    if (eq > 0) {
      flags[arg.slice(2, eq)] = arg.slice(eq + 1);
    } else {
      flags[arg.slice(2)] = argv[i + 1] ?? '';
      i += 1;
    }
  }

  const [inputPath] = positional;
  if (!inputPath) {
    throw new Error('Usage: tsx scripts/validate_model.ts <input.json> [--out dir] [--compare version]');
  }
  return {
    inputPath,
    outDir: flags.out || getEnvConfig().validationResultsDir,
    compareVersion: flags.compare || undefined,
  };
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  const input = loadModelInputFile(options.inputPath);
  const report = validateModel(input, getThresholdConfig());
  const written = writeModelValidationReport(report, { dir: options.outDir });

  console.log(`Model: ${report.model_name} ${report.model_version}`);
  console.log(`Report: ${written.filePath}`);
  console.log(
    `RMSE ${report.metrics.rmse.toFixed(2)}  MAE ${report.metrics.mae.toFixed(2)}  R2 ${
      report.metrics.r2 === null ? 'n/a' : report.metrics.r2.toFixed(4)
    }`
  );
  console.log(`Performance: ${report.performance.status}`);
  for (const [attribute, analysis] of Object.entries(report.bias_analysis)) {
    const ratio = analysis.disparity_metrics.mean_prediction?.ratio;
    console.log(
      `  ${attribute}: ${Object.keys(analysis.groups).length} groups, ratio ${
        ratio === undefined || ratio === null ? 'n/a' : ratio.toFixed(3)
      }${analysis.flagged ? ' FLAGGED' : ''}`
    );
  }
  if (report.healthcare_validation) {
    const healthcare = healthcareValidationToCheckResult(report.healthcare_validation);
    console.log(`Healthcare rules: ${healthcare.status}`);
    for (const issue of healthcare.issues) {
      console.log(`  ${issue.details}`);
    }
  }
  console.log(`Compliance: ${report.compliance_status}`);

  if (options.compareVersion) {
    const previous = getLatestValidationReport(report.model_name, options.compareVersion, options.outDir);
    if (!previous) {
      logger.warn({ version: options.compareVersion }, 'No saved report for comparison version');
    } else {
      const comparison = compareModelVersions(report, previous.report);
      console.log(`\nCompared with ${comparison.compare_version}:`);
      for (const change of comparison.significant_changes) {
        const pct = change.change === null ? 'from zero' : `${change.change.toFixed(1)}%`;
        console.log(`  ${change.metric}: ${pct} (${change.severity})`);
      }
      if (comparison.significant_changes.length === 0) {
        console.log('  no significant changes');
      }
    }
  }

  if (report.performance.status === 'failed' || report.compliance_status === 'non_compliant') {
    process.exitCode = 1;
  }
}

try {
  main();
} catch (error) {
  logger.error({ error: errorMessage(error) }, 'Model validation failed');
  process.exitCode = 2;
}
