/**
 * Quality Check Script
 * Runs the dataset checks over the patients and insurance_charges tables
 * and writes a combined quality report
 *
 * Usage: npx tsx scripts/run_quality_checks.ts [--db path] [--out dir]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getEnvConfig } from '../src/core/env';
import { errorMessage } from '../src/core/errors';
import { getThresholdConfig } from '../src/core/thresholds';
import { closeDatabase, loadTable, openDatabase } from '../src/data/db';
import { createAnomalyCheck } from '../src/quality/checks/anomaly_check';
import { createConsistencyCheck } from '../src/quality/checks/consistency_check';
import { nullCheck } from '../src/quality/checks/null_check';
import {
  createSchemaCheck,
  INSURANCE_CHARGES_SCHEMA,
  PATIENTS_SCHEMA,
} from '../src/quality/checks/schema_check';
import { combineReports, runChecks, summarizeReport } from '../src/quality/runner';
import { writeQualityReport } from '../src/run/writer';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('run_quality_checks');

interface CliOptions {
  dbPath: string;
  outDir: string;
}

function readFlag(argv: string[], name: string): string | undefined {
  const eqArg = argv.find((arg) => arg.startsWith(`${name}=`));
  if (eqArg) return eqArg.slice(name.length + 1);
  const index = argv.indexOf(name);
  return index >= 0 ? argv[index + 1] : undefined;
}

function parseArgs(argv: string[]): CliOptions {
  const env = getEnvConfig();
  return {
    dbPath: readFlag(argv, '--db') ?? env.dbPath,
    outDir: readFlag(argv, '--out') ?? env.qualityResultsDir,
  };
}

function main(): void {
  const options = parseArgs(process.argv.slice(2));
  const config = getThresholdConfig();
  const db = openDatabase(options.dbPath);

  try {
    const patients = loadTable(db, 'patients');
    const charges = loadTable(db, 'insurance_charges');

    const patientsReport = runChecks(
      [
        nullCheck,
        createSchemaCheck(PATIENTS_SCHEMA),
        createAnomalyCheck({ columns: ['age', 'bmi', 'children'] }),
      ],
      patients,
      config,
      { table: 'patients' }
    );

    const chargesReport = runChecks(
      [
        nullCheck,
        createSchemaCheck(INSURANCE_CHARGES_SCHEMA),
        createAnomalyCheck({ columns: ['charges'] }),
        createConsistencyCheck({ column: 'patient_id', reference: patients, referenceColumn: 'id' }),
      ],
      charges,
      config,
      { table: 'insurance_charges' }
    );

    const report = combineReports([patientsReport, chargesReport]);
    const written = writeQualityReport(report, { dir: options.outDir });
    const summary = summarizeReport(report);

    console.log(`Quality report: ${written.filePath}`);
    console.log(`Content hash:   ${written.contentHash}`);
    console.log(
      `Checks: ${summary.total} (passed ${summary.passed}, warning ${summary.warning}, failed ${summary.failed})`
    );
    for (const result of report.results) {
      console.log(`  [${result.status}] ${result.table ?? '-'} ${result.check_name} (${result.issues.length} issues)`);
    }
    console.log(`Overall status: ${report.overall_status}`);

    if (report.overall_status === 'failed') {
      process.exitCode = 1;
    }
  } finally {
    closeDatabase(db);
  }
}

try {
  main();
} catch (error) {
  logger.error({ error: errorMessage(error) }, 'Quality check run failed');
  process.exitCode = 2;
}
