/**
 * Environment variable handling for the CLI collaborators
 */

import { join } from 'path';

export interface EnvConfig {
  dbPath: string;
  qualityResultsDir: string;
  validationResultsDir: string;
  thresholdsConfigPath: string | null;
  logLevel: 'debug' | 'info' | 'warn' | 'error' | 'silent';
  nodeEnv: 'development' | 'production' | 'test';
}

const LOG_LEVELS: EnvConfig['logLevel'][] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: EnvConfig['nodeEnv'][] = ['development', 'production', 'test'];

function getEnvVar(name: string, required: boolean = false): string | undefined {
  const value = process.env[name];
  if (required && !value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value || undefined;
}

function pickOption<T extends string>(raw: string | undefined, options: readonly T[], fallback: T): T {
  const match = options.find((option) => option === raw);
  return match ?? fallback;
}

export function loadEnvConfig(): EnvConfig {
  const projectRoot = process.cwd();

  return {
    dbPath: getEnvVar('DB_PATH') ?? join(projectRoot, 'data', 'db', 'healthcare.db'),
    qualityResultsDir:
      getEnvVar('QUALITY_RESULTS_DIR') ?? join(projectRoot, 'data', 'quality_results'),
    validationResultsDir:
      getEnvVar('VALIDATION_RESULTS_DIR') ?? join(projectRoot, 'validation_results'),
    thresholdsConfigPath: getEnvVar('THRESHOLDS_CONFIG') ?? null,
    logLevel: pickOption(getEnvVar('LOG_LEVEL'), LOG_LEVELS, 'info'),
    nodeEnv: pickOption(process.env.NODE_ENV, NODE_ENVS, 'development'),
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
