/**
 * Threshold configuration shared by every check and model validation step.
 *
 * A ThresholdConfig is deep-frozen once built. Each run may build its own
 * instance with createThresholdConfig(); the cached instance from
 * getThresholdConfig() is read from config/thresholds.json.
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { ConfigError, errorMessage } from './errors';
import { loadEnvConfig } from './env';
import { validateThresholdOverrides } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('thresholds');

export interface ColumnRange {
  readonly min: number;
  readonly max: number;
}

export interface DistributionReference {
  readonly expected_mean: number;
  readonly expected_std: number;
}

export interface RegulatoryThresholds {
  /** Hard ceiling that the configured bias_threshold itself must stay under. */
  readonly max_bias_ratio: number;
  readonly minimum_accuracy: number;
}

export interface ClinicalContextThresholds {
  readonly emergency_high_cost: number;
  readonly pediatric_bmi_max: number;
}

export interface ThresholdConfig {
  readonly null_pct_max: number;
  readonly zscore_max: number;
  readonly rmse_threshold: number | null;
  readonly r2_threshold: number | null;
  readonly mae_threshold: number | null;
  readonly bias_threshold: number;
  readonly min_group_size: number;
  readonly valid_ranges: Readonly<Record<string, ColumnRange>>;
  readonly allowed_categories: Readonly<Record<string, readonly string[]>>;
  /** Ascending bin edges per protected attribute; absent attributes group by exact value. */
  readonly attribute_bins: Readonly<Record<string, readonly number[]>>;
  readonly output_distributions: Readonly<Record<string, DistributionReference>>;
  readonly distribution_tolerance: number;
  readonly regulatory: RegulatoryThresholds;
  readonly clinical_context: ClinicalContextThresholds;
}

export type ThresholdOverrides = Partial<
  Omit<ThresholdConfig, 'regulatory' | 'clinical_context'>
> & {
  regulatory?: Partial<RegulatoryThresholds>;
  clinical_context?: Partial<ClinicalContextThresholds>;
};

export const DEFAULT_THRESHOLDS: ThresholdConfig = {
  null_pct_max: 5.0,
  zscore_max: 3.0,
  rmse_threshold: null,
  r2_threshold: null,
  mae_threshold: null,
  bias_threshold: 1.1,
  min_group_size: 30,
  valid_ranges: {
    age: { min: 0, max: 120 },
    bmi: { min: 10, max: 70 },
    children: { min: 0, max: 10 },
    charges: { min: 0, max: 100000 },
  },
  allowed_categories: {
    sex: ['male', 'female'],
    smoker: ['yes', 'no'],
    region: ['northeast', 'northwest', 'southeast', 'southwest'],
  },
  attribute_bins: {},
  output_distributions: {
    charges: { expected_mean: 13000, expected_std: 5000 },
  },
  distribution_tolerance: 0.1,
  regulatory: {
    max_bias_ratio: 1.15,
    minimum_accuracy: 0.9,
  },
  clinical_context: {
    emergency_high_cost: 50000,
    pediatric_bmi_max: 40,
  },
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build an immutable config from the defaults and the given overrides.
 * Map-valued options merge per key; everything else replaces the default.
 */
export function createThresholdConfig(overrides: ThresholdOverrides = {}): ThresholdConfig {
  const validation = validateThresholdOverrides(overrides);
  if (!validation.valid) {
    throw new ConfigError('Invalid threshold configuration', validation.errors ?? []);
  }

  const merged: ThresholdConfig = {
    ...DEFAULT_THRESHOLDS,
    ...overrides,
    valid_ranges: { ...DEFAULT_THRESHOLDS.valid_ranges, ...overrides.valid_ranges },
    allowed_categories: {
      ...DEFAULT_THRESHOLDS.allowed_categories,
      ...overrides.allowed_categories,
    },
    attribute_bins: { ...DEFAULT_THRESHOLDS.attribute_bins, ...overrides.attribute_bins },
    output_distributions: {
      ...DEFAULT_THRESHOLDS.output_distributions,
      ...overrides.output_distributions,
    },
    regulatory: { ...DEFAULT_THRESHOLDS.regulatory, ...overrides.regulatory },
    clinical_context: { ...DEFAULT_THRESHOLDS.clinical_context, ...overrides.clinical_context },
  };

  for (const [column, range] of Object.entries(merged.valid_ranges)) {
    if (range.min > range.max) {
      throw new ConfigError('Invalid threshold configuration', [
        `valid_ranges.${column}: min ${range.min} exceeds max ${range.max}`,
      ]);
    }
  }

  for (const [attribute, edges] of Object.entries(merged.attribute_bins)) {
    if (edges.some((edge, idx) => idx > 0 && edge <= edges[idx - 1])) {
      throw new ConfigError('Invalid threshold configuration', [
        `attribute_bins.${attribute}: edges must be strictly ascending`,
      ]);
    }
  }

  return deepFreeze(merged);
}

function resolveConfigPath(explicitPath?: string): { path: string; required: boolean } {
  if (explicitPath) {
    return { path: explicitPath, required: true };
  }
  const envPath = loadEnvConfig().thresholdsConfigPath;
  if (envPath) {
    return { path: envPath, required: true };
  }
  return { path: join(process.cwd(), 'config', 'thresholds.json'), required: false };
}

export function loadThresholdConfig(explicitPath?: string): ThresholdConfig {
  const { path, required } = resolveConfigPath(explicitPath);

  if (!existsSync(path)) {
    if (required) {
      throw new ConfigError(`Threshold config not found: ${path}`);
    }
    logger.debug({ path }, 'No threshold config file, using defaults');
    return createThresholdConfig();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Threshold config is not valid JSON: ${path}`, [errorMessage(error)]);
  }

  const validation = validateThresholdOverrides(parsed);
  if (!validation.valid || !validation.data) {
    throw new ConfigError(`Invalid threshold configuration in ${path}`, validation.errors ?? []);
  }

  logger.debug({ path }, 'Threshold config loaded');
  return createThresholdConfig(validation.data);
}

let cachedConfig: ThresholdConfig | null = null;

export function getThresholdConfig(): ThresholdConfig {
  if (!cachedConfig) {
    cachedConfig = loadThresholdConfig();
  }
  return cachedConfig;
}

export function resetThresholdConfig(): void {
  cachedConfig = null;
}
