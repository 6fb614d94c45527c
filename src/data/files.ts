/**
 * JSON file loaders for datasets and model validation inputs
 */

import { existsSync, readFileSync } from 'fs';
import { DataLoadError, errorMessage } from '@/core/errors';
import { createDataset } from '@/quality/dataset';
import type { Dataset } from '@/quality/types';
import type { ModelValidationInput } from '@/model/types';
import { validateModelInput } from '@/validation/ajv_instance';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('files');

function readJsonFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new DataLoadError(`File not found: ${filePath}`);
  }
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new DataLoadError(`File is not valid JSON: ${filePath}`, { cause: error });
  }
}

/**
 * Load a JSON array of flat records as a Dataset.
 */
export function loadDatasetFile(filePath: string): Dataset {
  const parsed = readJsonFile(filePath);
  if (!Array.isArray(parsed)) {
    throw new DataLoadError(`Dataset file must contain a JSON array of records: ${filePath}`);
  }

  try {
    const dataset = createDataset(parsed);
    logger.debug({ filePath, records: dataset.records.length }, 'Dataset file loaded');
    return dataset;
  } catch (error) {
    throw new DataLoadError(`Could not load dataset from ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Load predictions, ground truth and protected attributes for validateModel.
 * Sequence lengths are checked later by the validator itself.
 */
export function loadModelInputFile(filePath: string): ModelValidationInput {
  const parsed = readJsonFile(filePath);
  const validation = validateModelInput(parsed);
  if (!validation.valid || !validation.data) {
    throw new DataLoadError(
      `Invalid model input in ${filePath}: ${(validation.errors ?? []).join('; ')}`
    );
  }
  logger.debug(
    { filePath, model: validation.data.model_name, records: validation.data.predictions.length },
    'Model input loaded'
  );
  return validation.data;
}
