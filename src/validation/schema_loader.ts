/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export type Schema = {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
};

export type SchemaName =
  | 'threshold_config.v1'
  | 'quality_report.v1'
  | 'model_validation.v1'
  | 'model_input.v1';

const schemaCache = new Map<string, Schema>();

export function getSchemasDirectory(): string {
  return join(process.cwd(), 'schemas');
}

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(getSchemasDirectory(), `${schemaName}.schema.json`);
  const schema: Schema = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}
