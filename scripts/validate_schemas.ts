/**
 * Schema Validation Script
 * Validates that all JSON schemas are valid and can compile validators
 *
 * Usage: npx tsx scripts/validate_schemas.ts
 */

import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { readFileSync, readdirSync } from 'fs';
import { join } from 'path';
import { errorMessage } from '../src/core/errors';
import { getSchemasDirectory, type Schema } from '../src/validation/schema_loader';

const schemasDir = getSchemasDirectory();

console.log('Validating schemas...\n');

const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});
addFormats(ajv);

let hasErrors = false;

const files = readdirSync(schemasDir).filter((f) => f.endsWith('.json'));

for (const file of files) {
  const schemaPath = join(schemasDir, file);

  try {
    const schema: Schema = JSON.parse(readFileSync(schemaPath, 'utf-8'));

    // Try to compile the schema
    ajv.compile(schema);

    console.log(`✓ ${file}`);
    console.log(`  ID: ${schema.$id}`);
    console.log(`  Required: ${schema.required?.join(', ') || 'none'}`);
    console.log('');
  } catch (error) {
    hasErrors = true;
    console.log(`✗ ${file}`);
    console.log(`  Error: ${errorMessage(error)}`);
    console.log('');
  }
}

if (hasErrors) {
  console.log('\nSchema validation FAILED');
  process.exit(1);
} else {
  console.log(`All ${files.length} schemas validated successfully`);
}
