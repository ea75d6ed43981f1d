/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { AnySchemaObject } from 'ajv/dist/2020';

const SCHEMA_DIR = join(__dirname, '..', '..', 'schemas');

const schemaCache = new Map<string, AnySchemaObject>();

export function loadSchema(schemaName: string): AnySchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const schemaPath = join(SCHEMA_DIR, `${schemaName}.schema.json`);
  const schema: AnySchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));

  schemaCache.set(schemaName, schema);
  return schema;
}

export function getScreenerConfigSchema(): AnySchemaObject {
  return loadSchema('screener_config.v1');
}
