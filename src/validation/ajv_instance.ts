/**
 * Ajv validation instance with schema validators
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { getScreenerConfigSchema } from './schema_loader';
import type { RawScreenerConfig } from '@/scoring/scoring_config';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

addFormats(ajv);

let screenerConfigValidator: ValidateFunction<RawScreenerConfig> | null = null;

export function getScreenerConfigValidator(): ValidateFunction<RawScreenerConfig> {
  if (!screenerConfigValidator) {
    screenerConfigValidator = ajv.compile<RawScreenerConfig>(getScreenerConfigSchema());
  }
  return screenerConfigValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  data: T | null;
  errors: string[] | null;
}

export function validateScreenerConfig(data: unknown): ValidationResult<RawScreenerConfig> {
  const validate = getScreenerConfigValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}
