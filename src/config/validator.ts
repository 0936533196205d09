/**
 * Configuration Validator
 *
 * Validates configuration data against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import type { FileConfig } from './types.js';
import configSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
}

/**
 * Validation result - either success with config or failure with errors
 */
export type ValidationResult =
  | { valid: true; config: FileConfig }
  | { valid: false; errors: ValidationError[] };

const ajv = new Ajv.default({
  allErrors: true,
  strict: false,
});

// Compile the schema once
const validate = ajv.compile<FileConfig>(configSchema);

/**
 * Validate configuration data against the JSON Schema.
 *
 * An empty YAML document (null or undefined) is an empty configuration.
 *
 * @param data - Parsed YAML data to validate
 * @returns Validation result with either the typed config or detailed errors
 */
export function validateConfig(data: unknown): ValidationResult {
  const candidate = data ?? {};

  if (!validate(candidate)) {
    const errors: ValidationError[] = (validate.errors ?? []).map((error: ErrorObject) => ({
      path: error.instancePath || '/',
      message: describeError(error),
    }));

    return { valid: false, errors };
  }

  return { valid: true, config: candidate };
}

function describeError(error: ErrorObject): string {
  const message = error.message ?? 'Unknown validation error';
  if (error.keyword === 'additionalProperties') {
    const extra: unknown = error.params['additionalProperty'];
    return typeof extra === 'string' ? `unknown key '${extra}'` : message;
  }
  return message;
}

/**
 * Format validation errors into human-readable messages.
 *
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((error) => `  - ${error.path}: ${error.message}`).join('\n');
}
