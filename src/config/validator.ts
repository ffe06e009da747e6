/**
 * Configuration Validator
 *
 * Validates a lab's resolved option values against the JSON Schema using Ajv.
 */

import Ajv, { type ErrorObject } from 'ajv';
import addFormats from 'ajv-formats';
import settingsSchema from './schema.json' with { type: 'json' };

/**
 * Validation error details
 */
export interface ValidationError {
  /** JSON path to the invalid field */
  path: string;
  /** Human-readable error message */
  message: string;
  /** Additional error parameters from Ajv */
  params: Record<string, unknown>;
}

/**
 * Validation result - either success or failure with errors
 */
export type ValidationResult =
  | { valid: true; values: Record<string, string> }
  | { valid: false; errors: ValidationError[] };

// Create Ajv instance with options for detailed error reporting
const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
});
addFormats.default(ajv);

// Compile the schema once
const validate = ajv.compile<Record<string, string>>(settingsSchema);

/**
 * Validate resolved lab option values against the JSON Schema.
 *
 * @param values - Option name to resolved value
 * @returns Validation result with either the values or detailed errors
 */
export function validateSettings(values: Record<string, string>): ValidationResult {
  const valid = validate(values);

  if (!valid) {
    const errors: ValidationError[] = (validate.errors ?? [])
      // anyOf branches report their own failures; keep the summary only
      .filter((error: ErrorObject) => !error.schemaPath.includes('/anyOf/'))
      .map((error: ErrorObject) => ({
        path: error.instancePath || '/',
        message: error.message ?? 'Unknown validation error',
        params: { ...error.params },
      }));

    return { valid: false, errors };
  }

  return { valid: true, values };
}

/**
 * Format validation errors into human-readable messages.
 *
 * @param errors - Array of validation errors
 * @returns Formatted error string with one error per line
 */
export function formatValidationErrors(
  errors: ReadonlyArray<Pick<ValidationError, 'path' | 'message'>>
): string {
  return errors
    .map((error) => {
      const path = error.path || '/';
      return `  - ${path}: ${error.message}`;
    })
    .join('\n');
}
