/**
 * Schema validation for startup inputs.
 *
 * Validates the plugin's descriptor and the raw configuration object
 * against their JSON Schemas using ajv. Schemas are compiled once per
 * validator and rejected inputs produce path-prefixed messages suitable
 * for a ConfigurationError.
 */

import _Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

// ---------------------------------------------------------------------------
// Prototype pollution keys
// ---------------------------------------------------------------------------

const POLLUTION_KEYS = new Set(['__proto__', 'constructor', 'prototype']);

// ---------------------------------------------------------------------------
// Validation result
// ---------------------------------------------------------------------------

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

// ---------------------------------------------------------------------------
// SchemaValidator
// ---------------------------------------------------------------------------

export class SchemaValidator {
  private readonly ajv: InstanceType<typeof Ajv>;
  private readonly validators: Map<string, ValidateFunction> = new Map();

  constructor() {
    this.ajv = new Ajv({ allErrors: true, strict: false });
  }

  /**
   * Compile a schema under a name.
   *
   * @throws If the name was already compiled or the schema is invalid.
   */
  compile(name: string, schema: Record<string, unknown>): void {
    if (this.validators.has(name)) {
      throw new Error(`Schema already compiled: "${name}"`);
    }
    this.validators.set(name, this.ajv.compile(schema));
  }

  /**
   * Validate a value against a previously compiled schema.
   *
   * @throws If no schema has been compiled under the name.
   */
  validate(name: string, value: unknown): ValidationResult {
    const validateFn = this.validators.get(name);
    if (!validateFn) {
      throw new Error(`No compiled schema: "${name}"`);
    }

    const pollutionErrors = checkPollutionKeys(value, '');
    if (pollutionErrors.length > 0) {
      return { valid: false, errors: pollutionErrors };
    }

    if (validateFn(value)) {
      return { valid: true, errors: [] };
    }

    return { valid: false, errors: (validateFn.errors ?? []).map(formatError) };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function formatError(err: ErrorObject): string {
  const path = err.instancePath || '/';
  const params: Record<string, unknown> = err.params;
  if (err.keyword === 'additionalProperties') {
    return `${path}: additional property "${String(params['additionalProperty'] ?? '')}" not allowed`;
  }
  if (err.keyword === 'required') {
    return `${path}: required property "${String(params['missingProperty'] ?? '')}" is missing`;
  }
  return `${path}: ${err.message ?? 'unknown error'}`;
}

/**
 * Recursively check for prototype pollution keys in an object.
 */
function checkPollutionKeys(value: unknown, path: string): string[] {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return [];
  }

  const errors: string[] = [];
  for (const [key, child] of Object.entries(value)) {
    if (POLLUTION_KEYS.has(key)) {
      errors.push(`${path}/${key}: prototype pollution key "${key}" is not allowed`);
    }
    errors.push(...checkPollutionKeys(child, `${path}/${key}`));
  }
  return errors;
}
