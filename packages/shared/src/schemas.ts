/**
 * JSON Schema Validation
 *
 * Validates assembled researcher documents against the closed canonical
 * schema (docs/contracts/researcher_output.schema.json) using Ajv.
 */

import fs from 'fs';
import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { ConfigurationError, type SchemaViolation } from './errors';
import { logger } from './logger';

export interface ValidationResult {
  valid: boolean;
  violations: SchemaViolation[];
}

export type DocumentValidator = (document: unknown) => ValidationResult;

// Compiled validators by schema path - compiled once per process
const compiledValidators = new Map<string, ValidateFunction>();

export function createAjv(): Ajv2020 {
  // Initialize Ajv with 2020-12 draft support
  const ajv = new Ajv2020({
    strict: false, // Allow annotation keywords such as "description"
    allErrors: true,
    verbose: true,
  });
  addFormats(ajv);
  return ajv;
}

function isSchemaObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a schema file. A missing or malformed schema is a
 * configuration problem, reported before any document is processed.
 */
export function loadSchema(schemaPath: string): object {
  let content: string;
  try {
    content = fs.readFileSync(schemaPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Schema file not readable: ${schemaPath} (${reason})`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Schema file is not valid JSON: ${schemaPath} (${reason})`);
  }

  if (!isSchemaObject(parsed)) {
    throw new ConfigurationError(`Schema file does not hold a JSON object: ${schemaPath}`);
  }
  return parsed;
}

/**
 * Name the offending field of an Ajv error: the missing or unexpected
 * property for required/additionalProperties, else the last path segment.
 */
function toViolation(error: ErrorObject): SchemaViolation {
  const params: Record<string, unknown> = error.params;
  const segments = error.instancePath.split('/').filter(Boolean);
  let field = segments.length > 0 ? segments[segments.length - 1] : '(document)';

  if (error.keyword === 'required' && typeof params.missingProperty === 'string') {
    field = params.missingProperty;
  } else if (error.keyword === 'additionalProperties' && typeof params.additionalProperty === 'string') {
    field = params.additionalProperty;
  }

  return {
    path: error.instancePath || '/',
    field,
    constraint: error.keyword,
    message: error.message ?? 'is invalid',
  };
}

function compileSchema(schemaPath: string): ValidateFunction {
  const cached = compiledValidators.get(schemaPath);
  if (cached) return cached;

  const schema = loadSchema(schemaPath);
  let validate: ValidateFunction;
  try {
    validate = createAjv().compile(schema);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Schema file does not compile: ${schemaPath} (${reason})`);
  }

  compiledValidators.set(schemaPath, validate);
  logger.debug('Schema compiled', { schema_path: schemaPath });
  return validate;
}

/**
 * Create a validator for researcher documents.
 * Throws ConfigurationError when the schema cannot be loaded or compiled.
 */
export function createDocumentValidator(schemaPath: string): DocumentValidator {
  const validate = compileSchema(schemaPath);

  return function validateDocument(document: unknown): ValidationResult {
    if (validate(document)) {
      return { valid: true, violations: [] };
    }
    return { valid: false, violations: (validate.errors ?? []).map(toViolation) };
  };
}
