/**
 * JSON Schema Validation
 *
 * Contract validation using Ajv for form-field extractions, case snapshots
 * and classification assist responses.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020, { type SchemaObject, type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Assist output is loosely shaped: coerce scalars and fill in missing keys.
const coercingAjv = new Ajv2020({
  strict: false,
  allErrors: true,
  coerceTypes: true,
  useDefaults: true,
});
addFormats(coercingAjv);

export const CONTRACT_SCHEMAS = {
  formFields: 'form_fields_extraction.schema.json',
  caseData: 'case_data.schema.json',
  assistResponse: 'assist_response.schema.json',
} as const;

export type ContractName = keyof typeof CONTRACT_SCHEMAS;

// Schema loading - lazy loaded on first use
const schemaCache = new Map<string, SchemaObject>();
const validatorCache = new Map<string, ValidateFunction>();

function loadSchema(schemaName: string): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
    // Absolute path fallback
    `/app/docs/contracts/${schemaName}`,
  ];

  for (const schemaPath of possiblePaths) {
    if (!fs.existsSync(schemaPath)) {
      continue;
    }
    try {
      const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      schemaCache.set(schemaName, schema);
      return schema;
    } catch (err) {
      logger.warn(`Schema file unreadable: ${schemaPath}`, {
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  const permissive: SchemaObject = { type: 'object' };
  schemaCache.set(schemaName, permissive);
  return permissive;
}

function getValidator(contract: ContractName): ValidateFunction {
  const cached = validatorCache.get(contract);
  if (cached) {
    return cached;
  }
  const instance = contract === 'assistResponse' ? coercingAjv : ajv;
  const validate = instance.compile(loadSchema(CONTRACT_SCHEMAS[contract]));
  validatorCache.set(contract, validate);
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Raised at worker boundaries when a produced record breaks its contract.
 */
export class ContractValidationError extends Error {
  constructor(
    readonly contract: ContractName,
    readonly errors: string[]
  ) {
    super(`${contract} failed contract validation: ${errors.join('; ')}`);
    this.name = 'ContractValidationError';
  }
}

function runValidation(contract: ContractName, label: string, data: unknown): ValidationResult {
  const validate = getValidator(contract);
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`) ?? [];
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a FormFieldsExtraction against form_fields_extraction.schema.json
 */
export function validateFormFields(data: unknown): ValidationResult {
  return runValidation('formFields', 'FormFieldsExtraction', data);
}

/**
 * Validate a CaseData snapshot against case_data.schema.json
 */
export function validateCaseData(data: unknown): ValidationResult {
  return runValidation('caseData', 'CaseData', data);
}

/**
 * Throw ContractValidationError when a result is invalid.
 */
export function assertValid(contract: ContractName, result: ValidationResult): void {
  if (!result.valid) {
    throw new ContractValidationError(contract, result.errors ?? []);
  }
}

/** Assist response after coercion and defaults. */
export interface AssistResponse {
  doc_type: string;
  confidence: number;
  title: string;
  summary: string;
  key_dates: unknown[];
  key_parties: unknown[];
  key_amounts: unknown[];
  key_terms: string[];
}

function isAssistResponse(data: unknown): data is AssistResponse {
  if (typeof data !== 'object' || data === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...data };
  return (
    typeof record.doc_type === 'string' &&
    typeof record.confidence === 'number' &&
    Number.isFinite(record.confidence) &&
    Array.isArray(record.key_terms)
  );
}

/**
 * Validate a parsed assist response, coercing scalar types and filling
 * defaults in place. Returns null when the payload cannot be used.
 */
export function validateAssistResponse(data: unknown): AssistResponse | null {
  const result = runValidation('assistResponse', 'AssistResponse', data);
  if (!result.valid || !isAssistResponse(data)) {
    return null;
  }
  return data;
}

// Re-export schemas for use in assist prompts
export const schemas = {
  get formFields() {
    return loadSchema(CONTRACT_SCHEMAS.formFields);
  },
  get caseData() {
    return loadSchema(CONTRACT_SCHEMAS.caseData);
  },
  get assistResponse() {
    return loadSchema(CONTRACT_SCHEMAS.assistResponse);
  },
};
