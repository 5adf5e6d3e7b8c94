/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for page extractions and consolidated statements.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { SchemaObject, ValidateFunction } from 'ajv';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

export const PAGE_EXTRACTION_SCHEMA = 'page_extraction.schema.json';
export const CONSOLIDATED_STATEMENT_SCHEMA = 'consolidated_statement.schema.json';

// Compiled lazily on first use
const validators = new Map<string, ValidateFunction>();

function loadSchema(schemaName: string): SchemaObject {
  const possiblePaths = [
    // packages/core/src in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // packages/core/dist/src after build
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Permissive schema if the contracts directory is not shipped
  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getValidator(schemaName: string): ValidateFunction {
  let validate = validators.get(schemaName);
  if (!validate) {
    validate = ajv.compile(loadSchema(schemaName));
    validators.set(schemaName, validate);
  }
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function runValidation(schemaName: string, label: string, data: unknown): ValidationResult {
  const validate = getValidator(schemaName);
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a raw page extraction response against page_extraction.schema.json
 */
export function validatePageExtraction(data: unknown): ValidationResult {
  return runValidation(PAGE_EXTRACTION_SCHEMA, 'PageExtraction', data);
}

/**
 * Validate a ConsolidatedStatement against consolidated_statement.schema.json
 */
export function validateConsolidatedStatement(data: unknown): ValidationResult {
  return runValidation(CONSOLIDATED_STATEMENT_SCHEMA, 'ConsolidatedStatement', data);
}
