/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for report profile definitions and
 * extraction results.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { ValidateFunction } from 'ajv';
import { logger } from './logger';
import type { ExtractionResult } from './types';
import type { ReportProfileDefinition } from './extractors/profile';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});

let profileValidator: ValidateFunction<ReportProfileDefinition> | null = null;
let extractionResultValidator: ValidateFunction<ExtractionResult> | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Beside the package sources
    path.join(__dirname, '../schemas', schemaName),
    // Relative to compiled output in dist/packages/shared/src
    path.join(__dirname, '../../../../packages/shared/schemas', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'packages/shared/schemas', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      return JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
    }
  }

  throw new Error(`Schema file not found: ${schemaName}`);
}

function getProfileValidator(): ValidateFunction<ReportProfileDefinition> {
  if (!profileValidator) {
    profileValidator = ajv.compile<ReportProfileDefinition>(loadSchema('report_profile.schema.json'));
  }
  return profileValidator;
}

function getExtractionResultValidator(): ValidateFunction<ExtractionResult> {
  if (!extractionResultValidator) {
    extractionResultValidator = ajv.compile<ExtractionResult>(loadSchema('extraction_result.schema.json'));
  }
  return extractionResultValidator;
}

export interface ValidationResult<T> {
  valid: boolean;
  value?: T;
  errors?: string[];
}

function formatErrors(validate: ValidateFunction): string[] | undefined {
  return validate.errors?.map(e => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate a report profile definition against report_profile.schema.json
 */
export function validateProfileDefinition(data: unknown): ValidationResult<ReportProfileDefinition> {
  const validate = getProfileValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate);
    logger.warn('Report profile validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true, value: data };
}

/**
 * Validate an ExtractionResult against extraction_result.schema.json
 */
export function validateExtractionResult(data: unknown): ValidationResult<ExtractionResult> {
  const validate = getExtractionResultValidator();

  if (!validate(data)) {
    const errors = formatErrors(validate);
    logger.warn('ExtractionResult validation failed', { errors });
    return { valid: false, errors };
  }

  return { valid: true, value: data };
}
