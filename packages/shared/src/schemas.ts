/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for the resolved runtime configuration.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { Config } from './config';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});

// Schema loading - lazy loaded on first use
let configSchema: object | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to the working directory
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

function getConfigSchema(): object {
  if (!configSchema) {
    configSchema = loadSchema('config.schema.json');
  }
  return configSchema;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a resolved configuration
 */
export function validateConfig(config: Config): ValidationResult {
  const validate = ajv.compile(getConfigSchema());
  const valid = validate(config);

  if (!valid) {
    const errors = (validate.errors || []).map(
      (err) => `${err.instancePath || '/'}: ${err.message}`
    );
    return { valid: false, errors };
  }

  return { valid: true };
}
