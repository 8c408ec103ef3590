/**
 * JSON Schema Validation
 *
 * Ajv validation for HTTP request bodies, response contracts and the
 * structured completions returned by the generative classifier.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { SchemaObject } from 'ajv';
import { logger } from './logger';
import { RequestValidationError } from './errors';
import { GENERATIVE_CLASSIFICATION_SCHEMA } from './templates/classification';
import type {
  AppealRequest,
  ClassificationResponse,
  ClassifyRequest,
  ResolveServiceRequest,
  ServiceResolution,
  SolveRequest,
} from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false, // Allow additional keywords from JSON Schema draft
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

// Separate instance: fills schema defaults into parsed completions
const completionAjv = new Ajv2020({
  strict: false,
  allErrors: true,
  useDefaults: true,
});

/**
 * Contract files under docs/contracts/ and the payloads they describe
 */
export interface ContractTypes {
  classify_request: ClassifyRequest;
  resolve_service_request: ResolveServiceRequest;
  appeal_request: AppealRequest;
  solve_request: SolveRequest;
  classification_response: ClassificationResponse;
  service_resolution: ServiceResolution;
}

export type ContractName = keyof ContractTypes;

// Schema loading - lazy loaded on first use
const loadedSchemas = new Map<ContractName, SchemaObject>();

function loadSchema(name: ContractName): SchemaObject {
  const schemaFile = `${name}.schema.json`;
  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package sources
    path.join(__dirname, '../../../docs/contracts', schemaFile),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaFile),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaFile),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  // Return a permissive schema if file not found (for container environments)
  logger.warn(`Schema file not found: ${schemaFile}, using permissive validation`);
  return { type: 'object' };
}

function getSchema(name: ContractName): SchemaObject {
  let schema = loadedSchemas.get(name);
  if (!schema) {
    schema = loadSchema(name);
    loadedSchemas.set(name, schema);
  }
  return schema;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

/**
 * Validate a payload against one of the contracts in docs/contracts/
 */
export function validateContract(name: ContractName, data: unknown): ValidationResult {
  const validate = ajv.compile(getSchema(name));
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn('Contract validation failed', { contract: name, errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate an inbound payload and return it typed, or throw RequestValidationError
 */
export function parseContract<K extends ContractName>(name: K, data: unknown): ContractTypes[K] {
  const validate = ajv.compile<ContractTypes[K]>(getSchema(name));
  if (validate(data)) {
    return data;
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  throw new RequestValidationError(`Request does not match ${name}`, errors);
}

/**
 * Structured fields of a generative classification, after defaults are applied
 */
export interface GenerativeClassificationPayload {
  category_id: string;
  confidence: number;
  reasoning: string;
  is_urgent: boolean;
  is_relevant: boolean;
}

const validateCompletion = completionAjv.compile<GenerativeClassificationPayload>(
  GENERATIVE_CLASSIFICATION_SCHEMA
);

/**
 * Validate a parsed generative completion. Missing optional fields are filled
 * in place with their schema defaults.
 */
export function parseGenerativeClassification(
  data: unknown
): { payload: GenerativeClassificationPayload } | { errors: string[] } {
  if (validateCompletion(data)) {
    return { payload: data };
  }
  return {
    errors: (validateCompletion.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`),
  };
}
