/**
 * JSON Schema Validation
 *
 * Ajv schemas for the process configuration and the generation service's
 * reply envelope. The generated StructuredMap itself is deliberately not
 * validated.
 */

import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { Config } from './config';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

export const CONFIG_SCHEMA = {
  type: 'object',
  required: [
    'port',
    'generationProvider',
    'generationUrl',
    'generationModel',
    'generationTimeoutMs',
    'generationMaxTokens',
    'responseJsonScanner',
    'maxUploadBytes',
    'logLevel',
  ],
  properties: {
    port: { type: 'integer', minimum: 0, maximum: 65535 },
    generationProvider: { enum: ['ollama', 'openai'] },
    generationUrl: { type: 'string', format: 'uri' },
    generationModel: { type: 'string', minLength: 1 },
    generationTimeoutMs: { type: 'integer', minimum: 1 },
    generationMaxTokens: { type: 'integer', minimum: 1 },
    openaiApiKey: { type: 'string' },
    openaiBaseUrl: { type: 'string', format: 'uri' },
    responseJsonScanner: { enum: ['first-close', 'balanced'] },
    maxUploadBytes: { type: 'integer', minimum: 1 },
    logLevel: { enum: ['debug', 'info', 'warn', 'error', 'silent'] },
  },
} as const;

/**
 * Reply body of Ollama's /api/generate. Only the object shape is required;
 * a missing `response` field is handled by the sanitizer, not here.
 */
export interface GenerationEnvelope {
  response?: unknown;
  model?: string;
  done?: boolean;
  [key: string]: unknown;
}

export const GENERATION_ENVELOPE_SCHEMA = {
  type: 'object',
  properties: {
    model: { type: 'string' },
    done: { type: 'boolean' },
  },
} as const;

const configValidator = ajv.compile<Config>(CONFIG_SCHEMA);
const envelopeValidator = ajv.compile<GenerationEnvelope>(GENERATION_ENVELOPE_SCHEMA);

function formatErrors(errors: typeof configValidator.errors): string[] {
  return (errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
}

/**
 * Validate a candidate Config against CONFIG_SCHEMA
 */
export function validateConfig(data: unknown): ValidationResult {
  if (!configValidator(data)) {
    return { valid: false, errors: formatErrors(configValidator.errors) };
  }
  return { valid: true };
}

export function isConfig(data: unknown): data is Config {
  return configValidator(data);
}

/**
 * Type guard for the generation service's reply envelope
 */
export function isGenerationEnvelope(data: unknown): data is GenerationEnvelope {
  return envelopeValidator(data);
}

export function describeEnvelopeErrors(): string[] {
  return formatErrors(envelopeValidator.errors);
}
