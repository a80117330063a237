/**
 * Response Sanitizer
 *
 * Turns a RawModelResponse into a StructuredMap or throws SanitizeFailure.
 * Maps are used as-is. Text is unfenced, the first JSON object is located
 * and parsed. Anything else is rejected.
 */

import { SanitizeFailure } from '../errors';
import { logger } from '../logger';
import type { JsonScannerMode, RawModelResponse, StructuredMap } from '../types';
import { findJsonObject } from './json-scanner';

export interface SanitizeOptions {
  scanner: JsonScannerMode;
}

const DEFAULT_SANITIZE_OPTIONS: SanitizeOptions = { scanner: 'balanced' };

/**
 * Replace every ``` or ```json fenced block with its inner content and trim.
 */
export function stripCodeFences(text: string): string {
  return text.replace(/```(?:json)?\s*([\s\S]*?)\s*```/g, '$1').trim();
}

export function isStructuredMap(value: unknown): value is StructuredMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Tag a loosely-typed service value by shape.
 */
export function classifyRawResponse(value: unknown): RawModelResponse {
  if (isStructuredMap(value)) return { kind: 'map', value };
  if (typeof value === 'string') return { kind: 'text', value };
  return { kind: 'other', value };
}

export function parseStructuredText(text: string, scanner: JsonScannerMode): StructuredMap {
  const cleaned = stripCodeFences(text);
  const span = findJsonObject(cleaned, scanner);

  if (span === null) {
    throw new SanitizeFailure('no_json_object', 'No JSON object found in model response');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(span);
  } catch (error) {
    throw new SanitizeFailure(
      'invalid_json',
      `Model response JSON did not parse: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!isStructuredMap(parsed)) {
    throw new SanitizeFailure('not_an_object', 'Model response JSON is not an object');
  }

  return parsed;
}

export function sanitizeResponse(
  raw: RawModelResponse,
  options: SanitizeOptions = DEFAULT_SANITIZE_OPTIONS
): StructuredMap {
  switch (raw.kind) {
    case 'map':
      logger.debug('Model response is already a map');
      return raw.value;

    case 'text':
      return parseStructuredText(raw.value, options.scanner);

    case 'other':
      throw new SanitizeFailure(
        'unsupported_response_type',
        `Unsupported model response type: ${raw.value === null ? 'null' : typeof raw.value}`
      );
  }
}
