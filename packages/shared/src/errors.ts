/**
 * Error Taxonomy
 *
 * DocumentFormatError is fatal for a request. GenerationFailure and
 * SanitizeFailure are recovered by the pipeline's fallback to BasicInfo.
 */

export type ErrorCode =
  | 'invalid_document'
  | 'generation_failed'
  | 'sanitize_failed'
  | 'unsupported_file_type'
  | 'invalid_config';

export abstract class ResumeParserError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The uploaded bytes are not a readable PDF.
 */
export class DocumentFormatError extends ResumeParserError {
  readonly code = 'invalid_document';
}

/**
 * Network error, timeout, non-success status or malformed reply envelope
 * from the generation service.
 */
export class GenerationFailure extends ResumeParserError {
  readonly code = 'generation_failed';
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

export type SanitizeFailureReason =
  | 'no_json_object'
  | 'invalid_json'
  | 'unsupported_response_type'
  | 'not_an_object';

/**
 * The raw model response could not be turned into a StructuredMap.
 */
export class SanitizeFailure extends ResumeParserError {
  readonly code = 'sanitize_failed';
  readonly reason: SanitizeFailureReason;

  constructor(reason: SanitizeFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.reason = reason;
  }
}

export class UnsupportedFileTypeError extends ResumeParserError {
  readonly code = 'unsupported_file_type';
}

export class ConfigError extends ResumeParserError {
  readonly code = 'invalid_config';
}
