/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export {
  logger,
  serializeError,
  setLogLevel,
  getLogLevel,
  type LogContext,
  type LogLevel,
} from './logger';

// Config
export { config, loadConfig, type Config, type Env } from './config';

// Errors
export {
  ResumeParserError,
  DocumentFormatError,
  GenerationFailure,
  SanitizeFailure,
  UnsupportedFileTypeError,
  ConfigError,
  type ErrorCode,
  type SanitizeFailureReason,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  pipelineStageDurationHistogram,
  pipelineRunsCounter,
  fallbacksCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateConfig,
  isConfig,
  isGenerationEnvelope,
  describeEnvelopeErrors,
  CONFIG_SCHEMA,
  GENERATION_ENVELOPE_SCHEMA,
  type GenerationEnvelope,
  type ValidationResult,
} from './schemas';

// Templates
export { RESUME_TEMPLATE, buildResumePrompt, type PromptTemplate } from './templates';

// Extractors
export {
  extractText,
  joinPageText,
  extractBasicInfo,
  extractEmail,
  extractPhone,
  extractName,
  EMAIL_PATTERN,
  PHONE_PATTERN,
  UNKNOWN_NAME,
  findJsonObject,
  findFirstClosedSpan,
  findBalancedObject,
  sanitizeResponse,
  parseStructuredText,
  classifyRawResponse,
  stripCodeFences,
  isStructuredMap,
  type SanitizeOptions,
  reconcile,
  CANONICAL_KEYS,
} from './extractors';
