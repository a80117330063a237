/**
 * Resume Extractors
 */

export { extractText, joinPageText } from './text';
export {
  extractBasicInfo,
  extractEmail,
  extractPhone,
  extractName,
  EMAIL_PATTERN,
  PHONE_PATTERN,
  UNKNOWN_NAME,
} from './basic-info';
export { findJsonObject, findFirstClosedSpan, findBalancedObject } from './json-scanner';
export {
  sanitizeResponse,
  parseStructuredText,
  classifyRawResponse,
  stripCodeFences,
  isStructuredMap,
  type SanitizeOptions,
} from './response-sanitizer';
export { reconcile, CANONICAL_KEYS } from './reconcile';
