/**
 * Basic Field Extraction
 *
 * Pattern-based extraction of name, email and phone from document text.
 * The result doubles as the pipeline's fallback when generation fails.
 */

import type { BasicInfo } from '../types';

/**
 * First `local-part@domain.tld` in the text.
 */
export const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/;

/**
 * Optional leading `+`, then at least 10 characters of digits, spaces and
 * dashes that start and end with a digit.
 * Examples: 555-123-4567, +1 555 123 4567, 5551234567
 */
export const PHONE_PATTERN = /\+?\d[\d -]{8,}\d/;

export const UNKNOWN_NAME = 'Unknown';

export function extractEmail(text: string): string | null {
  const match = text.match(EMAIL_PATTERN);
  return match ? match[0] : null;
}

export function extractPhone(text: string): string | null {
  const match = text.match(PHONE_PATTERN);
  return match ? match[0] : null;
}

/**
 * The first line, trimmed. Resumes conventionally open with the candidate's name.
 */
export function extractName(text: string): string {
  if (text === '') return UNKNOWN_NAME;
  return text.split('\n')[0].trim();
}

export function extractBasicInfo(text: string): BasicInfo {
  return {
    name: extractName(text),
    email: extractEmail(text),
    phone: extractPhone(text),
    raw_text: text,
  };
}
