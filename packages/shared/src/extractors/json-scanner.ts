/**
 * JSON Object Location
 *
 * Finds the span of the first JSON object embedded in free text.
 *
 * - 'first-close': from the first `{` to the first `}` after it. Nested
 *   objects are cut at the first inner `}`, so the span no longer parses.
 * - 'balanced': from the first `{` to the `}` that closes it, counting depth
 *   and skipping braces inside string literals.
 */

import type { JsonScannerMode } from '../types';

export function findFirstClosedSpan(text: string): string | null {
  const match = text.match(/\{[\s\S]*?\}/);
  return match ? match[0] : null;
}

export function findBalancedObject(text: string): string | null {
  const start = text.indexOf('{');
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      depth++;
    } else if (ch === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  // Unterminated object
  return null;
}

export function findJsonObject(text: string, mode: JsonScannerMode): string | null {
  switch (mode) {
    case 'first-close':
      return findFirstClosedSpan(text);
    case 'balanced':
      return findBalancedObject(text);
  }
}
