/**
 * Reconciliation
 *
 * Backfills canonical fields the generation service left out, using the
 * deterministic BasicInfo. A key that is present is never overwritten, even
 * when its value is null.
 */

import type { BasicInfo, StructuredMap } from '../types';

export const CANONICAL_KEYS = ['name', 'email', 'phone'] as const;

export function reconcile(structured: StructuredMap, basicInfo: BasicInfo): StructuredMap {
  const result: StructuredMap = { ...structured };

  for (const key of CANONICAL_KEYS) {
    if (!Object.prototype.hasOwnProperty.call(result, key)) {
      result[key] = basicInfo[key];
    }
  }

  // Keeps raw_text on every FinalResult, success path included.
  if (!Object.prototype.hasOwnProperty.call(result, 'raw_text')) {
    result.raw_text = basicInfo.raw_text;
  }

  return result;
}
