/**
 * sanitizer.ts: Which records get embedded
 *
 * A record is eligible when its content is a string that, once trimmed,
 * is non-empty, not a bare "{}" / "[]", at least MIN_CONTENT_LENGTH chars,
 * and strictly under the embedding model's context window.
 *
 * Ineligible records are only left out of the index; the archive keeps them
 * for conversation reconstruction.
 */

import type { EligibleRecord, MessageRecord } from '@threadseek/shared';

export const MIN_CONTENT_LENGTH = 3;
const EMPTY_STRUCTURES = new Set(['{}', '[]']);

export type TokenCounter = (text: string) => number;

/**
 * Estimate token count (~4 chars per token).
 */
export const estimateTokens: TokenCounter = (text) => Math.ceil(text.length / 4);

export type ExclusionReason = 'not_string' | 'empty' | 'empty_structure' | 'too_short' | 'too_long';

export interface SanitizeOptions {
  maxTokens: number;
  countTokens?: TokenCounter;
}

export interface SanitizeResult {
  records: EligibleRecord[];
  /** records[i].content === texts[i] */
  texts: string[];
  excluded: Record<ExclusionReason, number>;
}

export type Eligibility =
  | { eligible: true; text: string }
  | { eligible: false; reason: ExclusionReason };

/** Classify a content value: the trimmed text to embed, or why it cannot be embedded */
export function checkEligibility(content: unknown, options: SanitizeOptions): Eligibility {
  if (typeof content !== 'string') return { eligible: false, reason: 'not_string' };

  const text = content.trim();
  if (!text) return { eligible: false, reason: 'empty' };
  if (EMPTY_STRUCTURES.has(text)) return { eligible: false, reason: 'empty_structure' };
  if (text.length < MIN_CONTENT_LENGTH) return { eligible: false, reason: 'too_short' };

  const count = options.countTokens ?? estimateTokens;
  if (count(text) >= options.maxTokens) return { eligible: false, reason: 'too_long' };

  return { eligible: true, text };
}

/** Why a content value cannot be embedded, or null when it can */
export function exclusionReason(content: unknown, options: SanitizeOptions): ExclusionReason | null {
  const result = checkEligibility(content, options);
  return result.eligible ? null : result.reason;
}

export function sanitizeRecords(records: readonly MessageRecord[], options: SanitizeOptions): SanitizeResult {
  const result: SanitizeResult = {
    records: [],
    texts: [],
    excluded: { not_string: 0, empty: 0, empty_structure: 0, too_short: 0, too_long: 0 },
  };

  for (const record of records) {
    const eligibility = checkEligibility(record.content, options);
    if (!eligibility.eligible) {
      result.excluded[eligibility.reason]++;
      continue;
    }

    result.records.push({ ...record, content: eligibility.text });
    result.texts.push(eligibility.text);
  }

  return result;
}
