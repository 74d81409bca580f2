/**
 * Censor Service
 * Rebuilds text with every matched span replaced by a fixed-width mask.
 */

import type { MatchRecord } from '../types.js';
import { InvalidOptionError } from '../utils/errors.js';
import { hasWordCharacter } from './tokenizer-service.js';

export const MASK_LENGTH = 3;
export const DEFAULT_MASK_CHARACTER = '*';

/**
 * Check a mask character. It must be one UTF-16 code unit, so the mask is
 * always MASK_LENGTH units long, and a character the tokenizer strips, so
 * the mask is never read back as a word.
 *
 * @returns Error message or null if valid
 */
export function validateMaskCharacter(value: unknown): string | null {
  if (typeof value !== 'string' || value.length !== 1 || /[\uD800-\uDFFF]/.test(value)) {
    return 'maskCharacter must be a single character';
  }
  if (hasWordCharacter(value) || /\s/u.test(value)) {
    return 'maskCharacter must not be a letter, digit or whitespace';
  }
  return null;
}

export function buildMask(maskCharacter: string = DEFAULT_MASK_CHARACTER): string {
  const error = validateMaskCharacter(maskCharacter);
  if (error) {
    throw new InvalidOptionError(error);
  }
  return maskCharacter.repeat(MASK_LENGTH);
}

/**
 * Replace each matched span of `text` with the mask.
 * Output length is `text.length - Σ(end - start) + MASK_LENGTH * records.length`.
 *
 * @throws RangeError if a record is out of bounds or two records overlap
 */
export function censorText(
  text: string,
  records: readonly MatchRecord[],
  maskCharacter: string = DEFAULT_MASK_CHARACTER
): string {
  const mask = buildMask(maskCharacter);
  const ordered = [...records].sort((a, b) => a.start - b.start);

  let output = '';
  let cursor = 0;

  for (const record of ordered) {
    if (record.start < cursor || record.end <= record.start || record.end > text.length) {
      throw new RangeError(
        `Match [${record.start}, ${record.end}) is out of bounds or overlaps a previous match`
      );
    }
    output += text.slice(cursor, record.start) + mask;
    cursor = record.end;
  }

  return output + text.slice(cursor);
}
