/**
 * Tokenizer Service
 * Splits text into word tokens that keep their exact position in the input.
 *
 * Boundary rule: whitespace separates chunks, then every leading and trailing
 * character that is not a letter, combining mark or digit is stripped from
 * the chunk. Punctuation inside a word ("don't", "ki-schrott") stays part of
 * it. A chunk made only of punctuation yields no token.
 *
 * Offsets are UTF-16 code unit indices, so `text.slice(start, end)` always
 * returns the token's original spelling. Each token also keeps its whole
 * chunk, edge punctuation included, so listed spellings such as "$hit" can
 * be matched without matching the bare word.
 */

import type { Token } from '../types.js';

const WORD_CHAR = /[\p{L}\p{M}\p{N}]/u;

/**
 * True when the string holds at least one letter, mark or digit
 */
export function hasWordCharacter(value: string): boolean {
  return WORD_CHAR.test(value);
}

/**
 * Normalize a word for matching: NFC, then lower case.
 * Pass the language code as locale so that e.g. Turkish "İ" lowers to "i".
 */
export function normalizeWord(word: string, locale?: string): string {
  const composed = word.normalize('NFC');
  return locale ? composed.toLocaleLowerCase(locale) : composed.toLowerCase();
}

/**
 * Locate the word inside a whitespace-delimited chunk.
 * Walks code points so astral characters are never split.
 */
function wordBounds(chunk: string): { start: number; end: number } | null {
  const chars = Array.from(chunk);

  let first = 0;
  while (first < chars.length && !WORD_CHAR.test(chars[first])) {
    first++;
  }
  if (first === chars.length) {
    return null;
  }

  let last = chars.length - 1;
  while (!WORD_CHAR.test(chars[last])) {
    last--;
  }

  return {
    start: chars.slice(0, first).join('').length,
    end: chars.slice(0, last + 1).join('').length,
  };
}

/**
 * Split text into tokens, left to right, with dense zero-based indices
 */
export function tokenize(text: string, locale?: string): Token[] {
  const tokens: Token[] = [];
  const chunkPattern = /\S+/g;

  let chunk: RegExpExecArray | null;
  while ((chunk = chunkPattern.exec(text)) !== null) {
    const bounds = wordBounds(chunk[0]);
    if (!bounds) {
      continue;
    }

    const start = chunk.index + bounds.start;
    const end = chunk.index + bounds.end;
    const original = text.slice(start, end);

    tokens.push({
      text: normalizeWord(original, locale),
      original,
      index: tokens.length,
      start,
      end,
      chunk: {
        text: normalizeWord(chunk[0], locale),
        start: chunk.index,
        end: chunk.index + chunk[0].length,
      },
    });
  }

  return tokens;
}
