/**
 * Matcher Service Tests
 */

import { describe, it, expect } from 'vitest';
import { buildTermTrie, matchTokens } from '../../src/services/matcher-service.js';
import { tokenize } from '../../src/services/tokenizer-service.js';
import { buildVocabulary } from '../../src/services/word-list-service.js';
import type { Vocabulary } from '../../src/types.js';

function match(text: string, vocabulary: Vocabulary) {
    return matchTokens(tokenize(text, vocabulary.language), vocabulary);
}

describe('MatcherService', () => {
    // ============================================
    // buildTermTrie
    // ============================================

    describe('buildTermTrie', () => {
        it('should nest phrase words under their first word', () => {
            const trie = buildTermTrie([
                { text: 'bad', words: ['bad'] },
                { text: 'bad word', words: ['bad', 'word'] },
            ]);

            const bad = trie.children.get('bad');
            expect(bad?.term?.text).toBe('bad');
            expect(bad?.children.get('word')?.term?.text).toBe('bad word');
        });

        it('should keep the first spelling of duplicate terms', () => {
            const trie = buildTermTrie([
                { text: 'Darn', words: ['darn'] },
                { text: 'DARN', words: ['darn'] },
            ]);

            expect(trie.children.get('darn')?.term?.text).toBe('Darn');
        });

        it('should skip terms without words', () => {
            const trie = buildTermTrie([{ text: '', words: [] }]);
            expect(trie.children.size).toBe(0);
            expect(trie.term).toBeUndefined();
        });
    });

    // ============================================
    // matchTokens
    // ============================================

    describe('matchTokens', () => {
        const vocabulary = buildVocabulary('en', ['bad', 'bad word', 'darn', 'heck off']);

        it('should report one match for the longer phrase', () => {
            expect(match('this is a bad word', vocabulary)).toEqual([
                { term: 'bad word', wordIndex: 3, start: 10, end: 18 },
            ]);
        });

        it('should fall back to the single word when the phrase does not continue', () => {
            expect(match('bad, bad word!', vocabulary)).toEqual([
                { term: 'bad', wordIndex: 0, start: 0, end: 3 },
                { term: 'bad word', wordIndex: 1, start: 5, end: 13 },
            ]);
        });

        it('should match case-insensitively and report the listed spelling', () => {
            expect(match('BAD Word', vocabulary)).toEqual([
                { term: 'bad word', wordIndex: 0, start: 0, end: 8 },
            ]);
        });

        it('should not match inside longer words', () => {
            expect(match('badger darned', vocabulary)).toEqual([]);
        });

        it('should exclude trailing punctuation from the span', () => {
            expect(match('Oh, darn!', vocabulary)).toEqual([
                { term: 'darn', wordIndex: 1, start: 4, end: 8 },
            ]);
        });

        it('should not report a phrase whose first word is not listed alone', () => {
            expect(match('heck yes', vocabulary)).toEqual([]);
            expect(match('just heck off', vocabulary)).toEqual([
                { term: 'heck off', wordIndex: 1, start: 5, end: 13 },
            ]);
        });

        it('should return matches in order without overlaps', () => {
            const text = 'darn bad word bad darn heck off darn';
            const matches = match(text, vocabulary);

            expect(matches.map((m) => m.term)).toEqual(['darn', 'bad word', 'bad', 'darn', 'heck off', 'darn']);
            for (let i = 1; i < matches.length; i++) {
                expect(matches[i].start).toBeGreaterThanOrEqual(matches[i - 1].end);
            }
        });

        it('should produce spans whose words equal the matched term', () => {
            const text = 'Well... BAD   word, and DARN it';
            for (const record of match(text, vocabulary)) {
                const spanWords = tokenize(text.slice(record.start, record.end)).map((t) => t.text);
                expect(spanWords.join(' ')).toBe(record.term.toLowerCase());
            }
        });

        it('should be deterministic', () => {
            const text = 'bad word darn bad';
            expect(match(text, vocabulary)).toEqual(match(text, vocabulary));
        });

        it('should return nothing for an empty vocabulary', () => {
            expect(match('bad word darn', buildVocabulary('en', []))).toEqual([]);
        });

        it('should return nothing for empty text', () => {
            expect(matchTokens([], vocabulary)).toEqual([]);
        });

        it('should match listed variants only in their own spelling', () => {
            const variants = buildVocabulary('en', ['a$$', '$hit']);

            expect(match('I hit a ball', variants)).toEqual([]);
            expect(match('I $HIT a$$', variants)).toEqual([
                { term: '$hit', wordIndex: 1, start: 2, end: 6 },
                { term: 'a$$', wordIndex: 2, start: 7, end: 10 },
            ]);
        });

        it('should prefer the whole chunk over the stripped word', () => {
            const both = buildVocabulary('en', ['hit', '$hit']);

            expect(match('$hit hit!', both)).toEqual([
                { term: '$hit', wordIndex: 0, start: 0, end: 4 },
                { term: 'hit', wordIndex: 1, start: 5, end: 8 },
            ]);
        });

        it('should match phrases mixing variant and plain words', () => {
            const phrase = buildVocabulary('en', ['go to $hell']);

            expect(match('go to hell', phrase)).toEqual([]);
            expect(match('Go to $hell', phrase)).toEqual([
                { term: 'go to $hell', wordIndex: 0, start: 0, end: 11 },
            ]);
        });

        it('should match Turkish terms using the tr locale', () => {
            const turkish = buildVocabulary('tr', ['kız']);
            expect(match('KIZ', turkish)).toEqual([{ term: 'kız', wordIndex: 0, start: 0, end: 3 }]);
        });
    });
});
