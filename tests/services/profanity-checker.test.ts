/**
 * Profanity Checker Tests
 */

import path from 'node:path';
import { pino } from 'pino';
import { describe, it, expect } from 'vitest';
import { ProfanityChecker } from '../../src/services/profanity-checker.js';
import {
    DetectionFailedError,
    InvalidOptionError,
    LanguageNotSetError,
    UnsupportedLanguageError,
} from '../../src/utils/errors.js';
import { createTempFiles, createTestStore } from '../test-utils.js';

function createChecker(maskCharacter?: string): Promise<ProfanityChecker> {
    return ProfanityChecker.create({ store: createTestStore(), maskCharacter });
}

describe('ProfanityChecker', () => {
    // ============================================
    // Language selection
    // ============================================

    describe('language selection', () => {
        it('should load English by default', async () => {
            const checker = await createChecker();

            expect(checker.language).toBe('en');
            expect(checker.detection).toBeNull();
        });

        it('should start without a language when constructed directly', () => {
            const checker = new ProfanityChecker({ store: createTestStore() });

            expect(checker.language).toBeNull();
            expect(() => checker.checkProfanity('bad')).toThrow(LanguageNotSetError);
            expect(() => checker.censorProfanity('bad')).toThrow(LanguageNotSetError);
        });

        it('should switch to another language', async () => {
            const checker = await createChecker();
            await checker.setLanguage('tr');

            expect(checker.language).toBe('tr');
            expect(checker.checkProfanity('bad')).toEqual([]);
            expect(checker.containsProfanity('çok kötü')).toBe(true);
        });

        it('should keep the previous language when loading fails', async () => {
            const checker = await createChecker();

            await expect(checker.setLanguage('fr')).rejects.toBeInstanceOf(UnsupportedLanguageError);
            await expect(checker.setLanguage('de')).rejects.toThrow('Language "de" is not supported');
            expect(checker.language).toBe('en');
        });

        it('should select the language detected from text', async () => {
            const checker = await createChecker();

            await expect(checker.setLanguageFromText('bu çok kötü bir gün')).resolves.toBe('tr');
            expect(checker.language).toBe('tr');
            expect(checker.detection).toEqual({
                language: 'tr',
                scores: { en: 0, tr: 4, de: 0, es: 0, pt: 0 },
            });
        });

        it('should keep the language when detection fails', async () => {
            const checker = await createChecker();

            await expect(checker.setLanguageFromText('')).rejects.toBeInstanceOf(DetectionFailedError);
            expect(checker.language).toBe('en');
            expect(checker.detection).toBeNull();
        });

        it('should select the language detected from a subtitle file', async () => {
            const srt = ['1', '00:00:01,000 --> 00:00:02,000', '<i>bu çok kötü</i>', ''].join('\n');
            const { dir, cleanup } = await createTempFiles({ 'subs/tr.srt': srt });
            try {
                const checker = await createChecker();

                await expect(checker.setLanguageFromSubtitleFile(path.join(dir, 'subs/tr.srt'))).resolves.toBe('tr');
                expect(checker.checkProfanity('bu kötü')).toEqual([
                    { term: 'kötü', wordIndex: 1, start: 3, end: 7 },
                ]);
            } finally {
                await cleanup();
            }
        });

        it('should log the selected language', async () => {
            const lines: string[] = [];
            const logger = pino({ level: 'debug' }, { write: (line: string) => lines.push(line) });
            const checker = new ProfanityChecker({ store: createTestStore(), logger });

            await checker.setLanguage('tr');

            expect(lines).toHaveLength(1);
            expect(JSON.parse(lines[0])).toMatchObject({
                level: 20,
                msg: 'Language selected',
                language: 'tr',
                terms: 2,
            });
        });
    });

    // ============================================
    // checkProfanity
    // ============================================

    describe('checkProfanity', () => {
        it('should prefer the longest listed phrase', async () => {
            const checker = await createChecker();

            expect(checker.checkProfanity('This is a bad word')).toEqual([
                { term: 'bad word', wordIndex: 3, start: 10, end: 18 },
            ]);
        });

        it('should report every match in order', async () => {
            const checker = await createChecker();

            expect(checker.checkProfanity('Darn! Heck off, BAD.')).toEqual([
                { term: 'darn', wordIndex: 0, start: 0, end: 4 },
                { term: 'heck off', wordIndex: 1, start: 6, end: 14 },
                { term: 'bad', wordIndex: 3, start: 16, end: 19 },
            ]);
        });

        it('should not match inside longer words', async () => {
            const checker = await createChecker();

            expect(checker.checkProfanity('badminton and darning')).toEqual([]);
            expect(checker.containsProfanity('badminton')).toBe(false);
        });

        it('should find nothing with an empty vocabulary', async () => {
            const checker = await ProfanityChecker.create({ store: createTestStore({ en: { words: [] } }) });

            expect(checker.checkProfanity('bad word darn')).toEqual([]);
        });

        it('should produce spans that spell the matched words', async () => {
            const checker = await createChecker();
            const text = 'Well, heck   off and bad-ish BAD word!';

            for (const match of checker.checkProfanity(text)) {
                const words = text.slice(match.start, match.end).toLowerCase().split(/\s+/);
                expect(words.join(' ')).toBe(match.term);
            }
        });
    });

    // ============================================
    // censorProfanity
    // ============================================

    describe('censorProfanity', () => {
        it('should mask every match with three characters', async () => {
            const checker = await createChecker();

            expect(checker.censorProfanity('Darn, this is bad!')).toBe('***, this is ***!');
            expect(checker.censorProfanity('This is a bad word')).toBe('This is a ***');
        });

        it('should leave clean text unchanged', async () => {
            const checker = await createChecker();

            expect(checker.censorProfanity('a perfectly clean line')).toBe('a perfectly clean line');
        });

        it('should use the configured mask character', async () => {
            const checker = await createChecker('#');

            expect(checker.censorProfanity('heck off!')).toBe('###!');
        });

        it('should reject a letter as mask character', () => {
            expect(() => new ProfanityChecker({ store: createTestStore(), maskCharacter: 'x' })).toThrow(
                InvalidOptionError
            );
        });

        it('should return the censored text with its matches', async () => {
            const checker = await createChecker();

            expect(checker.censorWithMatches('bad, darn')).toEqual({
                censored: '***, ***',
                matches: [
                    { term: 'bad', wordIndex: 0, start: 0, end: 3 },
                    { term: 'darn', wordIndex: 1, start: 5, end: 9 },
                ],
            });
        });

        it('should shrink the text by each span and add the mask length', async () => {
            const checker = await createChecker();
            const text = 'Heck off, this bad word is darn bad.';
            const matches = checker.checkProfanity(text);
            const spanTotal = matches.reduce((sum, match) => sum + match.end - match.start, 0);

            expect(checker.censorProfanity(text)).toHaveLength(text.length - spanTotal + 3 * matches.length);
        });

        it('should produce output that checks clean', async () => {
            const checker = await createChecker();
            const censored = checker.censorProfanity('Heck off, this bad word is darn bad.');

            expect(checker.checkProfanity(censored)).toEqual([]);
        });
    });
});
