/**
 * Bundled Word List Tests
 */

import { describe, it, expect } from 'vitest';
import { ProfanityChecker } from '../../src/services/profanity-checker.js';
import {
    DEFAULT_WORD_LIST_DIR,
    WordListStore,
    createFileWordListSource,
} from '../../src/services/word-list-service.js';
import { SUPPORTED_LANGUAGES, type LanguageCode } from '../../src/types.js';

function createBundledStore(): WordListStore {
    return new WordListStore(createFileWordListSource(DEFAULT_WORD_LIST_DIR));
}

function createChecker(language: LanguageCode): Promise<ProfanityChecker> {
    return ProfanityChecker.create({ store: createBundledStore(), language });
}

describe('Bundled word lists', () => {
    it.each(SUPPORTED_LANGUAGES)('%s should load terms and reference words', async (language) => {
        const vocabulary = await createBundledStore().load(language);

        expect(vocabulary.terms.length).toBeGreaterThan(20);
        expect(vocabulary.referenceWords.size).toBeGreaterThan(vocabulary.terms.length);
        for (const term of vocabulary.terms) {
            expect(term.words.length).toBeGreaterThan(0);
            expect(term.text.startsWith('#')).toBe(false);
        }
    });

    it('should list English phrases of up to four words', async () => {
        const vocabulary = await createBundledStore().load('en');

        expect(vocabulary.maxTermWords).toBe(4);
    });

    it('should match an English phrase over its last word', async () => {
        const checker = await createChecker('en');

        expect(checker.checkProfanity('You son of a bitch!')).toEqual([
            { term: 'son of a bitch', wordIndex: 1, start: 4, end: 18 },
        ]);
    });

    it('should match German phrases with sharp s', async () => {
        const checker = await createChecker('de');

        expect(checker.checkProfanity('Verdammte Scheiße!')).toEqual([
            { term: 'verdammte scheiße', wordIndex: 0, start: 0, end: 17 },
        ]);
    });

    it('should lower-case Turkish dotted capitals', async () => {
        const checker = await createChecker('tr');

        expect(checker.checkProfanity('SİKTİR')).toEqual([{ term: 'siktir', wordIndex: 0, start: 0, end: 6 }]);
    });

    it('should censor Spanish and Portuguese text', async () => {
        const spanish = await createChecker('es');
        const portuguese = await createChecker('pt');

        expect(spanish.censorProfanity('Que mierda.')).toBe('Que ***.');
        expect(portuguese.censorProfanity('Que merda!')).toBe('Que ***!');
    });

    it('should reject French, which has no list', async () => {
        await expect(createBundledStore().load('fr')).rejects.toThrow('Language "fr" is not supported');
    });
});
