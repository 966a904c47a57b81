import { describe, it, expect } from 'vitest';
import { detectLanguage, LanguageDetectionEngine } from '../nlp/language.js';
import { DictionaryLemmaLookup, LemmatizerEngine, MapLemmaLookup, lemmatizeToken } from '../nlp/lemmatizer.js';
import { loadStopwords } from '../nlp/stopwords.js';
import { tokenize } from '../nlp/tokenizer.js';
import { createAnnotationResult } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

const STOPWORDS = new Map([
    ['de', new Set(['mit', 'in', 'und', 'die'])],
    ['en', new Set(['with', 'in', 'and', 'the'])],
]);

function resultFor(text: string) {
    return { ...createAnnotationResult(text), tokens: tokenize(text) };
}

describe('detectLanguage', () => {
    it('should pick the language with the most stopword hits', () => {
        expect(detectLanguage(['Pflanzen', 'mit', 'roten', 'Blüten'], STOPWORDS)).toBe('de');
        expect(detectLanguage(['Plants', 'WITH', 'red', 'flowers'], STOPWORDS)).toBe('en');
    });

    it('should return null on a tie', () => {
        expect(detectLanguage(['Paris', 'in', 'Paris'], STOPWORDS)).toBeNull();
    });

    it('should return null without any hit', () => {
        expect(detectLanguage(['Fagus', 'sylvatica'], STOPWORDS)).toBeNull();
    });
});

describe('stopwords', () => {
    it('should load the bundled lists', () => {
        expect(loadStopwords('de').has('mit')).toBe(true);
        expect(loadStopwords('en').has('with')).toBe(true);
    });

    it('should fail for a language without a list', () => {
        expect(() => loadStopwords('xx')).toThrow(ConfigurationError);
    });
});

describe('LanguageDetectionEngine', () => {
    it('should set the language of the result', () => {
        const engine = new LanguageDetectionEngine(['de', 'en']);
        expect(engine.apply(resultFor('Wo finde ich Fagus sylvatica?')).language).toBe('de');
        expect(engine.apply(resultFor('plants with red flowers')).language).toBe('en');
    });

    it('should ignore quoted phrases', () => {
        const engine = new LanguageDetectionEngine(['de', 'en']);
        expect(engine.apply(resultFor('Pflanzen "with the"')).language).toBeNull();
    });
});

describe('lemmatizer', () => {
    const lookup = new MapLemmaLookup({ de: { Blüten: 'Blüte', roten: 'rot' } });

    it('should return the base form of known words', () => {
        expect(lookup.lookup('blüten', 'de')).toBe('Blüte');
        expect(lookup.lookup('ROTEN', 'de')).toBe('rot');
    });

    it('should return unknown words unchanged', () => {
        expect(lookup.lookup('Fagus', 'de')).toBe('Fagus');
    });

    it('should lowercase words of an unsupported language', () => {
        expect(lookup.supports('fr')).toBe(false);
        expect(lookup.lookup('Fleurs', 'fr')).toBe('fleurs');
    });

    it('should leave quoted and empty tokens without a lemma', () => {
        const [quoted, empty] = tokenize('"rote Blüten" ,');
        expect(quoted && lemmatizeToken(quoted, 'de', lookup).lemma).toBeNull();
        expect(empty && lemmatizeToken(empty, 'de', lookup).lemma).toBeNull();
    });

    it('should use the detected language, or the default one', () => {
        const english = new MapLemmaLookup({ de: { flowers: 'Blume' }, en: { flowers: 'flower' } });
        const engine = new LemmatizerEngine(english, 'de');

        const detected = engine.apply({ ...resultFor('red flowers'), language: 'en' });
        expect(detected.tokens.map((t) => t.lemma)).toEqual(['red', 'flower']);

        const fallback = engine.apply(resultFor('red flowers'));
        expect(fallback.tokens.map((t) => t.lemma)).toEqual(['red', 'Blume']);
    });

    it('should read the bundled dictionaries', () => {
        const dictionary = new DictionaryLemmaLookup();
        expect(dictionary.supports('de')).toBe(true);
        expect(dictionary.lookup('Pflanzen', 'de')).toBe('Pflanze');
        expect(dictionary.lookup('flowers', 'en')).toBe('flower');
        expect(dictionary.supports('xx')).toBe(false);
        expect(dictionary.lookup('Fleurs', 'xx')).toBe('fleurs');
    });
});
