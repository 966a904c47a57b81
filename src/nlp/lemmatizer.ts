import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { AnnotationEngine, AnnotationResult, LemmaLookup, Token } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { dataPath } from '../utils/data-path.js';
import { getLogger } from '../utils/logger.js';

const LemmaDictionarySchema = z.record(z.string());

/**
 * Lemma dictionaries read from `data/lemmas/<language>.json`
 * (lowercase word form → base form). A dictionary is loaded on first use.
 */
export class DictionaryLemmaLookup implements LemmaLookup {
    private readonly dictionaries = new Map<string, ReadonlyMap<string, string>>();

    constructor(private readonly directory: string = dataPath('lemmas')) {}

    supports(language: string): boolean {
        return this.dictionaries.has(language) || existsSync(this.fileFor(language));
    }

    lookup(word: string, language: string): string {
        const lower = word.toLowerCase();
        if (!this.supports(language)) {
            return lower;
        }
        return this.dictionary(language).get(lower) ?? word;
    }

    private dictionary(language: string): ReadonlyMap<string, string> {
        const cached = this.dictionaries.get(language);
        if (cached) return cached;

        const start = Date.now();
        const file = this.fileFor(language);
        const parsed = LemmaDictionarySchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')));
        if (!parsed.success) {
            throw new ConfigurationError(`Malformed lemma dictionary ${file}`);
        }

        const entries = new Map(Object.entries(parsed.data).map(([form, lemma]) => [form.toLowerCase(), lemma] as const));
        this.dictionaries.set(language, entries);
        getLogger().debug({ language, entries: entries.size, ms: Date.now() - start }, 'Loaded lemma dictionary');
        return entries;
    }

    private fileFor(language: string): string {
        return path.join(this.directory, `${language}.json`);
    }
}

/**
 * Lemma lookup backed by a plain object, for custom dictionaries and tests.
 */
export class MapLemmaLookup implements LemmaLookup {
    private readonly dictionaries: ReadonlyMap<string, ReadonlyMap<string, string>>;

    constructor(dictionaries: Readonly<Record<string, Readonly<Record<string, string>>>>) {
        this.dictionaries = new Map(
            Object.entries(dictionaries).map(([language, entries]) => [
                language,
                new Map(Object.entries(entries).map(([form, lemma]) => [form.toLowerCase(), lemma] as const)),
            ] as const)
        );
    }

    supports(language: string): boolean {
        return this.dictionaries.has(language);
    }

    lookup(word: string, language: string): string {
        const dictionary = this.dictionaries.get(language);
        if (!dictionary) return word.toLowerCase();
        return dictionary.get(word.toLowerCase()) ?? word;
    }
}

/**
 * Lemmatize one token. Quoted and empty tokens keep `lemma === null`.
 */
export function lemmatizeToken(token: Token, language: string, lookup: LemmaLookup): Token {
    if (token.isQuoted || !token.text) {
        return token;
    }
    return { ...token, lemma: lookup.lookup(token.text, language) };
}

/**
 * Fills `Token.lemma` using the detected language, or the configured default
 * when detection did not run or was undecided.
 */
export class LemmatizerEngine implements AnnotationEngine {
    readonly name = 'lemmatizer';
    readonly requires: readonly string[] = ['tokenizer'];
    readonly after: readonly string[] = ['language'];

    constructor(
        private readonly lookup: LemmaLookup,
        private readonly defaultLanguage: string
    ) {}

    apply(result: AnnotationResult): AnnotationResult {
        const language = result.language ?? this.defaultLanguage;
        return {
            ...result,
            tokens: result.tokens.map((token) => lemmatizeToken(token, language, this.lookup)),
        };
    }
}
