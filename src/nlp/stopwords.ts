import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { dataPath } from '../utils/data-path.js';

const WordListSchema = z.array(z.string());

const cache = new Map<string, ReadonlySet<string>>();

/**
 * Stopword list of a language, read once from `data/stopwords/<language>.json`.
 * Words are lowercase.
 */
export function loadStopwords(language: string): ReadonlySet<string> {
    const cached = cache.get(language);
    if (cached) return cached;

    const file = stopwordFile(language);
    if (!existsSync(file)) {
        throw new ConfigurationError(`No stopword list for language "${language}"`);
    }

    const parsed = WordListSchema.safeParse(JSON.parse(readFileSync(file, 'utf-8')));
    if (!parsed.success) {
        throw new ConfigurationError(`Malformed stopword list ${file}`);
    }

    const words: ReadonlySet<string> = new Set(parsed.data.map((word) => word.toLowerCase()));
    cache.set(language, words);
    return words;
}

function stopwordFile(language: string): string {
    return dataPath('stopwords', `${language}.json`);
}
