import type { AnnotationEngine, AnnotationResult } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { loadStopwords } from './stopwords.js';

/**
 * Guess the language of a token list by counting stopwords of each candidate.
 * Returns null when no candidate has a hit or the best two are tied.
 */
export function detectLanguage(words: readonly string[], stopwords: ReadonlyMap<string, ReadonlySet<string>>): string | null {
    let best: string | null = null;
    let bestScore = 0;
    let tied = false;

    for (const [language, list] of stopwords) {
        const score = words.reduce((count, word) => (list.has(word.toLowerCase()) ? count + 1 : count), 0);
        if (score > bestScore) {
            best = language;
            bestScore = score;
            tied = false;
        } else if (score === bestScore && score > 0) {
            tied = true;
        }
    }

    return tied ? null : best;
}

/**
 * Sets `language` from stopword frequencies. Short queries often carry no
 * stopwords at all; the lemmatizer then uses its default language.
 */
export class LanguageDetectionEngine implements AnnotationEngine {
    readonly name = 'language';
    readonly requires: readonly string[] = ['tokenizer'];
    readonly after: readonly string[] = [];

    private readonly stopwords: ReadonlyMap<string, ReadonlySet<string>>;

    constructor(languages: readonly string[]) {
        this.stopwords = new Map(languages.map((language) => [language, loadStopwords(language)] as const));
    }

    apply(result: AnnotationResult): AnnotationResult {
        const language = detectLanguage(
            result.tokens.filter((token) => !token.isQuoted).map((token) => token.text),
            this.stopwords
        );
        getLogger().debug({ language }, 'Detected query language');
        return { ...result, language };
    }
}
