import type { AnnotationEngine, AnnotationResult, Token } from '../types/index.js';

/** Quoted phrase, or any run of non-whitespace. */
const TOKEN_PATTERN = /"[^"]*"|'[^']*'|\S+/g;

/** Punctuation stripped from the edges of unquoted tokens. */
const EDGE_PUNCTUATION = /^[!?;,:]+|[!?;,:]+$/g;

const NUMBER_PATTERN = /^[+-]?\d+(?:[.,]\d+)?$/;

/**
 * Split text into whitespace-delimited tokens.
 * - Quoted phrases ('...' or "...") are one token; offsets include the quotes
 * - Edge punctuation is removed from `text` but kept inside the offsets;
 *   a full stop is only removed from the last token, so "var." survives
 * - Decimal numbers stay whole ("1.5", "2,75")
 *
 * `text.slice(token.begin, token.end)` is always the raw chunk, and
 * everything between two tokens is whitespace.
 */
export function tokenize(text: string): Token[] {
    if (!text) return [];

    const tokens: Token[] = [];
    const contentEnd = text.trimEnd().length;
    for (const match of text.matchAll(TOKEN_PATTERN)) {
        const raw = match[0];
        const begin = match.index ?? 0;
        const isQuoted = raw.length >= 2 && (raw.startsWith('"') || raw.startsWith("'")) && raw.endsWith(raw.charAt(0));

        tokens.push({
            index: tokens.length,
            begin,
            end: begin + raw.length,
            text: isQuoted ? raw.slice(1, -1).trim() : cleanToken(raw, begin + raw.length === contentEnd),
            lemma: null,
            isQuoted,
        });
    }

    return tokens;
}

function cleanToken(raw: string, isLast: boolean): string {
    const stripped = raw.replace(EDGE_PUNCTUATION, '');
    return isLast && !NUMBER_PATTERN.test(stripped) ? stripped.replace(/\.+$/, '') : stripped;
}

export function isNumeric(text: string): boolean {
    return NUMBER_PATTERN.test(text);
}

/**
 * First engine of every pipeline: fills `tokens`.
 */
export class TokenizerEngine implements AnnotationEngine {
    readonly name = 'tokenizer';
    readonly requires: readonly string[] = [];
    readonly after: readonly string[] = [];

    apply(result: AnnotationResult): AnnotationResult {
        return { ...result, tokens: tokenize(result.text) };
    }
}
