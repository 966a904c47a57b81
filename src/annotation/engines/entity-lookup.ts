import type {
    AnnotationEngine,
    AnnotationResult,
    EntityCandidate,
    LabelStore,
    LookupConfig,
    Token,
} from '../../types/index.js';
import { isNumeric } from '../../nlp/tokenizer.js';
import { getLogger } from '../../utils/logger.js';

/**
 * Whether a key may be sent to the label store at all.
 */
export function isValidLookupKey(key: string, config: LookupConfig): boolean {
    return (
        key.length >= config.minKeyLength &&
        !isNumeric(key) &&
        !key.startsWith('(') &&
        !config.blacklist.includes(key)
    );
}

/**
 * Keys tried for a span, surface text first, then the lemmas.
 */
export function lookupKeys(tokens: readonly Token[]): string[] {
    const surface = tokens.map((token) => token.text).join(' ').toLowerCase();
    const lemma = tokens.map((token) => token.lemma ?? token.text).join(' ').toLowerCase();
    return lemma === surface ? [surface] : [surface, lemma];
}

/**
 * Queries the label store for spans of up to `maxSpanTokens` tokens,
 * longest match first, scanning left to right. Tokens covered by a literal
 * or without text never reach the store. A missing label is skipped.
 */
export class EntityLookupEngine implements AnnotationEngine {
    readonly name = 'entity-lookup';
    readonly requires: readonly string[] = ['tokenizer'];
    readonly after: readonly string[] = ['lemmatizer', 'literals'];

    constructor(
        private readonly store: LabelStore,
        private readonly config: LookupConfig
    ) {}

    apply(result: AnnotationResult): AnnotationResult {
        const { tokens } = result;
        const excluded = tokens.map(
            (token) => !token.text || result.literals.some((literal) => literal.begin <= token.begin && token.end <= literal.end)
        );

        const candidates: EntityCandidate[] = [];
        let lookups = 0;
        let index = 0;

        while (index < tokens.length) {
            if (excluded[index]) {
                index++;
                continue;
            }

            // Longest run of lookup-eligible tokens starting here
            let runEnd = index;
            while (runEnd < tokens.length && !excluded[runEnd] && runEnd - index < this.config.maxSpanTokens) {
                runEnd++;
            }

            let consumed = 1;
            for (let length = runEnd - index; length >= 1; length--) {
                const span = tokens.slice(index, index + length);
                const first = span[0];
                const last = span[span.length - 1];
                if (!first || !last) continue;

                const hit = this.findRecord(span);
                lookups += hit.lookups;
                if (hit.record) {
                    candidates.push({
                        begin: first.begin,
                        end: last.end,
                        text: span.map((token) => token.text).join(' '),
                        lemma: span.every((token) => token.lemma !== null)
                            ? span.map((token) => token.lemma).join(' ')
                            : null,
                        key: hit.key,
                        record: hit.record,
                    });
                    consumed = length;
                    break;
                }
            }

            index += consumed;
        }

        getLogger().debug({ lookups, candidates: candidates.length }, 'Entity lookup finished');
        return { ...result, candidates };
    }

    private findRecord(span: readonly Token[]): { key: string; record: EntityCandidate['record'] | null; lookups: number } {
        let lookups = 0;
        for (const key of lookupKeys(span)) {
            if (!isValidLookupKey(key, this.config)) continue;
            lookups++;
            const record = this.store.lookup(key);
            if (record) {
                return { key, record, lookups };
            }
        }
        return { key: '', record: null, lookups };
    }
}
