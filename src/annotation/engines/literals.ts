import {
    NamedEntityType,
    spanId,
    type AnnotationEngine,
    type AnnotationResult,
    type LiteralAnnotation,
    type LiteralValue,
    type Token,
} from '../../types/index.js';
import { isNumeric } from '../../nlp/tokenizer.js';
import { getLogger } from '../../utils/logger.js';

/**
 * Literal value of a token, or null when the token is looked up normally.
 * Decimal commas are normalised to dots.
 */
export function literalValueOf(token: Token): LiteralValue | null {
    if (token.isQuoted) {
        return { kind: 'literal', text: token.text, datatype: 'string' };
    }
    if (isNumeric(token.text)) {
        const normalised = token.text.replace(',', '.').replace(/^\+/, '');
        return {
            kind: 'literal',
            text: normalised,
            datatype: normalised.includes('.') ? 'decimal' : 'integer',
        };
    }
    return null;
}

/**
 * Marks quoted phrases and numbers as literals. Entity lookup skips every
 * token covered by a literal.
 */
export class LiteralAnnotationEngine implements AnnotationEngine {
    readonly name = 'literals';
    readonly requires: readonly string[] = ['tokenizer'];
    readonly after: readonly string[] = [];

    apply(result: AnnotationResult): AnnotationResult {
        const literals: LiteralAnnotation[] = [];
        for (const token of result.tokens) {
            const value = literalValueOf(token);
            if (value) {
                literals.push({
                    id: spanId(token.begin, token.end),
                    begin: token.begin,
                    end: token.end,
                    text: token.text,
                    namedEntityType: NamedEntityType.MISCELLANEOUS,
                    value,
                });
            }
        }

        getLogger().debug({ count: literals.length }, 'Literals annotated');
        return { ...result, literals };
    }
}
