import type {
    Annotation,
    AnnotationEngine,
    AnnotationResult,
    IdentifierPosition,
    LiteralAnnotation,
    Statement,
    StatementObject,
    Uri,
} from '../../types/index.js';
import { ConfigurationError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import type { DependencyPattern, PatternElement, PatternRole } from '../patterns.js';

/**
 * One position of the linear sequence the patterns run over.
 */
export type SequenceElement =
    | { readonly kind: 'entity'; readonly annotation: Annotation }
    | { readonly kind: 'literal'; readonly literal: LiteralAnnotation }
    | { readonly kind: 'word'; readonly text: string; readonly lemma: string | null };

type Bound = Extract<SequenceElement, { kind: 'entity' | 'literal' }>;

/**
 * Merge tokens, annotations and literals into one left-to-right sequence.
 * A multi-token annotation or literal is a single element.
 */
export function buildSequence(result: AnnotationResult): SequenceElement[] {
    const sequence: SequenceElement[] = [];
    const emitted = new Set<string>();

    for (const token of result.tokens) {
        const annotation = result.annotations.find((a) => a.begin <= token.begin && token.end <= a.end);
        if (annotation) {
            if (!emitted.has(`a:${annotation.id}`)) {
                emitted.add(`a:${annotation.id}`);
                sequence.push({ kind: 'entity', annotation });
            }
            continue;
        }

        const literal = result.literals.find((l) => l.begin <= token.begin && token.end <= l.end);
        if (literal) {
            if (!emitted.has(`l:${literal.id}`)) {
                emitted.add(`l:${literal.id}`);
                sequence.push({ kind: 'literal', literal });
            }
            continue;
        }

        if (token.text) {
            sequence.push({ kind: 'word', text: token.text.toLowerCase(), lemma: token.lemma?.toLowerCase() ?? null });
        }
    }

    return sequence;
}

/**
 * Try one pattern at `start`. Optional words are taken when present; there
 * is no backtracking.
 */
export function matchPattern(
    pattern: DependencyPattern,
    sequence: readonly SequenceElement[],
    start: number
): { length: number; bound: Map<PatternRole, Bound> } | null {
    const bound = new Map<PatternRole, Bound>();
    let position = start;

    for (const element of pattern.elements) {
        const item = sequence[position];
        if (element.kind === 'word') {
            if (item?.kind === 'word' && matchesWord(element, item)) {
                position++;
            } else if (!element.optional) {
                return null;
            }
            continue;
        }

        if (element.kind === 'operand' && (item?.kind === 'entity' || item?.kind === 'literal')) {
            bound.set(element.role, item);
        } else if (element.kind === 'entity' && item?.kind === 'entity' && element.types.includes(item.annotation.namedEntityType)) {
            bound.set(element.role, item);
        } else if (element.kind === 'literal' && item?.kind === 'literal' && element.datatypes.includes(item.literal.value.datatype)) {
            bound.set(element.role, item);
        } else {
            return null;
        }
        position++;
    }

    return { length: position - start, bound };
}

function matchesWord(element: Extract<PatternElement, { kind: 'word' }>, item: Extract<SequenceElement, { kind: 'word' }>): boolean {
    return element.words.includes(item.text) || (item.lemma !== null && element.words.includes(item.lemma));
}

/**
 * Identifiers of an annotation for one triple position; all of them when
 * none is marked for that position.
 */
function urisFor(annotation: Annotation, position: IdentifierPosition): readonly Uri[] {
    const matching = annotation.uris.filter((uri) => uri.positionInTriple === position);
    return matching.length > 0 ? matching : annotation.uris;
}

/**
 * Emits statements by running the ordered pattern table over the
 * disambiguated sequence. At each position the first matching pattern wins
 * and consumes its window. Entities left over become standalone statements
 * without predicate and object.
 */
export class DependencyLinkingEngine implements AnnotationEngine {
    readonly name = 'dependency-linking';
    readonly requires: readonly string[] = ['disambiguation'];
    readonly after: readonly string[] = [];

    constructor(
        private readonly patterns: readonly DependencyPattern[],
        private readonly queryVariable: string
    ) {
        for (const pattern of patterns) {
            const subjects = pattern.elements.filter(
                (element) => (element.kind === 'entity' || element.kind === 'operand') && element.role === 'subject'
            );
            if (subjects.length !== 1) {
                throw new ConfigurationError(`Dependency pattern "${pattern.name}" must have exactly one subject element`);
            }
        }
    }

    apply(result: AnnotationResult): AnnotationResult {
        const sequence = buildSequence(result);
        const statements: Statement[] = [];
        let position = 0;

        while (position < sequence.length) {
            const match = this.firstMatch(sequence, position);
            if (match) {
                statements.push(match.statement);
                position += match.length;
                continue;
            }

            const item = sequence[position];
            if (item?.kind === 'entity') {
                statements.push(this.standalone(item.annotation));
            }
            position++;
        }

        getLogger().debug(
            { statements: statements.length, patterns: statements.filter((s) => s.pattern !== null).length },
            'Dependencies linked'
        );
        return { ...result, statements };
    }

    private firstMatch(sequence: readonly SequenceElement[], position: number): { statement: Statement; length: number } | null {
        for (const pattern of this.patterns) {
            const match = matchPattern(pattern, sequence, position);
            const subject = match?.bound.get('subject');
            if (!match || !subject) continue;

            const predicate = match.bound.get('predicate');
            const object = match.bound.get('object');
            return {
                length: match.length,
                statement: {
                    pattern: pattern.name,
                    subject: {
                        name: this.queryVariable,
                        bounds: subject.kind === 'entity' ? subject.annotation.uris : [],
                    },
                    predicate: predicate?.kind === 'entity' ? urisFor(predicate.annotation, 2) : null,
                    object: object ? objectOf(object) : null,
                    subjectAnnotationId: subject.kind === 'entity' ? subject.annotation.id : subject.literal.id,
                    relationship: pattern.relationship ?? null,
                },
            };
        }
        return null;
    }

    private standalone(annotation: Annotation): Statement {
        return {
            pattern: null,
            subject: { name: this.queryVariable, bounds: annotation.uris },
            predicate: null,
            object: null,
            subjectAnnotationId: annotation.id,
            relationship: null,
        };
    }
}

function objectOf(element: Bound): StatementObject {
    return element.kind === 'entity' ? urisFor(element.annotation, 3) : element.literal.value;
}
