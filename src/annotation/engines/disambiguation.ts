import type {
    Annotation,
    AnnotationEngine,
    AnnotationResult,
    ContextCueConfig,
    CuePosition,
    NamedEntityType,
    Token,
} from '../../types/index.js';
import { getLogger } from '../../utils/logger.js';
import type { EntityTypeRegistry } from '../entity-types.js';

/**
 * Context cue with its type already resolved.
 */
export interface ContextCue {
    readonly words: ReadonlySet<string>;
    readonly type: NamedEntityType;
    readonly position: CuePosition;
}

export function compileContextCues(cues: readonly ContextCueConfig[], types: EntityTypeRegistry): ContextCue[] {
    return cues.map((cue) => ({
        words: new Set(cue.words.map((word) => word.toLowerCase())),
        type: types.require(cue.type),
        position: cue.position,
    }));
}

/**
 * Annotations whose spans overlap, transitively, in order of `begin`.
 */
export function groupOverlapping(annotations: readonly Annotation[]): Annotation[][] {
    const sorted = [...annotations].sort((a, b) => a.begin - b.begin || b.end - a.end);
    const groups: Annotation[][] = [];
    let current: Annotation[] = [];
    let currentEnd = -1;

    for (const annotation of sorted) {
        if (current.length > 0 && annotation.begin >= currentEnd) {
            groups.push(current);
            current = [];
        }
        current.push(annotation);
        currentEnd = Math.max(currentEnd, annotation.end);
    }
    if (current.length > 0) {
        groups.push(current);
    }
    return groups;
}

interface Decision {
    type: NamedEntityType;
    isSafe: boolean;
    ambiguousTypes: readonly NamedEntityType[];
    reason: 'unique' | 'cue' | 'priority';
}

/**
 * Collapses overlapping and multi-typed annotations to one interpretation
 * per span.
 *
 * 1. A group with a single type keeps it.
 * 2. Otherwise the first context cue whose word is adjacent to the group and
 *    whose type is among the candidates decides, for this occurrence only.
 * 3. Otherwise the highest type in the priority order wins; the result is
 *    marked unsafe and the losing types are kept in `ambiguousTypes`.
 *
 * Within the winning type the longest span survives (earliest on a tie).
 * Running the engine on its own output changes nothing.
 */
export class DisambiguationEngine implements AnnotationEngine {
    readonly name = 'disambiguation';
    readonly requires: readonly string[] = ['uri-linking'];
    readonly after: readonly string[] = [];

    constructor(
        private readonly types: EntityTypeRegistry,
        private readonly cues: readonly ContextCue[]
    ) {}

    apply(result: AnnotationResult): AnnotationResult {
        const logger = getLogger();
        const annotations: Annotation[] = [];

        for (const group of groupOverlapping(result.annotations)) {
            const decision = this.decide(group, result.tokens);
            const [winner, ...dropped] = group
                .filter((annotation) => annotation.namedEntityType === decision.type)
                .sort((a, b) => b.end - b.begin - (a.end - a.begin) || a.begin - b.begin);
            if (!winner) continue;

            for (const loser of group) {
                if (loser !== winner) {
                    logger.debug(
                        {
                            text: loser.text,
                            span: loser.id,
                            type: loser.namedEntityType,
                            kept: decision.type,
                            reason: dropped.includes(loser) ? 'shorter-span' : decision.reason,
                        },
                        'Dropped interpretation'
                    );
                }
            }

            annotations.push({
                ...winner,
                isSafe: decision.isSafe,
                ambiguousTypes: decision.ambiguousTypes,
                uris: winner.uris.map((uri) => ({ ...uri, isSafe: decision.isSafe })),
                features: [...winner.features],
            });
        }

        return { ...result, annotations };
    }

    private decide(group: readonly Annotation[], tokens: readonly Token[]): Decision {
        const candidates = [...new Set(group.map((annotation) => annotation.namedEntityType))].sort((a, b) =>
            this.types.compare(a, b)
        );
        const [best] = candidates;
        if (!best) {
            throw new RangeError('Cannot disambiguate an empty group');
        }

        if (candidates.length === 1) {
            // Keep what an earlier pass decided
            const ambiguousTypes = group.flatMap((annotation) => annotation.ambiguousTypes);
            const unique = [...new Set(ambiguousTypes)].sort((a, b) => this.types.compare(a, b));
            return { type: best, isSafe: unique.length === 0, ambiguousTypes: unique, reason: 'unique' };
        }

        const begin = Math.min(...group.map((annotation) => annotation.begin));
        const end = Math.max(...group.map((annotation) => annotation.end));
        const before = [...tokens].reverse().find((token) => token.end <= begin);
        const after = tokens.find((token) => token.begin >= end);

        for (const cue of this.cues) {
            const neighbour = cue.position === 'before' ? before : after;
            if (neighbour && matchesCue(neighbour, cue) && candidates.includes(cue.type)) {
                return { type: cue.type, isSafe: true, ambiguousTypes: [], reason: 'cue' };
            }
        }

        return {
            type: best,
            isSafe: false,
            ambiguousTypes: candidates.slice(1),
            reason: 'priority',
        };
    }
}

function matchesCue(token: Token, cue: ContextCue): boolean {
    return cue.words.has(token.text.toLowerCase()) || (token.lemma !== null && cue.words.has(token.lemma.toLowerCase()));
}
