import {
    spanId,
    type Annotation,
    type AnnotationEngine,
    type AnnotationResult,
    type EntityCandidate,
    type IdentifierPosition,
    type NamedEntityType,
} from '../../types/index.js';
import { LabelRecordError } from '../../utils/errors.js';
import { getLogger } from '../../utils/logger.js';
import type { EntityTypeRegistry } from '../entity-types.js';
import type { UriArena } from '../uri-arena.js';

/**
 * Turns raw label records into annotations: one Annotation per
 * (span, entity type), carrying interned identifiers.
 *
 * Record keys are resolved through the type registry, so persisted names
 * such as "Plant_Flora" and canonical names both work. An unknown type name
 * is a `LabelRecordError`. Identifiers are interned into a copy of the
 * result's arena, so spans that share an identifier share its labels.
 */
export class UriLinkingEngine implements AnnotationEngine {
    readonly name = 'uri-linking';
    readonly requires: readonly string[] = ['entity-lookup'];
    readonly after: readonly string[] = [];

    constructor(private readonly types: EntityTypeRegistry) {}

    apply(result: AnnotationResult): AnnotationResult {
        const arena = result.identifiers.clone();
        const linked = result.candidates.map((candidate) => this.link(candidate, arena));
        // Snapshot after interning so every identifier carries all its labels
        const annotations = linked.flatMap((groups) =>
            groups.map((group) => ({
                ...group.annotation,
                uris: group.entries.map(([index, position]) => arena.toUri(index, position, group.annotation.isSafe)),
            }))
        );
        getLogger().debug(
            { candidates: result.candidates.length, annotations: annotations.length },
            'URIs linked'
        );
        return { ...result, annotations, identifiers: arena };
    }

    private link(candidate: EntityCandidate, arena: UriArena): LinkedGroup[] {
        // Aliases may map two stored names onto one type; keep the first order seen
        const byType = new Map<NamedEntityType, Array<readonly [string, IdentifierPosition]>>();
        for (const [typeName, pairs] of Object.entries(candidate.record)) {
            const type = this.types.resolve(typeName);
            if (!type) {
                throw new LabelRecordError(`Unknown entity type "${typeName}"`, candidate.key);
            }
            const entries = byType.get(type) ?? [];
            entries.push(...pairs);
            byType.set(type, entries);
        }

        const isSafe = byType.size === 1;
        const groups: LinkedGroup[] = [];
        for (const [type, pairs] of byType) {
            const entries = internPairs(pairs, candidate.key, arena);
            if (entries.length === 0) continue;
            groups.push({
                annotation: {
                    id: spanId(candidate.begin, candidate.end),
                    begin: candidate.begin,
                    end: candidate.end,
                    text: candidate.text,
                    lemma: candidate.lemma,
                    namedEntityType: type,
                    uris: [],
                    isSafe,
                    ambiguousTypes: [],
                    features: [],
                },
                entries,
            });
        }
        return groups;
    }
}

interface LinkedGroup {
    annotation: Annotation;
    entries: Array<readonly [number, IdentifierPosition]>;
}

/**
 * Intern identifiers, dropping repeated (identifier, position) pairs.
 */
function internPairs(
    pairs: ReadonlyArray<readonly [string, IdentifierPosition]>,
    label: string,
    arena: UriArena
): Array<readonly [number, IdentifierPosition]> {
    const seen = new Set<string>();
    const entries: Array<readonly [number, IdentifierPosition]> = [];
    for (const [url, position] of pairs) {
        const key = `${position}|${url}`;
        if (seen.has(key)) continue;
        seen.add(key);
        entries.push([arena.intern(url, label), position]);
    }
    return entries;
}
