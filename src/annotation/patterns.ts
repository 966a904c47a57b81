import { NamedEntityType, SUBJECT_ENTITY_TYPES, type LiteralDatatype, type Relationship } from '../types/index.js';

/** Role an element plays in the emitted statement. */
export type PatternRole = 'subject' | 'predicate' | 'object';

export type PatternElement =
    | { readonly kind: 'entity'; readonly types: readonly NamedEntityType[]; readonly role: PatternRole }
    | { readonly kind: 'literal'; readonly datatypes: readonly LiteralDatatype[]; readonly role: 'object' }
    /** Any entity or literal */
    | { readonly kind: 'operand'; readonly role: 'subject' | 'object' }
    | { readonly kind: 'word'; readonly words: readonly string[]; readonly optional: boolean };

/**
 * An ordered rule over the linear sequence of entities, literals and plain
 * words. A pattern must bind a subject.
 */
export interface DependencyPattern {
    readonly name: string;
    readonly elements: readonly PatternElement[];
    /** Marks the emitted statements as conjunctions */
    readonly relationship?: Relationship;
}

const SUBJECT: PatternElement = {
    kind: 'entity',
    types: [...SUBJECT_ENTITY_TYPES],
    role: 'subject',
};

const WITH: PatternElement = { kind: 'word', words: ['mit', 'with'], optional: true };

function conjunction(name: string, relationship: Relationship, words: readonly string[]): DependencyPattern {
    return {
        name,
        relationship,
        elements: [
            { kind: 'operand', role: 'subject' },
            { kind: 'word', words, optional: false },
            { kind: 'operand', role: 'object' },
        ],
    };
}

/**
 * Default rules, tried in this order at every position.
 *
 * - "Pflanzen mit roten Blüten", "plants with red flowers"
 * - "Bäume mit 5 Blättern"
 * - "Pflanzen mit Dornen"
 * - "Fagus und Quercus", "Fagus or 'Rotbuche'"
 */
export const DEFAULT_PATTERNS: readonly DependencyPattern[] = [
    {
        name: 'taxon-property',
        elements: [
            SUBJECT,
            WITH,
            { kind: 'entity', types: [NamedEntityType.MISCELLANEOUS], role: 'object' },
            { kind: 'entity', types: [NamedEntityType.MISCELLANEOUS], role: 'predicate' },
        ],
    },
    {
        name: 'taxon-numerical-property',
        elements: [
            SUBJECT,
            WITH,
            { kind: 'literal', datatypes: ['integer', 'decimal'], role: 'object' },
            { kind: 'entity', types: [NamedEntityType.MISCELLANEOUS], role: 'predicate' },
        ],
    },
    {
        name: 'taxon-compound-property',
        elements: [
            SUBJECT,
            WITH,
            { kind: 'entity', types: [NamedEntityType.MISCELLANEOUS], role: 'object' },
        ],
    },
    conjunction('and-conjunction', 'and', ['und', 'and']),
    conjunction('or-conjunction', 'or', ['oder', 'or']),
];
