import { UriArena } from '../annotation/uri-arena.js';

/**
 * Named entity categories an annotation can carry.
 *
 * The order used to break ties between them is not fixed here; it comes from
 * `annotationPriority` in the configuration.
 */
export enum NamedEntityType {
    TAXON = 'Taxon',
    ANIMAL = 'Animal',
    PLANT = 'Plant',
    LOCATION = 'Location',
    MISCELLANEOUS = 'Miscellaneous',
}

/** Types whose annotations can stand in the subject position of a statement. */
export const SUBJECT_ENTITY_TYPES: ReadonlySet<NamedEntityType> = new Set([
    NamedEntityType.TAXON,
    NamedEntityType.PLANT,
    NamedEntityType.ANIMAL,
]);

/**
 * Position of a term in a triple. Position 1 is the query variable and is
 * never stored on an identifier.
 */
export type TriplePosition = 1 | 2 | 3;

/** Positions an identifier can occupy: 2 (predicate) or 3 (object). */
export type IdentifierPosition = 2 | 3;

/**
 * A whitespace-delimited span of the original query.
 * Offsets are half-open and relative to the query string.
 */
export interface Token {
    readonly index: number;
    readonly begin: number;
    readonly end: number;
    /** Surface text with surrounding quotes and punctuation removed */
    readonly text: string;
    readonly lemma: string | null;
    readonly isQuoted: boolean;
}

/**
 * An identifier of a real-world entity in the knowledge graph.
 *
 * `parent` and `children` are indices into the `identifiers` arena of the
 * result or query that holds the identifier; the hierarchy may be cyclic.
 */
export interface Uri {
    readonly url: string;
    readonly positionInTriple: IdentifierPosition;
    /** True when resolution of this identifier is unambiguous */
    readonly isSafe: boolean;
    readonly labels: readonly string[];
    readonly parent: number | null;
    readonly children: readonly number[];
}

export type LiteralDatatype = 'string' | 'integer' | 'decimal';

/** A user-supplied value that is matched as-is instead of being looked up. */
export interface LiteralValue {
    readonly kind: 'literal';
    readonly text: string;
    readonly datatype: LiteralDatatype;
}

/** A quoted string or number found in the query. */
export interface LiteralAnnotation {
    readonly id: string;
    readonly begin: number;
    readonly end: number;
    readonly text: string;
    readonly namedEntityType: NamedEntityType.MISCELLANEOUS;
    readonly value: LiteralValue;
}

/**
 * One semantic fact about an annotation. `property === null` is a bare
 * identity fact.
 */
export interface Feature {
    readonly property: readonly Uri[] | null;
    readonly value: readonly Uri[] | LiteralValue | null;
}

export interface Annotation {
    /** `${begin}/${end}` */
    readonly id: string;
    readonly begin: number;
    readonly end: number;
    readonly text: string;
    readonly lemma: string | null;
    readonly namedEntityType: NamedEntityType;
    /** Current identifiers; replaced by disambiguation and resolution */
    uris: Uri[];
    /** False when the type was picked by the priority fallback */
    isSafe: boolean;
    /** Types that lost against `namedEntityType` without a context cue */
    readonly ambiguousTypes: readonly NamedEntityType[];
    /** Append-only provenance */
    readonly features: Feature[];
}

/**
 * Raw hit of the label store for one span, before identifiers are built.
 * `record` keeps the persisted type names untouched.
 */
export interface EntityCandidate {
    readonly begin: number;
    readonly end: number;
    readonly text: string;
    readonly lemma: string | null;
    /** The key that produced the hit */
    readonly key: string;
    readonly record: LabelRecord;
}

/** Placeholder for the subject of a statement, constrained by `bounds`. */
export interface QueryVariable {
    readonly name: string;
    /** Identifiers the bound values must descend from */
    readonly bounds: readonly Uri[];
}

export type StatementObject = readonly Uri[] | LiteralValue;

/** How the two operands of a conjunction relate. */
export type Relationship = 'and' | 'or';

/**
 * A triple pattern whose subject is the query variable.
 *
 * A conjunction ("Fagus und Quercus") is a statement with a `relationship`:
 * subject and object are its two operands, and it is never executed against
 * a knowledge engine.
 */
export interface Statement {
    /** Name of the dependency pattern that produced it; null for a standalone entity */
    readonly pattern: string | null;
    readonly subject: QueryVariable;
    readonly predicate: readonly Uri[] | null;
    readonly object: StatementObject | null;
    /** Annotation (or literal, for a conjunction) that receives the bindings of the subject variable */
    readonly subjectAnnotationId: string;
    readonly relationship: Relationship | null;
}

/**
 * State threaded through the annotation engines. Every engine returns a new
 * object; the arrays of a result handed to an engine are never mutated.
 */
export interface AnnotationResult {
    readonly text: string;
    readonly language: string | null;
    readonly tokens: readonly Token[];
    readonly literals: readonly LiteralAnnotation[];
    readonly candidates: readonly EntityCandidate[];
    readonly annotations: readonly Annotation[];
    readonly statements: readonly Statement[];
    readonly identifiers: UriArena;
}

/** A user query and everything derived from it. Owned by a single caller. */
export interface Query {
    readonly text: string;
    annotations: Annotation[];
    literals: LiteralAnnotation[];
    statements: Statement[];
    identifiers: UriArena;
}

/**
 * Persisted label store value: type name → `[identifier, position]` pairs.
 * Type names are the stored ones (e.g. "Plant_Flora") and are resolved later.
 */
export type LabelRecord = Readonly<Record<string, ReadonlyArray<readonly [string, IdentifierPosition]>>>;

/** Bound identifiers per triple position. */
export type Bindings = ReadonlyMap<TriplePosition, readonly string[]>;

export function isLiteralValue(value: StatementObject | Feature['value']): value is LiteralValue {
    return value !== null && 'kind' in value;
}

export function spanId(begin: number, end: number): string {
    return `${begin}/${end}`;
}

export function createAnnotationResult(text: string): AnnotationResult {
    return {
        text,
        language: null,
        tokens: [],
        literals: [],
        candidates: [],
        annotations: [],
        statements: [],
        identifiers: new UriArena(),
    };
}

export function createQuery(text: string): Query {
    return { text, annotations: [], literals: [], statements: [], identifiers: new UriArena() };
}
