import type { Relationship } from './annotation.js';
import type { EngineName } from './engine.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Which side of a span a cue word must stand on.
 */
export type CuePosition = 'before' | 'after';

/**
 * A lexical indicator that favours one entity type for the adjacent span,
 * e.g. "in" before a span favours Location.
 */
export interface ContextCueConfig {
    /** Lowercase cue words, compared against token text and lemma */
    words: string[];
    /** Entity type name (an alias or a NamedEntityType value) */
    type: string;
    position: CuePosition;
}

/**
 * Entity lookup settings.
 */
export interface LookupConfig {
    /** Longest span, in tokens, tried against the label store */
    maxSpanTokens: number;
    /** Keys shorter than this are never looked up */
    minKeyLength: number;
    /** Lowercase keys that are never looked up */
    blacklist: string[];
}

export type LabelStoreConfig =
    | { kind: 'memory'; path?: string }
    | { kind: 'sqlite'; path: string };

/**
 * Remote SPARQL endpoint. Retries are off unless `maxRetries` is raised;
 * `requestsPerSecond` throttles requests on the client side.
 */
export interface SparqlStoreConfig {
    kind: 'sparql';
    url: string;
    timeout: number;
    maxRetries: number;
    initialBackoff?: number;
    maxBackoff?: number;
    requestsPerSecond?: number;
    userAgent?: string;
}

export type KnowledgeStoreConfig = { kind: 'graph'; path?: string } | SparqlStoreConfig;

/**
 * Document search query settings.
 */
export interface SolrConfig {
    /** Field every term is searched in */
    field: string;
    /** Joins clauses that no conjunction of the query relates */
    defaultConjunction: Relationship;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface BiosearchConfig {
    // Language
    language: string;
    languages: string[];

    // Pipeline
    engines: EngineName[];
    annotationPriority: string[];
    typeAliases: Record<string, string>;
    contextCues: ContextCueConfig[];
    lookup: LookupConfig;

    // Resolution
    queryVariable: string;
    resultLimit: number;
    hierarchyPredicates: string[];
    namespaces: Record<string, string>;

    // Document search
    solr: SolrConfig;

    // Stores
    labelStore: LabelStoreConfig;
    knowledgeStore: KnowledgeStoreConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Default configuration values. Without store paths the bundled demo data is used.
 */
export const DEFAULT_CONFIG: BiosearchConfig = {
    language: 'de',
    languages: ['de', 'en'],
    engines: [
        'tokenizer',
        'language',
        'lemmatizer',
        'literals',
        'entity-lookup',
        'uri-linking',
        'disambiguation',
        'dependency-linking',
    ],
    annotationPriority: ['Plant', 'Animal', 'Taxon', 'Location', 'Miscellaneous'],
    typeAliases: {
        Plant_Flora: 'Plant',
        Animal_Fauna: 'Animal',
        Location_Place: 'Location',
        misc: 'Miscellaneous',
    },
    contextCues: [
        { words: ['in', 'im', 'bei', 'aus', 'near', 'from', 'around'], type: 'Location', position: 'before' },
    ],
    lookup: {
        maxSpanTokens: 6,
        minKeyLength: 3,
        blacklist: ['l.', '(l.)', 'r.', '&', 'var.', 'in'],
    },
    queryVariable: 'taxon',
    resultLimit: 1000,
    hierarchyPredicates: [
        'terms:kingdom',
        'terms:class',
        'terms:order',
        'terms:family',
        'terms:genus',
        'terms:phylum',
        'terms:parentNameUsageID',
        'terms:acceptedNameUsageID',
    ],
    namespaces: {
        terms: 'https://dwc.tdwg.org/terms/#',
    },
    solr: {
        field: 'q',
        defaultConjunction: 'and',
    },
    labelStore: { kind: 'memory' },
    knowledgeStore: { kind: 'graph' },
    logLevel: 'info',
    jsonLogs: false,
};
