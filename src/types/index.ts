/**
 * Barrel export for all shared types.
 */
export {
    NamedEntityType,
    SUBJECT_ENTITY_TYPES,
    isLiteralValue,
    spanId,
    createAnnotationResult,
    createQuery,
} from './annotation.js';
export type {
    TriplePosition,
    IdentifierPosition,
    Token,
    Uri,
    LiteralDatatype,
    LiteralValue,
    LiteralAnnotation,
    Feature,
    Annotation,
    EntityCandidate,
    QueryVariable,
    StatementObject,
    Statement,
    Relationship,
    AnnotationResult,
    Query,
    LabelRecord,
    Bindings,
} from './annotation.js';
export { ENGINE_NAMES } from './engine.js';
export type { EngineName, AnnotationEngine } from './engine.js';
export type { LabelStore, LemmaLookup, KnowledgeEngine, ExecuteOptions } from './stores.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    BiosearchConfig,
    LogLevel,
    CuePosition,
    ContextCueConfig,
    LookupConfig,
    LabelStoreConfig,
    KnowledgeStoreConfig,
    SparqlStoreConfig,
    SolrConfig,
} from './config.js';
