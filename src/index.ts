export * from './types/index.js';
export { TextAnnotator, validateEngineOrder } from './annotation/text-annotator.js';
export { EntityTypeRegistry } from './annotation/entity-types.js';
export { UriArena } from './annotation/uri-arena.js';
export { DEFAULT_PATTERNS } from './annotation/patterns.js';
export type { DependencyPattern, PatternElement, PatternRole } from './annotation/patterns.js';
export { toAbstractedString } from './annotation/abstracted-string.js';
export { LiteralAnnotationEngine } from './annotation/engines/literals.js';
export { EntityLookupEngine, isValidLookupKey } from './annotation/engines/entity-lookup.js';
export { UriLinkingEngine } from './annotation/engines/uri-linking.js';
export { DisambiguationEngine, compileContextCues } from './annotation/engines/disambiguation.js';
export type { ContextCue } from './annotation/engines/disambiguation.js';
export { DependencyLinkingEngine } from './annotation/engines/dependency-linking.js';
export { TokenizerEngine, tokenize } from './nlp/tokenizer.js';
export { LemmatizerEngine, DictionaryLemmaLookup, MapLemmaLookup } from './nlp/lemmatizer.js';
export { LanguageDetectionEngine, detectLanguage } from './nlp/language.js';
export { SemanticQueryProcessor } from './query/processor.js';
export { SparqlQueryGenerator } from './query/sparql-generator.js';
export { SolrQueryGenerator, escapeSolrInput } from './query/solr-generator.js';
export type { SolrQueryOptions } from './query/solr-generator.js';
export { GraphKnowledgeEngine } from './graph/knowledge-graph.js';
export { SparqlKnowledgeEngine } from './sources/sparql.js';
export { InMemoryLabelStore, decodeLabelRecord } from './storage/label-store.js';
export { SqliteLabelStore } from './storage/database.js';
export {
    createEngines,
    createTextAnnotator,
    createQueryProcessor,
    createLabelStore,
    createKnowledgeEngine,
    createSolrQueryGenerator,
} from './factory.js';
export type { PipelineDependencies } from './factory.js';
export { resolveConfig, defaultConfig } from './utils/config.js';
export type { ConfigOverrides } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export { ConfigurationError, LabelRecordError, SparqlResponseError } from './utils/errors.js';
export { HttpClient, HttpError } from './utils/http-client.js';
