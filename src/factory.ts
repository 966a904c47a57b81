import { DisambiguationEngine, compileContextCues } from './annotation/engines/disambiguation.js';
import { DependencyLinkingEngine } from './annotation/engines/dependency-linking.js';
import { EntityLookupEngine } from './annotation/engines/entity-lookup.js';
import { LiteralAnnotationEngine } from './annotation/engines/literals.js';
import { UriLinkingEngine } from './annotation/engines/uri-linking.js';
import { EntityTypeRegistry } from './annotation/entity-types.js';
import { DEFAULT_PATTERNS, type DependencyPattern } from './annotation/patterns.js';
import { TextAnnotator } from './annotation/text-annotator.js';
import { GraphKnowledgeEngine } from './graph/knowledge-graph.js';
import { LanguageDetectionEngine } from './nlp/language.js';
import { DictionaryLemmaLookup, LemmatizerEngine } from './nlp/lemmatizer.js';
import { loadStopwords } from './nlp/stopwords.js';
import { TokenizerEngine } from './nlp/tokenizer.js';
import { SemanticQueryProcessor } from './query/processor.js';
import { SolrQueryGenerator } from './query/solr-generator.js';
import { SparqlKnowledgeEngine } from './sources/sparql.js';
import { SqliteLabelStore } from './storage/database.js';
import { InMemoryLabelStore } from './storage/label-store.js';
import type {
    AnnotationEngine,
    BiosearchConfig,
    EngineName,
    KnowledgeEngine,
    LabelStore,
    LemmaLookup,
} from './types/index.js';
import { dataPath } from './utils/data-path.js';

/**
 * Collaborators that can be injected instead of being built from config.
 */
export interface PipelineDependencies {
    labelStore?: LabelStore;
    lemmaLookup?: LemmaLookup;
    patterns?: readonly DependencyPattern[];
    knowledgeEngine?: KnowledgeEngine | null;
}

export function createLabelStore(config: BiosearchConfig): LabelStore {
    const store = config.labelStore;
    switch (store.kind) {
        case 'memory':
            return InMemoryLabelStore.fromFile(store.path ?? dataPath('demo', 'labels.json'));
        case 'sqlite':
            return new SqliteLabelStore(store.path, { readonly: true });
    }
}

export function createKnowledgeEngine(config: BiosearchConfig): KnowledgeEngine {
    const store = config.knowledgeStore;
    switch (store.kind) {
        case 'graph':
            return GraphKnowledgeEngine.fromFile(store.path ?? dataPath('demo', 'knowledge.json'), {
                hierarchyPredicates: config.hierarchyPredicates,
                namespaces: config.namespaces,
                defaultLimit: config.resultLimit,
            });
        case 'sparql':
            return new SparqlKnowledgeEngine({
                endpoint: store.url,
                http: {
                    timeout: store.timeout,
                    maxRetries: store.maxRetries,
                    initialBackoff: store.initialBackoff,
                    maxBackoff: store.maxBackoff,
                    requestsPerSecond: store.requestsPerSecond,
                    userAgent: store.userAgent,
                },
                namespaces: config.namespaces,
                hierarchyPredicates: config.hierarchyPredicates,
                defaultLimit: config.resultLimit,
            });
    }
}

/**
 * Build the annotation engines named in `config.engines`, in that order.
 * Misordered or missing prerequisites fail in the TextAnnotator constructor.
 */
export function createEngines(config: BiosearchConfig, deps: PipelineDependencies = {}): AnnotationEngine[] {
    const types = new EntityTypeRegistry(config.annotationPriority, config.typeAliases);
    const cues = compileContextCues(config.contextCues, types);
    let labelStore = deps.labelStore;
    let lemmaLookup = deps.lemmaLookup;

    const build = (name: EngineName): AnnotationEngine => {
        switch (name) {
            case 'tokenizer':
                return new TokenizerEngine();
            case 'language':
                return new LanguageDetectionEngine(config.languages);
            case 'lemmatizer':
                lemmaLookup ??= new DictionaryLemmaLookup();
                return new LemmatizerEngine(lemmaLookup, config.language);
            case 'literals':
                return new LiteralAnnotationEngine();
            case 'entity-lookup':
                labelStore ??= createLabelStore(config);
                return new EntityLookupEngine(labelStore, config.lookup);
            case 'uri-linking':
                return new UriLinkingEngine(types);
            case 'disambiguation':
                return new DisambiguationEngine(types, cues);
            case 'dependency-linking':
                return new DependencyLinkingEngine(deps.patterns ?? DEFAULT_PATTERNS, config.queryVariable);
        }
    };

    return config.engines.map(build);
}

export function createTextAnnotator(config: BiosearchConfig, deps: PipelineDependencies = {}): TextAnnotator {
    return new TextAnnotator(createEngines(config, deps));
}

/**
 * Text annotator plus knowledge engine. Pass `knowledgeEngine: null` for an
 * annotation-only processor.
 */
export function createQueryProcessor(config: BiosearchConfig, deps: PipelineDependencies = {}): SemanticQueryProcessor {
    const knowledgeEngine = deps.knowledgeEngine === undefined ? createKnowledgeEngine(config) : deps.knowledgeEngine;
    return new SemanticQueryProcessor(createTextAnnotator(config, deps), knowledgeEngine, {
        limit: config.resultLimit,
    });
}

/**
 * Solr generator from `config.solr`; the stopwords of every configured
 * language are left out of the free-text terms.
 */
export function createSolrQueryGenerator(
    config: BiosearchConfig,
    options: { omitPropertyOperands?: boolean } = {}
): SolrQueryGenerator {
    const stopwords = new Set(config.languages.flatMap((language) => [...loadStopwords(language)]));
    return new SolrQueryGenerator({
        field: config.solr.field,
        defaultConjunction: config.solr.defaultConjunction,
        stopwords,
        omitPropertyOperands: options.omitPropertyOperands ?? false,
    });
}
