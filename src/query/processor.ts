import type { TextAnnotator } from '../annotation/text-annotator.js';
import { toAbstractedString } from '../annotation/abstracted-string.js';
import type {
    Annotation,
    ExecuteOptions,
    Feature,
    KnowledgeEngine,
    Query,
    Statement,
    Uri,
} from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Whether a statement constrains its subject beyond bare identity.
 * Conjunctions never do.
 */
export function isConstraining(statement: Statement): boolean {
    return statement.relationship === null && (statement.predicate !== null || statement.object !== null);
}

/**
 * Features of one annotation: its identity, then one per constraining
 * statement about it.
 */
export function createFeatures(annotation: Annotation, statements: readonly Statement[]): Feature[] {
    const features: Feature[] = [];
    if (annotation.uris.length > 0) {
        features.push({ property: null, value: annotation.uris });
    }
    for (const statement of statements) {
        if (statement.subjectAnnotationId === annotation.id && isConstraining(statement)) {
            features.push({ property: statement.predicate, value: statement.object });
        }
    }
    return features;
}

export interface SemanticQueryProcessorOptions {
    /** Default maximum number of identifiers bound per annotation */
    limit?: number;
}

/**
 * Annotates queries and resolves their statements against a knowledge
 * engine, binding the results back onto the subject annotations.
 */
export class SemanticQueryProcessor {
    constructor(
        private readonly textAnnotator: TextAnnotator,
        private readonly knowledgeEngine: KnowledgeEngine | null = null,
        private readonly options: SemanticQueryProcessorOptions = {}
    ) {}

    /**
     * Run the text annotator over `query.text` and replace the query's
     * annotations, literals and statements with the result.
     */
    updateQueryWithAnnotations(query: Query): void {
        const result = this.textAnnotator.annotate(query.text);

        query.statements = [...result.statements];
        query.literals = [...result.literals];
        query.identifiers = result.identifiers;
        query.annotations = result.annotations.map((annotation) => ({
            ...annotation,
            uris: [...annotation.uris],
            features: createFeatures(annotation, result.statements),
        }));

        getLogger().debug(
            { query: toAbstractedString(query.text, query.annotations, query.literals), statements: query.statements.length },
            'Query annotated'
        );
    }

    /**
     * Resolve every annotation that is the subject of a constraining
     * statement. All statements of one subject go into a single `execute()`
     * call; the bound subject identifiers replace the annotation's `uris`.
     *
     * Nothing on the query changes unless every call succeeds. Returns true
     * when at least one annotation received identifiers.
     */
    async resolveQueryAnnotations(query: Query, options: ExecuteOptions = {}): Promise<boolean> {
        if (!this.knowledgeEngine) {
            throw new ConfigurationError('No knowledge engine configured; cannot resolve query annotations');
        }
        const logger = getLogger();
        const limit = options.limit ?? this.options.limit;

        const bySubject = new Map<string, Statement[]>();
        for (const statement of query.statements) {
            if (!isConstraining(statement)) continue;
            const group = bySubject.get(statement.subjectAnnotationId) ?? [];
            group.push(statement);
            bySubject.set(statement.subjectAnnotationId, group);
        }

        const arena = query.identifiers.clone();
        const staged = new Map<string, Uri[]>();

        for (const annotation of query.annotations) {
            const statements = bySubject.get(annotation.id);
            if (!statements) continue;

            const bindings = await this.knowledgeEngine.execute(statements, limit === undefined ? {} : { limit });
            const urls = [...new Set(bindings.get(1) ?? [])];

            const bounds = statements.flatMap((statement) => statement.subject.bounds).map((uri) => arena.intern(uri.url));
            const indices = urls.map((url) => {
                const index = arena.intern(url, annotation.text.toLowerCase());
                for (const bound of bounds) {
                    arena.link(bound, index);
                }
                return index;
            });

            staged.set(annotation.id, indices.map((index) => arena.toUri(index, 3, true)));
            logger.debug({ annotation: annotation.id, statements: statements.length, bound: urls.length }, 'Annotation resolved');
        }

        // All calls succeeded; apply the changes
        for (const annotation of query.annotations) {
            const uris = staged.get(annotation.id);
            if (uris) {
                annotation.uris = uris;
                annotation.isSafe = true;
            }
        }
        query.identifiers = arena;

        const enriched = [...staged.values()].some((uris) => uris.length > 0);
        logger.info(
            { engine: this.knowledgeEngine.name, resolved: staged.size, enriched },
            'Query annotations resolved'
        );
        return enriched;
    }
}
