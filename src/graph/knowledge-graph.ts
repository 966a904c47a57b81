import { readFileSync } from 'node:fs';
import { MultiDirectedGraph } from 'graphology';
import { z } from 'zod';
import {
    isLiteralValue,
    type Bindings,
    type ExecuteOptions,
    type KnowledgeEngine,
    type LiteralValue,
    type Statement,
    type TriplePosition,
} from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

// ─── Data file ──────────────────────────────────────────

/**
 * `triples` link two resources; `literals` attach a value to a resource.
 * Identifiers may be absolute or prefixed with one of `namespaces`.
 */
const KnowledgeFileSchema = z.object({
    namespaces: z.record(z.string()).default({}),
    triples: z.array(z.tuple([z.string().min(1), z.string().min(1), z.string().min(1)])).default([]),
    literals: z.array(z.tuple([z.string().min(1), z.string().min(1), z.union([z.string(), z.number()])])).default([]),
});

export type KnowledgeFile = z.input<typeof KnowledgeFileSchema>;

// Type aliases, not interfaces: graphology requires an index signature
type NodeAttributes = {
    kind: 'resource' | 'literal';
    value: string;
};

type EdgeAttributes = {
    predicate: string;
};

export interface GraphKnowledgeEngineOptions {
    hierarchyPredicates: readonly string[];
    namespaces?: Readonly<Record<string, string>>;
    defaultLimit?: number;
}

/**
 * Expand `prefix:local` with a known prefix; anything else is returned as is.
 */
export function expandIdentifier(identifier: string, namespaces: Readonly<Record<string, string>>): string {
    const separator = identifier.indexOf(':');
    if (separator <= 0) return identifier;
    const namespace = namespaces[identifier.slice(0, separator)];
    return namespace === undefined ? identifier : namespace + identifier.slice(separator + 1);
}

function literalKey(value: string): string {
    return `"${value}"`;
}

function literalsEqual(stored: string, wanted: LiteralValue): boolean {
    if (wanted.datatype === 'string') {
        return stored.toLowerCase() === wanted.text.toLowerCase();
    }
    return Number(stored) === Number(wanted.text);
}

// ─── Engine ─────────────────────────────────────────────

/**
 * In-process triple store on a graphology multigraph. Resources and literal
 * values are nodes, predicates are edge attributes.
 *
 * A statement's subject bounds match every resource that reaches one of
 * them through hierarchy edges, transitively; the bounds themselves are
 * not matches. Cycles in the hierarchy are tolerated.
 */
export class GraphKnowledgeEngine implements KnowledgeEngine {
    readonly name = 'graph';
    private readonly graph = new MultiDirectedGraph<NodeAttributes, EdgeAttributes>();
    private readonly namespaces: Readonly<Record<string, string>>;
    private readonly hierarchy: ReadonlySet<string>;
    private readonly defaultLimit: number | undefined;

    constructor(options: GraphKnowledgeEngineOptions) {
        this.namespaces = options.namespaces ?? {};
        this.hierarchy = new Set(options.hierarchyPredicates.map((predicate) => this.expand(predicate)));
        this.defaultLimit = options.defaultLimit;
    }

    static fromFile(filePath: string, options: GraphKnowledgeEngineOptions): GraphKnowledgeEngine {
        const engine = new GraphKnowledgeEngine(options);
        engine.load(JSON.parse(readFileSync(filePath, 'utf-8')));
        getLogger().debug({ path: filePath, nodes: engine.graph.order, edges: engine.graph.size }, 'Loaded knowledge graph');
        return engine;
    }

    /**
     * Add the contents of a knowledge file. Prefixes declared in the file
     * extend the configured ones for this load.
     */
    load(data: unknown): void {
        const parsed = KnowledgeFileSchema.safeParse(data);
        if (!parsed.success) {
            throw new ConfigurationError(
                'Malformed knowledge graph data',
                parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            );
        }
        const file = parsed.data;
        const namespaces = { ...this.namespaces, ...file.namespaces };

        for (const [subject, predicate, object] of file.triples) {
            this.addEdge(
                this.addResource(expandIdentifier(subject, namespaces)),
                expandIdentifier(predicate, namespaces),
                this.addResource(expandIdentifier(object, namespaces))
            );
        }
        for (const [subject, predicate, value] of file.literals) {
            const text = String(value);
            const key = literalKey(text);
            this.graph.mergeNode(key, { kind: 'literal', value: text });
            this.addEdge(this.addResource(expandIdentifier(subject, namespaces)), expandIdentifier(predicate, namespaces), key);
        }
    }

    get nodeCount(): number {
        return this.graph.order;
    }

    async execute(statements: readonly Statement[], options: ExecuteOptions = {}): Promise<Bindings> {
        let matches: Set<string> | null = null;

        for (const statement of statements) {
            const current = this.match(statement);
            matches = matches === null ? current : new Set([...matches].filter((node: string) => current.has(node)));
        }

        const limit = options.limit ?? this.defaultLimit;
        const bound = [...(matches ?? [])].sort().slice(0, limit);
        getLogger().debug({ statements: statements.length, bound: bound.length }, 'Graph query executed');
        return new Map<TriplePosition, readonly string[]>([[1, bound]]);
    }

    // ─── Matching ───────────────────────────────────────────

    private match(statement: Statement): Set<string> {
        const bounds = statement.subject.bounds.map((uri) => this.expand(uri.url));
        let candidates = bounds.length > 0 ? this.descendantsOf(bounds) : this.allResources();

        const { predicate, object } = statement;
        if (predicate !== null || object !== null) {
            const predicates = predicate === null ? null : new Set(predicate.map((uri) => this.expand(uri.url)));
            candidates = new Set(
                [...candidates].filter((node) => this.hasConstraint(node, predicates, object))
            );
        }

        return candidates;
    }

    private hasConstraint(node: string, predicates: ReadonlySet<string> | null, object: Statement['object']): boolean {
        const objects = object !== null && !isLiteralValue(object) ? new Set(object.map((uri) => this.expand(uri.url))) : null;
        let found = false;

        this.graph.forEachOutEdge(node, (_edge, attributes, _source, target, _sourceAttributes, targetAttributes) => {
            if (found) return;
            if (predicates !== null && !predicates.has(attributes.predicate)) return;
            if (object === null) {
                found = true;
            } else if (isLiteralValue(object)) {
                found = targetAttributes.kind === 'literal' && literalsEqual(targetAttributes.value, object);
            } else {
                found = objects?.has(target) ?? false;
            }
        });

        return found;
    }

    /**
     * Resources that reach any of `bounds` over hierarchy edges.
     */
    private descendantsOf(bounds: readonly string[]): Set<string> {
        const start = new Set(bounds.filter((bound) => this.graph.hasNode(bound)));
        const visited = new Set<string>(start);
        const result = new Set<string>();
        const queue = [...start];

        while (queue.length > 0) {
            const current = queue.shift();
            if (current === undefined) break;
            this.graph.forEachInEdge(current, (_edge, attributes, source) => {
                if (!this.hierarchy.has(attributes.predicate) || visited.has(source)) return;
                visited.add(source);
                result.add(source);
                queue.push(source);
            });
        }

        for (const bound of start) {
            result.delete(bound);
        }
        return result;
    }

    private allResources(): Set<string> {
        return new Set(this.graph.filterNodes((_node, attributes) => attributes.kind === 'resource'));
    }

    private addResource(identifier: string): string {
        this.graph.mergeNode(identifier, { kind: 'resource', value: identifier });
        return identifier;
    }

    private addEdge(source: string, predicate: string, target: string): void {
        this.graph.addEdge(source, target, { predicate });
    }

    private expand(identifier: string): string {
        return expandIdentifier(identifier, this.namespaces);
    }
}
