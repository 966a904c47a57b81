import { z } from 'zod';
import { SparqlQueryGenerator, type SparqlGeneratorOptions } from '../query/sparql-generator.js';
import type { Bindings, ExecuteOptions, KnowledgeEngine, Statement, TriplePosition } from '../types/index.js';
import { SparqlResponseError } from '../utils/errors.js';
import { HttpClient, type HttpClientOptions } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/**
 * SPARQL 1.1 JSON results document, as far as it is read here.
 */
const SparqlResultsSchema = z.object({
    head: z.object({ vars: z.array(z.string()) }).optional(),
    results: z.object({
        bindings: z.array(z.record(z.object({ type: z.string(), value: z.string() }))),
    }),
});

export interface SparqlKnowledgeEngineOptions extends SparqlGeneratorOptions {
    endpoint: string;
    /** Client to send requests with; one is created from `http` otherwise */
    client?: HttpClient;
    http?: HttpClientOptions;
}

function parsePayload(data: unknown): unknown {
    if (typeof data !== 'string') {
        return data;
    }
    try {
        return JSON.parse(data);
    } catch {
        throw new SparqlResponseError('SPARQL endpoint returned a non-JSON payload', data.slice(0, 200));
    }
}

/**
 * Knowledge engine backed by a remote SPARQL endpoint. Statements are
 * rendered by `SparqlQueryGenerator` and POSTed as a form-encoded query;
 * the values bound to the query variable become position 1.
 */
export class SparqlKnowledgeEngine implements KnowledgeEngine {
    readonly name = 'sparql';
    private readonly generator: SparqlQueryGenerator;
    private readonly client: HttpClient;

    constructor(private readonly options: SparqlKnowledgeEngineOptions) {
        this.generator = new SparqlQueryGenerator(options);
        this.client = options.client ?? new HttpClient({ maxRetries: 0, ...options.http });
    }

    async execute(statements: readonly Statement[], options: ExecuteOptions = {}): Promise<Bindings> {
        const variable = statements[0]?.subject.name;
        if (variable === undefined) {
            return new Map<TriplePosition, readonly string[]>();
        }

        const query = this.generator.generate(statements, options);
        getLogger().debug({ endpoint: this.options.endpoint, query }, 'Sending SPARQL query');

        const response = await this.client.post(this.options.endpoint, new URLSearchParams({ query }).toString(), {
            headers: {
                'Content-Type': 'application/x-www-form-urlencoded',
                Accept: 'application/sparql-results+json',
            },
        });

        const parsed = SparqlResultsSchema.safeParse(parsePayload(response.data));
        if (!parsed.success) {
            throw new SparqlResponseError('SPARQL endpoint returned an unexpected results document', response.data);
        }

        const values = parsed.data.results.bindings.flatMap((row) => {
            const cell = row[variable];
            return cell ? [cell.value] : [];
        });
        const bound = [...new Set(values)];

        getLogger().debug({ bound: bound.length }, 'SPARQL query answered');
        return new Map<TriplePosition, readonly string[]>([[1, bound]]);
    }
}
