#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { createQueryProcessor, createSolrQueryGenerator, createTextAnnotator } from '../factory.js';
import { SparqlQueryGenerator } from '../query/sparql-generator.js';
import { isConstraining } from '../query/processor.js';
import { SqliteLabelStore } from '../storage/database.js';
import { createQuery, type BiosearchConfig } from '../types/index.js';
import { isLogLevel, resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { describeQuery, reportFailure } from './output.js';

const VERSION = '0.2.0';

interface CommonOptions {
    resolve?: boolean;
    language?: string;
    labels?: string;
    labelsDb?: string;
    knowledge?: string;
    sparqlUrl?: string;
    limit?: string;
    logLevel?: string;
    jsonLogs?: boolean;
}

const program = new Command();

program
    .name('biosearch')
    .description('Annotate biodiversity search queries and resolve them against a knowledge graph.')
    .version(VERSION);

/**
 * Turn shared command options into config overrides (highest precedence).
 */
function toOverrides(opts: CommonOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    if (opts.language) overrides.language = opts.language;
    if (opts.labelsDb) overrides.labelStore = { kind: 'sqlite', path: opts.labelsDb };
    else if (opts.labels) overrides.labelStore = { kind: 'memory', path: opts.labels };
    if (opts.sparqlUrl) overrides.knowledgeStore = { kind: 'sparql', url: opts.sparqlUrl };
    else if (opts.knowledge) overrides.knowledgeStore = { kind: 'graph', path: opts.knowledge };
    if (opts.limit) overrides.resultLimit = parseInt(opts.limit, 10);
    if (opts.logLevel) {
        if (!isLogLevel(opts.logLevel)) {
            throw new Error(`Invalid log level: ${opts.logLevel}`);
        }
        overrides.logLevel = opts.logLevel;
    }
    if (opts.jsonLogs) overrides.jsonLogs = true;
    return overrides;
}

async function setup(opts: CommonOptions): Promise<Readonly<BiosearchConfig>> {
    const config = await resolveConfig(toOverrides(opts));
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function withCommonOptions(command: Command): Command {
    return command
        .option('--language <code>', 'Default lemmatizer language')
        .option('--labels <path>', 'Label store JSON file')
        .option('--labels-db <path>', 'Label store SQLite file')
        .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
        .option('--json-logs', 'Output JSON logs', false);
}

// ─── ANNOTATE command ─────────────────────────────────────

withCommonOptions(
    program
        .command('annotate')
        .description('Print annotations, literals and statements of a query as JSON')
        .argument('<text>', 'Query text')
)
    .action(async (text: string, opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const processor = createQueryProcessor(config, { knowledgeEngine: null });
            const query = createQuery(text);
            processor.updateQueryWithAnnotations(query);
            console.log(JSON.stringify(describeQuery(query), null, 2));
        } catch (error) {
            reportFailure(error, 'Annotation failed');
        }
    });

// ─── RESOLVE command ──────────────────────────────────────

withCommonOptions(
    program
        .command('resolve')
        .description('Annotate a query and resolve it against the knowledge store')
        .argument('<text>', 'Query text')
        .option('--knowledge <path>', 'Knowledge graph JSON file')
        .option('--sparql-url <url>', 'SPARQL endpoint instead of the knowledge graph file')
        .option('-l, --limit <n>', 'Maximum identifiers per annotation')
)
    .action(async (text: string, opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const processor = createQueryProcessor(config);
            const query = createQuery(text);
            processor.updateQueryWithAnnotations(query);
            const enriched = await processor.resolveQueryAnnotations(query, { limit: config.resultLimit });
            console.log(JSON.stringify({ enriched, ...describeQuery(query) }, null, 2));
        } catch (error) {
            reportFailure(error, 'Resolution failed');
        }
    });

// ─── SPARQL command ───────────────────────────────────────

withCommonOptions(
    program
        .command('sparql')
        .description('Print the SPARQL query generated for each resolvable annotation')
        .argument('<text>', 'Query text')
        .option('-l, --limit <n>', 'LIMIT of the generated query')
)
    .action(async (text: string, opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const annotator = createTextAnnotator(config);
            const result = annotator.annotate(text);
            const generator = new SparqlQueryGenerator({
                namespaces: config.namespaces,
                hierarchyPredicates: config.hierarchyPredicates,
                defaultLimit: config.resultLimit,
            });

            const subjects = [...new Set(result.statements.filter(isConstraining).map((s) => s.subjectAnnotationId))];
            if (subjects.length === 0) {
                getLogger().warn('No statement constrains an annotation; nothing to resolve');
            }
            for (const subject of subjects) {
                const statements = result.statements.filter((s) => s.subjectAnnotationId === subject && isConstraining(s));
                console.log(`# ${subject}`);
                console.log(generator.generate(statements));
            }
        } catch (error) {
            reportFailure(error, 'SPARQL generation failed');
        }
    });

// ─── SOLR command ─────────────────────────────────────────

withCommonOptions(
    program
        .command('solr')
        .description('Print the Solr query for the document search')
        .argument('<text>', 'Query text')
        .option('--resolve', 'Resolve the query first and search the bound identifiers', false)
        .option('--knowledge <path>', 'Knowledge graph JSON file')
        .option('--sparql-url <url>', 'SPARQL endpoint instead of the knowledge graph file')
        .option('-l, --limit <n>', 'Maximum identifiers per annotation')
)
    .action(async (text: string, opts: CommonOptions) => {
        try {
            const config = await setup(opts);
            const resolve = opts.resolve === true;
            const processor = createQueryProcessor(config, resolve ? {} : { knowledgeEngine: null });
            const query = createQuery(text);
            processor.updateQueryWithAnnotations(query);
            const enriched = resolve ? await processor.resolveQueryAnnotations(query, { limit: config.resultLimit }) : false;
            console.log(createSolrQueryGenerator(config, { omitPropertyOperands: enriched }).generate(query));
        } catch (error) {
            reportFailure(error, 'Solr query generation failed');
        }
    });

// ─── IMPORT-LABELS command ────────────────────────────────

program
    .command('import-labels')
    .description('Load a label JSON file into a SQLite label store')
    .argument('<json>', 'Label file: { "<label>": { "<type>": [["<identifier>", 2 | 3]] } }')
    .requiredOption('-o, --out <path>', 'SQLite database path')
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent')
    .option('--json-logs', 'Output JSON logs', false)
    .action(async (jsonPath: string, opts: CommonOptions & { out: string }) => {
        try {
            await setup(opts);
            const data: unknown = JSON.parse(readFileSync(jsonPath, 'utf-8'));
            if (typeof data !== 'object' || data === null || Array.isArray(data)) {
                throw new Error(`${jsonPath} must contain a JSON object`);
            }
            const store = new SqliteLabelStore(opts.out);
            try {
                const count = store.importLabels(Object.fromEntries(Object.entries(data)));
                console.log(`Imported ${count} labels into ${opts.out}`);
            } finally {
                store.close();
            }
        } catch (error) {
            reportFailure(error, 'Import failed');
        }
    });

program.parseAsync().catch((error: unknown) => reportFailure(error, 'Command failed'));
