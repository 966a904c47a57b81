import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, ENGINE_NAMES, type BiosearchConfig, type LogLevel } from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { getLogger } from './logger.js';

// ─── Schema ─────────────────────────────────────────────

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

const ContextCueSchema = z.object({
    words: z.array(z.string().min(1).transform((word) => word.toLowerCase())).min(1),
    type: z.string().min(1),
    position: z.enum(['before', 'after']),
});

const LookupSchema = z.object({
    maxSpanTokens: z.number().int().min(1).max(16),
    minKeyLength: z.number().int().min(1),
    blacklist: z.array(z.string().transform((key) => key.toLowerCase())),
});

const SolrSchema = z.object({
    field: z.string().min(1),
    defaultConjunction: z.enum(['and', 'or']),
});

const LabelStoreSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('memory'), path: z.string().min(1).optional() }),
    z.object({ kind: z.literal('sqlite'), path: z.string().min(1) }),
]);

const KnowledgeStoreSchema = z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('graph'), path: z.string().min(1).optional() }),
    z.object({
        kind: z.literal('sparql'),
        url: z.string().url(),
        timeout: z.number().int().positive().default(30000),
        maxRetries: z.number().int().min(0).default(0),
        initialBackoff: z.number().int().min(0).optional(),
        maxBackoff: z.number().int().min(0).optional(),
        requestsPerSecond: z.number().positive().optional(),
        userAgent: z.string().min(1).optional(),
    }),
]);

const ConfigSchema = z.object({
    language: z.string().min(2),
    languages: z.array(z.string().min(2)).min(1),
    engines: z.array(z.enum(ENGINE_NAMES)).min(1),
    annotationPriority: z.array(z.string().min(1)).min(1),
    typeAliases: z.record(z.string()),
    contextCues: z.array(ContextCueSchema),
    lookup: LookupSchema,
    queryVariable: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a SPARQL variable name'),
    resultLimit: z.number().int().positive(),
    hierarchyPredicates: z.array(z.string().min(1)).min(1),
    namespaces: z.record(z.string().url()),
    solr: SolrSchema,
    labelStore: LabelStoreSchema,
    knowledgeStore: KnowledgeStoreSchema,
    logLevel: LogLevelSchema,
    jsonLogs: z.boolean(),
});

/** Config file contents: every field optional, nested objects merged field by field. */
const FileConfigSchema = ConfigSchema.extend({
    lookup: LookupSchema.partial(),
    solr: SolrSchema.partial(),
}).partial();

export type ConfigOverrides = z.input<typeof FileConfigSchema>;

// ─── Sources ────────────────────────────────────────────

/**
 * Load configuration from biosearch.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('biosearch', {
        searchPlaces: ['biosearch.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid config file ${result.filepath}`, formatIssues(parsed.error));
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    const level = env['BIOSEARCH_LOG_LEVEL'];
    if (level) {
        const parsed = LogLevelSchema.safeParse(level);
        if (!parsed.success) {
            throw new ConfigurationError(`Invalid BIOSEARCH_LOG_LEVEL "${level}"`);
        }
        overrides.logLevel = parsed.data;
    }

    const sparqlUrl = env['BIOSEARCH_SPARQL_URL'];
    if (sparqlUrl) {
        overrides.knowledgeStore = { kind: 'sparql', url: sparqlUrl };
    }

    return overrides;
}

// ─── Merge ──────────────────────────────────────────────

export interface ResolveConfigOptions {
    /** Directory to start the config file search from (defaults to cwd) */
    searchFrom?: string;
    /** Skip the config file search entirely */
    skipFile?: boolean;
    env?: NodeJS.ProcessEnv;
}

/**
 * Merge configuration from multiple sources and validate it.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * The returned object is deeply frozen.
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides = {},
    options: ResolveConfigOptions = {}
): Promise<Readonly<BiosearchConfig>> {
    const fileConfig = options.skipFile ? null : await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);

    const merged = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Deep merge nested objects
        lookup: {
            ...DEFAULT_CONFIG.lookup,
            ...fileConfig?.lookup,
            ...cliFlags.lookup,
        },
        typeAliases: {
            ...DEFAULT_CONFIG.typeAliases,
            ...fileConfig?.typeAliases,
            ...cliFlags.typeAliases,
        },
        namespaces: {
            ...DEFAULT_CONFIG.namespaces,
            ...fileConfig?.namespaces,
            ...cliFlags.namespaces,
        },
        solr: {
            ...DEFAULT_CONFIG.solr,
            ...fileConfig?.solr,
            ...cliFlags.solr,
        },
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
    }

    return deepFreeze(parsed.data);
}

/**
 * Defaults only, validated and frozen. Used by the zero-config demo mode.
 */
export function defaultConfig(overrides: ConfigOverrides = {}): Readonly<BiosearchConfig> {
    const parsed = ConfigSchema.safeParse({
        ...DEFAULT_CONFIG,
        ...overrides,
        lookup: { ...DEFAULT_CONFIG.lookup, ...overrides.lookup },
        solr: { ...DEFAULT_CONFIG.solr, ...overrides.solr },
    });
    if (!parsed.success) {
        throw new ConfigurationError('Invalid configuration', formatIssues(parsed.error));
    }
    return deepFreeze(parsed.data);
}

export function isLogLevel(value: string): value is LogLevel {
    return LogLevelSchema.safeParse(value).success;
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function deepFreeze<T>(value: T): T {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}
