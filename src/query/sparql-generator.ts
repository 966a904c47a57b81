import { isLiteralValue, type LiteralValue, type Statement, type Uri } from '../types/index.js';

const XSD = 'http://www.w3.org/2001/XMLSchema#';

/** Characters escaped in values that did not come from a trusted source. */
const UNSAFE_CHARACTERS = /[\\\n\r\t'"<>]/g;

const ESCAPES: Readonly<Record<string, string>> = {
    '\n': '\\n',
    '\r': '\\r',
    '\t': '\\t',
};

export interface SparqlGeneratorOptions {
    namespaces: Readonly<Record<string, string>>;
    hierarchyPredicates: readonly string[];
    defaultLimit: number;
}

export function escapeSparqlInput(text: string): string {
    return text.replace(UNSAFE_CHARACTERS, (character) => ESCAPES[character] ?? `\\${character}`);
}

/**
 * Render an identifier as a SPARQL term: absolute http(s) identifiers are
 * wrapped in angle brackets, prefixed names are kept as they are.
 */
export function formatIdentifier(url: string, isSafe: boolean): string {
    const value = isSafe ? url : escapeSparqlInput(url);
    if (!value.startsWith('http') || value.startsWith('<')) {
        return value;
    }
    return `<${value}>`;
}

export function formatLiteral(literal: LiteralValue): string {
    const text = `"${escapeSparqlInput(literal.text)}"`;
    switch (literal.datatype) {
        case 'integer':
            return `${text}^^<${XSD}integer>`;
        case 'decimal':
            return `${text}^^<${XSD}decimal>`;
        case 'string':
            return text;
    }
}

function formatUris(uris: readonly Uri[]): string {
    return uris.map((uri) => formatIdentifier(uri.url, uri.isSafe)).join(' ');
}

/**
 * Translates statements into one `SELECT DISTINCT` query over the query
 * variable. Every statement becomes a group; groups are joined, so a result
 * satisfies all statements.
 *
 * - Subject bounds: `?taxon ?hasParent ?subjectN` with `?hasParent` over the
 *   hierarchy predicates
 * - Predicate and object: `?taxon ?predicateN ?objectN`, where either side
 *   may stay unbound
 */
export class SparqlQueryGenerator {
    constructor(private readonly options: SparqlGeneratorOptions) {}

    generate(statements: readonly Statement[], options: { limit?: number } = {}): string {
        const variable = statements[0]?.subject.name ?? 'taxon';
        const limit = options.limit ?? this.options.defaultLimit;

        const prefixes = Object.entries(this.options.namespaces).map(
            ([name, url]) => `PREFIX ${name}: <${url}>`
        );
        const groups = statements.map((statement, index) => this.group(statement, index));

        return [
            ...prefixes,
            `SELECT DISTINCT ?${variable}`,
            'WHERE {',
            ...groups.flatMap((lines) => ['  {', ...lines.map((line) => `    ${line}`), '  }']),
            '}',
            `ORDER BY ?${variable}`,
            `LIMIT ${limit}`,
        ].join('\n');
    }

    private group(statement: Statement, index: number): string[] {
        const variable = `?${statement.subject.name}`;
        const lines: string[] = [];

        if (statement.subject.bounds.length > 0) {
            lines.push(
                `VALUES ?subject${index} { ${formatUris(statement.subject.bounds)} }`,
                `VALUES ?hasParent${index} { ${this.options.hierarchyPredicates.join(' ')} }`,
                `${variable} ?hasParent${index} ?subject${index} .`
            );
        }

        const { predicate, object } = statement;
        if (predicate === null && object === null) {
            return lines;
        }

        const predicateTerm = `?predicate${index}`;
        if (predicate !== null && predicate.length > 0) {
            lines.push(`VALUES ${predicateTerm} { ${formatUris(predicate)} }`);
        }

        let objectTerm = `?object${index}`;
        if (object !== null) {
            if (isLiteralValue(object)) {
                objectTerm = formatLiteral(object);
            } else if (object.length === 1 && object[0]) {
                objectTerm = formatIdentifier(object[0].url, object[0].isSafe);
            } else if (object.length > 1) {
                lines.push(`VALUES ${objectTerm} { ${formatUris(object)} }`);
            }
        }

        lines.push(`${variable} ${predicateTerm} ${objectTerm} .`);
        return lines;
    }
}
