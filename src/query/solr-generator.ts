import { tokenize } from '../nlp/tokenizer.js';
import {
    isLiteralValue,
    type Annotation,
    type LiteralValue,
    type Query,
    type Relationship,
    type Statement,
    type Uri,
} from '../types/index.js';

/** Characters the Solr standard query parser treats as syntax. */
const SOLR_SPECIAL_CHARACTERS = /[\\+\-&|!(){}[\]^"~*?:]/g;

const MATCH_ALL = '*:*';

type Operator = 'AND' | 'OR';

type SolrExpression =
    | { readonly kind: 'clause'; readonly text: string }
    | { readonly kind: 'group'; readonly operator: Operator; readonly parts: readonly SolrExpression[] };

export interface SolrQueryOptions {
    /** Field every term is searched in */
    field?: string;
    /** Joins clauses that no conjunction of the query relates */
    defaultConjunction?: Relationship;
    /** Lowercase words that are not searched as free text */
    stopwords?: ReadonlySet<string>;
    /**
     * Leave out the annotations and literals that are the predicate or object
     * of a property statement. Meant for resolved queries, where the
     * subject's identifiers already carry those constraints.
     */
    omitPropertyOperands?: boolean;
}

export function escapeSolrInput(text: string): string {
    return text.replace(SOLR_SPECIAL_CHARACTERS, (character) => `\\${character}`);
}

/** Identifiers are always quoted; unsafe ones are escaped first. */
export function formatSolrIdentifier(uri: Uri): string {
    return `"${uri.isSafe ? uri.url : escapeSolrInput(uri.url)}"`;
}

export function formatSolrLiteral(literal: LiteralValue): string {
    if (literal.datatype === 'string') {
        return `"${literal.text.replace(/["\\]/g, (character) => `\\${character}`)}"`;
    }
    return escapeSolrInput(literal.text);
}

function operatorOf(relationship: Relationship): Operator {
    return relationship === 'and' ? 'AND' : 'OR';
}

function merge(left: SolrExpression | null, right: SolrExpression, operator: Operator): SolrExpression {
    if (left === null) return right;
    if (left.kind === 'group' && left.operator === operator) {
        return { ...left, parts: [...left.parts, right] };
    }
    return { kind: 'group', operator, parts: [left, right] };
}

function render(expression: SolrExpression, nested = false): string {
    if (expression.kind === 'clause') return expression.text;
    const text = expression.parts.map((part) => render(part, true)).join(` ${expression.operator} `);
    return nested ? `(${text})` : text;
}

/** An annotation without identifiers is searched by its text. */
function annotationTerms(annotation: Annotation): string[] {
    if (annotation.uris.length === 0) {
        return [formatSolrLiteral({ kind: 'literal', text: annotation.text, datatype: 'string' })];
    }
    return [...new Set(annotation.uris.map(formatSolrIdentifier))].sort();
}

function sharesIdentifier(annotation: Annotation, uris: readonly Uri[]): boolean {
    return annotation.uris.some((own) => uris.some((uri) => uri.url === own.url));
}

/**
 * Renders an annotated (and possibly resolved) query as a Solr query string
 * for the document search.
 *
 * Clauses are built in this order and joined with the default conjunction:
 * conjunction statements, every remaining annotation (its identifiers
 * OR-ed), then literals and free-text words AND-ed in one clause. An empty
 * query matches everything.
 */
export class SolrQueryGenerator {
    private readonly field: string;
    private readonly conjunction: Operator;
    private readonly stopwords: ReadonlySet<string>;
    private readonly omitPropertyOperands: boolean;

    constructor(options: SolrQueryOptions = {}) {
        this.field = options.field ?? 'q';
        this.conjunction = operatorOf(options.defaultConjunction ?? 'and');
        this.stopwords = options.stopwords ?? new Set();
        this.omitPropertyOperands = options.omitPropertyOperands ?? false;
    }

    generate(query: Query): string {
        const consumed = new Set<string>();
        let expression: SolrExpression | null = null;

        if (this.omitPropertyOperands) {
            for (const statement of query.statements) {
                if (statement.relationship !== null || statement.pattern === null) continue;
                for (const id of this.operandIds(query, statement)) consumed.add(id);
            }
        }

        for (const statement of query.statements) {
            if (statement.relationship === null) continue;

            const subject = this.subjectOperand(query, statement);
            const object = this.objectOperand(query, statement);
            if (!subject || !object) continue;

            const pair = merge(this.clause(subject.terms, 'OR'), this.clause(object.terms, 'OR'), operatorOf(statement.relationship));
            expression = merge(expression, pair, this.conjunction);
            for (const id of [subject.id, object.id]) {
                if (id !== null) consumed.add(id);
            }
        }

        for (const annotation of query.annotations) {
            if (consumed.has(annotation.id)) continue;
            expression = merge(expression, this.clause(annotationTerms(annotation), 'OR'), this.conjunction);
        }

        const plain = [
            ...query.literals
                .filter((literal) => !consumed.has(literal.id))
                .map((literal) => ({ begin: literal.begin, term: formatSolrLiteral(literal.value) })),
            ...this.freeWords(query),
        ].sort((a, b) => a.begin - b.begin);
        if (plain.length > 0) {
            const terms = plain.map((item) => item.term);
            expression = merge(expression, this.clause(terms, 'AND'), this.conjunction);
        }

        return expression ? render(expression) : MATCH_ALL;
    }

    private clause(terms: readonly string[], operator: Operator): SolrExpression {
        const joined = terms.join(` ${operator} `);
        return { kind: 'clause', text: terms.length > 1 ? `${this.field}:(${joined})` : `${this.field}:${joined}` };
    }

    /** Words outside every annotation and literal, stopwords left out. */
    private freeWords(query: Query): Array<{ begin: number; term: string }> {
        const covered = [...query.annotations, ...query.literals];
        return tokenize(query.text)
            .filter((token) => token.text && !this.stopwords.has(token.text.toLowerCase()))
            .filter((token) => !covered.some((span) => span.begin <= token.begin && token.end <= span.end))
            .map((token) => ({ begin: token.begin, term: escapeSolrInput(token.text) }));
    }

    private subjectOperand(query: Query, statement: Statement): { id: string; terms: string[] } | null {
        const id = statement.subjectAnnotationId;
        const annotation = query.annotations.find((a) => a.id === id);
        if (annotation) return { id, terms: annotationTerms(annotation) };
        const literal = query.literals.find((l) => l.id === id);
        return literal ? { id, terms: [formatSolrLiteral(literal.value)] } : null;
    }

    private objectOperand(query: Query, statement: Statement): { id: string | null; terms: string[] } | null {
        const object = statement.object;
        if (object === null) return null;

        if (isLiteralValue(object)) {
            const literal = query.literals.find(
                (l) => l.value.text === object.text && l.value.datatype === object.datatype && l.id !== statement.subjectAnnotationId
            );
            return { id: literal?.id ?? null, terms: [formatSolrLiteral(object)] };
        }

        const annotation = query.annotations.find((a) => a.id !== statement.subjectAnnotationId && sharesIdentifier(a, object));
        if (annotation) return { id: annotation.id, terms: annotationTerms(annotation) };
        return object.length > 0 ? { id: null, terms: [...new Set(object.map(formatSolrIdentifier))].sort() } : null;
    }

    /** Annotations and literals behind the predicate and object of a property statement. */
    private operandIds(query: Query, statement: Statement): string[] {
        const ids: string[] = [];
        const predicate = statement.predicate;
        if (predicate) {
            ids.push(
                ...query.annotations
                    .filter((a) => a.id !== statement.subjectAnnotationId && sharesIdentifier(a, predicate))
                    .map((a) => a.id)
            );
        }
        const object = this.objectOperand(query, statement);
        if (object?.id) ids.push(object.id);
        return ids;
    }
}
