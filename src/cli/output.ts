import { toAbstractedString } from '../annotation/abstracted-string.js';
import { isLiteralValue, type Annotation, type Query } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

function describeAnnotation(annotation: Annotation): Record<string, unknown> {
    return {
        text: annotation.text,
        span: annotation.id,
        type: annotation.namedEntityType,
        isSafe: annotation.isSafe,
        ambiguousTypes: annotation.ambiguousTypes,
        uris: annotation.uris.map((uri) => uri.url),
    };
}

/** JSON view of a query printed by the commands. */
export function describeQuery(query: Query): Record<string, unknown> {
    return {
        text: query.text,
        abstracted: toAbstractedString(query.text, query.annotations, query.literals),
        annotations: query.annotations.map(describeAnnotation),
        literals: query.literals.map((literal) => ({ text: literal.text, span: literal.id, datatype: literal.value.datatype })),
        statements: query.statements.map((statement) => ({
            pattern: statement.pattern,
            relationship: statement.relationship,
            subject: statement.subjectAnnotationId,
            predicate: statement.predicate?.map((uri) => uri.url) ?? null,
            object:
                statement.object === null
                    ? null
                    : isLiteralValue(statement.object)
                      ? statement.object.text
                      : statement.object.map((uri) => uri.url),
        })),
    };
}

/**
 * Log a failed command and set a failing exit code. The process exits once
 * the logger transport has drained.
 */
export function reportFailure(error: unknown, message: string): void {
    getLogger().error({ err: error }, message);
    process.exitCode = 1;
}
