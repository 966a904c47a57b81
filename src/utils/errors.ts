/**
 * Raised while building a pipeline or loading configuration. Never thrown
 * during annotation.
 */
export class ConfigurationError extends Error {
    constructor(
        message: string,
        public readonly details?: readonly string[]
    ) {
        super(details && details.length > 0 ? `${message}: ${details.join('; ')}` : message);
        this.name = 'ConfigurationError';
    }
}

/**
 * A label store returned a value that does not follow the persisted
 * `{ type: [[identifier, position], ...] }` shape.
 */
export class LabelRecordError extends Error {
    constructor(
        message: string,
        public readonly key: string
    ) {
        super(`${message} (key "${key}")`);
        this.name = 'LabelRecordError';
    }
}

/**
 * The SPARQL endpoint answered with something that is not a SPARQL JSON
 * results document.
 */
export class SparqlResponseError extends Error {
    constructor(
        message: string,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'SparqlResponseError';
    }
}
