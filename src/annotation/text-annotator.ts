import { createAnnotationResult, type AnnotationEngine, type AnnotationResult } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Check that every engine's prerequisites are configured and come first.
 * Returns the list of problems; empty when the order is valid.
 */
export function validateEngineOrder(engines: readonly AnnotationEngine[]): string[] {
    const positions = new Map<string, number>();
    const problems: string[] = [];

    engines.forEach((engine, index) => {
        if (positions.has(engine.name)) {
            problems.push(`engine "${engine.name}" is configured twice`);
        } else {
            positions.set(engine.name, index);
        }
    });

    engines.forEach((engine, index) => {
        for (const name of engine.requires) {
            const position = positions.get(name);
            if (position === undefined) {
                problems.push(`"${engine.name}" requires "${name}", which is not configured`);
            } else if (position > index) {
                problems.push(`"${engine.name}" must run after "${name}"`);
            }
        }
        for (const name of engine.after) {
            const position = positions.get(name);
            if (position !== undefined && position > index) {
                problems.push(`"${engine.name}" must run after "${name}"`);
            }
        }
    });

    return problems;
}

/**
 * Runs the configured engines in order, threading each result into the
 * next. The order is validated once, here.
 */
export class TextAnnotator {
    readonly engines: readonly AnnotationEngine[];

    constructor(engines: readonly AnnotationEngine[]) {
        const problems = validateEngineOrder(engines);
        if (problems.length > 0) {
            throw new ConfigurationError('Invalid annotation engine order', problems);
        }
        this.engines = [...engines];
        getLogger().debug({ engines: this.engines.map((engine) => engine.name) }, 'Text annotator ready');
    }

    annotate(text: string): AnnotationResult {
        const logger = getLogger();
        let result = createAnnotationResult(text);

        for (const engine of this.engines) {
            const start = process.hrtime.bigint();
            result = engine.apply(result);
            logger.debug(
                { engine: engine.name, ms: Number(process.hrtime.bigint() - start) / 1e6 },
                'Engine applied'
            );
        }

        return result;
    }
}
