import type { AnnotationResult } from './annotation.js';

/**
 * Names of the built-in annotation engines, in their default order.
 */
export const ENGINE_NAMES = [
    'tokenizer',
    'language',
    'lemmatizer',
    'literals',
    'entity-lookup',
    'uri-linking',
    'disambiguation',
    'dependency-linking',
] as const;

export type EngineName = (typeof ENGINE_NAMES)[number];

/**
 * A single step of the text annotation pipeline.
 *
 * `requires` lists engines that must be configured before this one.
 * `after` lists engines that are optional, but must run earlier when present.
 * The text annotator checks both when it is constructed.
 */
export interface AnnotationEngine {
    readonly name: string;
    readonly requires: readonly string[];
    readonly after: readonly string[];

    /** Returns a new result; the given one is left untouched. */
    apply(result: AnnotationResult): AnnotationResult;
}
