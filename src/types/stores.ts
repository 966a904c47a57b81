import type { Bindings, LabelRecord, Statement } from './annotation.js';

/**
 * Key-value store mapping lowercase labels to entity records.
 * A missing label is `null`, never an error.
 */
export interface LabelStore {
    lookup(key: string): LabelRecord | null;
}

/**
 * Per-language lemma dictionary.
 */
export interface LemmaLookup {
    supports(language: string): boolean;

    /** Returns the base form, or the word itself when it is unknown */
    lookup(word: string, language: string): string;
}

export interface ExecuteOptions {
    /** Maximum number of bindings per position */
    limit?: number;
}

/**
 * Executes statements against a knowledge graph.
 *
 * The statements share one query variable and are combined conjunctively.
 * An empty map is a valid answer; failures reject.
 */
export interface KnowledgeEngine {
    readonly name: string;
    execute(statements: readonly Statement[], options?: ExecuteOptions): Promise<Bindings>;
}
