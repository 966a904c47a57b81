import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { LabelRecord, LabelStore } from '../types/index.js';
import { LabelRecordError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Persisted value of one label: `{ "<type name>": [["<identifier>", 2 | 3], ...] }`.
 * Type names are validated later, when identifiers are built.
 */
const LabelRecordSchema = z.record(
    z.array(z.tuple([z.string().min(1), z.union([z.literal(2), z.literal(3)])]))
);

/** A whole label file: lowercase label → record (or its JSON encoding). */
const LabelFileSchema = z.record(z.union([z.string(), LabelRecordSchema]));

export type LabelFile = z.input<typeof LabelFileSchema>;

/**
 * Decode a stored value into a LabelRecord.
 * Accepts the JSON string as persisted or an already parsed object.
 */
export function decodeLabelRecord(value: unknown, key: string): LabelRecord {
    let raw = value;
    if (typeof value === 'string') {
        try {
            raw = JSON.parse(value);
        } catch (error) {
            throw new LabelRecordError(`Invalid JSON in label record: ${error instanceof Error ? error.message : String(error)}`, key);
        }
    }

    const parsed = LabelRecordSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new LabelRecordError(`Malformed label record at ${issue?.path.join('.') ?? '(root)'}: ${issue?.message ?? 'invalid'}`, key);
    }
    return parsed.data;
}

/**
 * Characters stripped from keys before they reach a store that treats them
 * specially (":" is a namespace separator in many key-value stores).
 */
const UNSAFE_KEY_CHARACTERS = /:/g;

export function sanitizeKey(key: string): string {
    return key.replace(UNSAFE_KEY_CHARACTERS, '');
}

/**
 * Label store held in memory. Values are decoded on every lookup, so a
 * malformed entry fails the lookup that hits it and nothing else.
 */
export class InMemoryLabelStore implements LabelStore {
    private readonly entries: ReadonlyMap<string, unknown>;

    constructor(data: Readonly<Record<string, unknown>> = {}) {
        this.entries = new Map(Object.entries(data));
    }

    /**
     * Load a label file (see `LabelFile`).
     */
    static fromFile(filePath: string): InMemoryLabelStore {
        const parsed = LabelFileSchema.safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
        if (!parsed.success) {
            throw new LabelRecordError(`Malformed label file ${filePath}: ${parsed.error.issues[0]?.message ?? 'invalid'}`, '');
        }
        getLogger().debug({ path: filePath, labels: Object.keys(parsed.data).length }, 'Loaded label file');
        return new InMemoryLabelStore(parsed.data);
    }

    get size(): number {
        return this.entries.size;
    }

    lookup(key: string): LabelRecord | null {
        if (!this.entries.has(key)) {
            return null;
        }
        return decodeLabelRecord(this.entries.get(key), key);
    }
}
