import Database from 'better-sqlite3';
import type { LabelRecord, LabelStore } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { decodeLabelRecord, sanitizeKey } from './label-store.js';

/**
 * SQLite schema migration v1.
 * One row per lowercase label; `data` holds the JSON-encoded record.
 */
const MIGRATION_V1 = `
CREATE TABLE IF NOT EXISTS labels (
  label TEXT PRIMARY KEY,
  data TEXT NOT NULL
);
`;

interface LabelRow {
    data: string;
}

interface CountRow {
    count: number;
}

function isLabelRow(row: unknown): row is LabelRow {
    return typeof row === 'object' && row !== null && 'data' in row && typeof row.data === 'string';
}

function isCountRow(row: unknown): row is CountRow {
    return typeof row === 'object' && row !== null && 'count' in row && typeof row.count === 'number';
}

/**
 * Label store on a SQLite file (better-sqlite3).
 * Handles schema migration, WAL mode and bulk import.
 */
export class SqliteLabelStore implements LabelStore {
    private db: Database.Database;
    private readonly selectStmt: Database.Statement<[string]>;

    constructor(dbPath: string, options: { readonly?: boolean } = {}) {
        this.db = new Database(dbPath, { readonly: options.readonly ?? false });

        if (!options.readonly) {
            this.db.pragma('journal_mode = WAL');
            this.migrate();
        }

        this.selectStmt = this.db.prepare<[string]>('SELECT data FROM labels WHERE label = ?');
        getLogger().debug({ dbPath }, 'Label database opened');
    }

    /**
     * Run schema migrations.
     */
    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Label database migrated to v1');
        }
    }

    /**
     * Look up a label. ":" is stripped from the key first.
     */
    lookup(key: string): LabelRecord | null {
        const label = sanitizeKey(key);
        const row: unknown = this.selectStmt.get(label);
        if (row === undefined) {
            return null;
        }
        if (!isLabelRow(row)) {
            throw new Error(`Unexpected row shape for label "${label}"`);
        }
        return decodeLabelRecord(row.data, label);
    }

    /**
     * Insert or replace labels in a single transaction. Every record is
     * validated first; nothing is written when one of them is malformed.
     * Returns the number of labels written.
     */
    importLabels(entries: Readonly<Record<string, unknown>>): number {
        const rows = Object.entries(entries).map(([label, value]) => ({
            label: label.toLowerCase(),
            data: JSON.stringify(decodeLabelRecord(value, label)),
        }));

        const stmt = this.db.prepare('INSERT OR REPLACE INTO labels (label, data) VALUES (@label, @data)');
        const insertAll = this.db.transaction((batch: typeof rows) => {
            for (const row of batch) {
                stmt.run(row);
            }
        });

        insertAll(rows);
        getLogger().info({ count: rows.length }, 'Imported labels');
        return rows.length;
    }

    getLabelCount(): number {
        const row: unknown = this.db.prepare('SELECT COUNT(*) AS count FROM labels').get();
        return isCountRow(row) ? row.count : 0;
    }

    close(): void {
        this.db.close();
    }
}
