import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SqliteLabelStore } from '../storage/database.js';
import { decodeLabelRecord, InMemoryLabelStore, sanitizeKey } from '../storage/label-store.js';
import { dataPath } from '../utils/data-path.js';
import { LabelRecordError } from '../utils/errors.js';
import path from 'node:path';
import fs from 'node:fs';
import os from 'node:os';

const FAGUS = { Plant_Flora: [['https://www.biofid.de/ontology/fagus_sylvatica', 3]] };

describe('SqliteLabelStore', () => {
    let store: SqliteLabelStore;
    let tmpDir: string;
    let dbPath: string;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'biosearch-test-'));
        dbPath = path.join(tmpDir, 'labels.db');
        store = new SqliteLabelStore(dbPath);
    });

    afterEach(() => {
        store.close();
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should start empty', () => {
        expect(store.getLabelCount()).toBe(0);
        expect(store.lookup('fagus sylvatica')).toBeNull();
    });

    it('should import labels and look them up', () => {
        const count = store.importLabels({ 'Fagus sylvatica': FAGUS, paris: JSON.stringify({ Location_Place: [['https://sws.geonames.org/2988507/', 3]] }) });

        expect(count).toBe(2);
        expect(store.getLabelCount()).toBe(2);
        expect(store.lookup('fagus sylvatica')).toEqual(FAGUS);
        expect(store.lookup('paris')).toEqual({ Location_Place: [['https://sws.geonames.org/2988507/', 3]] });
    });

    it('should replace an existing label', () => {
        store.importLabels({ buche: FAGUS });
        store.importLabels({ buche: { Plant_Flora: [['https://www.biofid.de/ontology/fagus', 3]] } });

        expect(store.getLabelCount()).toBe(1);
        expect(store.lookup('buche')).toEqual({ Plant_Flora: [['https://www.biofid.de/ontology/fagus', 3]] });
    });

    it('should write nothing when one record is malformed', () => {
        expect(() => store.importLabels({ buche: FAGUS, kaputt: { misc: [['https://pato.org/x', 1]] } })).toThrow(LabelRecordError);
        expect(store.getLabelCount()).toBe(0);
    });

    it('should strip colons from lookup keys', () => {
        store.importLabels({ termskingdom: FAGUS });
        store.close();
        store = new SqliteLabelStore(dbPath);

        expect(store.lookup('terms:kingdom')).toEqual(FAGUS);
        expect(store.lookup('terms::missing')).toBeNull();
    });

    it('should open an existing file read-only', () => {
        store.importLabels({ buche: FAGUS });
        const reader = new SqliteLabelStore(dbPath, { readonly: true });
        try {
            expect(reader.lookup('buche')).toEqual(FAGUS);
        } finally {
            reader.close();
        }
    });
});

describe('InMemoryLabelStore', () => {
    it('should return null for unknown labels', () => {
        expect(new InMemoryLabelStore({ buche: FAGUS }).lookup('eiche')).toBeNull();
    });

    it('should fail the lookup of a malformed entry only', () => {
        const store = new InMemoryLabelStore({ buche: FAGUS, kaputt: '{not json' });

        expect(store.lookup('buche')).toEqual(FAGUS);
        expect(() => store.lookup('kaputt')).toThrow(LabelRecordError);
    });

    it('should load the bundled demo labels', () => {
        const store = InMemoryLabelStore.fromFile(dataPath('demo', 'labels.json'));
        expect(store.size).toBeGreaterThan(10);
        expect(store.lookup('paris')).toEqual({
            Location_Place: [['https://sws.geonames.org/2988507/', 3]],
            Plant_Flora: [['https://www.biofid.de/ontology/paris_quadrifolia', 3]],
        });
    });
});

describe('decodeLabelRecord', () => {
    it('should accept JSON text and objects', () => {
        expect(decodeLabelRecord(JSON.stringify(FAGUS), 'fagus sylvatica')).toEqual(FAGUS);
        expect(decodeLabelRecord(FAGUS, 'fagus sylvatica')).toEqual(FAGUS);
    });

    it('should name the key in errors', () => {
        expect(() => decodeLabelRecord({ misc: 'https://pato.org/x' }, 'rot')).toThrow('(key "rot")');
    });

    it('should reject positions other than 2 and 3', () => {
        expect(() => decodeLabelRecord({ misc: [['https://pato.org/x', 1]] }, 'rot')).toThrow(LabelRecordError);
    });
});

describe('sanitizeKey', () => {
    it('should remove colons', () => {
        expect(sanitizeKey('terms:kingdom')).toBe('termskingdom');
    });
});
