import { describe, it, expect } from 'vitest';
import { UriLinkingEngine } from '../annotation/engines/uri-linking.js';
import { EntityTypeRegistry } from '../annotation/entity-types.js';
import { UriArena } from '../annotation/uri-arena.js';
import { createAnnotationResult, NamedEntityType } from '../types/index.js';
import { ConfigurationError, LabelRecordError } from '../utils/errors.js';
import { FLOWER, linked, PARIS_CITY, PARIS_PLANT, PLANTS, RED, registry } from './helpers.js';

describe('UriLinkingEngine', () => {
    it('should create one annotation per span with its identifiers', () => {
        const result = linked('Pflanzen mit roten Blüten');

        expect(result.annotations.map((a) => [a.id, a.text, a.namedEntityType, a.isSafe])).toEqual([
            ['0/8', 'Pflanzen', NamedEntityType.PLANT, true],
            ['13/18', 'roten', NamedEntityType.MISCELLANEOUS, true],
            ['19/25', 'Blüten', NamedEntityType.MISCELLANEOUS, true],
        ]);
        expect(result.annotations[0]?.uris).toEqual([
            { url: PLANTS, positionInTriple: 3, isSafe: true, labels: ['pflanze'], parent: null, children: [] },
        ]);
        expect(result.annotations[2]?.uris.map((u) => [u.url, u.positionInTriple])).toEqual([[FLOWER, 2]]);
        expect(result.identifiers.size).toBe(3);
    });

    it('should split a record with several types into unsafe annotations', () => {
        const result = linked('Paris');

        expect(result.annotations.map((a) => [a.namedEntityType, a.isSafe, a.uris.map((u) => u.url)])).toEqual([
            [NamedEntityType.LOCATION, false, [PARIS_CITY]],
            [NamedEntityType.PLANT, false, [PARIS_PLANT]],
        ]);
    });

    it('should intern an identifier once across spans', () => {
        const result = linked('Paris in Paris');

        expect(result.annotations).toHaveLength(4);
        expect(result.identifiers.size).toBe(2);
        expect(result.identifiers.indexOf(PARIS_CITY)).toBe(0);
    });

    it('should merge aliases of the same type and drop repeated pairs', () => {
        const result = linked('rot', {
            rot: {
                misc: [
                    [RED, 3],
                    [RED, 3],
                    [RED, 2],
                ],
                Miscellaneous: [['https://pato.org/crimson', 3]],
            },
        });

        expect(result.annotations).toHaveLength(1);
        expect(result.annotations[0]?.isSafe).toBe(true);
        expect(result.annotations[0]?.uris.map((u) => [u.url, u.positionInTriple])).toEqual([
            [RED, 3],
            [RED, 2],
            ['https://pato.org/crimson', 3],
        ]);
    });

    it('should reject unknown entity types', () => {
        expect(() => linked('Pilz', { pilz: { Fungus: [['https://example.org/fungi', 3]] } })).toThrow(
            new LabelRecordError('Unknown entity type "Fungus"', 'pilz')
        );
    });

    it('should leave the arena of its input untouched', () => {
        const input = linked('Pflanzen');
        const before = input.identifiers.size;
        const output = new UriLinkingEngine(registry()).apply({
            ...input,
            candidates: [...input.candidates, { begin: 0, end: 8, text: 'Pflanzen', lemma: null, key: 'x', record: { misc: [['https://example.org/new', 3]] } }],
        });

        expect(input.identifiers.size).toBe(before);
        expect(output.identifiers.size).toBe(before + 1);
    });

    it('should return nothing without candidates', () => {
        const result = new UriLinkingEngine(registry()).apply(createAnnotationResult(''));
        expect(result.annotations).toEqual([]);
    });
});

describe('UriArena', () => {
    it('should intern by url and collect labels', () => {
        const arena = new UriArena();
        const first = arena.intern('https://example.org/a', 'beta');
        const again = arena.intern('https://example.org/a', 'alpha');

        expect(again).toBe(first);
        expect(arena.get(first).labels).toEqual(['alpha', 'beta']);
    });

    it('should keep the first parent and tolerate cycles', () => {
        const arena = new UriArena();
        const a = arena.intern('a');
        const b = arena.intern('b');
        const c = arena.intern('c');
        arena.link(a, b);
        arena.link(c, b);
        arena.link(b, a);

        expect(arena.get(b).parent).toBe(a);
        expect(arena.get(a).parent).toBe(b);
        expect(arena.ancestors(b)).toEqual([a]);
        expect(arena.descendants(a)).toEqual([b]);
        expect(arena.descendants(c)).toEqual([b, a]);
    });

    it('should copy records on clone', () => {
        const arena = new UriArena();
        arena.intern('a');
        const copy = arena.clone();
        copy.intern('b');
        copy.link(0, 1);

        expect(arena.size).toBe(1);
        expect(arena.get(0).children).toEqual([]);
        expect(copy.get(0).children).toEqual([1]);
    });

    it('should reject unknown indices', () => {
        expect(() => new UriArena().get(0)).toThrow(RangeError);
    });
});

describe('EntityTypeRegistry', () => {
    it('should resolve canonical names and aliases', () => {
        const types = registry();
        expect(types.resolve('Plant')).toBe(NamedEntityType.PLANT);
        expect(types.resolve('Plant_Flora')).toBe(NamedEntityType.PLANT);
        expect(types.resolve('Fungus')).toBeNull();
        expect(() => types.require('Fungus')).toThrow(ConfigurationError);
    });

    it('should order types by priority', () => {
        expect(registry().priority).toEqual([
            NamedEntityType.PLANT,
            NamedEntityType.ANIMAL,
            NamedEntityType.TAXON,
            NamedEntityType.LOCATION,
            NamedEntityType.MISCELLANEOUS,
        ]);
    });

    it('should require a total order', () => {
        expect(() => new EntityTypeRegistry(['Plant', 'Plant_Flora', 'Animal', 'Taxon', 'Location'], { Plant_Flora: 'Plant' })).toThrow(
            'annotationPriority must be a total order over all entity types: "Plant_Flora" listed twice; "Miscellaneous" is missing'
        );
    });

    it('should reject aliases of unknown types', () => {
        expect(() => new EntityTypeRegistry(['Plant'], { Pilz: 'Fungus' })).toThrow(ConfigurationError);
    });
});
