import { describe, it, expect } from 'vitest';
import { compileContextCues, DisambiguationEngine, groupOverlapping } from '../annotation/engines/disambiguation.js';
import { EntityTypeRegistry } from '../annotation/entity-types.js';
import { tokenize } from '../nlp/tokenizer.js';
import {
    createAnnotationResult,
    DEFAULT_CONFIG,
    NamedEntityType,
    spanId,
    type Annotation,
    type ContextCueConfig,
} from '../types/index.js';
import { linked, PARIS_CITY, PARIS_PLANT, registry } from './helpers.js';

function engine(cues: ContextCueConfig[] = DEFAULT_CONFIG.contextCues, priority = DEFAULT_CONFIG.annotationPriority) {
    const types = new EntityTypeRegistry(priority, DEFAULT_CONFIG.typeAliases);
    return new DisambiguationEngine(types, compileContextCues(cues, types));
}

function annotation(begin: number, end: number, text: string, namedEntityType: NamedEntityType): Annotation {
    return {
        id: spanId(begin, end),
        begin,
        end,
        text,
        lemma: null,
        namedEntityType,
        uris: [],
        isSafe: false,
        ambiguousTypes: [],
        features: [],
    };
}

describe('groupOverlapping', () => {
    it('should group spans that overlap transitively', () => {
        const a = annotation(0, 5, 'a', NamedEntityType.PLANT);
        const b = annotation(3, 8, 'b', NamedEntityType.PLANT);
        const c = annotation(8, 10, 'c', NamedEntityType.PLANT);

        expect(groupOverlapping([c, b, a])).toEqual([[a, b], [c]]);
    });
});

describe('DisambiguationEngine', () => {
    it('should decide each occurrence of an ambiguous word on its own', () => {
        const result = engine().apply(linked('Paris in Paris'));

        expect(result.annotations.map((a) => [a.id, a.namedEntityType, a.isSafe, a.ambiguousTypes])).toEqual([
            ['0/5', NamedEntityType.PLANT, false, [NamedEntityType.LOCATION]],
            ['9/14', NamedEntityType.LOCATION, true, []],
        ]);
        expect(result.annotations.map((a) => a.uris.map((u) => [u.url, u.isSafe]))).toEqual([
            [[PARIS_PLANT, false]],
            [[PARIS_CITY, true]],
        ]);
    });

    it('should use a cue word in front of a trailing span', () => {
        const result = engine().apply(linked('Wo finde ich Fagus sylvatica in Paris?'));

        expect(result.annotations.map((a) => [a.text, a.namedEntityType, a.isSafe])).toEqual([
            ['Fagus sylvatica', NamedEntityType.PLANT, true],
            ['Paris', NamedEntityType.LOCATION, true],
        ]);
        expect(result.annotations[1]?.end).toBe(38);
    });

    it('should change nothing when run on its own output', () => {
        const disambiguation = engine();
        const once = disambiguation.apply(linked('Paris in Paris'));
        const twice = disambiguation.apply(once);

        expect(twice.annotations).toEqual(once.annotations);
    });

    it('should follow the configured priority without a cue', () => {
        const locationFirst = ['Location', 'Plant', 'Animal', 'Taxon', 'Miscellaneous'];
        const result = engine([], locationFirst).apply(linked('Paris'));

        expect(result.annotations.map((a) => [a.namedEntityType, a.isSafe, a.ambiguousTypes])).toEqual([
            [NamedEntityType.LOCATION, false, [NamedEntityType.PLANT]],
        ]);
    });

    it('should let the first applicable cue win', () => {
        const cues: ContextCueConfig[] = [
            { words: ['bei'], type: 'Animal', position: 'before' },
            { words: ['bei'], type: 'Plant', position: 'before' },
            { words: ['bei'], type: 'Location', position: 'before' },
        ];
        const result = engine(cues, ['Location', 'Plant', 'Animal', 'Taxon', 'Miscellaneous']).apply(linked('bei Paris'));

        expect(result.annotations.map((a) => [a.namedEntityType, a.isSafe])).toEqual([[NamedEntityType.PLANT, true]]);
    });

    it('should match cues after the span', () => {
        const cues: ContextCueConfig[] = [{ words: ['wächst'], type: 'Plant_Flora', position: 'after' }];
        const result = engine(cues, ['Location', 'Plant', 'Animal', 'Taxon', 'Miscellaneous']).apply(linked('Paris wächst'));

        expect(result.annotations.map((a) => [a.namedEntityType, a.isSafe])).toEqual([[NamedEntityType.PLANT, true]]);
    });

    it('should keep the longest span of the winning type', () => {
        const text = 'Fagus sylvatica';
        const result = engine().apply({
            ...createAnnotationResult(text),
            tokens: tokenize(text),
            annotations: [
                annotation(0, 5, 'Fagus', NamedEntityType.PLANT),
                annotation(0, 15, 'Fagus sylvatica', NamedEntityType.PLANT),
                annotation(6, 15, 'sylvatica', NamedEntityType.TAXON),
            ],
        });

        expect(result.annotations.map((a) => [a.id, a.namedEntityType, a.isSafe, a.ambiguousTypes])).toEqual([
            ['0/15', NamedEntityType.PLANT, false, [NamedEntityType.TAXON]],
        ]);
    });

    it('should keep unambiguous annotations safe', () => {
        const result = engine().apply(linked('Pflanzen mit roten Blüten'));
        expect(result.annotations.every((a) => a.isSafe)).toBe(true);
        expect(result.annotations).toHaveLength(3);
    });

    it('should reject cues with unknown types', () => {
        expect(() => compileContextCues([{ words: ['in'], type: 'Fungus', position: 'before' }], registry())).toThrow(
            'Unknown entity type "Fungus"'
        );
    });
});
