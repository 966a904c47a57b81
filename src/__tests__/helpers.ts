import { EntityLookupEngine } from '../annotation/engines/entity-lookup.js';
import { LiteralAnnotationEngine } from '../annotation/engines/literals.js';
import { UriLinkingEngine } from '../annotation/engines/uri-linking.js';
import { EntityTypeRegistry } from '../annotation/entity-types.js';
import { LemmatizerEngine, MapLemmaLookup } from '../nlp/lemmatizer.js';
import { TokenizerEngine } from '../nlp/tokenizer.js';
import { InMemoryLabelStore } from '../storage/label-store.js';
import {
    createAnnotationResult,
    DEFAULT_CONFIG,
    type AnnotationEngine,
    type AnnotationResult,
    type LabelRecord,
} from '../types/index.js';

export const PLANTS = 'https://www.biofid.de/ontology/pflanzen';
export const RED = 'https://pato.org/red_color';
export const FLOWER = 'https://pato.org/flower_part';
export const PETAL = 'https://pato.org/petal_part';
export const PARIS_CITY = 'https://sws.geonames.org/2988507/';
export const PARIS_PLANT = 'https://www.biofid.de/ontology/paris_quadrifolia';

export const LABELS: Record<string, LabelRecord> = {
    pflanze: { Plant_Flora: [[PLANTS, 3]] },
    rot: { misc: [[RED, 3]] },
    blüte: { misc: [[FLOWER, 2]] },
    blütenblatt: { misc: [[PETAL, 2]] },
    paris: { Location_Place: [[PARIS_CITY, 3]], Plant_Flora: [[PARIS_PLANT, 3]] },
    'fagus sylvatica': { Plant_Flora: [['https://www.biofid.de/ontology/fagus_sylvatica', 3]] },
    fagus: { Plant_Flora: [['https://www.biofid.de/ontology/fagus', 3]] },
};

export const LEMMAS = new MapLemmaLookup({
    de: { pflanzen: 'Pflanze', roten: 'rot', blüten: 'Blüte', blütenblättern: 'Blütenblatt' },
});

export function registry(): EntityTypeRegistry {
    return new EntityTypeRegistry(DEFAULT_CONFIG.annotationPriority, DEFAULT_CONFIG.typeAliases);
}

/**
 * Runs the engines up to and including URI linking over `text`.
 */
export function linked(text: string, labels: Record<string, LabelRecord> = LABELS): AnnotationResult {
    const engines: AnnotationEngine[] = [
        new TokenizerEngine(),
        new LemmatizerEngine(LEMMAS, 'de'),
        new LiteralAnnotationEngine(),
        new EntityLookupEngine(new InMemoryLabelStore(labels), DEFAULT_CONFIG.lookup),
        new UriLinkingEngine(registry()),
    ];
    return engines.reduce((result, engine) => engine.apply(result), createAnnotationResult(text));
}
