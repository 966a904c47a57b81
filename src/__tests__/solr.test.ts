import { describe, it, expect } from 'vitest';
import { createQueryProcessor, createSolrQueryGenerator } from '../factory.js';
import { escapeSolrInput, formatSolrLiteral, SolrQueryGenerator } from '../query/solr-generator.js';
import { InMemoryLabelStore } from '../storage/label-store.js';
import {
    createQuery,
    NamedEntityType,
    type Annotation,
    type LiteralAnnotation,
    type Query,
    type Statement,
    type Uri,
} from '../types/index.js';
import { defaultConfig } from '../utils/config.js';
import { FLOWER, LABELS, LEMMAS, PLANTS, RED } from './helpers.js';

const BIO = 'https://www.biofid.de/ontology/';
const FAGUS_SYLVATICA = `${BIO}fagus_sylvatica`;
const ANOTHER_FAGUS = `${BIO}another_fagus`;

function uri(url: string, isSafe = true): Uri {
    return { url, positionInTriple: 3, isSafe, labels: [], parent: null, children: [] };
}

function annotation(begin: number, text: string, uris: Uri[]): Annotation {
    return {
        id: `${begin}/${begin + text.length}`,
        begin,
        end: begin + text.length,
        text,
        lemma: null,
        namedEntityType: NamedEntityType.PLANT,
        uris,
        isSafe: true,
        ambiguousTypes: [],
        features: [],
    };
}

/** A quoted literal; `begin` is the offset of the opening quote. */
function quoted(begin: number, text: string): LiteralAnnotation {
    const end = begin + text.length + 2;
    return {
        id: `${begin}/${end}`,
        begin,
        end,
        text,
        namedEntityType: NamedEntityType.MISCELLANEOUS,
        value: { kind: 'literal', text, datatype: 'string' },
    };
}

function conjunction(subject: Annotation, object: Statement['object'], relationship: 'and' | 'or'): Statement {
    return {
        pattern: `${relationship}-conjunction`,
        subject: { name: 'taxon', bounds: subject.uris },
        predicate: null,
        object,
        subjectAnnotationId: subject.id,
        relationship,
    };
}

function query(text: string, parts: Partial<Pick<Query, 'annotations' | 'literals' | 'statements'>> = {}): Query {
    return { ...createQuery(text), ...parts };
}

describe('Solr formatting', () => {
    it('should escape query syntax characters', () => {
        expect(escapeSolrInput('a:b (c) -d')).toBe('a\\:b \\(c\\) \\-d');
    });

    it('should quote string literals and leave numbers bare', () => {
        expect(formatSolrLiteral({ kind: 'literal', text: 'Rote "Buche"', datatype: 'string' })).toBe('"Rote \\"Buche\\""');
        expect(formatSolrLiteral({ kind: 'literal', text: '-3', datatype: 'integer' })).toBe('\\-3');
    });
});

describe('SolrQueryGenerator', () => {
    const generator = new SolrQueryGenerator({ stopwords: new Set(['und', 'oder']) });

    it('should match everything for an empty query', () => {
        expect(generator.generate(query(''))).toBe('*:*');
    });

    it('should AND free-text words in one clause', () => {
        expect(generator.generate(query('Here is no annotation'))).toBe('q:(Here AND is AND no AND annotation)');
    });

    it('should search a quoted literal as a phrase', () => {
        const text = "'Here is no annotation'";
        expect(generator.generate(query(text, { literals: [quoted(0, 'Here is no annotation')] }))).toBe(
            'q:"Here is no annotation"'
        );
    });

    it('should join an annotation and a word with the default conjunction', () => {
        const fagus = annotation(0, 'Fagus sylvatica', [uri(FAGUS_SYLVATICA)]);
        const parts = { annotations: [fagus] };

        expect(generator.generate(query('Fagus sylvatica Test', parts))).toBe(
            'q:"https://www.biofid.de/ontology/fagus_sylvatica" AND q:Test'
        );
        expect(new SolrQueryGenerator({ defaultConjunction: 'or' }).generate(query('Fagus sylvatica Test', parts))).toBe(
            'q:"https://www.biofid.de/ontology/fagus_sylvatica" OR q:Test'
        );
    });

    it('should OR the identifiers of one annotation in sorted order', () => {
        const fagus = annotation(0, 'Fagus sylvatica', [uri(FAGUS_SYLVATICA), uri(ANOTHER_FAGUS)]);
        const foo = quoted(20, 'Foo');
        const text = 'Fagus sylvatica und "Foo"';

        expect(
            generator.generate(query(text, { annotations: [fagus], literals: [foo], statements: [conjunction(fagus, foo.value, 'and')] }))
        ).toBe(
            'q:("https://www.biofid.de/ontology/another_fagus" OR "https://www.biofid.de/ontology/fagus_sylvatica") AND q:"Foo"'
        );
    });

    it('should render an OR conjunction and group it against other clauses', () => {
        const fagus = annotation(0, 'Fagus', [uri(`${BIO}fagus`)]);
        const quercus = annotation(11, 'Quercus', [uri(`${BIO}quercus`)]);
        const paris = annotation(19, 'Paris', [uri('https://sws.geonames.org/2988507/')]);
        const text = 'Fagus oder Quercus Paris';

        expect(
            generator.generate(
                query(text, { annotations: [fagus, quercus, paris], statements: [conjunction(fagus, quercus.uris, 'or')] })
            )
        ).toBe(
            '(q:"https://www.biofid.de/ontology/fagus" OR q:"https://www.biofid.de/ontology/quercus") AND q:"https://sws.geonames.org/2988507/"'
        );
    });

    it('should escape identifiers that are not safe', () => {
        const fagus = annotation(0, 'Fagus sylvatica', [uri(FAGUS_SYLVATICA, false)]);
        const text = "Fagus sylvatica 'Foo Bar'";

        expect(generator.generate(query(text, { annotations: [fagus], literals: [quoted(16, 'Foo Bar')] }))).toBe(
            'q:"https\\://www.biofid.de/ontology/fagus_sylvatica" AND q:"Foo Bar"'
        );
    });

    it('should search an annotation without identifiers by its text', () => {
        const plants = annotation(0, 'Pflanzen', []);
        expect(new SolrQueryGenerator({ field: 'text' }).generate(query('Pflanzen', { annotations: [plants] }))).toBe(
            'text:"Pflanzen"'
        );
    });
});

describe('createSolrQueryGenerator', () => {
    function annotated(text: string): Query {
        const query = createQuery(text);
        createQueryProcessor(defaultConfig(), {
            labelStore: new InMemoryLabelStore(LABELS),
            lemmaLookup: LEMMAS,
            knowledgeEngine: null,
        }).updateQueryWithAnnotations(query);
        return query;
    }

    it('should keep property operands of an unresolved query', () => {
        expect(createSolrQueryGenerator(defaultConfig()).generate(annotated('Pflanzen mit roten Blüten'))).toBe(
            `q:"${PLANTS}" AND q:"${RED}" AND q:"${FLOWER}"`
        );
    });

    it('should link the operands of a conjunction', () => {
        expect(createSolrQueryGenerator(defaultConfig()).generate(annotated('Fagus sylvatica und Fagus'))).toBe(`q:"${FAGUS_SYLVATICA}" AND q:"${BIO}fagus"`);
    });

    it('should search the resolved identifiers only once the query is resolved', async () => {
        const config = defaultConfig();
        const resolving = createQueryProcessor(config);
        const query = createQuery('Pflanzen mit roten Blüten');
        resolving.updateQueryWithAnnotations(query);
        await resolving.resolveQueryAnnotations(query);

        expect(createSolrQueryGenerator(config, { omitPropertyOperands: true }).generate(query)).toBe(
            `q:("${BIO}plant_with_red_flower_1" OR "${BIO}plant_with_red_flower_2" OR ` +
                `"${BIO}plant_with_red_flower_3" OR "${BIO}plant_with_red_flower_and_3_petals")`
        );
    });
});
