import { describe, it, expect } from 'vitest';
import {
    DEFAULT_CONFIG,
    DEFAULT_EVALUATION_CONFIG,
    EntityType,
    LINK_AUTHORITIES,
    Modality,
    RELATION_SCHEMA,
    RelationType,
    isEntityType,
    isLinkAuthority,
    isModality,
    isRelationType,
} from '../types/index.js';

describe('Types', () => {
    describe('closed tag sets', () => {
        it('should have 9 entity types', () => {
            expect(Object.values(EntityType)).toHaveLength(9);
        });

        it('should have 7 relation types, each with a role table', () => {
            const types = Object.values(RelationType);
            expect(types).toHaveLength(7);
            for (const type of types) {
                expect(RELATION_SCHEMA[type].length).toBeGreaterThanOrEqual(2);
            }
        });

        it('should have 4 modalities', () => {
            expect(Object.values(Modality)).toEqual(['Asserted', 'Negated', 'Hypothetical', 'Uncertain']);
        });

        it('guards should accept tags and reject other spellings', () => {
            expect(isEntityType('Pest')).toBe(true);
            expect(isEntityType('pest')).toBe(false);
            expect(isRelationType('HasBeenFoundOn')).toBe(true);
            expect(isRelationType('FoundOn')).toBe(false);
            expect(isModality('Negated')).toBe(true);
            expect(isModality('Denied')).toBe(false);
            expect(isLinkAuthority('GeoNames')).toBe(true);
            expect(isLinkAuthority('Wikidata')).toBe(false);
        });

        it('should list three linking authorities', () => {
            expect(LINK_AUTHORITIES).toEqual(['NCBI_Taxonomy', 'GeoNames', 'OntoBiotope']);
        });
    });

    describe('RELATION_SCHEMA', () => {
        it('nests relations only through OccursOn, Reports and LocatedIn', () => {
            const nesting = Object.values(RelationType).filter((type) =>
                RELATION_SCHEMA[type].some((role) => role.accepts !== 'entity')
            );
            expect(nesting).toEqual([RelationType.LocatedIn, RelationType.OccursOn, RelationType.Reports]);
        });

        it('Transmits has an optional pathogen role', () => {
            const pathogen = RELATION_SCHEMA[RelationType.Transmits].find((role) => role.name === 'pathogen');
            expect(pathogen?.required).toBe(false);
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should use an overlap threshold of 0.5', () => {
            expect(DEFAULT_EVALUATION_CONFIG.entityOverlapThreshold).toBe(0.5);
        });

        it('should give coreference partial credit and match greedily', () => {
            expect(DEFAULT_EVALUATION_CONFIG.corefPartialCredit).toBe(true);
            expect(DEFAULT_EVALUATION_CONFIG.matching).toBe('greedy');
        });

        it('should compare linking codes case-sensitively', () => {
            expect(DEFAULT_EVALUATION_CONFIG.linkingCaseSensitive).toBe(true);
        });

        it('should exclude unloadable predictions and evaluate 4 documents at once', () => {
            expect(DEFAULT_CONFIG.predictionErrors).toBe('exclude');
            expect(DEFAULT_CONFIG.concurrency).toBe(4);
            expect(DEFAULT_CONFIG.evaluation).toEqual(DEFAULT_EVALUATION_CONFIG);
        });
    });
});
