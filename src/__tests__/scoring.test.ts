import { describe, it, expect } from 'vitest';
import { categoryReport, computePrf, coreferenceReport, macroAverage } from '../scoring/metrics.js';
import { emptyScoreRecord, foldScoreRecords, mergeScoreRecords } from '../scoring/score-record.js';
import { scoreDocument } from '../scoring/scorer.js';
import { alignDocument } from '../alignment/align-document.js';
import {
    DEFAULT_EVALUATION_CONFIG,
    EntityType,
    type Document,
    type EvaluationConfig,
    type ScoreRecord,
} from '../types/index.js';
import { doc, entity } from './helpers.js';

function score(gold: Document, predicted: Document, overrides: Partial<EvaluationConfig> = {}): ScoreRecord {
    const config = { ...DEFAULT_EVALUATION_CONFIG, ...overrides };
    return scoreDocument(gold, predicted, alignDocument(gold, predicted, config), config);
}

describe('Scorer', () => {
    describe('computePrf', () => {
        it('should be null when there is nothing to score', () => {
            expect(computePrf({ tp: 0, fp: 0, fn: 0 })).toEqual({ precision: null, recall: null, f1: null, tp: 0, fp: 0, fn: 0 });
        });

        it('should be 0 when nothing is found', () => {
            expect(computePrf({ tp: 0, fp: 0, fn: 3 })).toEqual({ precision: 0, recall: 0, f1: 0, tp: 0, fp: 0, fn: 3 });
            expect(computePrf({ tp: 0, fp: 2, fn: 0 })).toEqual({ precision: 0, recall: 0, f1: 0, tp: 0, fp: 2, fn: 0 });
        });

        it('should compute precision, recall and their harmonic mean', () => {
            const result = computePrf({ tp: 3, fp: 1, fn: 2 });
            expect(result.precision).toBeCloseTo(0.75);
            expect(result.recall).toBeCloseTo(0.6);
            expect(result.f1).toBeCloseTo((2 * 0.75 * 0.6) / 1.35);
        });
    });

    describe('macroAverage', () => {
        it('should leave out types with nothing to score', () => {
            const report = categoryReport({
                Pest: { tp: 1, fp: 0, fn: 0 },
                Plant: { tp: 0, fp: 1, fn: 0 },
                Disease: { tp: 0, fp: 0, fn: 0 },
            });

            expect(report.macro).toEqual({ precision: 0.5, recall: 0.5, f1: 0.5, types: 2 });
            expect(Object.keys(report.byType)).toEqual(['Disease', 'Pest', 'Plant']);
        });

        it('should be null when no type qualifies', () => {
            expect(macroAverage([])).toEqual({ precision: null, recall: null, f1: null, types: 0 });
        });

        it('micro counts should equal the per-type sums', () => {
            const report = categoryReport({
                Pest: { tp: 2, fp: 1, fn: 0 },
                Plant: { tp: 1, fp: 0, fn: 4 },
            });
            expect(report.micro.tp).toBe(3);
            expect(report.micro.fp).toBe(1);
            expect(report.micro.fn).toBe(4);
            expect(report.micro.f1).toBeCloseTo((2 * 0.75 * (3 / 7)) / (0.75 + 3 / 7));
        });
    });

    describe('scoreDocument', () => {
        it('should list every entity type, zero or not', () => {
            const record = score(doc('d'), doc('d'));
            expect(Object.keys(record.entities)).toHaveLength(Object.values(EntityType).length);
            expect(record.entities[EntityType.Pest]).toEqual({ tp: 0, fp: 0, fn: 0 });
        });

        it('should count TP, FP and FN per type', () => {
            const gold = doc('d', { entities: [entity('G1', EntityType.Disease, 0, 10), entity('G2', EntityType.Pest, 40, 50)] });
            const predicted = doc('d', { entities: [entity('P1', EntityType.Disease, 20, 30), entity('P2', EntityType.Pest, 40, 49)] });

            const record = score(gold, predicted);
            expect(record.entities[EntityType.Disease]).toEqual({ tp: 0, fp: 1, fn: 1 });
            expect(record.entities[EntityType.Pest]).toEqual({ tp: 1, fp: 0, fn: 0 });
        });

        describe('linking', () => {
            const gold = doc('d', { entities: [entity('G1', EntityType.Organism, 0, 10, { authority: 'NCBI_Taxonomy', code: '9606' })] });

            it('should count a matching identifier as correct', () => {
                const predicted = doc('d', {
                    entities: [entity('P1', EntityType.Organism, 0, 10, { authority: 'NCBI_Taxonomy', code: '9606' })],
                });
                expect(score(gold, predicted).linking).toEqual({ correct: 1, total: 1 });
            });

            it('should count a wrong identifier as incorrect but keep the detection TP', () => {
                const predicted = doc('d', {
                    entities: [entity('P1', EntityType.Organism, 0, 10, { authority: 'NCBI_Taxonomy', code: '9605' })],
                });
                const record = score(gold, predicted);
                expect(record.linking).toEqual({ correct: 0, total: 1 });
                expect(record.entities[EntityType.Organism]).toEqual({ tp: 1, fp: 0, fn: 0 });
            });

            it('should count a missing identifier as incorrect', () => {
                const predicted = doc('d', { entities: [entity('P1', EntityType.Organism, 0, 10)] });
                expect(score(gold, predicted).linking).toEqual({ correct: 0, total: 1 });
            });

            it('should compare codes case-insensitively when configured', () => {
                const geoGold = doc('d', { entities: [entity('G1', EntityType.Location, 0, 10, { authority: 'GeoNames', code: 'ABC' })] });
                const predicted = doc('d', {
                    entities: [entity('P1', EntityType.Location, 0, 10, { authority: 'GeoNames', code: 'abc' })],
                });

                expect(score(geoGold, predicted).linking.correct).toBe(0);
                expect(score(geoGold, predicted, { linkingCaseSensitive: false }).linking.correct).toBe(1);
            });

            it('should ignore aligned pairs whose gold entity is unlinked', () => {
                const unlinked = doc('d', { entities: [entity('G1', EntityType.Organism, 0, 10)] });
                const predicted = doc('d', {
                    entities: [entity('P1', EntityType.Organism, 0, 10, { authority: 'NCBI_Taxonomy', code: '9606' })],
                });
                expect(score(unlinked, predicted).linking).toEqual({ correct: 0, total: 0 });
            });
        });

        describe('coreference', () => {
            const gold = doc('d', {
                entities: [entity('G1', EntityType.Pest, 0, 5), entity('G2', EntityType.Pest, 10, 15), entity('G3', EntityType.Pest, 20, 25)],
                chains: [{ id: 'C1', entityIds: ['G1', 'G2'] }],
            });
            const merged = doc('d', {
                entities: [entity('P1', EntityType.Pest, 0, 5), entity('P2', EntityType.Pest, 10, 15), entity('P3', EntityType.Pest, 20, 25)],
                chains: [{ id: 'K1', entityIds: ['P1', 'P2', 'P3'] }],
            });

            it('should give B-cubed partial credit', () => {
                const counts = score(gold, merged).coreference;
                expect(counts.precisionNumerator).toBeCloseTo(5 / 3);
                expect(counts.precisionDenominator).toBe(3);
                expect(counts.recallNumerator).toBeCloseTo(3);
                expect(counts.recallDenominator).toBe(3);

                const report = coreferenceReport(counts, true);
                expect(report.mode).toBe('b-cubed');
                expect(report.precision).toBeCloseTo(5 / 9);
                expect(report.recall).toBeCloseTo(1);
                expect(report.f1).toBeCloseTo(5 / 7);
            });

            it('should honour the minimum shared pairs in B-cubed', () => {
                const counts = score(gold, merged, { corefMinSharedPairs: 2 }).coreference;
                expect(counts.precisionNumerator).toBeCloseTo(4 / 3);
                expect(counts.recallNumerator).toBeCloseTo(2);
            });

            it('should require identical chains without partial credit', () => {
                expect(score(gold, merged, { corefPartialCredit: false }).coreference).toEqual({
                    precisionNumerator: 0,
                    precisionDenominator: 1,
                    recallNumerator: 0,
                    recallDenominator: 1,
                });

                const exact = doc('d', {
                    entities: merged.entities,
                    chains: [{ id: 'K1', entityIds: ['P1', 'P2'] }],
                });
                expect(score(gold, exact, { corefPartialCredit: false }).coreference).toEqual({
                    precisionNumerator: 1,
                    precisionDenominator: 1,
                    recallNumerator: 1,
                    recallDenominator: 1,
                });
            });

            it('should be null without any entity', () => {
                expect(coreferenceReport(score(doc('d'), doc('d')).coreference, true)).toEqual({
                    mode: 'b-cubed',
                    precision: null,
                    recall: null,
                    f1: null,
                });
            });
        });
    });

    describe('ScoreRecord merging', () => {
        const a: ScoreRecord = {
            entities: { Pest: { tp: 1, fp: 2, fn: 0 } },
            relations: { Causes: { tp: 0, fp: 1, fn: 1 } },
            coreference: { precisionNumerator: 0.5, precisionDenominator: 2, recallNumerator: 1, recallDenominator: 2 },
            linking: { correct: 1, total: 2 },
            modalityMismatches: 1,
        };
        const b: ScoreRecord = {
            entities: { Pest: { tp: 2, fp: 0, fn: 1 }, Plant: { tp: 1, fp: 0, fn: 0 } },
            relations: {},
            coreference: { precisionNumerator: 1.25, precisionDenominator: 3, recallNumerator: 0.75, recallDenominator: 1 },
            linking: { correct: 0, total: 1 },
            modalityMismatches: 0,
        };
        const c: ScoreRecord = {
            entities: { Plant: { tp: 0, fp: 0, fn: 4 } },
            relations: { Causes: { tp: 3, fp: 0, fn: 0 } },
            coreference: { precisionNumerator: 0.25, precisionDenominator: 1, recallNumerator: 0.5, recallDenominator: 1 },
            linking: { correct: 2, total: 2 },
            modalityMismatches: 2,
        };

        it('should be associative and commutative', () => {
            expect(mergeScoreRecords(a, mergeScoreRecords(b, c))).toEqual(mergeScoreRecords(mergeScoreRecords(a, b), c));
            expect(mergeScoreRecords(a, b)).toEqual(mergeScoreRecords(b, a));
        });

        it('should have the empty record as identity', () => {
            expect(mergeScoreRecords(a, emptyScoreRecord())).toEqual(a);
            expect(mergeScoreRecords(emptyScoreRecord(), a)).toEqual(a);
        });

        it('should sum every count', () => {
            const total = foldScoreRecords([a, b, c]);
            expect(total.entities).toEqual({ Pest: { tp: 3, fp: 2, fn: 1 }, Plant: { tp: 1, fp: 0, fn: 4 } });
            expect(total.relations).toEqual({ Causes: { tp: 3, fp: 1, fn: 1 } });
            expect(total.coreference).toEqual({ precisionNumerator: 2, precisionDenominator: 6, recallNumerator: 2.25, recallDenominator: 4 });
            expect(total.linking).toEqual({ correct: 3, total: 5 });
            expect(total.modalityMismatches).toBe(3);
            expect(foldScoreRecords([c, a, b])).toEqual(total);
        });
    });
});
