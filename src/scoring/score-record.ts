import type { Counts, ScoreRecord } from '../types/index.js';

/**
 * Identity element of `mergeScoreRecords`.
 */
export function emptyScoreRecord(): ScoreRecord {
    return {
        entities: {},
        relations: {},
        coreference: { precisionNumerator: 0, precisionDenominator: 0, recallNumerator: 0, recallDenominator: 0 },
        linking: { correct: 0, total: 0 },
        modalityMismatches: 0,
    };
}

function mergeCounts(
    a: Readonly<Record<string, Counts>>,
    b: Readonly<Record<string, Counts>>
): Record<string, Counts> {
    const merged: Record<string, Counts> = { ...a };
    for (const [type, counts] of Object.entries(b)) {
        const current = merged[type] ?? { tp: 0, fp: 0, fn: 0 };
        merged[type] = {
            tp: current.tp + counts.tp,
            fp: current.fp + counts.fp,
            fn: current.fn + counts.fn,
        };
    }
    return merged;
}

/**
 * Sum two records. Associative and commutative, so documents can be
 * reduced in any order.
 */
export function mergeScoreRecords(a: ScoreRecord, b: ScoreRecord): ScoreRecord {
    return {
        entities: mergeCounts(a.entities, b.entities),
        relations: mergeCounts(a.relations, b.relations),
        coreference: {
            precisionNumerator: a.coreference.precisionNumerator + b.coreference.precisionNumerator,
            precisionDenominator: a.coreference.precisionDenominator + b.coreference.precisionDenominator,
            recallNumerator: a.coreference.recallNumerator + b.coreference.recallNumerator,
            recallDenominator: a.coreference.recallDenominator + b.coreference.recallDenominator,
        },
        linking: {
            correct: a.linking.correct + b.linking.correct,
            total: a.linking.total + b.linking.total,
        },
        modalityMismatches: a.modalityMismatches + b.modalityMismatches,
    };
}

export function foldScoreRecords(records: readonly ScoreRecord[]): ScoreRecord {
    return records.reduce(mergeScoreRecords, emptyScoreRecord());
}
