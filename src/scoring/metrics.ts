import type {
    CategoryReport,
    CoreferenceCounts,
    CoreferenceReport,
    Counts,
    LinkingCounts,
    LinkingReport,
    MacroScore,
    PrfScore,
} from '../types/index.js';
import { compareIds } from '../utils/ids.js';

/**
 * F1 as the harmonic mean of precision and recall; 0 when both are 0.
 */
export function harmonicMean(precision: number, recall: number): number {
    if (precision + recall === 0) return 0;
    return (2 * precision * recall) / (precision + recall);
}

/**
 * Precision / recall / F1 from raw counts.
 *
 * tp = fp = fn = 0 → all null (nothing to score).
 * An empty denominator otherwise yields 0, keeping every value in [0, 1].
 */
export function computePrf(counts: Counts): PrfScore {
    const { tp, fp, fn } = counts;

    if (tp + fp + fn === 0) {
        return { precision: null, recall: null, f1: null, tp, fp, fn };
    }

    const precision = tp + fp > 0 ? tp / (tp + fp) : 0;
    const recall = tp + fn > 0 ? tp / (tp + fn) : 0;

    return { precision, recall, f1: harmonicMean(precision, recall), tp, fp, fn };
}

/**
 * Pool counts across type tags.
 */
export function sumCounts(byType: Readonly<Record<string, Counts>>): Counts {
    let tp = 0;
    let fp = 0;
    let fn = 0;
    for (const counts of Object.values(byType)) {
        tp += counts.tp;
        fp += counts.fp;
        fn += counts.fn;
    }
    return { tp, fp, fn };
}

function mean(values: number[]): number {
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Unweighted mean of per-type scores.
 *
 * Types with no gold and no predicted instance (null scores) are left
 * out rather than counted as perfect. Null when no type qualifies.
 */
export function macroAverage(scores: readonly PrfScore[]): MacroScore {
    const scored = scores.filter(
        (score): score is PrfScore & { precision: number; recall: number; f1: number } =>
            score.precision !== null && score.recall !== null && score.f1 !== null
    );

    if (scored.length === 0) {
        return { precision: null, recall: null, f1: null, types: 0 };
    }

    return {
        precision: mean(scored.map((score) => score.precision)),
        recall: mean(scored.map((score) => score.recall)),
        f1: mean(scored.map((score) => score.f1)),
        types: scored.length,
    };
}

/**
 * Per-type, micro and macro scores of one category (entities or relations).
 * Type keys come out sorted.
 */
export function categoryReport(byType: Readonly<Record<string, Counts>>): CategoryReport {
    const scores: Record<string, PrfScore> = {};
    for (const type of Object.keys(byType).sort(compareIds)) {
        const counts = byType[type];
        if (counts) scores[type] = computePrf(counts);
    }

    return {
        byType: scores,
        micro: computePrf(sumCounts(byType)),
        macro: macroAverage(Object.values(scores)),
    };
}

export function coreferenceReport(counts: CoreferenceCounts, partialCredit: boolean): CoreferenceReport {
    const mode = partialCredit ? 'b-cubed' : 'exact-chains';
    const { precisionNumerator, precisionDenominator, recallNumerator, recallDenominator } = counts;

    if (precisionDenominator === 0 && recallDenominator === 0) {
        return { mode, precision: null, recall: null, f1: null };
    }

    const precision = precisionDenominator > 0 ? precisionNumerator / precisionDenominator : 0;
    const recall = recallDenominator > 0 ? recallNumerator / recallDenominator : 0;

    return { mode, precision, recall, f1: harmonicMean(precision, recall) };
}

export function linkingReport(counts: LinkingCounts): LinkingReport {
    return {
        correct: counts.correct,
        total: counts.total,
        accuracy: counts.total > 0 ? counts.correct / counts.total : null,
    };
}
