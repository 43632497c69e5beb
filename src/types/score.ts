import type { EvaluationConfig } from './config.js';

/**
 * True positive / false positive / false negative counts.
 */
export interface Counts {
    readonly tp: number;
    readonly fp: number;
    readonly fn: number;
}

/**
 * Coreference counts, summable across documents.
 * Under B-cubed the numerators are sums of per-entity fractions;
 * under exact chain matching they are matched-chain counts.
 */
export interface CoreferenceCounts {
    readonly precisionNumerator: number;
    readonly precisionDenominator: number;
    readonly recallNumerator: number;
    readonly recallDenominator: number;
}

/**
 * Linking counts over aligned entity pairs whose gold entity is linked.
 */
export interface LinkingCounts {
    readonly correct: number;
    readonly total: number;
}

/**
 * Counts derived from one alignment (or a sum of them). Keys of the
 * per-type records are the closed-set type tags.
 */
export interface ScoreRecord {
    readonly entities: Readonly<Record<string, Counts>>;
    readonly relations: Readonly<Record<string, Counts>>;
    readonly coreference: CoreferenceCounts;
    readonly linking: LinkingCounts;
    readonly modalityMismatches: number;
}

export interface DocumentScore {
    readonly documentId: string;
    readonly record: ScoreRecord;
}

/**
 * Precision / recall / F1 with the counts they came from.
 * All three are null when tp = fp = fn = 0.
 */
export interface PrfScore {
    precision: number | null;
    recall: number | null;
    f1: number | null;
    tp: number;
    fp: number;
    fn: number;
}

export interface MacroScore {
    precision: number | null;
    recall: number | null;
    f1: number | null;
    /** Number of types that entered the average */
    types: number;
}

export interface CategoryReport {
    byType: Record<string, PrfScore>;
    micro: PrfScore;
    macro: MacroScore;
}

export interface CoreferenceReport {
    mode: 'b-cubed' | 'exact-chains';
    precision: number | null;
    recall: number | null;
    f1: number | null;
}

export interface LinkingReport {
    correct: number;
    total: number;
    accuracy: number | null;
}

/**
 * Why a document was left out of a run.
 */
export interface ExcludedDocument {
    documentId: string;
    side: 'gold' | 'predicted';
    kind: string;
    message: string;
    /** `scored-empty`: the gold document was scored against an empty prediction */
    action: 'excluded' | 'scored-empty';
}

export interface DocumentReportRow {
    documentId: string;
    entities: PrfScore;
    relations: PrfScore;
    coreference: CoreferenceReport;
    linking: LinkingReport;
    modalityMismatches: number;
}

export interface CorpusScoreReport {
    documentCount: number;
    entities: CategoryReport;
    relations: CategoryReport;
    coreference: CoreferenceReport;
    linking: LinkingReport;
    modalityMismatches: number;
    documents: DocumentReportRow[];
    excluded: ExcludedDocument[];
    unpairedPredictions: string[];
    config: EvaluationConfig;
}

/**
 * Medians over repeated model runs of the same corpus.
 */
export interface RepeatSummary {
    repeats: number;
    entityF1: number;
    relationF1: number;
    documents: Array<{ documentId: string; entityF1: number; relationF1: number }>;
}
