import type {
    CorpusScoreReport,
    DocumentReportRow,
    DocumentScore,
    EvaluationConfig,
    ExcludedDocument,
    RepeatSummary,
} from '../types/index.js';
import { categoryReport, computePrf, coreferenceReport, linkingReport, sumCounts } from '../scoring/metrics.js';
import { foldScoreRecords } from '../scoring/score-record.js';
import { compareIds } from '../utils/ids.js';

export interface ReportContext {
    config: EvaluationConfig;
    excluded?: readonly ExcludedDocument[];
    unpairedPredictions?: readonly string[];
}

function documentRow(score: DocumentScore, config: EvaluationConfig): DocumentReportRow {
    const { record } = score;
    return {
        documentId: score.documentId,
        entities: computePrf(sumCounts(record.entities)),
        relations: computePrf(sumCounts(record.relations)),
        coreference: coreferenceReport(record.coreference, config.corefPartialCredit),
        linking: linkingReport(record.linking),
        modalityMismatches: record.modalityMismatches,
    };
}

/**
 * Aggregate per-document records into the corpus report.
 *
 * Counts are summed first and every ratio is recomputed from the sums;
 * per-document F1 values are never averaged.
 */
export function buildCorpusReport(scores: readonly DocumentScore[], context: ReportContext): CorpusScoreReport {
    const { config } = context;
    const ordered = [...scores].sort((a, b) => compareIds(a.documentId, b.documentId));
    const total = foldScoreRecords(ordered.map((score) => score.record));

    return {
        documentCount: ordered.length,
        entities: categoryReport(total.entities),
        relations: categoryReport(total.relations),
        coreference: coreferenceReport(total.coreference, config.corefPartialCredit),
        linking: linkingReport(total.linking),
        modalityMismatches: total.modalityMismatches,
        documents: ordered.map((score) => documentRow(score, config)),
        excluded: [...(context.excluded ?? [])].sort(
            (a, b) => compareIds(a.documentId, b.documentId) || compareIds(a.side, b.side)
        ),
        unpairedPredictions: [...(context.unpairedPredictions ?? [])].sort(compareIds),
        config,
    };
}

/**
 * Upper median: the middle value, or the higher of the two middle values.
 */
export function upperMedian(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    return sorted[Math.floor(sorted.length / 2)] ?? 0;
}

/**
 * Median scores over repeated runs of one model on the same corpus.
 * A null F1 (nothing to score) counts as 0; a document missing from a
 * repeat is left out of that repeat's values.
 */
export function summarizeRepeats(reports: readonly CorpusScoreReport[]): RepeatSummary {
    const perDocument = new Map<string, { entity: number[]; relation: number[] }>();

    for (const report of reports) {
        for (const row of report.documents) {
            const entry = perDocument.get(row.documentId) ?? { entity: [], relation: [] };
            entry.entity.push(row.entities.f1 ?? 0);
            entry.relation.push(row.relations.f1 ?? 0);
            perDocument.set(row.documentId, entry);
        }
    }

    return {
        repeats: reports.length,
        entityF1: upperMedian(reports.map((report) => report.entities.micro.f1 ?? 0)),
        relationF1: upperMedian(reports.map((report) => report.relations.micro.f1 ?? 0)),
        documents: [...perDocument.entries()]
            .sort(([a], [b]) => compareIds(a, b))
            .map(([documentId, values]) => ({
                documentId,
                entityF1: upperMedian(values.entity),
                relationF1: upperMedian(values.relation),
            })),
    };
}
