import type {
    CorpusScoreReport,
    Document,
    DocumentScore,
    EvaluationConfig,
    ExcludedDocument,
} from '../types/index.js';
import { alignDocument } from '../alignment/align-document.js';
import { scoreDocument } from '../scoring/scorer.js';
import { buildCorpusReport } from '../report/report-builder.js';
import { compareIds } from '../utils/ids.js';
import { getLogger } from '../utils/logger.js';
import { resolveEvaluationConfig, validateConcurrency } from './evaluation-config.js';
import { runPool } from './pool.js';

/**
 * Load failures and other run context carried into the report.
 */
export interface EvaluationContext {
    excluded?: readonly ExcludedDocument[];
    /** Prediction ids dropped before loading because no gold document matches */
    unpairedPredictions?: readonly string[];
}

export interface AsyncEvaluationOptions {
    /** Documents evaluated at once (default 4) */
    concurrency?: number;
    /** Abandon the run between documents */
    signal?: AbortSignal;
    context?: EvaluationContext;
}

interface DocumentPair {
    gold: Document;
    predicted: Document;
}

interface EvaluationPlan {
    pairs: DocumentPair[];
    unpairedPredictions: string[];
    duplicates: ExcludedDocument[];
}

/**
 * A prediction with nothing in it, used when a gold document has no prediction.
 */
export function emptyPrediction(gold: Document): Document {
    return { id: gold.id, text: gold.text, entities: [], chains: [], relations: [] };
}

function indexById(documents: readonly Document[], side: ExcludedDocument['side'], duplicates: ExcludedDocument[]): Map<string, Document> {
    const byId = new Map<string, Document>();
    for (const document of documents) {
        if (byId.has(document.id)) {
            duplicates.push({
                documentId: document.id,
                side,
                kind: 'DuplicateDocument',
                message: `Document ${document.id} appears more than once; the first copy is used`,
                action: 'excluded',
            });
            continue;
        }
        byId.set(document.id, document);
    }
    return byId;
}

/**
 * Pair gold and predicted documents by id, in gold id order. Gold documents
 * without a prediction are paired with an empty one.
 */
function planEvaluation(gold: readonly Document[], predicted: readonly Document[]): EvaluationPlan {
    const duplicates: ExcludedDocument[] = [];
    const goldById = indexById(gold, 'gold', duplicates);
    const predictedById = indexById(predicted, 'predicted', duplicates);

    const pairs = [...goldById.values()]
        .sort((a, b) => compareIds(a.id, b.id))
        .map((document) => ({ gold: document, predicted: predictedById.get(document.id) ?? emptyPrediction(document) }));

    const unpairedPredictions = [...predictedById.keys()].filter((id) => !goldById.has(id)).sort(compareIds);

    return { pairs, unpairedPredictions, duplicates };
}

function evaluatePair(pair: DocumentPair, config: EvaluationConfig): DocumentScore {
    const alignment = alignDocument(pair.gold, pair.predicted, config);
    return { documentId: pair.gold.id, record: scoreDocument(pair.gold, pair.predicted, alignment, config) };
}

function finish(plan: EvaluationPlan, scores: DocumentScore[], config: EvaluationConfig, context: EvaluationContext): CorpusScoreReport {
    const report = buildCorpusReport(scores, {
        config,
        excluded: [...(context.excluded ?? []), ...plan.duplicates],
        unpairedPredictions: [...new Set([...(context.unpairedPredictions ?? []), ...plan.unpairedPredictions])],
    });

    getLogger().info(
        {
            documents: report.documentCount,
            excluded: report.excluded.length,
            entityF1: report.entities.micro.f1,
            relationF1: report.relations.micro.f1,
        },
        'Evaluation complete'
    );

    return report;
}

/**
 * Score predicted documents against gold documents.
 *
 * @throws ConfigError before any document is processed when `config` is invalid
 */
export function evaluate(
    gold: readonly Document[],
    predicted: readonly Document[],
    config: Partial<EvaluationConfig> = {},
    context: EvaluationContext = {}
): CorpusScoreReport {
    const resolved = resolveEvaluationConfig(config);
    const plan = planEvaluation(gold, predicted);

    const scores = plan.pairs.map((pair) => evaluatePair(pair, resolved));
    return finish(plan, scores, resolved, context);
}

/**
 * `evaluate` with one task per document and coarse cancellation.
 * Produces the same report as `evaluate` for the same input.
 */
export async function evaluateAsync(
    gold: readonly Document[],
    predicted: readonly Document[],
    config: Partial<EvaluationConfig> = {},
    options: AsyncEvaluationOptions = {}
): Promise<CorpusScoreReport> {
    const resolved = resolveEvaluationConfig(config);
    const concurrency = validateConcurrency(options.concurrency ?? 4);
    const plan = planEvaluation(gold, predicted);

    getLogger().debug({ documents: plan.pairs.length, concurrency }, 'Evaluating documents');

    const scores = await runPool(plan.pairs, concurrency, (pair) => evaluatePair(pair, resolved), options.signal);
    return finish(plan, scores, resolved, options.context ?? {});
}
