import { extname } from 'node:path';
import type { CorpusScoreReport, ExcludedDocument, PhytoEvalConfig, RepeatSummary } from '../types/index.js';
import { loadCorpus } from '../corpus/loader.js';
import { readGoldCorpus, readPredictionRuns } from '../corpus/corpus-reader.js';
import { EvaluationDatabase } from '../storage/database.js';
import { exportReport } from '../report/export.js';
import { summarizeRepeats } from '../report/report-builder.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { evaluateAsync } from './evaluate.js';

export interface RepeatOutcome {
    repeat: number;
    report: CorpusScoreReport;
    /** Set when the run was stored */
    runId?: number;
    /** Where the rendered report was written */
    reportPath?: string;
}

export interface EvaluationOutcome {
    repeats: RepeatOutcome[];
    summary: RepeatSummary;
}

/**
 * Report path of one repeat: the configured path as is for a single repeat,
 * otherwise `<name>.repeat-<n><ext>`.
 */
export function repeatReportPath(path: string, repeat: number, repeatCount: number): string {
    if (repeatCount <= 1) return path;
    const extension = extname(path);
    return `${path.slice(0, path.length - extension.length)}.repeat-${repeat}${extension}`;
}

/**
 * Evaluate every repeat of a model's predictions against a gold corpus on disk.
 * Stores each repeat when `config.out` is set and writes reports when
 * `config.report` is set.
 *
 * @throws ConfigError when the gold or prediction directory is missing
 */
export async function runEvaluation(
    config: PhytoEvalConfig,
    options: { signal?: AbortSignal } = {}
): Promise<EvaluationOutcome> {
    const logger = getLogger();
    if (!config.gold) throw new ConfigError('A gold corpus directory is required', 'gold');
    if (!config.predictions) throw new ConfigError('A predictions directory is required', 'predictions');

    const gold = loadCorpus(readGoldCorpus(config.gold), 'gold');
    const goldTexts = new Map(gold.documents.map((document) => [document.id, document.text]));
    const excludedGold = new Set(gold.excluded.map((excluded) => excluded.documentId));

    const { runs, unpaired } = readPredictionRuns(config.predictions, goldTexts, excludedGold);
    if (runs.length === 0) {
        logger.warn({ dir: config.predictions }, 'No predictions found; scoring against empty predictions');
        runs.push({ repeat: 1, inputs: [] });
    }

    const db = config.out ? new EvaluationDatabase(config.out) : undefined;
    const repeats: RepeatOutcome[] = [];

    try {
        for (const run of runs) {
            const predicted = loadCorpus(run.inputs, 'predicted');

            let goldDocuments = gold.documents;
            let predictedExcluded: ExcludedDocument[] = predicted.excluded;

            if (config.predictionErrors === 'exclude') {
                // a duplicate keeps its first copy, so its gold document stays
                const failed = new Set(
                    predicted.excluded
                        .filter((excluded) => excluded.kind !== 'DuplicateDocument')
                        .map((excluded) => excluded.documentId)
                );
                goldDocuments = gold.documents.filter((document) => !failed.has(document.id));
            } else {
                predictedExcluded = predicted.excluded.map((excluded): ExcludedDocument =>
                    excluded.kind === 'DuplicateDocument' ? excluded : { ...excluded, action: 'scored-empty' }
                );
            }

            logger.info({ model: config.model, repeat: run.repeat, documents: goldDocuments.length }, 'Scoring repeat');

            const report = await evaluateAsync(goldDocuments, predicted.documents, config.evaluation, {
                concurrency: config.concurrency,
                signal: options.signal,
                context: { excluded: [...gold.excluded, ...predictedExcluded], unpairedPredictions: unpaired },
            });

            const outcome: RepeatOutcome = { repeat: run.repeat, report };

            if (db) {
                outcome.runId = db.insertRun(report, { model: config.model, repeat: run.repeat });
            }

            if (config.report) {
                outcome.reportPath = repeatReportPath(config.report, run.repeat, runs.length);
                exportReport(report, outcome.reportPath, config.reportFormat);
            }

            repeats.push(outcome);
        }
    } finally {
        db?.close();
    }

    const summary = summarizeRepeats(repeats.map((outcome) => outcome.report));
    logger.info(
        { model: config.model, repeats: summary.repeats, entityF1: summary.entityF1, relationF1: summary.relationF1 },
        'Evaluation finished'
    );

    return { repeats, summary };
}
