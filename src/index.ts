export * from './types/index.js';
export { LoadError, ConfigError, type LoadErrorKind } from './utils/errors.js';
export { initLogger, getLogger } from './utils/logger.js';
export { resolveConfig, type ConfigOverrides } from './utils/config.js';
export { compareIds } from './utils/ids.js';
export { validateEntity, validateRelation, validateChains } from './schema/validation.js';
export type { ValidationFailure, ValidationResult, ValidationRule } from './schema/validation.js';
export { orderRelations } from './graph/relation-order.js';
export { loadDocument, loadCorpus, type DocumentInput, type LoadedCorpus } from './corpus/loader.js';
export { readGoldCorpus, readPredictionRuns, type PredictionRun, type PredictionRuns } from './corpus/corpus-reader.js';
export { parseAnnotationText } from './corpus/annotation-text.js';
export { spanIoU } from './alignment/spans.js';
export { greedyMatch, optimalMatch, type WeightedPair } from './alignment/matching.js';
export { alignEntities } from './alignment/entity-alignment.js';
export { buildClusters, alignCoreference } from './alignment/coreference.js';
export { alignRelations } from './alignment/relation-alignment.js';
export { alignDocument } from './alignment/align-document.js';
export { computePrf, macroAverage, categoryReport } from './scoring/metrics.js';
export { emptyScoreRecord, mergeScoreRecords, foldScoreRecords } from './scoring/score-record.js';
export { scoreDocument } from './scoring/scorer.js';
export { buildCorpusReport, summarizeRepeats, upperMedian } from './report/report-builder.js';
export { renderReport, exportReport, exportComparison } from './report/export.js';
export { EvaluationDatabase, type RunMetadata, type ComparisonMetric } from './storage/database.js';
export { resolveEvaluationConfig, validateConcurrency } from './evaluation/evaluation-config.js';
export { evaluate, evaluateAsync, emptyPrediction } from './evaluation/evaluate.js';
export type { EvaluationContext, AsyncEvaluationOptions } from './evaluation/evaluate.js';
export { runEvaluation, type EvaluationOutcome, type RepeatOutcome } from './evaluation/pipeline.js';
