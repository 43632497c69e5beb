/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * How eligible (predicted, gold) entity pairs are resolved into a one-to-one alignment.
 *
 *   greedy: repeatedly commit the highest-overlap free pair
 *   optimal: assignment maximising the summed overlap per entity type
 */
export type MatchingStrategy = 'greedy' | 'optimal';

/**
 * What to do with a predicted document that fails to load.
 *
 *   exclude: drop the document pair from the run and report it
 *   empty: score the gold document against an empty prediction
 */
export type PredictionErrorPolicy = 'exclude' | 'empty';

/** Output formats of a rendered report */
export type ReportFormat = 'json' | 'tsv' | 'markdown';

/**
 * Options of one evaluation run.
 */
export interface EvaluationConfig {
    /** Minimum span IoU for two entities to be aligned, in [0, 1] */
    entityOverlapThreshold: number;
    /** B-cubed partial credit (true) or exact chain matching (false) */
    corefPartialCredit: boolean;
    /** Minimum aligned pairs two clusters must share to be linked */
    corefMinSharedPairs: number;
    linkingCaseSensitive: boolean;
    matching: MatchingStrategy;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PhytoEvalConfig {
    // Input
    gold?: string;
    predictions?: string;
    model: string;

    // Output
    out?: string;
    report?: string;
    reportFormat: ReportFormat;

    // Execution
    concurrency: number;
    predictionErrors: PredictionErrorPolicy;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Scoring
    evaluation: EvaluationConfig;
}

export const DEFAULT_EVALUATION_CONFIG: Readonly<EvaluationConfig> = {
    entityOverlapThreshold: 0.5,
    corefPartialCredit: true,
    corefMinSharedPairs: 1,
    linkingCaseSensitive: true,
    matching: 'greedy',
};

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: PhytoEvalConfig = {
    model: 'model',
    reportFormat: 'json',
    concurrency: 4,
    predictionErrors: 'exclude',
    logLevel: 'info',
    jsonLogs: false,
    evaluation: { ...DEFAULT_EVALUATION_CONFIG },
};

/**
 * Run metadata stored in the SQLite `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    phytoeval_version: string;
    model: string;
    repeat: number;
    config_json: string;
    summary_json: string;
}

/**
 * Per-document row stored in the SQLite `document_scores` table.
 */
export interface DocumentScoreRow {
    run_id: number;
    document_id: string;
    entity_f1: number | null;
    relation_f1: number | null;
    coreference_f1: number | null;
    linking_accuracy: number | null;
    record_json: string;
}
