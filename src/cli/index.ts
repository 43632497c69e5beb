#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { runEvaluation } from '../evaluation/pipeline.js';
import { exportComparison, renderReport } from '../report/export.js';
import { EvaluationDatabase, type ComparisonMetric } from '../storage/database.js';
import type { LogLevel, MatchingStrategy, PredictionErrorPolicy, ReportFormat } from '../types/index.js';
import { VERSION } from '../version.js';

// ─── Argument parsers ─────────────────────────────────────

function choice<T extends string>(values: readonly T[]): (value: string) => T {
    return (value) => {
        const match = values.find((candidate) => candidate === value.toLowerCase());
        if (match === undefined) {
            throw new InvalidArgumentError(`Expected one of: ${values.join(', ')}`);
        }
        return match;
    };
}

function number(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
        throw new InvalidArgumentError('Expected a number');
    }
    return parsed;
}

const REPORT_FORMATS: readonly ReportFormat[] = ['json', 'tsv', 'markdown'];
const MATCHING: readonly MatchingStrategy[] = ['greedy', 'optimal'];
const PREDICTION_ERRORS: readonly PredictionErrorPolicy[] = ['exclude', 'empty'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];
const METRICS: readonly ComparisonMetric[] = ['relation', 'entity'];

interface EvaluateOptions {
    gold: string;
    predictions: string;
    model?: string;
    out?: string;
    report?: string;
    format?: ReportFormat;
    threshold?: number;
    matching?: MatchingStrategy;
    corefPartialCredit: boolean;
    minSharedPairs?: number;
    linkingCaseInsensitive?: boolean;
    concurrency?: number;
    predictionErrors?: PredictionErrorPolicy;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface ExportOptions {
    input: string;
    out?: string;
    metric: ComparisonMetric;
}

const program = new Command();

program
    .name('phytoeval')
    .description('Score extracted entities, coreference, relations and entity links against a gold corpus.')
    .version(VERSION);

// ─── EVALUATE command ─────────────────────────────────────

program
    .command('evaluate')
    .description('Score every repeat of a model run against the gold corpus')
    .requiredOption('-g, --gold <dir>', 'Gold corpus directory (<id>.txt + <id>.json)')
    .requiredOption('-p, --predictions <dir>', 'Predictions directory (<id>/<repeat>.txt or <id>.json)')
    .option('-m, --model <name>', 'Model name recorded with the run')
    .option('-o, --out <path>', 'Store results in this SQLite database')
    .option('-r, --report <path>', 'Write the report to this file')
    .option('-f, --format <format>', 'Report format: json | tsv | markdown', choice(REPORT_FORMATS))
    .option('--threshold <n>', 'Minimum span IoU for entity alignment', number)
    .option('--matching <strategy>', 'Entity matching: greedy | optimal', choice(MATCHING))
    .option('--no-coref-partial-credit', 'Score coreference by exact chain matching instead of B-cubed')
    .option('--min-shared-pairs <n>', 'Aligned pairs two clusters must share to be linked', number)
    .option('--linking-case-insensitive', 'Compare linking codes case-insensitively')
    .option('--concurrency <n>', 'Documents evaluated at once', number)
    .option('--prediction-errors <policy>', 'Unloadable predictions: exclude | empty', choice(PREDICTION_ERRORS))
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', choice(LOG_LEVELS))
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: EvaluateOptions) => {
        const cliConfig: ConfigOverrides = {
            gold: opts.gold,
            predictions: opts.predictions,
            model: opts.model,
            out: opts.out,
            report: opts.report,
            reportFormat: opts.format,
            concurrency: opts.concurrency,
            predictionErrors: opts.predictionErrors,
            logLevel: opts.logLevel,
            jsonLogs: opts.jsonLogs,
            evaluation: {
                entityOverlapThreshold: opts.threshold,
                matching: opts.matching,
                corefPartialCredit: opts.corefPartialCredit ? undefined : false,
                corefMinSharedPairs: opts.minSharedPairs,
                linkingCaseSensitive: opts.linkingCaseInsensitive ? false : undefined,
            },
        };

        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());

        try {
            const config = await resolveConfig(cliConfig);
            initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
            getLogger().info({ gold: config.gold, predictions: config.predictions, model: config.model }, 'Starting evaluation');

            const { repeats, summary } = await runEvaluation(config, { signal: controller.signal });

            const [only] = repeats;
            if (!config.report) {
                const output =
                    repeats.length === 1 && only
                        ? renderReport(only.report, config.reportFormat)
                        : JSON.stringify(summary, null, 2);
                process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);
            }
        } catch (error) {
            getLogger().error({ err: error }, 'Evaluation failed');
            process.exitCode = 1;
        }
    });

// ─── EXPORT command ───────────────────────────────────────

program
    .command('export')
    .description('Export a document × model table of median F1 from stored runs')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .option('-o, --out <path>', 'Output TSV path')
    .option('--metric <metric>', 'Metric: relation | entity', choice(METRICS), 'relation')
    .action((opts: ExportOptions) => {
        const outputPath = opts.out ?? opts.input.replace(/\.db$/, '') + `.${opts.metric}.tsv`;

        try {
            exportComparison(opts.input, outputPath, opts.metric);
            console.log(`Exported to ${outputPath}`);
        } catch (error) {
            getLogger().error({ err: error }, 'Export failed');
            process.exitCode = 1;
        }
    });

// ─── INSPECT command ──────────────────────────────────────

program
    .command('inspect')
    .description('Show database statistics')
    .requiredOption('-i, --input <dbPath>', 'Input database path')
    .action((opts: { input: string }) => {
        try {
            const db = new EvaluationDatabase(opts.input);
            const stats = db.getStats();
            const runs = db.getRuns();
            db.close();

            console.log('\nEvaluation Database Statistics\n');
            console.log(`  Runs:            ${stats.runs}`);
            console.log(`  Document scores: ${stats.documentScores}`);
            console.log(`  Excluded:        ${stats.excluded}`);

            if (Object.keys(stats.runsByModel).length > 0) {
                console.log('\n  Runs by model:');
                for (const [model, count] of Object.entries(stats.runsByModel)) {
                    console.log(`    ${model}: ${count}`);
                }
            }

            if (runs.length > 0) {
                console.log('\n  Runs:');
                for (const run of runs) {
                    console.log(`    #${run.run_id ?? '?'} ${run.model} repeat ${run.repeat} (${run.created_at})`);
                }
            }

            console.log('');
        } catch (error) {
            getLogger().error({ err: error }, 'Inspect failed');
            process.exitCode = 1;
        }
    });

await program.parseAsync(process.argv);
