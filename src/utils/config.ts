import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type EvaluationConfig, type PhytoEvalConfig } from '../types/index.js';
import { resolveEvaluationConfig, validateConcurrency } from '../evaluation/evaluation-config.js';
import { ConfigError } from './errors.js';
import { envLogLevel, getLogger } from './logger.js';

/**
 * Configuration overrides as collected from CLI flags, env vars or a config file.
 */
export type ConfigOverrides = Partial<Omit<PhytoEvalConfig, 'evaluation'>> & {
    evaluation?: Partial<EvaluationConfig>;
};

const FileConfigSchema = z
    .object({
        gold: z.string(),
        predictions: z.string(),
        model: z.string(),
        out: z.string(),
        report: z.string(),
        reportFormat: z.enum(['json', 'tsv', 'markdown']),
        concurrency: z.number(),
        predictionErrors: z.enum(['exclude', 'empty']),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
        evaluation: z
            .object({
                entityOverlapThreshold: z.number(),
                corefPartialCredit: z.boolean(),
                corefMinSharedPairs: z.number(),
                linkingCaseSensitive: z.boolean(),
                matching: z.enum(['greedy', 'optimal']),
            })
            .partial(),
    })
    .partial();

/**
 * Load configuration from phytoeval.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('phytoeval', {
        searchPlaces: ['phytoeval.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = FileConfigSchema.safeParse(result.config);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue?.path.join('.') || 'config';
        throw new ConfigError(`Invalid ${field} in ${result.filepath}: ${issue?.message ?? 'rejected'}`, field);
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const logLevel = envLogLevel();
    if (logLevel) env.logLevel = logLevel;

    const concurrency = process.env['PHYTOEVAL_CONCURRENCY'];
    if (concurrency) env.concurrency = Number(concurrency);

    return env;
}

/**
 * Merge configuration from multiple sources and validate it.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * @throws ConfigError when a merged value is out of range
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<PhytoEvalConfig> {
    const fileConfig = (await loadConfigFile(options.searchFrom)) ?? {};
    const envConfig = loadEnvVars();
    const layers = [cliFlags, envConfig, fileConfig];

    const pick = <K extends keyof ConfigOverrides>(key: K): ConfigOverrides[K] => {
        for (const layer of layers) {
            if (layer[key] !== undefined) return layer[key];
        }
        return undefined;
    };

    const evaluation = resolveEvaluationConfig({
        ...fileConfig.evaluation,
        ...withoutUndefined(cliFlags.evaluation ?? {}),
    });

    return {
        gold: pick('gold'),
        predictions: pick('predictions'),
        model: pick('model') ?? DEFAULT_CONFIG.model,
        out: pick('out'),
        report: pick('report'),
        reportFormat: pick('reportFormat') ?? DEFAULT_CONFIG.reportFormat,
        concurrency: validateConcurrency(pick('concurrency') ?? DEFAULT_CONFIG.concurrency),
        predictionErrors: pick('predictionErrors') ?? DEFAULT_CONFIG.predictionErrors,
        logLevel: pick('logLevel') ?? DEFAULT_CONFIG.logLevel,
        jsonLogs: pick('jsonLogs') ?? DEFAULT_CONFIG.jsonLogs,
        evaluation,
    };
}

/**
 * Drop keys whose value is undefined so they do not shadow lower-precedence layers.
 */
function withoutUndefined(value: Partial<EvaluationConfig>): Partial<EvaluationConfig> {
    const result: Partial<EvaluationConfig> = {};
    if (value.entityOverlapThreshold !== undefined) result.entityOverlapThreshold = value.entityOverlapThreshold;
    if (value.corefPartialCredit !== undefined) result.corefPartialCredit = value.corefPartialCredit;
    if (value.corefMinSharedPairs !== undefined) result.corefMinSharedPairs = value.corefMinSharedPairs;
    if (value.linkingCaseSensitive !== undefined) result.linkingCaseSensitive = value.linkingCaseSensitive;
    if (value.matching !== undefined) result.matching = value.matching;
    return result;
}
