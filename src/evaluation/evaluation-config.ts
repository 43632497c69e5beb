import { z } from 'zod';
import { DEFAULT_EVALUATION_CONFIG, type EvaluationConfig } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

const EvaluationConfigSchema = z.object({
    entityOverlapThreshold: z.number().min(0).max(1),
    corefPartialCredit: z.boolean(),
    corefMinSharedPairs: z.number().int().min(1),
    linkingCaseSensitive: z.boolean(),
    matching: z.enum(['greedy', 'optimal']),
});

/**
 * Fill in defaults and validate. Throws ConfigError naming the first bad field.
 */
export function resolveEvaluationConfig(overrides: Partial<EvaluationConfig> = {}): EvaluationConfig {
    const candidate = {
        entityOverlapThreshold: overrides.entityOverlapThreshold ?? DEFAULT_EVALUATION_CONFIG.entityOverlapThreshold,
        corefPartialCredit: overrides.corefPartialCredit ?? DEFAULT_EVALUATION_CONFIG.corefPartialCredit,
        corefMinSharedPairs: overrides.corefMinSharedPairs ?? DEFAULT_EVALUATION_CONFIG.corefMinSharedPairs,
        linkingCaseSensitive: overrides.linkingCaseSensitive ?? DEFAULT_EVALUATION_CONFIG.linkingCaseSensitive,
        matching: overrides.matching ?? DEFAULT_EVALUATION_CONFIG.matching,
    };

    const result = EvaluationConfigSchema.safeParse(candidate);
    if (!result.success) {
        const issue = result.error.issues[0];
        const field = String(issue?.path[0] ?? 'evaluation');
        throw new ConfigError(`Invalid ${field}: ${issue?.message ?? 'rejected'}`, field);
    }

    return result.data;
}

/**
 * Concurrency must be a positive integer.
 */
export function validateConcurrency(concurrency: number): number {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
        throw new ConfigError(`Invalid concurrency: expected a positive integer, got ${concurrency}`, 'concurrency');
    }
    return concurrency;
}
