import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { resolveConfig } from '../utils/config.js';
import { ConfigError } from '../utils/errors.js';
import { DEFAULT_EVALUATION_CONFIG } from '../types/index.js';

describe('resolveConfig', () => {
    let dir: string;

    function writeConfig(value: unknown): void {
        fs.writeFileSync(path.join(dir, 'phytoeval.config.json'), JSON.stringify(value), 'utf-8');
    }

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'phytoeval-config-'));
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should fall back to defaults without a config file', async () => {
        const config = await resolveConfig({}, { searchFrom: dir });

        expect(config).toMatchObject({
            model: 'model',
            reportFormat: 'json',
            concurrency: 4,
            predictionErrors: 'exclude',
            jsonLogs: false,
        });
        expect(config.evaluation).toEqual(DEFAULT_EVALUATION_CONFIG);
        expect(config.gold).toBeUndefined();
    });

    it('should read the config file', async () => {
        writeConfig({ gold: 'corpus/gold', model: 'alpha', evaluation: { matching: 'optimal', entityOverlapThreshold: 0.7 } });

        const config = await resolveConfig({}, { searchFrom: dir });

        expect(config.gold).toBe('corpus/gold');
        expect(config.model).toBe('alpha');
        expect(config.evaluation).toEqual({ ...DEFAULT_EVALUATION_CONFIG, matching: 'optimal', entityOverlapThreshold: 0.7 });
    });

    it('should let env vars override the file and flags override both', async () => {
        writeConfig({ concurrency: 2, logLevel: 'debug', evaluation: { matching: 'optimal' } });
        vi.stubEnv('PHYTOEVAL_CONCURRENCY', '6');
        vi.stubEnv('PHYTOEVAL_LOG_LEVEL', 'warn');

        const fromEnv = await resolveConfig({}, { searchFrom: dir });
        expect(fromEnv.concurrency).toBe(6);
        expect(fromEnv.logLevel).toBe('warn');

        const fromFlags = await resolveConfig(
            { concurrency: 8, evaluation: { matching: 'greedy', corefPartialCredit: undefined } },
            { searchFrom: dir }
        );
        expect(fromFlags.concurrency).toBe(8);
        expect(fromFlags.evaluation.matching).toBe('greedy');
        expect(fromFlags.evaluation.corefPartialCredit).toBe(true);
    });

    it('should reject a config file of the wrong shape', async () => {
        writeConfig({ reportFormat: 'html' });

        await expect(resolveConfig({}, { searchFrom: dir })).rejects.toBeInstanceOf(ConfigError);
        await expect(resolveConfig({}, { searchFrom: dir })).rejects.toMatchObject({ field: 'reportFormat' });
    });

    it('should reject out-of-range values', async () => {
        await expect(resolveConfig({ evaluation: { entityOverlapThreshold: 2 } }, { searchFrom: dir })).rejects.toMatchObject({
            field: 'entityOverlapThreshold',
        });
        await expect(resolveConfig({ concurrency: 0 }, { searchFrom: dir })).rejects.toMatchObject({ field: 'concurrency' });
    });
});
