import { existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { compareIds } from '../utils/ids.js';
import { getLogger } from '../utils/logger.js';
import type { DocumentInput } from './loader.js';

/**
 * Model outputs for every document, from one repeat of a prompted run.
 */
export interface PredictionRun {
    repeat: number;
    inputs: DocumentInput[];
}

export interface PredictionRuns {
    runs: PredictionRun[];
    /** Prediction ids with no gold text to load against */
    unpaired: string[];
}

const ANNOTATION_EXTENSIONS = new Set(['.json', '.txt']);

/**
 * Read a gold corpus: every `<id>.txt` document text with its `<id>.json` annotations.
 * Texts may live in a separate directory (the corpus release ships them apart).
 */
export function readGoldCorpus(annotationDir: string, textDir: string = annotationDir): DocumentInput[] {
    const logger = getLogger();
    const inputs: DocumentInput[] = [];

    const textFiles = readdirSync(textDir)
        .filter((file) => extname(file) === '.txt')
        .sort(compareIds);

    for (const file of textFiles) {
        const id = basename(file, '.txt');
        const annotationPath = join(annotationDir, `${id}.json`);

        if (!existsSync(annotationPath)) {
            logger.warn({ documentId: id }, 'Gold document has no annotation file, skipping');
            continue;
        }

        inputs.push({
            id,
            text: readFileSync(join(textDir, file), 'utf-8'),
            record: readFileSync(annotationPath, 'utf-8'),
        });
    }

    logger.info({ documents: inputs.length, dir: annotationDir }, 'Gold corpus read');
    return inputs;
}

/**
 * Read model outputs laid out as `<dir>/<id>/<repeat>.txt` (or `.json`),
 * or as a single `<dir>/<id>.json` counted as repeat 1.
 *
 * Each prediction is paired with its gold text; ids listed in `ignore`
 * (gold documents already excluded) are skipped silently.
 */
export function readPredictionRuns(
    dir: string,
    goldTexts: ReadonlyMap<string, string>,
    ignore: ReadonlySet<string> = new Set()
): PredictionRuns {
    const byRepeat = new Map<number, DocumentInput[]>();
    const unpaired = new Set<string>();

    const add = (id: string, repeat: number, path: string): void => {
        if (ignore.has(id)) return;
        const text = goldTexts.get(id);
        if (text === undefined) {
            unpaired.add(id);
            return;
        }
        const inputs = byRepeat.get(repeat) ?? [];
        inputs.push({ id, text, record: readFileSync(path, 'utf-8') });
        byRepeat.set(repeat, inputs);
    };

    for (const entry of readdirSync(dir).sort(compareIds)) {
        const path = join(dir, entry);

        if (statSync(path).isDirectory()) {
            for (const file of readdirSync(path)) {
                const extension = extname(file);
                const repeat = Number(basename(file, extension));
                if (!ANNOTATION_EXTENSIONS.has(extension) || !Number.isInteger(repeat) || repeat < 1) continue;
                add(entry, repeat, join(path, file));
            }
        } else if (extname(entry) === '.json') {
            add(basename(entry, '.json'), 1, path);
        }
    }

    const runs = [...byRepeat.entries()]
        .sort(([a], [b]) => a - b)
        .map(([repeat, inputs]) => ({ repeat, inputs }));

    getLogger().info({ dir, repeats: runs.length, unpaired: unpaired.size }, 'Predictions read');
    return { runs, unpaired: [...unpaired].sort(compareIds) };
}
