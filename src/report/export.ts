import { writeFileSync } from 'node:fs';
import { EvaluationDatabase, type ComparisonMetric } from '../storage/database.js';
import type { CategoryReport, CorpusScoreReport, PrfScore, ReportFormat } from '../types/index.js';
import { compareIds } from '../utils/ids.js';
import { getLogger } from '../utils/logger.js';
import { upperMedian } from './report-builder.js';

// ─── Main Export Functions ───────────────────────────────

/**
 * Render a corpus report in the given format.
 */
export function renderReport(report: CorpusScoreReport, format: ReportFormat): string {
    switch (format) {
        case 'json':
            return JSON.stringify(report, null, 2);
        case 'tsv':
            return renderTsv(report);
        case 'markdown':
            return renderMarkdown(report);
        default:
            throw new Error(`Unsupported report format: ${String(format)}`);
    }
}

/**
 * Render a corpus report and write it to `outputPath`.
 */
export function exportReport(report: CorpusScoreReport, outputPath: string, format: ReportFormat): void {
    writeFileSync(outputPath, renderReport(report, format), 'utf-8');
    getLogger().info({ format, outputPath, documents: report.documentCount }, 'Report exported');
}

/**
 * Write a document × model table of median F1 over each model's repeats,
 * from every run stored in the database.
 */
export function exportComparison(dbPath: string, outputPath: string, metric: ComparisonMetric): void {
    const db = new EvaluationDatabase(dbPath);

    try {
        const content = renderComparison(db, metric);
        writeFileSync(outputPath, content, 'utf-8');
        getLogger().info({ metric, outputPath }, 'Comparison exported');
    } finally {
        db.close();
    }
}

// ─── Format Implementations ─────────────────────────────

function fmt(value: number | null, missing = ''): string {
    return value === null ? missing : value.toFixed(4);
}

const cell = (value: number | null): string => fmt(value, 'n/a');

const TSV_HEADER = [
    'document',
    'entity_precision',
    'entity_recall',
    'entity_f1',
    'relation_precision',
    'relation_recall',
    'relation_f1',
    'coreference_f1',
    'linking_accuracy',
    'modality_mismatches',
].join('\t');

function tsvRow(
    label: string,
    entities: PrfScore,
    relations: PrfScore,
    coreferenceF1: number | null,
    linkingAccuracy: number | null,
    modalityMismatches: number
): string {
    return [
        label,
        fmt(entities.precision),
        fmt(entities.recall),
        fmt(entities.f1),
        fmt(relations.precision),
        fmt(relations.recall),
        fmt(relations.f1),
        fmt(coreferenceF1),
        fmt(linkingAccuracy),
        String(modalityMismatches),
    ].join('\t');
}

/**
 * One row per document, then the micro-averaged corpus row.
 */
function renderTsv(report: CorpusScoreReport): string {
    const lines = [TSV_HEADER];
    for (const row of report.documents) {
        lines.push(
            tsvRow(row.documentId, row.entities, row.relations, row.coreference.f1, row.linking.accuracy, row.modalityMismatches)
        );
    }
    lines.push(
        tsvRow(
            'micro',
            report.entities.micro,
            report.relations.micro,
            report.coreference.f1,
            report.linking.accuracy,
            report.modalityMismatches
        )
    );
    return lines.join('\n') + '\n';
}

function markdownCategory(title: string, category: CategoryReport): string[] {
    const lines = [`## ${title}`, '', '| Type | Precision | Recall | F1 | TP | FP | FN |', '| --- | --- | --- | --- | --- | --- | --- |'];
    const prfLine = (label: string, score: PrfScore): string =>
        `| ${label} | ${cell(score.precision)} | ${cell(score.recall)} | ${cell(score.f1)} | ${score.tp} | ${score.fp} | ${score.fn} |`;

    for (const [type, score] of Object.entries(category.byType)) {
        lines.push(prfLine(type, score));
    }
    lines.push(prfLine('**micro**', category.micro));
    lines.push(
        `| **macro** (${category.macro.types} types) | ${cell(category.macro.precision)} | ${cell(category.macro.recall)} | ${cell(category.macro.f1)} | | | |`
    );
    lines.push('');
    return lines;
}

function renderMarkdown(report: CorpusScoreReport): string {
    const lines = ['# Evaluation report', '', `Documents scored: ${report.documentCount}`, ''];

    lines.push(...markdownCategory('Entities', report.entities));
    lines.push(...markdownCategory('Relations', report.relations));

    lines.push('## Coreference', '');
    lines.push(
        `${report.coreference.mode}: precision ${cell(report.coreference.precision)}, recall ${cell(report.coreference.recall)}, F1 ${cell(report.coreference.f1)}`,
        ''
    );

    lines.push('## Linking', '');
    lines.push(`Accuracy ${cell(report.linking.accuracy)} (${report.linking.correct}/${report.linking.total})`, '');

    lines.push(`Modality mismatches: ${report.modalityMismatches}`, '');

    if (report.excluded.length > 0) {
        lines.push('## Excluded documents', '');
        for (const excluded of report.excluded) {
            lines.push(`- ${excluded.documentId} (${excluded.side}, ${excluded.kind}, ${excluded.action}): ${excluded.message}`);
        }
        lines.push('');
    }

    if (report.unpairedPredictions.length > 0) {
        lines.push('## Predictions without gold', '');
        for (const id of report.unpairedPredictions) {
            lines.push(`- ${id}`);
        }
        lines.push('');
    }

    return lines.join('\n');
}

function renderComparison(db: EvaluationDatabase, metric: ComparisonMetric): string {
    const byDocument = new Map<string, Map<string, number[]>>();
    const models = new Set<string>();

    for (const row of db.getModelScores(metric)) {
        models.add(row.model);
        const perModel = byDocument.get(row.document_id) ?? new Map<string, number[]>();
        const values = perModel.get(row.model) ?? [];
        values.push(row.f1 ?? 0);
        perModel.set(row.model, values);
        byDocument.set(row.document_id, perModel);
    }

    const columns = [...models].sort(compareIds);
    const lines = [['document', ...columns].join('\t')];

    for (const documentId of [...byDocument.keys()].sort(compareIds)) {
        const perModel = byDocument.get(documentId);
        const cells = columns.map((model) => {
            const values = perModel?.get(model);
            return values ? fmt(upperMedian(values)) : '';
        });
        lines.push([documentId, ...cells].join('\t'));
    }

    return lines.join('\n') + '\n';
}
