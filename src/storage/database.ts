import Database from 'better-sqlite3';
import type { CorpusScoreReport, DocumentScoreRow, ExcludedDocument, RunRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/**
 * SQLite schema migration v1.
 */
const MIGRATION_V1 = `
-- Runs: one scored repeat of one model
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  phytoeval_version TEXT NOT NULL,
  model TEXT NOT NULL,
  repeat INTEGER NOT NULL DEFAULT 1,
  config_json TEXT NOT NULL,
  summary_json TEXT NOT NULL DEFAULT '{}'
);

-- Per-document scores of a run
CREATE TABLE IF NOT EXISTS document_scores (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  document_id TEXT NOT NULL,
  entity_f1 REAL,
  relation_f1 REAL,
  coreference_f1 REAL,
  linking_accuracy REAL,
  record_json TEXT NOT NULL,
  PRIMARY KEY (run_id, document_id)
);

-- Documents left out of a run, and why
CREATE TABLE IF NOT EXISTS excluded_documents (
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  document_id TEXT NOT NULL,
  side TEXT NOT NULL,
  kind TEXT NOT NULL,
  message TEXT NOT NULL,
  action TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_runs_model ON runs(model);
CREATE INDEX IF NOT EXISTS idx_document_scores_document ON document_scores(document_id);
CREATE INDEX IF NOT EXISTS idx_excluded_run ON excluded_documents(run_id);
`;

export interface RunMetadata {
    model: string;
    repeat: number;
    /** Defaults to the running version */
    version?: string;
    createdAt?: string;
}

export interface ExcludedDocumentRow extends ExcludedDocument {
    run_id: number;
}

/** Per-document F1 of one metric, joined with the run's model */
export interface ModelScoreRow {
    model: string;
    repeat: number;
    document_id: string;
    f1: number | null;
}

export type ComparisonMetric = 'entity' | 'relation';

const METRIC_COLUMNS: Record<ComparisonMetric, string> = {
    entity: 'entity_f1',
    relation: 'relation_f1',
};

/**
 * Corpus-level part of a report, stored with the run.
 */
function reportSummary(report: CorpusScoreReport): Record<string, unknown> {
    return {
        documentCount: report.documentCount,
        entities: { micro: report.entities.micro, macro: report.entities.macro },
        relations: { micro: report.relations.micro, macro: report.relations.macro },
        coreference: report.coreference,
        linking: report.linking,
        modalityMismatches: report.modalityMismatches,
        unpairedPredictions: report.unpairedPredictions,
    };
}

/**
 * Evaluation results store around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and run persistence.
 */
export class EvaluationDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Database initialized');
    }

    private migrate(): void {
        const currentVersion = this.db.pragma('user_version', { simple: true });

        if (typeof currentVersion !== 'number' || currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Database migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    /**
     * Store a corpus report with its per-document rows and exclusions
     * in a single transaction. Returns the new run id.
     */
    insertRun(report: CorpusScoreReport, metadata: RunMetadata): number {
        const runStmt = this.db.prepare<Omit<RunRecord, 'run_id'>>(`
      INSERT INTO runs (created_at, phytoeval_version, model, repeat, config_json, summary_json)
      VALUES (@created_at, @phytoeval_version, @model, @repeat, @config_json, @summary_json)
    `);

        const scoreStmt = this.db.prepare<DocumentScoreRow>(`
      INSERT INTO document_scores (run_id, document_id, entity_f1, relation_f1, coreference_f1, linking_accuracy, record_json)
      VALUES (@run_id, @document_id, @entity_f1, @relation_f1, @coreference_f1, @linking_accuracy, @record_json)
    `);

        const excludedStmt = this.db.prepare<ExcludedDocumentRow>(`
      INSERT INTO excluded_documents (run_id, document_id, side, kind, message, action)
      VALUES (@run_id, @documentId, @side, @kind, @message, @action)
    `);

        const insertAll = this.db.transaction((): number => {
            const result = runStmt.run({
                created_at: metadata.createdAt ?? new Date().toISOString(),
                phytoeval_version: metadata.version ?? VERSION,
                model: metadata.model,
                repeat: metadata.repeat,
                config_json: JSON.stringify(report.config),
                summary_json: JSON.stringify(reportSummary(report)),
            });
            const runId = Number(result.lastInsertRowid);

            for (const row of report.documents) {
                scoreStmt.run({
                    run_id: runId,
                    document_id: row.documentId,
                    entity_f1: row.entities.f1,
                    relation_f1: row.relations.f1,
                    coreference_f1: row.coreference.f1,
                    linking_accuracy: row.linking.accuracy,
                    record_json: JSON.stringify(row),
                });
            }

            for (const excluded of report.excluded) {
                excludedStmt.run({ run_id: runId, ...excluded });
            }

            return runId;
        });

        const runId = insertAll();
        getLogger().debug({ runId, model: metadata.model, repeat: metadata.repeat }, 'Run stored');
        return runId;
    }

    getRuns(): RunRecord[] {
        return this.db.prepare<[], RunRecord>('SELECT * FROM runs ORDER BY run_id').all();
    }

    getDocumentScores(runId: number): DocumentScoreRow[] {
        return this.db
            .prepare<[number], DocumentScoreRow>('SELECT * FROM document_scores WHERE run_id = ? ORDER BY document_id')
            .all(runId);
    }

    getExcludedDocuments(runId: number): ExcludedDocumentRow[] {
        return this.db
            .prepare<[number], ExcludedDocumentRow>(`
      SELECT run_id, document_id AS documentId, side, kind, message, action
      FROM excluded_documents WHERE run_id = ? ORDER BY document_id, side
    `)
            .all(runId);
    }

    /**
     * Per-document F1 of every stored run, for comparing models.
     */
    getModelScores(metric: ComparisonMetric): ModelScoreRow[] {
        return this.db
            .prepare<[], ModelScoreRow>(`
      SELECT r.model, r.repeat, s.document_id, s.${METRIC_COLUMNS[metric]} AS f1
      FROM document_scores s JOIN runs r ON r.run_id = s.run_id
      ORDER BY r.model, s.document_id, r.repeat
    `)
            .all();
    }

    // ─── Stats ────────────────────────────────────────────────

    getStats(): {
        runs: number;
        documentScores: number;
        excluded: number;
        runsByModel: Record<string, number>;
    } {
        const count = (table: string): number =>
            this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0;

        const modelRows = this.db
            .prepare<[], { model: string; count: number }>('SELECT model, COUNT(*) as count FROM runs GROUP BY model ORDER BY model')
            .all();
        const runsByModel: Record<string, number> = {};
        for (const row of modelRows) {
            runsByModel[row.model] = row.count;
        }

        return {
            runs: count('runs'),
            documentScores: count('document_scores'),
            excluded: count('excluded_documents'),
            runsByModel,
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }
}
