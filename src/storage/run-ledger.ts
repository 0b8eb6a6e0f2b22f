import Database from 'better-sqlite3';
import type { AggregateMetrics, DataQualityReport, FundMetricsConfig } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * SQLite schema migration v1.
 * One row per pipeline run, one row per window/track metric of that run.
 */
const MIGRATION_V1 = `
-- Runs: one per pipeline invocation
CREATE TABLE IF NOT EXISTS runs (
  run_id INTEGER PRIMARY KEY,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  fundmetrics_version TEXT NOT NULL,
  label TEXT,
  sources_json TEXT NOT NULL DEFAULT '[]',
  config_json TEXT NOT NULL,
  raw_record_count INTEGER NOT NULL,
  entity_count INTEGER NOT NULL,
  duplication_factor REAL NOT NULL,
  quality_json TEXT NOT NULL
);

-- Window metrics: aggregate figures per window (and track)
CREATE TABLE IF NOT EXISTS window_metrics (
  metric_id INTEGER PRIMARY KEY,
  run_id INTEGER NOT NULL REFERENCES runs(run_id) ON DELETE CASCADE,
  window_label TEXT NOT NULL,
  start_year INTEGER NOT NULL,
  end_year INTEGER NOT NULL,
  track TEXT,
  project_count INTEGER NOT NULL,
  investment REAL NOT NULL,
  follow_on_funding REAL NOT NULL,
  roi REAL NOT NULL,
  trainees_total REAL NOT NULL,
  metrics_json TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_window_metrics_run ON window_metrics(run_id);
`;

export interface RunInput {
    version: string;
    label?: string;
    sources: string[];
    config: FundMetricsConfig;
    metrics: readonly AggregateMetrics[];
    quality: DataQualityReport;
}

export interface RunSummary {
    runId: number;
    createdAt: string;
    version: string;
    label: string | null;
    sources: string[];
    rawRecordCount: number;
    entityCount: number;
    duplicationFactor: number;
}

export interface StoredRun extends RunSummary {
    config: FundMetricsConfig;
    metrics: AggregateMetrics[];
    quality: DataQualityReport;
}

interface RunRow {
    run_id: number;
    created_at: string;
    fundmetrics_version: string;
    label: string | null;
    sources_json: string;
    config_json: string;
    raw_record_count: number;
    entity_count: number;
    duplication_factor: number;
    quality_json: string;
}

interface MetricRow {
    metrics_json: string;
}

function toSummary(row: RunRow): RunSummary {
    const sources: string[] = JSON.parse(row.sources_json);
    return {
        runId: row.run_id,
        createdAt: row.created_at,
        version: row.fundmetrics_version,
        label: row.label,
        sources,
        rawRecordCount: row.raw_record_count,
        entityCount: row.entity_count,
        duplicationFactor: row.duplication_factor,
    };
}

/**
 * Ledger of pipeline runs, so successive correction cycles over the same
 * extracts can be compared. Wraps better-sqlite3 with WAL mode and
 * `user_version` migrations.
 */
export class RunLedger {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        this.migrate();

        getLogger().debug({ dbPath }, 'Run ledger opened');
    }

    private migrate(): void {
        const version = this.db.pragma('user_version', { simple: true });
        const currentVersion = typeof version === 'number' ? version : 0;

        if (currentVersion < 1) {
            this.db.exec(MIGRATION_V1);
            this.db.pragma('user_version = 1');
            getLogger().info('Run ledger migrated to v1');
        }
    }

    // ─── Runs ─────────────────────────────────────────────────

    /**
     * Store a run and its window metrics in one transaction. Returns the run id.
     */
    recordRun(run: RunInput): number {
        const insertRun = this.db.prepare(`
      INSERT INTO runs (fundmetrics_version, label, sources_json, config_json, raw_record_count, entity_count, duplication_factor, quality_json)
      VALUES (@version, @label, @sources_json, @config_json, @raw_record_count, @entity_count, @duplication_factor, @quality_json)
    `);
        const insertMetric = this.db.prepare(`
      INSERT INTO window_metrics (run_id, window_label, start_year, end_year, track, project_count, investment, follow_on_funding, roi, trainees_total, metrics_json)
      VALUES (@run_id, @window_label, @start_year, @end_year, @track, @project_count, @investment, @follow_on_funding, @roi, @trainees_total, @metrics_json)
    `);

        const store = this.db.transaction((input: RunInput): number => {
            const result = insertRun.run({
                version: input.version,
                label: input.label ?? null,
                sources_json: JSON.stringify(input.sources),
                config_json: JSON.stringify(input.config),
                raw_record_count: input.quality.rawRecordCount,
                entity_count: input.quality.entityCount,
                duplication_factor: input.quality.duplicationFactor,
                quality_json: JSON.stringify(input.quality),
            });
            const runId = Number(result.lastInsertRowid);

            for (const metric of input.metrics) {
                insertMetric.run({
                    run_id: runId,
                    window_label: metric.window.label,
                    start_year: metric.window.startYear,
                    end_year: metric.window.endYear,
                    track: metric.track,
                    project_count: metric.projectCount,
                    investment: metric.investment,
                    follow_on_funding: metric.followOnFunding,
                    roi: metric.roi,
                    trainees_total: metric.trainees.total,
                    metrics_json: JSON.stringify(metric),
                });
            }
            return runId;
        });

        const runId = store(run);
        getLogger().info({ runId, metrics: run.metrics.length }, 'Run recorded');
        return runId;
    }

    /**
     * All runs, newest first.
     */
    listRuns(limit = 50): RunSummary[] {
        return this.db
            .prepare<[number], RunRow>('SELECT * FROM runs ORDER BY run_id DESC LIMIT ?')
            .all(limit)
            .map(toSummary);
    }

    getRun(runId: number): StoredRun | undefined {
        const row = this.db.prepare<[number], RunRow>('SELECT * FROM runs WHERE run_id = ?').get(runId);
        if (!row) return undefined;

        const metrics: AggregateMetrics[] = this.db
            .prepare<[number], MetricRow>('SELECT metrics_json FROM window_metrics WHERE run_id = ? ORDER BY metric_id')
            .all(runId)
            .map((metricRow) => JSON.parse(metricRow.metrics_json));

        return {
            ...toSummary(row),
            config: JSON.parse(row.config_json),
            metrics,
            quality: JSON.parse(row.quality_json),
        };
    }

    // ─── Utility ──────────────────────────────────────────────

    close(): void {
        this.db.close();
        getLogger().debug('Run ledger closed');
    }
}
