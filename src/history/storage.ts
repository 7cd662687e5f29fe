/**
 * Run History: Storage (InMemory + SQLite)
 */

import type BetterSqlite3 from "better-sqlite3";
import { z } from "zod";

import type { PipelineReport } from "../orchestration/types.js";
import { pipelineReportSchema, runRowSchema, type RunRow } from "./schema.js";

export type RunSummary = {
  runId: string;
  startedAt: string;
  completedAt: string;
  dryRun: boolean;
  success: boolean;
  aborted: boolean;
  devices: number;
  applied: number;
  failed: number;
  skipped: number;
};

export interface RunHistoryStorage {
  initialize(): Promise<void>;
  saveRun(report: PipelineReport): Promise<void>;
  /** Most recent first. */
  listRuns(limit?: number): Promise<RunSummary[]>;
  getRun(runId: string): Promise<PipelineReport | null>;
  close(): Promise<void>;
}

export function summarizeRun(report: PipelineReport): RunSummary {
  return {
    runId: report.runId,
    startedAt: report.startedAt,
    completedAt: report.completedAt,
    dryRun: report.dryRun,
    success: report.success,
    aborted: report.aborted,
    devices: report.totals.devices,
    applied: report.totals.applied,
    failed: report.totals.failed,
    skipped: report.totals.skipped,
  };
}

// ── InMemory ────────────────────────────────────────────────────

export class InMemoryRunHistory implements RunHistoryStorage {
  private runs: PipelineReport[] = [];

  async initialize(): Promise<void> {}

  async saveRun(report: PipelineReport): Promise<void> {
    this.runs = this.runs.filter((r) => r.runId !== report.runId);
    this.runs.push(structuredClone(report));
  }

  async listRuns(limit = 20): Promise<RunSummary[]> {
    return [...this.runs]
      .sort((a, b) => b.startedAt.localeCompare(a.startedAt))
      .slice(0, limit)
      .map(summarizeRun);
  }

  async getRun(runId: string): Promise<PipelineReport | null> {
    const found = this.runs.find((r) => r.runId === runId);
    return found ? structuredClone(found) : null;
  }

  async close(): Promise<void> {
    this.runs = [];
  }
}

// ── SQLite ──────────────────────────────────────────────────────

export class SQLiteRunHistory implements RunHistoryStorage {
  private db: BetterSqlite3.Database | null = null;

  constructor(private readonly dbPath: string) {}

  async initialize(): Promise<void> {
    const Database = (await import("better-sqlite3")).default;
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.pragma("synchronous = NORMAL");

    db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id TEXT PRIMARY KEY,
        started_at TEXT NOT NULL,
        completed_at TEXT NOT NULL,
        dry_run INTEGER NOT NULL,
        success INTEGER NOT NULL,
        aborted INTEGER NOT NULL,
        devices INTEGER NOT NULL,
        applied INTEGER NOT NULL,
        failed INTEGER NOT NULL,
        skipped INTEGER NOT NULL,
        report_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
    this.db = db;
  }

  async saveRun(report: PipelineReport): Promise<void> {
    const s = summarizeRun(report);
    this.database
      .prepare(
        `INSERT OR REPLACE INTO runs (run_id, started_at, completed_at, dry_run, success, aborted, devices, applied, failed, skipped, report_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        s.runId,
        s.startedAt,
        s.completedAt,
        s.dryRun ? 1 : 0,
        s.success ? 1 : 0,
        s.aborted ? 1 : 0,
        s.devices,
        s.applied,
        s.failed,
        s.skipped,
        JSON.stringify(report),
      );
  }

  async listRuns(limit = 20): Promise<RunSummary[]> {
    const rows = this.database
      .prepare(
        `SELECT run_id, started_at, completed_at, dry_run, success, aborted, devices, applied, failed, skipped
         FROM runs ORDER BY started_at DESC LIMIT ?`,
      )
      .all(limit);
    return rows.map((row) => rowToSummary(runRowSchema.parse(row)));
  }

  async getRun(runId: string): Promise<PipelineReport | null> {
    const row: unknown = this.database.prepare("SELECT report_json FROM runs WHERE run_id = ?").get(runId);
    if (row === undefined) return null;

    const { report_json } = reportRowSchema.parse(row);
    return pipelineReportSchema.parse(JSON.parse(report_json));
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  private get database(): BetterSqlite3.Database {
    if (!this.db) throw new Error("Run history is not initialized; call initialize() first");
    return this.db;
  }
}

const reportRowSchema = z.object({ report_json: z.string() });

function rowToSummary(row: RunRow): RunSummary {
  return {
    runId: row.run_id,
    startedAt: row.started_at,
    completedAt: row.completed_at,
    dryRun: row.dry_run === 1,
    success: row.success === 1,
    aborted: row.aborted === 1,
    devices: row.devices,
    applied: row.applied,
    failed: row.failed,
    skipped: row.skipped,
  };
}
