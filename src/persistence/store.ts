import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import type { BudgetDebit, BudgetLedger } from "../budget/budget-manager.js";
import { StoreError } from "../errors.js";
import { parseOrThrow, RunSnapshotSchema } from "../schemas.js";
import type { RunSnapshot, SupervisorPhase, Verdict } from "../supervisor/types.js";

const DEFAULT_DB_DIR = join(homedir(), ".taskforge");
const DEFAULT_DB_PATH = join(DEFAULT_DB_DIR, "runs.db");

export type RunSummary = {
  runId: string;
  goal: string;
  phase: SupervisorPhase;
  iteration: number;
  verdict: Verdict | null;
  startedAt: number;
  updatedAt: number;
  finishedAt?: number;
};

/**
 * Run snapshots and the budget ledger, in one SQLite file. Pass ":memory:"
 * for a throwaway store.
 */
export class RunStore implements BudgetLedger {
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? DEFAULT_DB_PATH;
    if (!dbPath) {
      mkdirSync(DEFAULT_DB_DIR, { recursive: true });
    }
    try {
      this.db = new Database(path);
    } catch (err) {
      throw new StoreError(`Cannot open run store at ${path}: ${String(err)}`, { path });
    }
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        goal        TEXT NOT NULL,
        phase       TEXT NOT NULL,
        iteration   INTEGER NOT NULL DEFAULT 0,
        verdict     TEXT,
        snapshot    TEXT NOT NULL,
        started_at  INTEGER NOT NULL,
        updated_at  INTEGER NOT NULL,
        finished_at INTEGER
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);

      CREATE TABLE IF NOT EXISTS budget_debits (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        day         TEXT NOT NULL,
        role        TEXT,
        cost        REAL NOT NULL,
        recorded_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_debits_day ON budget_debits(day);
    `);
  }

  save(snapshot: RunSnapshot): void {
    const { state } = snapshot;
    this.db
      .prepare(
        `INSERT OR REPLACE INTO runs (run_id, goal, phase, iteration, verdict, snapshot, started_at, updated_at, finished_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        state.runId,
        state.goal,
        state.phase,
        state.iteration,
        state.verdict,
        JSON.stringify(snapshot),
        state.startedAt,
        Date.now(),
        state.finishedAt ?? null,
      );
  }

  /** Load and validate a snapshot. A corrupt row raises a ParseError. */
  get(runId: string): RunSnapshot | undefined {
    const row = this.db.prepare("SELECT snapshot FROM runs WHERE run_id = ?").get(runId) as
      | { snapshot: string }
      | undefined;
    if (!row) return undefined;
    return parseOrThrow(RunSnapshotSchema, JSON.parse(row.snapshot), `snapshot for run "${runId}"`);
  }

  list(limit = 50): RunSummary[] {
    const rows = this.db
      .prepare("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?")
      .all(limit) as RunRow[];
    return rows.map(rowToSummary);
  }

  /** Delete a specific run by ID. Returns true if deleted. */
  delete(runId: string): boolean {
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /** Delete runs started before a given timestamp. */
  deleteOlderThan(timestamp: number): number {
    const result = this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp);
    return result.changes;
  }

  dailyUsage(day: string): number {
    const row = this.db.prepare("SELECT COALESCE(SUM(cost), 0) AS total FROM budget_debits WHERE day = ?").get(day) as {
      total: number;
    };
    return row.total;
  }

  appendDebit(debit: BudgetDebit): void {
    this.db
      .prepare("INSERT INTO budget_debits (day, role, cost, recorded_at) VALUES (?, ?, ?, ?)")
      .run(debit.day, debit.role, debit.cost, debit.recordedAt);
  }

  /** Per-role totals for one day, largest first. */
  usageByRole(day: string): Array<{ role: string | null; total: number }> {
    return this.db
      .prepare("SELECT role, SUM(cost) AS total FROM budget_debits WHERE day = ? GROUP BY role ORDER BY total DESC")
      .all(day) as Array<{ role: string | null; total: number }>;
  }

  close(): void {
    this.db.close();
  }
}

type RunRow = {
  run_id: string;
  goal: string;
  phase: SupervisorPhase;
  iteration: number;
  verdict: Verdict | null;
  started_at: number;
  updated_at: number;
  finished_at: number | null;
};

function rowToSummary(row: RunRow): RunSummary {
  return {
    runId: row.run_id,
    goal: row.goal,
    phase: row.phase,
    iteration: row.iteration,
    verdict: row.verdict,
    startedAt: row.started_at,
    updatedAt: row.updated_at,
    ...(row.finished_at !== null ? { finishedAt: row.finished_at } : {}),
  };
}
