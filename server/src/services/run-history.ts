/**
 * Run history store
 *
 * Persists finished runs so they can be listed and fetched after the fact.
 */

import type Database from "better-sqlite3";
import type { LogEntry, RunResult, RunStatus, StepRecord } from "@cacm-runtime/types";
import { generateId } from "../execution/workflow/utils.js";

export interface StoredRun {
  id: string;
  cacmId: string;
  sessionId: string;
  status: RunStatus;
  success: boolean;
  outputs: Record<string, unknown>;
  logs: LogEntry[];
  steps: StepRecord[];
  createdAt: string;
}

export interface ListRunsOptions {
  cacmId?: string;
  /** Maximum number of runs, newest first (default: 50) */
  limit?: number;
}

interface RunRow {
  id: string;
  cacm_id: string;
  session_id: string;
  status: string;
  success: number;
  outputs: string;
  logs: string;
  steps: string;
  created_at: string;
}

const RUN_STATUSES: readonly RunStatus[] = ["completed", "partial_failure", "invalid", "aborted"];

function toRunStatus(value: string): RunStatus {
  const status = RUN_STATUSES.find((s) => s === value);
  if (!status) {
    throw new Error(`Unknown run status in history: '${value}'`);
  }
  return status;
}

function rowToRun(row: RunRow): StoredRun {
  return {
    id: row.id,
    cacmId: row.cacm_id,
    sessionId: row.session_id,
    status: toRunStatus(row.status),
    success: row.success === 1,
    outputs: JSON.parse(row.outputs),
    logs: JSON.parse(row.logs),
    steps: JSON.parse(row.steps),
    createdAt: row.created_at,
  };
}

/**
 * Serialize a value for a JSON column; values JSON cannot represent
 * (symbols, functions) are dropped by JSON.stringify.
 */
function toJson(value: unknown): string {
  return JSON.stringify(value);
}

export class RunHistoryStore {
  constructor(private readonly db: Database.Database) {}

  save(result: RunResult, cacmId: string): StoredRun {
    const row: RunRow = {
      id: generateId("run"),
      cacm_id: cacmId,
      session_id: result.sessionId,
      status: result.status,
      success: result.success ? 1 : 0,
      outputs: toJson(result.outputs),
      logs: toJson(result.logs),
      steps: toJson(result.steps),
      created_at: new Date().toISOString(),
    };

    this.db
      .prepare<RunRow>(
        `INSERT INTO runs (id, cacm_id, session_id, status, success, outputs, logs, steps, created_at)
         VALUES (@id, @cacm_id, @session_id, @status, @success, @outputs, @logs, @steps, @created_at)`
      )
      .run(row);

    return rowToRun(row);
  }

  get(id: string): StoredRun | null {
    const row = this.db.prepare<[string], RunRow>("SELECT * FROM runs WHERE id = ?").get(id);
    return row ? rowToRun(row) : null;
  }

  list(options: ListRunsOptions = {}): StoredRun[] {
    const limit = options.limit ?? 50;
    const rows =
      options.cacmId !== undefined
        ? this.db
            .prepare<[string, number], RunRow>(
              "SELECT * FROM runs WHERE cacm_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?"
            )
            .all(options.cacmId, limit)
        : this.db
            .prepare<[number], RunRow>("SELECT * FROM runs ORDER BY created_at DESC, rowid DESC LIMIT ?")
            .all(limit);
    return rows.map(rowToRun);
  }
}
