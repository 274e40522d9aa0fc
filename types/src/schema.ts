/**
 * SQLite schema definition for run history
 */

export const SCHEMA_VERSION = 1;

export const RUNS_TABLE = `
CREATE TABLE IF NOT EXISTS runs (
    id TEXT PRIMARY KEY,
    cacm_id TEXT NOT NULL,
    session_id TEXT NOT NULL,
    status TEXT NOT NULL CHECK(status IN ('completed', 'partial_failure', 'invalid', 'aborted')),
    success INTEGER NOT NULL CHECK(success IN (0, 1)),
    outputs TEXT NOT NULL DEFAULT '{}',
    logs TEXT NOT NULL DEFAULT '[]',
    steps TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL
);
`;

export const RUNS_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_runs_cacm_id ON runs(cacm_id);
CREATE INDEX IF NOT EXISTS idx_runs_created_at ON runs(created_at);
`;
