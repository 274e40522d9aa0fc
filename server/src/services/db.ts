/**
 * Database service for run history
 * Uses shared schema from @cacm-runtime/types
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { RUNS_INDEXES, RUNS_TABLE, SCHEMA_VERSION } from "@cacm-runtime/types/schema";

/**
 * Database configuration
 */
export interface DatabaseConfig {
  /** File path, or ":memory:" for an in-process database */
  path: string;
  readOnly?: boolean;
}

const IN_MEMORY = ":memory:";

/**
 * Open the database and create the run-history schema
 */
export function initDatabase(config: DatabaseConfig): Database.Database {
  const { path: dbPath, readOnly = false } = config;

  if (dbPath !== IN_MEMORY) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath, {
    readonly: readOnly,
    fileMustExist: false,
  });

  // Don't modify schema if read-only
  if (readOnly) {
    return db;
  }

  if (dbPath !== IN_MEMORY) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("synchronous = NORMAL");
  db.pragma(`user_version = ${SCHEMA_VERSION}`);

  db.exec(RUNS_TABLE);
  db.exec(RUNS_INDEXES);

  return db;
}

/**
 * Close database connection
 */
export function closeDatabase(db: Database.Database): void {
  db.close();
}
