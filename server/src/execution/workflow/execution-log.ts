/**
 * Execution Log
 *
 * Ordered, level-tagged record of a run, returned to the caller with the
 * result.
 *
 * @module execution/workflow/execution-log
 */

import type { LogEntry, LogLevel } from "@cacm-runtime/types";

export function formatLogEntry(entry: LogEntry): string {
  return `${entry.level}: ${entry.source}: ${entry.message}`;
}

export class ExecutionLog {
  private readonly entries: LogEntry[] = [];

  /**
   * @param echo - Also write each entry to the console
   */
  constructor(private readonly echo = false) {}

  add(level: LogLevel, source: string, message: string, stepId?: string): LogEntry {
    const entry: LogEntry = {
      level,
      source,
      message,
      timestamp: new Date().toISOString(),
    };
    if (stepId !== undefined) {
      entry.stepId = stepId;
    }
    this.entries.push(entry);

    if (this.echo) {
      const line = formatLogEntry(entry);
      if (level === "ERROR") console.error(line);
      else if (level === "WARN") console.warn(line);
      else console.log(line);
    }
    return entry;
  }

  info(source: string, message: string, stepId?: string): LogEntry {
    return this.add("INFO", source, message, stepId);
  }

  warn(source: string, message: string, stepId?: string): LogEntry {
    return this.add("WARN", source, message, stepId);
  }

  error(source: string, message: string, stepId?: string): LogEntry {
    return this.add("ERROR", source, message, stepId);
  }

  /** Copy of the entries in insertion order */
  toArray(): LogEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  lines(): string[] {
    return this.entries.map(formatLogEntry);
  }

  get length(): number {
    return this.entries.length;
  }
}
