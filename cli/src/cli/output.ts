/**
 * Shared output helpers for command handlers
 */

import chalk from "chalk";
import type { LogEntry } from "@cacm-runtime/types";
import { formatLogEntry } from "@cacm-runtime/server";
import type { CommandContext } from "./types.js";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Print an error in the active output mode. Does not exit.
 */
export function reportError(ctx: CommandContext, message: string): void {
  if (ctx.jsonOutput) {
    console.error(JSON.stringify({ error: message }));
  } else {
    console.error(chalk.red(`Error: ${message}`));
  }
}

export function printLogEntry(entry: LogEntry): void {
  const line = formatLogEntry(entry);
  if (entry.level === "ERROR") {
    console.log(chalk.red(line));
  } else if (entry.level === "WARN") {
    console.log(chalk.yellow(line));
  } else {
    console.log(chalk.gray(line));
  }
}
