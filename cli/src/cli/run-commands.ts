/**
 * Run command handler
 */

import chalk from "chalk";
import Table from "cli-table3";
import * as fs from "fs/promises";
import * as path from "path";
import type { RunResult } from "@cacm-runtime/types";
import { createEngine, loadEngineConfig } from "@cacm-runtime/server";
import { loadInstanceFile } from "../instance-loader.js";
import { errorMessage, printLogEntry, reportError } from "./output.js";
import type { CommandContext } from "./types.js";

export interface RunOptions {
  catalog?: string;
  /** File to write the run's outputs to, as JSON */
  output?: string;
  /** Per-step timeout in milliseconds; 0 disables it */
  timeout?: string;
}

function parseTimeout(raw: string | undefined): number | undefined | null {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : null;
}

function printResult(result: RunResult): void {
  const table = new Table({
    head: [chalk.cyan("Step"), chalk.cyan("Capability"), chalk.cyan("State"), chalk.cyan("Duration")],
    colWidths: [24, 34, 12, 12],
  });
  for (const step of result.steps) {
    const state =
      step.state === "captured"
        ? chalk.green(step.state)
        : step.state === "failed"
          ? chalk.red(step.state)
          : chalk.yellow(step.state);
    table.push([step.stepId, step.capabilityRef, state, `${step.durationMs}ms`]);
  }

  if (result.steps.length > 0) {
    console.log();
    console.log(table.toString());
  }

  console.log(chalk.bold("\nOutputs:"));
  console.log(JSON.stringify(result.outputs, null, 2));
  console.log();

  if (result.success) {
    console.log(chalk.green(`✓ Run completed (session ${result.sessionId})`));
  } else {
    console.log(chalk.red(`✗ Run finished with status '${result.status}' (session ${result.sessionId})`));
  }
}

/**
 * Execute a workflow instance file. Exits with code 1 unless every step
 * completed.
 */
export async function handleRun(ctx: CommandContext, file: string, options: RunOptions): Promise<void> {
  const stepTimeoutMs = parseTimeout(options.timeout);
  if (stepTimeoutMs === null) {
    reportError(ctx, `Invalid --timeout '${options.timeout}': expected a non-negative integer`);
    process.exit(1);
  }

  let document: unknown;
  try {
    document = await loadInstanceFile(file);
  } catch (error) {
    reportError(ctx, errorMessage(error));
    process.exit(1);
  }

  const config = loadEngineConfig();
  const engine = await createEngine({
    catalogPath: options.catalog ?? config.catalogPath,
    stepTimeoutMs: stepTimeoutMs ?? config.stepTimeoutMs,
    maxDelegationDepth: config.maxDelegationDepth,
    verbose: ctx.verbose,
  });
  const result = await engine.orchestrator.run(document);

  if (options.output) {
    try {
      await fs.mkdir(path.dirname(path.resolve(options.output)), { recursive: true });
      await fs.writeFile(options.output, JSON.stringify(result.outputs, null, 2) + "\n", "utf8");
    } catch (error) {
      reportError(ctx, `Failed to write outputs to ${options.output}: ${errorMessage(error)}`);
      process.exit(1);
    }
  }

  if (ctx.jsonOutput) {
    console.log(
      JSON.stringify(
        {
          success: result.success,
          status: result.status,
          sessionId: result.sessionId,
          outputs: result.outputs,
          steps: result.steps,
          logs: result.logs,
        },
        null,
        2
      )
    );
  } else {
    // Verbose runs already echoed each entry as it was logged
    if (!ctx.verbose) {
      for (const entry of result.logs) {
        printLogEntry(entry);
      }
    }
    printResult(result);
    if (options.output) {
      console.log(chalk.gray(`Outputs written to ${options.output}`));
    }
  }

  if (!result.success) {
    process.exit(1);
  }
}
