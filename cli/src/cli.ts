#!/usr/bin/env -S node --import tsx

/**
 * cacm - validate and run capability-composed workflow instances
 */

import { Command } from "commander";
import { handleCapabilities } from "./cli/capability-commands.js";
import { handleRun } from "./cli/run-commands.js";
import type { CommandContext } from "./cli/types.js";
import { handleValidate } from "./cli/validate-commands.js";
import { VERSION } from "./version.js";

let jsonOutput = false;
let verbose = false;

function getContext(): CommandContext {
  return { jsonOutput, verbose };
}

const program = new Command();

program
  .name("cacm")
  .description("Validate and execute CACM workflow instances")
  .version(VERSION)
  .option("--json", "Output in JSON format")
  .option("-v, --verbose", "Echo engine diagnostics while running")
  .hook("preAction", (thisCommand: Command) => {
    const opts = thisCommand.optsWithGlobals();
    if (opts.json) jsonOutput = true;
    if (opts.verbose) verbose = true;
  });

program
  .command("validate <file>")
  .description("Validate a CACM instance file (JSON or YAML)")
  .action(async (file: string) => {
    await handleValidate(getContext(), file);
  });

program
  .command("run <file>")
  .description("Execute a CACM instance file")
  .option("-c, --catalog <path>", "Capability catalog path")
  .option("-o, --output <path>", "Write the run's outputs to a JSON file")
  .option("-t, --timeout <ms>", "Per-step timeout in milliseconds (0 disables)")
  .action(async (file: string, options: { catalog?: string; output?: string; timeout?: string }) => {
    await handleRun(getContext(), file, options);
  });

program
  .command("capabilities")
  .alias("caps")
  .description("List the capabilities in a catalog")
  .option("-c, --catalog <path>", "Capability catalog path")
  .action(async (options: { catalog?: string }) => {
    await handleCapabilities(getContext(), options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
