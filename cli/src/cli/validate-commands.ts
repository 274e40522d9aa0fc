/**
 * Validate command handler
 */

import chalk from "chalk";
import { SchemaValidator } from "@cacm-runtime/server";
import { loadInstanceFile } from "../instance-loader.js";
import { errorMessage, reportError } from "./output.js";
import type { CommandContext } from "./types.js";

/**
 * Check a workflow instance file without running it. Exits with code 1
 * when the file cannot be read or the instance is invalid.
 */
export async function handleValidate(ctx: CommandContext, file: string): Promise<void> {
  let document: unknown;
  try {
    document = await loadInstanceFile(file);
  } catch (error) {
    reportError(ctx, errorMessage(error));
    process.exit(1);
  }

  const outcome = new SchemaValidator().validate(document);

  if (ctx.jsonOutput) {
    console.log(
      JSON.stringify({ file, isValid: outcome.isValid, errors: outcome.errors }, null, 2)
    );
  } else if (outcome.isValid) {
    console.log(chalk.green(`✓ ${file} is a valid CACM instance`));
    console.log(chalk.gray(`  Name: ${outcome.instance.name}`));
    console.log(chalk.gray(`  Steps: ${outcome.instance.workflow.length}`));
  } else {
    console.log(chalk.red(`✗ ${file} is invalid (${outcome.errors.length} error(s))`));
    for (const issue of outcome.errors) {
      console.log(`  ${chalk.yellow(issue.path || "<root>")}: ${issue.message}`);
    }
  }

  if (!outcome.isValid) {
    process.exit(1);
  }
}
