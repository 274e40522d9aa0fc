/**
 * Capability catalog command handlers
 */

import chalk from "chalk";
import Table from "cli-table3";
import { CapabilityCatalog, DEFAULT_CATALOG_PATH } from "@cacm-runtime/server";
import type { CommandContext } from "./types.js";

export interface CapabilitiesOptions {
  catalog?: string;
}

/**
 * List the capabilities a catalog file declares.
 */
export async function handleCapabilities(
  ctx: CommandContext,
  options: CapabilitiesOptions
): Promise<void> {
  const catalogPath = options.catalog ?? DEFAULT_CATALOG_PATH;
  const catalog = await CapabilityCatalog.load(catalogPath);
  const capabilities = catalog.list();

  if (ctx.jsonOutput) {
    console.log(
      JSON.stringify(
        {
          catalog: catalogPath,
          capabilities,
          loadErrors: catalog.loadErrors.map((error) => error.message),
        },
        null,
        2
      )
    );
  } else if (capabilities.length === 0) {
    console.log(chalk.gray(`No capabilities found in ${catalogPath}`));
  } else {
    console.log(chalk.bold(`\nFound ${capabilities.length} capability(ies):\n`));

    const table = new Table({
      head: [chalk.cyan("ID"), chalk.cyan("Worker"), chalk.cyan("Inputs"), chalk.cyan("Outputs")],
      colWidths: [34, 22, 30, 30],
    });
    for (const capability of capabilities) {
      table.push([
        capability.id,
        capability.workerType,
        capability.inputs.join(", "),
        capability.outputs.join(", "),
      ]);
    }
    console.log(table.toString());
  }

  if (catalog.loadErrors.length > 0 && !ctx.jsonOutput) {
    console.log(chalk.yellow(`${catalog.loadErrors.length} catalog problem(s) were reported`));
  }
}
