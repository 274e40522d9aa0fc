/**
 * Reads a workflow instance document from disk.
 *
 * `.yaml` and `.yml` files are parsed as YAML; anything else as JSON.
 */

import * as fs from "fs/promises";
import * as path from "path";
import * as yaml from "js-yaml";

export class InstanceLoadError extends Error {
  constructor(
    public readonly filePath: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Failed to load ${filePath}: ${reason}`, options);
    this.name = "InstanceLoadError";
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isYamlPath(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return ext === ".yaml" || ext === ".yml";
}

/**
 * Parse document text. Returns the raw value; shape checks are the
 * validator's job.
 */
export function parseInstanceText(text: string, format: "json" | "yaml"): unknown {
  if (format === "yaml") {
    return yaml.load(text);
  }
  const parsed: unknown = JSON.parse(text);
  return parsed;
}

export async function loadInstanceFile(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    throw new InstanceLoadError(filePath, reasonOf(error), { cause: error });
  }

  try {
    return parseInstanceText(text, isYamlPath(filePath) ? "yaml" : "json");
  } catch (error) {
    throw new InstanceLoadError(filePath, reasonOf(error), { cause: error });
  }
}
