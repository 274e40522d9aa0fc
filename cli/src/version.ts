/**
 * Version utilities
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Get the CLI version from package.json
 */
export function getVersion(): string {
  const packageJsonPath = path.join(__dirname, "..", "package.json");
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf8"));
  if (
    typeof packageJson === "object" &&
    packageJson !== null &&
    "version" in packageJson &&
    typeof packageJson.version === "string"
  ) {
    return packageJson.version;
  }
  return "0.0.0";
}

export const VERSION = getVersion();
