/**
 * Engine configuration from environment variables
 */

import * as path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CATALOG_PATH = path.resolve(__dirname, "../config/capability-catalog.json");

export interface EngineConfig {
  catalogPath: string;
  /** 0 disables the per-step timeout */
  stepTimeoutMs: number;
  maxDelegationDepth: number;
  dbPath: string;
  port: number;
  verbose: boolean;
}

export const DEFAULT_CONFIG: EngineConfig = {
  catalogPath: DEFAULT_CATALOG_PATH,
  stepTimeoutMs: 0,
  maxDelegationDepth: 5,
  dbPath: ":memory:",
  port: 3100,
  verbose: false,
};

/**
 * Parse a non-negative integer variable, warning and falling back to the
 * default when the value is unusable.
 */
function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number,
  { min = 0 }: { min?: number } = {}
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    console.warn(`[config] Ignoring invalid ${name}='${raw}'; using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  return {
    catalogPath: env.CACM_CATALOG_PATH?.trim() || DEFAULT_CONFIG.catalogPath,
    stepTimeoutMs: readInteger(env, "CACM_STEP_TIMEOUT_MS", DEFAULT_CONFIG.stepTimeoutMs),
    maxDelegationDepth: readInteger(
      env,
      "CACM_MAX_DELEGATION_DEPTH",
      DEFAULT_CONFIG.maxDelegationDepth,
      { min: 1 }
    ),
    dbPath: env.CACM_DB_PATH?.trim() || DEFAULT_CONFIG.dbPath,
    port: readInteger(env, "PORT", DEFAULT_CONFIG.port, { min: 1 }),
    verbose: env.CACM_VERBOSE === "true" || env.CACM_VERBOSE === "1",
  };
}
