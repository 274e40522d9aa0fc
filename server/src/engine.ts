/**
 * Engine assembly: catalog, skills, workers, validator and orchestrator
 * wired together the way the server and CLI use them.
 */

import { CapabilityCatalog } from "./execution/catalog/capability-catalog.js";
import { createNativeSkillService } from "./execution/skills/native-skills.js";
import type { SkillService } from "./execution/skills/skill-service.js";
import { SchemaValidator } from "./execution/validation/schema-validator.js";
import { WorkerRegistry } from "./execution/workers/worker-registry.js";
import { LinearOrchestrator } from "./execution/workflow/linear-orchestrator.js";
import type { InstanceValidator } from "./execution/workflow/types.js";
import { registerBuiltinWorkers } from "./workers/index.js";
import { DEFAULT_CONFIG } from "./config.js";

export interface CreateEngineOptions {
  /** Pre-built catalog; takes precedence over `catalogPath` */
  catalog?: CapabilityCatalog;
  catalogPath?: string;
  /** Defaults to a registry holding the built-in workers */
  registry?: WorkerRegistry;
  skills?: SkillService;
  validator?: InstanceValidator;
  stepTimeoutMs?: number;
  maxDelegationDepth?: number;
  verbose?: boolean;
}

export interface Engine {
  catalog: CapabilityCatalog;
  registry: WorkerRegistry;
  skills: SkillService;
  validator: InstanceValidator;
  orchestrator: LinearOrchestrator;
}

export async function createEngine(options: CreateEngineOptions = {}): Promise<Engine> {
  const catalog =
    options.catalog ?? (await CapabilityCatalog.load(options.catalogPath ?? DEFAULT_CONFIG.catalogPath));
  const registry = options.registry ?? registerBuiltinWorkers(new WorkerRegistry());
  const skills = options.skills ?? createNativeSkillService();
  const validator = options.validator ?? new SchemaValidator();

  const orchestrator = new LinearOrchestrator({
    catalog,
    registry,
    skills,
    validator,
    stepTimeoutMs: options.stepTimeoutMs,
    maxDelegationDepth: options.maxDelegationDepth,
    verbose: options.verbose,
  });

  return { catalog, registry, skills, validator, orchestrator };
}
