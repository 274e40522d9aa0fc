/**
 * Workflow Layer Types
 *
 * @module execution/workflow/types
 */

import type { ValidationReport, WorkflowInstance } from "@cacm-runtime/types";
import type { CapabilityCatalog } from "../catalog/capability-catalog.js";
import type { SharedContext } from "../context/shared-context.js";
import type { SkillService } from "../skills/skill-service.js";
import type { WorkerRegistry } from "../workers/worker-registry.js";

/**
 * Outcome of instance validation. A valid outcome carries the typed
 * instance the orchestrator executes.
 */
export type ValidationOutcome =
  | (ValidationReport & { isValid: true; instance: WorkflowInstance })
  | (ValidationReport & { isValid: false });

/**
 * InstanceValidator - checks a workflow instance document before execution
 */
export interface InstanceValidator {
  validate(document: unknown): ValidationOutcome;
}

export interface OrchestratorOptions {
  catalog: CapabilityCatalog;
  registry: WorkerRegistry;
  skills: SkillService;
  validator: InstanceValidator;
  /** Per-step worker timeout in milliseconds; 0 disables it (default: 0) */
  stepTimeoutMs?: number;
  /** Maximum delegation hops below a step's worker (default: 5) */
  maxDelegationDepth?: number;
  /** Echo execution log entries and context writes to the console */
  verbose?: boolean;
}

export interface RunOptions {
  /** Session id for a fresh shared context; ignored when `context` is given */
  sessionId?: string;
  /** Existing shared context to run against */
  context?: SharedContext;
  /** Seeded into the shared context before the first step */
  globalParameters?: Record<string, unknown>;
  /** Seeded into the shared context before the first step (doc type -> URI) */
  documentReferences?: Record<string, string>;
  /** Overrides the orchestrator's step timeout for this run */
  stepTimeoutMs?: number;
}
