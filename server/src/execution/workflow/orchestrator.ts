/**
 * Workflow Orchestrator Interface
 *
 * Defines the contract for workflow orchestration implementations.
 *
 * @module execution/workflow/orchestrator
 */

import type { RunResult } from "@cacm-runtime/types";
import type { OrchestratorEventListener } from "./events.js";
import type { RunOptions, ValidationOutcome } from "./types.js";

/**
 * IWorkflowOrchestrator - Core interface for workflow orchestration
 *
 * Implementations validate a workflow instance, execute its steps against a
 * shared context, and report the outcome as data.
 */
export interface IWorkflowOrchestrator {
  /**
   * Validate and execute a workflow instance document.
   *
   * Never rejects for business-logic failures: an invalid instance, a
   * failed step or an aborted run is reported through the result's
   * `status`, `steps` and `logs`.
   */
  run(document: unknown, options?: RunOptions): Promise<RunResult>;

  /**
   * Validate without executing.
   */
  validate(document: unknown): ValidationOutcome;

  /**
   * Subscribe to lifecycle events.
   *
   * @returns Unsubscribe function
   */
  on(listener: OrchestratorEventListener): () => void;
}
