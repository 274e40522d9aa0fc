/**
 * Worker contract
 *
 * @module execution/workers/types
 */

import type { CapabilityDescriptor, WorkerResult } from "@cacm-runtime/types";
import type { CapabilityCatalog } from "../catalog/capability-catalog.js";
import type { SharedContext } from "../context/shared-context.js";
import type { SkillService } from "../skills/skill-service.js";

/** Resolved step inputs, keyed by binding name */
export type StepInputs = Record<string, unknown>;

/**
 * The polymorphic unit of work. Instances are created and cached by the
 * worker manager; per-instance state survives across steps and runs.
 */
export interface Worker {
  readonly name: string;
  /** When true, unresolved inputs are bound to MISSING instead of failing the step */
  readonly toleratesMissingInputs?: boolean;
  /**
   * @param descriptor - The capability this call executes; several
   *   capabilities may share one cached worker. Absent for delegated calls.
   */
  run(
    task: string,
    inputs: StepInputs,
    context: SharedContext,
    descriptor?: CapabilityDescriptor
  ): Promise<WorkerResult>;
}

/**
 * Narrow handle a worker uses to reach its peers. Implemented by the
 * worker manager; workers never hold the manager itself.
 */
export interface PeerRequester {
  delegate(
    caller: string,
    peer: string,
    task: string,
    inputs: StepInputs,
    context: SharedContext
  ): Promise<WorkerResult>;
}

/**
 * Shared infrastructure handed to every worker.
 */
export interface WorkerServices {
  skills: SkillService;
  catalog: CapabilityCatalog;
}

export interface WorkerInit {
  name: string;
  descriptor?: CapabilityDescriptor;
  services: WorkerServices;
  peers: PeerRequester;
  /** Free-form creation hints from the caller */
  hints: Record<string, unknown>;
  /** Echo diagnostic messages to the console */
  verbose: boolean;
}

export type WorkerFactory = (init: WorkerInit) => Worker;
