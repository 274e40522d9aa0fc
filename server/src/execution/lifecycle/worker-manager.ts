/**
 * Worker Lifecycle Manager
 *
 * Resolves a worker name to a live instance, creating and caching it on
 * first use. Owns every worker it creates and is the only sanctioned path
 * for one worker to reach another.
 *
 * @module execution/lifecycle/worker-manager
 */

import { AsyncLocalStorage } from "async_hooks";
import type { CapabilityDescriptor, WorkerError, WorkerResult } from "@cacm-runtime/types";
import type { CapabilityCatalog } from "../catalog/capability-catalog.js";
import type { SharedContext } from "../context/shared-context.js";
import {
  DelegationCycleError,
  DelegationDepthError,
  WorkerConstructionError,
  WorkerExecutionError,
  type OrchestrationError,
} from "../errors.js";
import type { SkillService } from "../skills/skill-service.js";
import type { WorkerRegistry } from "../workers/worker-registry.js";
import type { PeerRequester, StepInputs, Worker } from "../workers/types.js";

export const DEFAULT_MAX_DELEGATION_DEPTH = 5;

export interface WorkerManagerOptions {
  registry: WorkerRegistry;
  catalog: CapabilityCatalog;
  skills: SkillService;
  /** Maximum number of delegation hops below a step's worker (default: 5) */
  maxDelegationDepth?: number;
  /** Log worker creation and pass the flag on to workers */
  verbose?: boolean;
}

export interface CreationContext {
  /** Descriptor to hand the worker; looked up by worker type when omitted */
  descriptor?: CapabilityDescriptor;
  hints?: Record<string, unknown>;
}

export type WorkerLookup =
  | { ok: true; worker: Worker; created: boolean }
  | { ok: false; error: WorkerConstructionError };

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorResult(error: OrchestrationError): WorkerError {
  return { status: "error", message: error.message, kind: error.kind };
}

export class WorkerManager implements PeerRequester {
  private readonly workers = new Map<string, Worker>();
  /** Names of the workers on the current asynchronous call path */
  private readonly activeChain = new AsyncLocalStorage<readonly string[]>();

  private readonly registry: WorkerRegistry;
  private readonly catalog: CapabilityCatalog;
  private readonly skills: SkillService;
  readonly maxDelegationDepth: number;
  private readonly verbose: boolean;

  constructor(options: WorkerManagerOptions) {
    this.registry = options.registry;
    this.catalog = options.catalog;
    this.skills = options.skills;
    this.maxDelegationDepth = options.maxDelegationDepth ?? DEFAULT_MAX_DELEGATION_DEPTH;
    this.verbose = options.verbose ?? false;
  }

  /**
   * Return the cached worker for `name`, or create it.
   *
   * Never throws: an unknown type or a factory exception yields an error
   * result, and nothing is cached.
   */
  getOrCreate(name: string, creation: CreationContext = {}): WorkerLookup {
    const cached = this.workers.get(name);
    if (cached) {
      return { ok: true, worker: cached, created: false };
    }

    if (!this.registry.has(name)) {
      return {
        ok: false,
        error: new WorkerConstructionError(name, "no worker type registered under this name"),
      };
    }

    let worker: Worker;
    try {
      worker = this.registry.create({
        name,
        descriptor: creation.descriptor ?? this.catalog.findByWorkerType(name),
        services: { skills: this.skills, catalog: this.catalog },
        peers: this,
        hints: creation.hints ?? {},
        verbose: this.verbose,
      });
    } catch (error) {
      console.error(`[WorkerManager] Failed to create worker '${name}':`, error);
      return {
        ok: false,
        error: new WorkerConstructionError(name, reasonOf(error), { cause: error }),
      };
    }

    this.workers.set(name, worker);
    if (this.verbose) {
      console.log(`[WorkerManager] Created worker '${name}'`);
    }
    return { ok: true, worker, created: true };
  }

  /**
   * Run a worker with delegation tracking rooted at it. Rejects with
   * whatever the worker throws; callers decide what that means.
   */
  execute(
    worker: Worker,
    task: string,
    inputs: StepInputs,
    context: SharedContext,
    descriptor?: CapabilityDescriptor
  ): Promise<WorkerResult> {
    return this.activeChain.run([worker.name], () => worker.run(task, inputs, context, descriptor));
  }

  /**
   * Get-or-create then execute. Construction and execution failures come
   * back as error results.
   */
  async invoke(
    name: string,
    task: string,
    inputs: StepInputs,
    context: SharedContext,
    creation: CreationContext = {}
  ): Promise<WorkerResult> {
    const lookup = this.getOrCreate(name, creation);
    if (!lookup.ok) {
      return errorResult(lookup.error);
    }
    try {
      return await this.execute(lookup.worker, task, inputs, context, creation.descriptor);
    } catch (error) {
      return errorResult(new WorkerExecutionError(name, reasonOf(error), { cause: error }));
    }
  }

  async delegate(
    caller: string,
    peer: string,
    task: string,
    inputs: StepInputs,
    context: SharedContext
  ): Promise<WorkerResult> {
    const chain = this.activeChain.getStore() ?? [caller];

    if (chain.includes(peer)) {
      const error = new DelegationCycleError([...chain], peer);
      console.warn(`[WorkerManager] ${error.message}`);
      return errorResult(error);
    }

    const next = [...chain, peer];
    if (next.length - 1 > this.maxDelegationDepth) {
      const error = new DelegationDepthError(next, this.maxDelegationDepth);
      console.warn(`[WorkerManager] ${error.message}`);
      return errorResult(error);
    }

    const lookup = this.getOrCreate(peer);
    if (!lookup.ok) {
      return errorResult(lookup.error);
    }

    try {
      return await this.activeChain.run(next, () => lookup.worker.run(task, inputs, context));
    } catch (error) {
      return errorResult(new WorkerExecutionError(peer, reasonOf(error), { cause: error }));
    }
  }

  has(name: string): boolean {
    return this.workers.has(name);
  }

  get size(): number {
    return this.workers.size;
  }

  /** Drop every cached worker; the next request creates fresh instances. */
  clear(): void {
    this.workers.clear();
  }
}
