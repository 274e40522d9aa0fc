/**
 * Base class for built-in workers
 *
 * @module execution/workers/base-worker
 */

import type {
  CapabilityDescriptor,
  WorkerError,
  WorkerPartial,
  WorkerPayload,
  WorkerResult,
  WorkerSuccess,
} from "@cacm-runtime/types";
import type { SharedContext } from "../context/shared-context.js";
import type {
  PeerRequester,
  StepInputs,
  Worker,
  WorkerInit,
  WorkerServices,
} from "./types.js";

export abstract class BaseWorker implements Worker {
  readonly name: string;
  readonly toleratesMissingInputs: boolean = false;

  protected readonly descriptor?: CapabilityDescriptor;
  protected readonly services: WorkerServices;
  protected readonly hints: Record<string, unknown>;
  private readonly peers: PeerRequester;
  private readonly verbose: boolean;

  constructor(init: WorkerInit) {
    this.name = init.name;
    this.descriptor = init.descriptor;
    this.services = init.services;
    this.hints = init.hints;
    this.peers = init.peers;
    this.verbose = init.verbose;
  }

  abstract run(
    task: string,
    inputs: StepInputs,
    context: SharedContext,
    descriptor?: CapabilityDescriptor
  ): Promise<WorkerResult>;

  /** The descriptor of the current call, else the one the worker was built with */
  protected capability(descriptor?: CapabilityDescriptor): CapabilityDescriptor | undefined {
    return descriptor ?? this.descriptor;
  }

  /**
   * Hand work to a peer through the manager. Cycles and depth overflows come
   * back as error results.
   */
  protected delegate(
    peer: string,
    task: string,
    inputs: StepInputs,
    context: SharedContext
  ): Promise<WorkerResult> {
    return this.peers.delegate(this.name, peer, task, inputs, context);
  }

  protected success(payload: WorkerPayload, message?: string): WorkerSuccess {
    return { status: "success", message, payload };
  }

  protected partial(payload: WorkerPayload, warnings: string[], message?: string): WorkerPartial {
    return { status: "partial", message, payload, warnings };
  }

  protected failure(message: string, payload?: WorkerPayload): WorkerError {
    return { status: "error", message, payload };
  }

  protected log(message: string): void {
    if (this.verbose) {
      console.log(`[${this.name}] ${message}`);
    }
  }
}
