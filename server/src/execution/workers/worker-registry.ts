/**
 * Worker Registry
 *
 * Maps a worker type to the factory that builds it. Built-in types are
 * registered at process start; embedders may add their own.
 *
 * @module execution/workers/worker-registry
 */

import type { Worker, WorkerFactory, WorkerInit } from "./types.js";

export class WorkerNotRegisteredError extends Error {
  readonly workerType: string;

  constructor(workerType: string) {
    super(`No worker type '${workerType}' is registered`);
    this.name = "WorkerNotRegisteredError";
    this.workerType = workerType;
  }
}

export class WorkerRegistry {
  private readonly factories = new Map<string, WorkerFactory>();

  register(workerType: string, factory: WorkerFactory): this {
    if (this.factories.has(workerType)) {
      console.warn(`[WorkerRegistry] Replacing factory for worker type '${workerType}'`);
    }
    this.factories.set(workerType, factory);
    return this;
  }

  has(workerType: string): boolean {
    return this.factories.has(workerType);
  }

  types(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * @throws {WorkerNotRegisteredError} When no factory exists for `init.name`
   */
  create(init: WorkerInit): Worker {
    const factory = this.factories.get(init.name);
    if (!factory) {
      throw new WorkerNotRegisteredError(init.name);
    }
    return factory(init);
  }
}
