/**
 * Echo worker: returns its `in` input as `out`.
 *
 * Counts its invocations, which makes instance reuse observable.
 */

import type { WorkerResult } from "@cacm-runtime/types";
import type { SharedContext } from "../execution/context/shared-context.js";
import { BaseWorker } from "../execution/workers/base-worker.js";
import type { StepInputs } from "../execution/workers/types.js";

export class EchoWorker extends BaseWorker {
  private invocations = 0;

  async run(task: string, inputs: StepInputs, _context: SharedContext): Promise<WorkerResult> {
    this.invocations += 1;
    const out = Object.hasOwn(inputs, "in") ? inputs.in : { ...inputs };
    return this.success({ out, invocations: this.invocations }, `Echoed inputs for '${task}'`);
  }

  get invocationCount(): number {
    return this.invocations;
  }
}
