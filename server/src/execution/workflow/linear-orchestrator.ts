/**
 * Linear Workflow Orchestrator Implementation
 *
 * Validates a workflow instance, then executes its steps one at a time in
 * declared order: resolve input bindings, dispatch to the capability's
 * worker, capture the result into output bindings.
 *
 * @module execution/workflow/linear-orchestrator
 */

import type {
  RunResult,
  RunStatus,
  StepRecord,
  WorkerResult,
  WorkflowInstance,
  WorkflowStep,
} from "@cacm-runtime/types";
import { createScope, MISSING, resolveBinding, writeBinding, type BindingScope } from "../binding/resolver.js";
import type { CapabilityCatalog } from "../catalog/capability-catalog.js";
import { SharedContext } from "../context/shared-context.js";
import {
  CapabilityNotFoundError,
  UnresolvedBindingError,
  MissingOutputFieldError,
  WorkerExecutionError,
  WorkerTimeoutError,
  type OrchestrationError,
} from "../errors.js";
import { WorkerManager } from "../lifecycle/worker-manager.js";
import type { StepInputs } from "../workers/types.js";
import {
  OrchestratorEventEmitter,
  OrchestratorEventType,
  type OrchestratorEvent,
  type OrchestratorEventListener,
} from "./events.js";
import { ExecutionLog } from "./execution-log.js";
import type { IWorkflowOrchestrator } from "./orchestrator.js";
import type { InstanceValidator, OrchestratorOptions, RunOptions, ValidationOutcome } from "./types.js";
import { errorMessage, frozenCopy, TimeoutError, withTimeout } from "./utils.js";

const SOURCE = "Orchestrator";

/** Distributive Omit, so each event keeps its own fields */
type EventInit<E> = E extends OrchestratorEvent ? Omit<E, "timestamp" | "sessionId"> : never;

/**
 * Per-run state threaded through step execution
 */
interface RunState {
  instance: WorkflowInstance;
  scope: BindingScope;
  context: SharedContext;
  log: ExecutionLog;
  /** Output target -> id of the step that last wrote it */
  writers: Map<string, string>;
  timeoutMs: number;
}

function cacmIdOf(document: unknown): string {
  if (typeof document === "object" && document !== null && "cacmId" in document) {
    const { cacmId } = document;
    if (typeof cacmId === "string" && cacmId !== "") {
      return cacmId;
    }
  }
  return "unknown";
}

/**
 * LinearOrchestrator - Sequential workflow execution
 *
 * Worker instances are cached for the lifetime of the orchestrator, so
 * state a worker keeps is visible to later steps and later runs.
 */
export class LinearOrchestrator implements IWorkflowOrchestrator {
  private readonly catalog: CapabilityCatalog;
  private readonly validator: InstanceValidator;
  private readonly manager: WorkerManager;
  private readonly events = new OrchestratorEventEmitter();
  private readonly stepTimeoutMs: number;
  private readonly verbose: boolean;

  constructor(options: OrchestratorOptions) {
    this.catalog = options.catalog;
    this.validator = options.validator;
    this.stepTimeoutMs = options.stepTimeoutMs ?? 0;
    this.verbose = options.verbose ?? false;
    this.manager = new WorkerManager({
      registry: options.registry,
      catalog: options.catalog,
      skills: options.skills,
      maxDelegationDepth: options.maxDelegationDepth,
      verbose: this.verbose,
    });
  }

  /** The lifecycle manager owning this orchestrator's workers */
  get workers(): WorkerManager {
    return this.manager;
  }

  on(listener: OrchestratorEventListener): () => void {
    return this.events.on(listener);
  }

  validate(document: unknown): ValidationOutcome {
    return this.validator.validate(document);
  }

  async run(document: unknown, options: RunOptions = {}): Promise<RunResult> {
    const log = new ExecutionLog(this.verbose);
    const outcome = this.validator.validate(document);
    const context =
      options.context ??
      new SharedContext(outcome.isValid ? outcome.instance.cacmId : cacmIdOf(document), {
        sessionId: options.sessionId,
        verbose: this.verbose,
      });

    if (!outcome.isValid) {
      log.error(SOURCE, "CACM instance is invalid.");
      for (const issue of outcome.errors) {
        log.error(SOURCE, `Validation error at ${issue.path || "<root>"}: ${issue.message}`);
      }
      return this.finish(context, log, "invalid", {}, []);
    }

    log.info(SOURCE, "CACM instance is valid.");
    const instance = frozenCopy(outcome.instance);

    for (const [key, value] of Object.entries(options.globalParameters ?? {})) {
      context.setGlobalParameter(key, value);
    }
    for (const [docType, uri] of Object.entries(options.documentReferences ?? {})) {
      context.addDocumentReference(docType, uri);
    }

    const state: RunState = {
      instance,
      scope: createScope(instance),
      context,
      log,
      writers: new Map(),
      timeoutMs: options.stepTimeoutMs ?? this.stepTimeoutMs,
    };

    log.info(
      SOURCE,
      `Starting '${instance.name}' (${instance.workflow.length} steps, session ${context.sessionId})`
    );
    this.emit(context, {
      type: OrchestratorEventType.RUN_STARTED,
      cacmId: instance.cacmId,
      stepCount: instance.workflow.length,
    });

    const records: StepRecord[] = [];
    let abortedBy: string | undefined;

    for (const step of instance.workflow) {
      if (abortedBy !== undefined) {
        records.push(this.skipStep(step, state, `required step '${abortedBy}' failed`));
        continue;
      }

      const record = await this.executeStep(step, state);
      records.push(record);

      if (record.state === "failed" && step.required) {
        abortedBy = step.stepId;
        log.error(SOURCE, `Required step '${step.stepId}' failed; skipping remaining steps`, step.stepId);
      }
    }

    let status: RunStatus = "completed";
    if (abortedBy !== undefined) {
      status = "aborted";
    } else if (records.some((r) => r.state === "failed")) {
      status = "partial_failure";
    }

    return this.finish(context, log, status, state.scope.outputs, records, instance.cacmId);
  }

  private async executeStep(step: WorkflowStep, state: RunState): Promise<StepRecord> {
    const { log, context } = state;
    const startedAt = Date.now();
    const record: StepRecord = {
      stepId: step.stepId,
      capabilityRef: step.computeCapabilityRef,
      state: "pending",
      warnings: [],
      durationMs: 0,
    };

    const fail = (error: OrchestrationError): StepRecord => {
      record.state = "failed";
      record.errorKind = error.kind;
      record.error = error.message;
      record.durationMs = Date.now() - startedAt;
      log.error(SOURCE, `Step '${step.stepId}' failed: ${error.message}`, step.stepId);
      this.emit(context, {
        type: OrchestratorEventType.STEP_FAILED,
        stepId: step.stepId,
        errorKind: error.kind,
        error: error.message,
      });
      return record;
    };

    log.info(SOURCE, `--- Executing Step '${step.stepId}': ${step.description} ---`, step.stepId);
    this.emit(context, {
      type: OrchestratorEventType.STEP_STARTED,
      stepId: step.stepId,
      capabilityRef: step.computeCapabilityRef,
    });

    // Inputs
    record.state = "resolving_inputs";
    const inputs: StepInputs = {};
    const unresolved: UnresolvedBindingError[] = [];
    for (const [name, bound] of Object.entries(step.inputBindings)) {
      const resolution = resolveBinding(bound, state.scope);
      if (resolution.ok) {
        inputs[name] = resolution.value;
      } else {
        unresolved.push(resolution.error);
        inputs[name] = MISSING;
        log.warn(SOURCE, `Input '${name}': ${resolution.error.message}`, step.stepId);
      }
    }

    // Worker
    const descriptor = this.catalog.lookup(step.computeCapabilityRef);
    if (!descriptor) {
      return fail(new CapabilityNotFoundError(step.computeCapabilityRef));
    }
    const lookup = this.manager.getOrCreate(descriptor.workerType, { descriptor });
    if (!lookup.ok) {
      return fail(lookup.error);
    }
    const worker = lookup.worker;

    if (unresolved.length > 0) {
      if (!worker.toleratesMissingInputs) {
        return fail(unresolved[0]);
      }
      log.warn(
        SOURCE,
        `Dispatching with ${unresolved.length} missing input(s); worker '${worker.name}' accepts them`,
        step.stepId
      );
    }

    // Dispatch
    record.state = "dispatched";
    log.info(
      SOURCE,
      `Dispatching to worker '${worker.name}'${lookup.created ? " (new instance)" : ""}`,
      step.stepId
    );

    let result: WorkerResult;
    try {
      result = await withTimeout(
        this.manager.execute(worker, step.description, inputs, context, descriptor),
        state.timeoutMs
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        return fail(new WorkerTimeoutError(worker.name, error.timeoutMs));
      }
      return fail(new WorkerExecutionError(worker.name, errorMessage(error), { cause: error }));
    }

    if (result.status === "error") {
      return fail(new WorkerExecutionError(worker.name, result.message));
    }

    if (result.status === "partial") {
      record.warnings = [...result.warnings];
      for (const warning of result.warnings) {
        log.warn(SOURCE, `Worker '${worker.name}' reported: ${warning}`, step.stepId);
      }
    }

    // Outputs
    const captureErrors: OrchestrationError[] = [];
    for (const [field, target] of Object.entries(step.outputBindings)) {
      const value = Object.hasOwn(result.payload, field) ? result.payload[field] : undefined;
      if (value === undefined) {
        const error = new MissingOutputFieldError(field, target);
        captureErrors.push(error);
        log.warn(SOURCE, error.message, step.stepId);
        continue;
      }

      const write = writeBinding(target, value, state.scope);
      if (!write.ok) {
        captureErrors.push(write.error);
        log.warn(SOURCE, write.error.message, step.stepId);
        continue;
      }
      if (write.overwritten) {
        const previous = state.writers.get(target) ?? "an earlier step";
        log.warn(
          SOURCE,
          `Output '${target}' written by '${previous}' is overwritten by '${step.stepId}'`,
          step.stepId
        );
      }
      state.writers.set(target, step.stepId);
      log.info(SOURCE, `Bound '${field}' -> '${target}'`, step.stepId);
    }

    if (captureErrors.length > 0) {
      return fail(captureErrors[0]);
    }

    record.state = "captured";
    record.durationMs = Date.now() - startedAt;
    log.info(
      SOURCE,
      `Step '${step.stepId}' completed${result.status === "partial" ? " with warnings" : ""}`,
      step.stepId
    );
    this.emit(context, {
      type: OrchestratorEventType.STEP_COMPLETED,
      stepId: step.stepId,
      status: result.status,
      warnings: record.warnings,
    });
    return record;
  }

  private skipStep(step: WorkflowStep, state: RunState, reason: string): StepRecord {
    state.log.warn(SOURCE, `Skipping step '${step.stepId}': ${reason}`, step.stepId);
    this.emit(state.context, { type: OrchestratorEventType.STEP_SKIPPED, stepId: step.stepId, reason });
    return {
      stepId: step.stepId,
      capabilityRef: step.computeCapabilityRef,
      state: "skipped",
      warnings: [],
      durationMs: 0,
    };
  }

  private finish(
    context: SharedContext,
    log: ExecutionLog,
    status: RunStatus,
    outputs: Record<string, unknown>,
    steps: StepRecord[],
    cacmId = context.cacmId
  ): RunResult {
    const success = status === "completed";
    const message = `Run finished with status '${status}'`;
    if (success) log.info(SOURCE, message);
    else log.error(SOURCE, message);

    this.emit(context, { type: OrchestratorEventType.RUN_COMPLETED, cacmId, status, success });
    return {
      success,
      status,
      logs: log.toArray(),
      outputs,
      steps,
      sessionId: context.sessionId,
      context: context.toJSON(),
    };
  }

  private emit(context: SharedContext, event: EventInit<OrchestratorEvent>): void {
    this.events.emit({ ...event, sessionId: context.sessionId, timestamp: Date.now() });
  }
}
