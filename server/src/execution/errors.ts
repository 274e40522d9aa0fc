/**
 * Orchestration error taxonomy
 *
 * Step-local errors are normally carried as data (tagged results, step
 * records); these classes give them a stable `kind` and the context fields
 * callers need to report them.
 *
 * @module execution/errors
 */

import type { ErrorKind, ValidationIssue } from "@cacm-runtime/types";

export abstract class OrchestrationError extends Error {
  abstract readonly kind: ErrorKind;
}

/**
 * Thrown (or reported) when a workflow instance fails validation.
 */
export class ValidationError extends OrchestrationError {
  readonly kind = "ValidationError";
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const first = issues[0];
    super(
      first
        ? `Validation failed at ${first.path || "<root>"}: ${first.message}`
        : "Validation failed"
    );
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class CatalogLoadError extends OrchestrationError {
  readonly kind = "CatalogLoadError";
  readonly source: string;

  constructor(source: string, reason: string) {
    super(`Failed to load capability catalog from ${source}: ${reason}`);
    this.name = "CatalogLoadError";
    this.source = source;
  }
}

export class CapabilityNotFoundError extends OrchestrationError {
  readonly kind = "CapabilityNotFound";
  readonly capabilityRef: string;

  constructor(capabilityRef: string) {
    super(`Capability '${capabilityRef}' not found in catalog`);
    this.name = "CapabilityNotFoundError";
    this.capabilityRef = capabilityRef;
  }
}

export class WorkerConstructionError extends OrchestrationError {
  readonly kind = "WorkerConstructionError";
  readonly workerName: string;

  constructor(workerName: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not create worker '${workerName}': ${reason}`, options);
    this.name = "WorkerConstructionError";
    this.workerName = workerName;
  }
}

/**
 * A reference whose path could not be walked to a value.
 */
export class UnresolvedBindingError extends OrchestrationError {
  readonly kind = "UnresolvedBinding";
  readonly reference: string;
  /** Segment at which the walk stopped; undefined for malformed references */
  readonly segment?: string;

  constructor(reference: string, reason: string, segment?: string) {
    super(`Unresolved binding '${reference}': ${reason}`);
    this.name = "UnresolvedBindingError";
    this.reference = reference;
    this.segment = segment;
  }
}

export class MissingOutputFieldError extends OrchestrationError {
  readonly kind = "MissingOutputField";
  readonly field: string;
  readonly target: string;

  constructor(field: string, target: string) {
    super(`Result has no field '${field}' for output binding '${target}'`);
    this.name = "MissingOutputFieldError";
    this.field = field;
    this.target = target;
  }
}

export class WorkerExecutionError extends OrchestrationError {
  readonly kind = "WorkerExecutionError";
  readonly workerName: string;

  constructor(workerName: string, message: string, options?: { cause?: unknown }) {
    super(`Worker '${workerName}' failed: ${message}`, options);
    this.name = "WorkerExecutionError";
    this.workerName = workerName;
  }
}

export class WorkerTimeoutError extends OrchestrationError {
  readonly kind = "WorkerTimeout";
  readonly workerName: string;
  readonly timeoutMs: number;

  constructor(workerName: string, timeoutMs: number) {
    super(`Worker '${workerName}' did not finish within ${timeoutMs}ms`);
    this.name = "WorkerTimeoutError";
    this.workerName = workerName;
    this.timeoutMs = timeoutMs;
  }
}

export class DelegationCycleError extends OrchestrationError {
  readonly kind = "DelegationCycle";
  readonly chain: string[];

  constructor(chain: string[], peer: string) {
    super(`Delegation cycle: ${[...chain, peer].join(" -> ")}`);
    this.name = "DelegationCycleError";
    this.chain = chain;
  }
}

export class DelegationDepthError extends OrchestrationError {
  readonly kind = "DelegationDepth";
  readonly chain: string[];
  readonly maxDepth: number;

  constructor(chain: string[], maxDepth: number) {
    super(
      `Delegation depth ${chain.length - 1} exceeds limit of ${maxDepth} (${chain.join(" -> ")})`
    );
    this.name = "DelegationDepthError";
    this.chain = chain;
    this.maxDepth = maxDepth;
  }
}
