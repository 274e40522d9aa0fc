/**
 * Core entity types for cacm-runtime
 */

export * from "./capabilities.js";
export * from "./workers.js";

/**
 * A declared workflow input. `value` carries the bound data; the other
 * fields describe it.
 */
export interface InstanceInput {
  type: string;
  value?: unknown;
  description?: string;
  [extra: string]: unknown;
}

/**
 * A declared workflow output. Steps bind into it via `cacm.outputs.<name>`.
 */
export interface InstanceOutput {
  type: string;
  description?: string;
  optional?: boolean;
  [extra: string]: unknown;
}

export interface WorkflowStep {
  stepId: string;
  description: string;
  /** Catalog key of the capability that runs this step */
  computeCapabilityRef: string;
  /** Step input name -> reference string or literal value */
  inputBindings: Record<string, unknown>;
  /** Worker payload field -> target reference (`cacm.outputs.*` or `intermediate.*`) */
  outputBindings: Record<string, string>;
  /** When true, a failure of this step aborts the remaining steps */
  required?: boolean;
}

export interface WorkflowInstance {
  cacmId: string;
  name: string;
  version?: string;
  description?: string;
  metadata?: Record<string, unknown>;
  inputs: Record<string, InstanceInput>;
  outputs: Record<string, InstanceOutput>;
  workflow: WorkflowStep[];
}

export type BindingNamespace = "cacm.inputs" | "cacm.outputs" | "intermediate";

// =============================================================================
// Validation
// =============================================================================

export interface ValidationIssue {
  /** Dotted path into the instance document, e.g. "workflow.0.stepId" */
  path: string;
  message: string;
}

export interface ValidationReport {
  isValid: boolean;
  errors: ValidationIssue[];
}

// =============================================================================
// Execution log
// =============================================================================

export type LogLevel = "INFO" | "WARN" | "ERROR";

export interface LogEntry {
  level: LogLevel;
  source: string;
  message: string;
  timestamp: string;
  stepId?: string;
}

// =============================================================================
// Run results
// =============================================================================

export type ErrorKind =
  | "ValidationError"
  | "CatalogLoadError"
  | "CapabilityNotFound"
  | "WorkerConstructionError"
  | "UnresolvedBinding"
  | "MissingOutputField"
  | "WorkerExecutionError"
  | "WorkerTimeout"
  | "DelegationCycle"
  | "DelegationDepth";

export type StepState =
  | "pending"
  | "resolving_inputs"
  | "dispatched"
  | "captured"
  | "failed"
  | "skipped";

export interface StepRecord {
  stepId: string;
  capabilityRef: string;
  state: StepState;
  errorKind?: ErrorKind;
  error?: string;
  warnings: string[];
  durationMs: number;
}

export type RunStatus = "completed" | "partial_failure" | "invalid" | "aborted";

export interface SharedContextSnapshot {
  sessionId: string;
  cacmId: string;
  documentReferences: Record<string, string>;
  knowledgeBaseReferences: string[];
  globalParameters: Record<string, unknown>;
  dataStore: Record<string, unknown>;
}

export interface RunResult {
  success: boolean;
  status: RunStatus;
  logs: LogEntry[];
  outputs: Record<string, unknown>;
  steps: StepRecord[];
  sessionId: string;
  context: SharedContextSnapshot;
}
