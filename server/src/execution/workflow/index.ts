/**
 * Workflow Layer Exports
 *
 * @module execution/workflow
 */

// Types
export type {
  InstanceValidator,
  OrchestratorOptions,
  RunOptions,
  ValidationOutcome,
} from "./types.js";
export type {
  OrchestratorEvent,
  OrchestratorEventListener,
  RunStartedEvent,
  StepStartedEvent,
  StepCompletedEvent,
  StepFailedEvent,
  StepSkippedEvent,
  RunCompletedEvent,
} from "./events.js";

// Interfaces
export type { IWorkflowOrchestrator } from "./orchestrator.js";

// Implementations
export { LinearOrchestrator } from "./linear-orchestrator.js";
export { OrchestratorEventEmitter, OrchestratorEventType } from "./events.js";
export { ExecutionLog, formatLogEntry } from "./execution-log.js";

// Utilities
export { generateId, deepFreeze, frozenCopy, withTimeout, TimeoutError } from "./utils.js";
