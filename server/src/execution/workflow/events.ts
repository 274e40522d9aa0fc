/**
 * Orchestrator Event Emitter
 *
 * Typed lifecycle events for a run. Uses a set of listeners rather than
 * Node's EventEmitter; a listener that throws is logged and skipped.
 *
 * @module execution/workflow/events
 */

import type { ErrorKind, RunStatus, WorkerStatus } from "@cacm-runtime/types";

export type OrchestratorEvent =
  | RunStartedEvent
  | StepStartedEvent
  | StepCompletedEvent
  | StepFailedEvent
  | StepSkippedEvent
  | RunCompletedEvent;

export const OrchestratorEventType = {
  RUN_STARTED: "run_started",
  STEP_STARTED: "step_started",
  STEP_COMPLETED: "step_completed",
  STEP_FAILED: "step_failed",
  STEP_SKIPPED: "step_skipped",
  RUN_COMPLETED: "run_completed",
} as const;

export interface RunStartedEvent {
  type: "run_started";
  sessionId: string;
  cacmId: string;
  stepCount: number;
  timestamp: number;
}

export interface StepStartedEvent {
  type: "step_started";
  sessionId: string;
  stepId: string;
  capabilityRef: string;
  timestamp: number;
}

export interface StepCompletedEvent {
  type: "step_completed";
  sessionId: string;
  stepId: string;
  status: Exclude<WorkerStatus, "error">;
  warnings: string[];
  timestamp: number;
}

export interface StepFailedEvent {
  type: "step_failed";
  sessionId: string;
  stepId: string;
  errorKind: ErrorKind;
  error: string;
  timestamp: number;
}

export interface StepSkippedEvent {
  type: "step_skipped";
  sessionId: string;
  stepId: string;
  reason: string;
  timestamp: number;
}

export interface RunCompletedEvent {
  type: "run_completed";
  sessionId: string;
  cacmId: string;
  status: RunStatus;
  success: boolean;
  timestamp: number;
}

export type OrchestratorEventListener = (event: OrchestratorEvent) => void;

export class OrchestratorEventEmitter {
  private listeners = new Set<OrchestratorEventListener>();

  /**
   * Subscribe to events.
   *
   * @returns Unsubscribe function
   */
  on(listener: OrchestratorEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  off(listener: OrchestratorEventListener): void {
    this.listeners.delete(listener);
  }

  emit(event: OrchestratorEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error("[Orchestrator] Error in event listener:", error);
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }
}
