/**
 * Worker result types
 *
 * Partial failure is data, not an exception: a worker reports what it
 * produced and the orchestrator decides what that means for the step.
 */

import type { ErrorKind } from "./index.js";

export type WorkerPayload = Record<string, unknown>;

export interface WorkerSuccess {
  status: "success";
  message?: string;
  payload: WorkerPayload;
}

export interface WorkerPartial {
  status: "partial";
  message?: string;
  payload: WorkerPayload;
  warnings: string[];
}

export interface WorkerError {
  status: "error";
  message: string;
  payload?: WorkerPayload;
  /** Set when the failure came from the runtime rather than the worker */
  kind?: ErrorKind;
}

export type WorkerResult = WorkerSuccess | WorkerPartial | WorkerError;

export type WorkerStatus = WorkerResult["status"];
