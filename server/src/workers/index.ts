/**
 * Built-in worker types
 */

import type { WorkerRegistry } from "../execution/workers/worker-registry.js";
import { DataIngestionWorker } from "./data-ingestion-worker.js";
import { EchoWorker } from "./echo-worker.js";
import { FinancialAnalysisWorker } from "./financial-analysis-worker.js";
import { ReportGenerationWorker } from "./report-generation-worker.js";

export const BuiltinWorkerType = {
  ECHO: "echo",
  DATA_INGESTION: "data-ingestion",
  FINANCIAL_ANALYSIS: "financial-analysis",
  REPORT_GENERATION: "report-generation",
} as const;

export function registerBuiltinWorkers(registry: WorkerRegistry): WorkerRegistry {
  return registry
    .register(BuiltinWorkerType.ECHO, (init) => new EchoWorker(init))
    .register(BuiltinWorkerType.DATA_INGESTION, (init) => new DataIngestionWorker(init))
    .register(BuiltinWorkerType.FINANCIAL_ANALYSIS, (init) => new FinancialAnalysisWorker(init))
    .register(BuiltinWorkerType.REPORT_GENERATION, (init) => new ReportGenerationWorker(init));
}

export { EchoWorker, DataIngestionWorker, FinancialAnalysisWorker, ReportGenerationWorker };
export { ContextKeys } from "./context-keys.js";
export type { DeliveredResults } from "./report-generation-worker.js";
