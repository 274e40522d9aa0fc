/**
 * @cacm-runtime/server public API
 */

// Orchestration core
export * from "./execution/errors.js";
export { CapabilityCatalog } from "./execution/catalog/capability-catalog.js";
export { SharedContext, type SharedContextOptions } from "./execution/context/shared-context.js";
export {
  parseBinding,
  isReference,
  formatReference,
  type Binding,
  type Literal,
  type Reference,
} from "./execution/binding/reference.js";
export {
  MISSING,
  isMissing,
  createScope,
  resolveBinding,
  writeBinding,
  type BindingScope,
  type Missing,
  type Resolution,
  type WriteResult,
} from "./execution/binding/resolver.js";
export {
  WorkerManager,
  DEFAULT_MAX_DELEGATION_DEPTH,
  type CreationContext,
  type WorkerLookup,
  type WorkerManagerOptions,
} from "./execution/lifecycle/worker-manager.js";
export { BaseWorker } from "./execution/workers/base-worker.js";
export { WorkerRegistry, WorkerNotRegisteredError } from "./execution/workers/worker-registry.js";
export type {
  PeerRequester,
  StepInputs,
  Worker,
  WorkerFactory,
  WorkerInit,
  WorkerServices,
} from "./execution/workers/types.js";
export * from "./execution/workflow/index.js";
export { SchemaValidator, WorkflowInstanceSchema, checkInstanceRules } from "./execution/validation/schema-validator.js";
export {
  NativeSkillService,
  SkillNotFoundError,
  type SkillArguments,
  type SkillDescriptor,
  type SkillFunction,
  type SkillService,
} from "./execution/skills/skill-service.js";
export {
  createNativeSkillService,
  calculateRatio,
  simpleScorer,
  calculateBasicRatios,
  BASIC_CALCULATIONS,
  FINANCIAL_ANALYSIS,
  type RatioReport,
} from "./execution/skills/native-skills.js";

// Built-in workers
export * from "./workers/index.js";

// Assembly, persistence and HTTP
export { createEngine, type CreateEngineOptions, type Engine } from "./engine.js";
export { loadEngineConfig, DEFAULT_CONFIG, DEFAULT_CATALOG_PATH, type EngineConfig } from "./config.js";
export { initDatabase, closeDatabase, type DatabaseConfig } from "./services/db.js";
export { RunHistoryStore, type StoredRun, type ListRunsOptions } from "./services/run-history.js";
export { createApp, type AppDependencies } from "./app.js";
