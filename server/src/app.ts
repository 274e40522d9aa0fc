import express, { Express, Request, Response } from "express";
import cors from "cors";
import type { CapabilityCatalog } from "./execution/catalog/capability-catalog.js";
import type { IWorkflowOrchestrator } from "./execution/workflow/orchestrator.js";
import type { InstanceValidator } from "./execution/workflow/types.js";
import { createCapabilitiesRouter } from "./routes/capabilities.js";
import { createRunsRouter } from "./routes/runs.js";
import { createValidationRouter } from "./routes/validation.js";
import type { RunHistoryStore } from "./services/run-history.js";

export interface AppDependencies {
  orchestrator: IWorkflowOrchestrator;
  catalog: CapabilityCatalog;
  validator: InstanceValidator;
  history: RunHistoryStore;
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "5mb" }));

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ status: "ok", capabilities: deps.catalog.size });
  });

  app.use("/api/capabilities", createCapabilitiesRouter(deps.catalog));
  app.use("/api/runs", createRunsRouter(deps.orchestrator, deps.history));
  app.use("/api/validate", createValidationRouter(deps.validator));

  return app;
}
