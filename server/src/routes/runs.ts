import { Router, Request, Response } from "express";
import type { IWorkflowOrchestrator } from "../execution/workflow/orchestrator.js";
import type { RunHistoryStore } from "../services/run-history.js";

const MAX_LIST_LIMIT = 500;

export function createRunsRouter(
  orchestrator: IWorkflowOrchestrator,
  history: RunHistoryStore
): Router {
  const router = Router();

  /**
   * POST /api/runs
   * Runs a workflow instance and records the result.
   * Responds 422 when the instance fails validation.
   */
  router.post("/", async (req: Request, res: Response) => {
    try {
      const result = await orchestrator.run(req.body);
      const stored = history.save(result, result.context.cacmId);

      res.status(result.status === "invalid" ? 422 : 200).json({
        runId: stored.id,
        sessionId: result.sessionId,
        success: result.success,
        status: result.status,
        outputs: result.outputs,
        steps: result.steps,
        logs: result.logs,
      });
    } catch (error) {
      console.error("Failed to run workflow instance:", error);
      res.status(500).json({ error: "Failed to run workflow instance" });
    }
  });

  /**
   * GET /api/runs?cacmId=&limit=
   * Lists recorded runs, newest first
   */
  router.get("/", (req: Request, res: Response) => {
    const { cacmId, limit } = req.query;

    let parsedLimit: number | undefined;
    if (typeof limit === "string") {
      parsedLimit = Number(limit);
      if (!Number.isInteger(parsedLimit) || parsedLimit < 1 || parsedLimit > MAX_LIST_LIMIT) {
        res.status(400).json({ error: `limit must be an integer between 1 and ${MAX_LIST_LIMIT}` });
        return;
      }
    }

    try {
      const runs = history.list({
        cacmId: typeof cacmId === "string" ? cacmId : undefined,
        limit: parsedLimit,
      });
      res.status(200).json({ runs });
    } catch (error) {
      console.error("Failed to list runs:", error);
      res.status(500).json({ error: "Failed to list runs" });
    }
  });

  /**
   * GET /api/runs/:id
   */
  router.get("/:id", (req: Request, res: Response) => {
    try {
      const run = history.get(req.params.id);
      if (!run) {
        res.status(404).json({ error: `Run '${req.params.id}' not found` });
        return;
      }
      res.status(200).json({ run });
    } catch (error) {
      console.error("Failed to get run:", error);
      res.status(500).json({ error: "Failed to get run" });
    }
  });

  return router;
}
