import { Router, Request, Response } from "express";
import type { CapabilityCatalog } from "../execution/catalog/capability-catalog.js";

export function createCapabilitiesRouter(catalog: CapabilityCatalog): Router {
  const router = Router();

  /**
   * GET /api/capabilities
   * Returns every capability in the loaded catalog
   */
  router.get("/", (_req: Request, res: Response) => {
    try {
      res.status(200).json({
        capabilities: catalog.list(),
        loadErrors: catalog.loadErrors.map((error) => error.message),
      });
    } catch (error) {
      console.error("Failed to list capabilities:", error);
      res.status(500).json({ error: "Failed to retrieve capabilities" });
    }
  });

  /**
   * GET /api/capabilities/:id
   */
  router.get("/:id", (req: Request, res: Response) => {
    const capability = catalog.lookup(req.params.id);
    if (!capability) {
      res.status(404).json({ error: `Capability '${req.params.id}' not found` });
      return;
    }
    res.status(200).json({ capability });
  });

  return router;
}
