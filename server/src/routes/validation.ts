import { Router, Request, Response } from "express";
import type { InstanceValidator } from "../execution/workflow/types.js";

export function createValidationRouter(validator: InstanceValidator): Router {
  const router = Router();

  /**
   * POST /api/validate
   * Validates a workflow instance document without running it
   */
  router.post("/", (req: Request, res: Response) => {
    try {
      const { isValid, errors } = validator.validate(req.body);
      res.status(200).json({ isValid, errors });
    } catch (error) {
      console.error("Failed to validate instance:", error);
      res.status(500).json({ error: "Failed to validate instance" });
    }
  });

  return router;
}
