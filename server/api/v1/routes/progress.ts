import { Router } from "express";
import type { CollectionCoordinator } from "../../../collection/coordinator";
import { envelope, sendError } from "../types";

export function createProgressRouter(coordinator: CollectionCoordinator): Router {
  const router = Router();

  router.get("/latest", async (_req, res, next) => {
    try {
      const snapshot = await coordinator.tracker.loadLatest();
      if (!snapshot) {
        return sendError(res, 404, "NOT_FOUND", "No progress snapshot recorded yet");
      }
      res.json(envelope(snapshot));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
