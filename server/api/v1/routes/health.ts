import { Router } from "express";
import type { CollectionCoordinator } from "../../../collection/coordinator";
import { envelope } from "../types";

export function createHealthRouter(coordinator: CollectionCoordinator): Router {
  const router = Router();

  router.get("/health", async (_req, res, next) => {
    try {
      const stats = await coordinator.store.getStats();
      const { config } = coordinator;
      res.json(envelope({
        status: "ok",
        timestamp: new Date().toISOString(),
        referenceYear: config.referenceYear,
        window: {
          start: config.referenceYear - config.lookbackYears,
          end: config.referenceYear + config.lookaheadYears,
        },
        referenceUniversities: coordinator.identity.universities.length,
        counts: stats,
      }));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
