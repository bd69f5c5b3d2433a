import { Router } from "express";
import type { CollectionCoordinator } from "../../../collection/coordinator";
import { serializeGapSet } from "../../../collection/gap-analyzer";
import { envelope } from "../types";

export function createGapsRouter(coordinator: CollectionCoordinator): Router {
  const router = Router();

  // ?university=<raw name> narrows the result to one institution
  router.get("/", async (req, res, next) => {
    try {
      const raw = typeof req.query.university === "string" ? req.query.university : "";
      const only = raw.trim() ? coordinator.identity.resolve(raw).university.canonicalName : null;

      const { gapSet, warnings } = await coordinator.analyze();
      const serialized = serializeGapSet(gapSet);
      if (only !== null) {
        serialized.universities = serialized.universities.filter((u) => u.university === only);
        serialized.unstarted = serialized.unstarted.filter((name) => name === only);
        serialized.totalMissing = serialized.universities.reduce((sum, u) => sum + u.missingYears.length, 0);
      }

      res.json(envelope({ ...serialized, warnings: warnings.length }, serialized.universities.length));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
