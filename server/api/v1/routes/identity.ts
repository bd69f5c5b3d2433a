import { Router } from "express";
import type { CollectionCoordinator } from "../../../collection/coordinator";
import { envelope, sendError } from "../types";

export function createIdentityRouter(coordinator: CollectionCoordinator): Router {
  const router = Router();

  router.get("/", (req, res, next) => {
    const name = typeof req.query.name === "string" ? req.query.name.trim() : "";
    if (!name) {
      return sendError(res, 400, "BAD_REQUEST", "Query parameter 'name' is required");
    }
    try {
      const match = coordinator.identity.resolve(name);
      res.json(envelope({
        input: name,
        canonicalName: match.university.canonicalName,
        key: match.university.key,
        matchedBy: match.matchedBy,
        confidence: match.confidence,
        domain: match.university.domain,
        country: match.university.country,
      }));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
