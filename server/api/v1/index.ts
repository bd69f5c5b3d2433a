import { Router } from "express";
import type { CollectionCoordinator } from "../../collection/coordinator";
import { v1Cors } from "./middleware/cors";
import { createGeneralLimiter, createPlanLimiter } from "./middleware/rate-limit";
import { envelopeMiddleware } from "./middleware/envelope";
import { v1ErrorHandler } from "./middleware/error-handler";

import { createHealthRouter } from "./routes/health";
import { createGapsRouter } from "./routes/gaps";
import { createPlanRouter } from "./routes/plan";
import { createIdentityRouter } from "./routes/identity";
import { createProgressRouter } from "./routes/progress";

export function createV1Router(coordinator: CollectionCoordinator): Router {
  const router = Router();

  // Global middleware for all v1 routes
  router.use(v1Cors);
  router.use(createGeneralLimiter());
  router.use(envelopeMiddleware);

  router.use("/", createHealthRouter(coordinator));
  router.use("/gaps", createGapsRouter(coordinator));
  router.use("/plan", createPlanLimiter(), createPlanRouter(coordinator));
  router.use("/identity", createIdentityRouter(coordinator));
  router.use("/progress", createProgressRouter(coordinator));

  // Error handler (must be last)
  router.use(v1ErrorHandler);

  return router;
}
