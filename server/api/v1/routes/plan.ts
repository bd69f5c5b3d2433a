import { Router } from "express";
import { z } from "zod";
import type { CollectionCoordinator } from "../../../collection/coordinator";
import { formatFinancialYear } from "../../../collection/financial-year";
import { taskId, type SearchTask } from "../../../collection/query-planner";
import { envelope, sendError } from "../types";

const planQuerySchema = z.object({
  universities: z.coerce.number().int().min(0).max(50).optional(),
  years: z.coerce.number().int().min(0).max(20).optional(),
  bootstrap: z.coerce.number().int().min(0).max(50).optional(),
});

export function serializeTask(task: SearchTask) {
  return {
    id: taskId(task),
    kind: task.kind,
    university: task.university.canonicalName,
    year: task.year,
    yearLabel: task.year === null ? null : formatFinancialYear(task.year),
    query: task.query,
    scope: task.scope,
    domain: task.domain,
    priority: task.priority,
  };
}

export function createPlanRouter(coordinator: CollectionCoordinator): Router {
  const router = Router();

  // Preview only: nothing is dispatched or written
  router.get("/", async (req, res, next) => {
    const parsed = planQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return sendError(res, 400, "BAD_REQUEST", `${issue?.path.join(".") ?? "query"}: ${issue?.message ?? "invalid"}`);
    }
    try {
      const tasks = await coordinator.plan({
        universitiesPerBatch: parsed.data.universities,
        yearsPerUniversity: parsed.data.years,
        bootstrapPerBatch: parsed.data.bootstrap,
      });
      res.json(envelope(tasks.map(serializeTask), tasks.length));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
