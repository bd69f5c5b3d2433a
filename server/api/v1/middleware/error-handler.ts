import type { Request, Response, NextFunction } from "express";
import { CollectionError } from "../../../collection/errors";
import { logError } from "../../../log";
import { errorBody } from "../types";

const STATUS_CODES: Record<number, string> = {
  400: "BAD_REQUEST",
  404: "NOT_FOUND",
  429: "RATE_LIMITED",
  500: "INTERNAL_ERROR",
  503: "SERVICE_UNAVAILABLE",
};

function statusOf(err: unknown): number {
  if (err instanceof CollectionError) return err.status;
  if (typeof err === "object" && err !== null) {
    if ("status" in err && typeof err.status === "number") return err.status;
    if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  }
  return 500;
}

export function v1ErrorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const status = statusOf(err);
  const code = err instanceof CollectionError ? err.code : STATUS_CODES[status] || "INTERNAL_ERROR";
  const message = err instanceof Error && err.message ? err.message : "Internal Server Error";

  if (status >= 500) {
    logError("v1 API error", "api", err);
  }

  res.status(status).json(errorBody(code, message));
}
