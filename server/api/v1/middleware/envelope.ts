import type { Request, Response, NextFunction } from "express";

function isEnveloped(body: unknown): boolean {
  return typeof body === "object" && body !== null && ("error" in body || "data" in body);
}

/**
 * Wraps JSON responses in the standard envelope: { data, meta }.
 * Bodies that already carry `data` or `error` pass through unchanged.
 */
export function envelopeMiddleware(_req: Request, res: Response, next: NextFunction): void {
  const originalJson = res.json.bind(res);

  res.json = function (body?: unknown) {
    if (isEnveloped(body)) {
      return originalJson(body);
    }
    return originalJson({
      data: body,
      meta: {
        apiVersion: "v1" as const,
        timestamp: new Date().toISOString(),
      },
    });
  };

  next();
}
