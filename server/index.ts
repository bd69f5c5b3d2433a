import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { createV1Router } from "./api/v1";
import { loadCollectionConfig } from "./collection/config";
import { createDefaultCoordinator } from "./collection/coordinator";
import { errorMessage } from "./collection/errors";
import { pool } from "./db";
import { log, logError } from "./log";
import { runMigrations } from "./migrate";

const app = express();
const httpServer = createServer(app);

app.use(express.json());

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson?: unknown) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        const snippet = JSON.stringify(capturedJsonResponse);
        logLine += ` :: ${snippet.length > 200 ? snippet.slice(0, 200) + "…" : snippet}`;
      }
      log(logLine);
    }
  });

  next();
});

(async () => {
  // Configuration and reference-table errors stop the server before it listens
  const config = loadCollectionConfig();
  const coordinator = createDefaultCoordinator(config);

  app.use("/api/v1", createV1Router(coordinator));

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    logError("Internal Server Error", "express", err);
    if (res.headersSent) {
      return next(err);
    }
    return res.status(500).json({ message: errorMessage(err) });
  });

  if (pool) {
    log("Running database migrations...");
    const applied = await runMigrations(pool);
    log(`Database migrations complete (${applied} applied)`);
  }

  const port = parseInt(process.env.PORT || "5000", 10);
  const host = process.env.HOST || "::";
  httpServer.listen({ port, host, ipv6Only: false }, () => {
    log(`serving on ${host}:${port}`);
    log(
      `tracking ${coordinator.identity.universities.length} universities, ` +
        `window ${config.referenceYear - config.lookbackYears}–${config.referenceYear + config.lookaheadYears}`,
    );
  });
})().catch((err) => {
  logError(`Startup failed: ${errorMessage(err)}`, "express", err);
  process.exit(1);
});
