import express from "express";
import { access } from "fs/promises";
import type { AppConfig } from "../core/config";
import type { RunsRepository } from "../db/repositories/runs.repo";
import { logger } from "../core/logger";
import { createRunsRoutes } from "./routes/runs.routes";
import { createSearchRoutes, type Collector } from "./routes/search.routes";

export interface AppDeps {
  config: AppConfig;
  collector: Collector;
  runs: RunsRepository;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export function createApp({ config, collector, runs }: AppDeps): express.Express {
  const app = express();
  const search = createSearchRoutes(config, collector);

  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: Math.floor(Date.now() / 1000) });
  });

  app.get("/api/status", async (_req, res, next) => {
    try {
      const [cookiesConfigured, sheetsConfigured] = await Promise.all([
        fileExists(config.session.cookiesPath),
        fileExists(config.export.credentialsPath),
      ]);
      res.json({
        cookiesConfigured,
        sheetsConfigured,
        destination: config.export.destination,
        busy: search.state.busy,
        message: cookiesConfigured ? "Ready" : "No session cookies; run auth:login first",
      });
    } catch (error) {
      next(error);
    }
  });

  app.use("/api/search", search.router);
  app.use("/api/runs", createRunsRoutes(runs));

  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      logger.error({ err: err.message, stack: err.stack }, "Unhandled error");
      res.status(500).json({ error: "Internal server error" });
    }
  );

  return app;
}
