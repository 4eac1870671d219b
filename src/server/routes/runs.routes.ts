import { Router } from "express";
import type { RunsRepository } from "../../db/repositories/runs.repo";
import type { CollectionRun } from "../../db/schema";

function toRunView(run: CollectionRun) {
  const { keywordsJson, ...rest } = run;
  let keywords: unknown = [];
  try {
    keywords = JSON.parse(keywordsJson);
  } catch {
    keywords = [];
  }
  return { ...rest, keywords: Array.isArray(keywords) ? keywords : [] };
}

export function createRunsRoutes(runs: RunsRepository): Router {
  const router = Router();

  router.get("/", async (req, res, next) => {
    try {
      const limit = Number.parseInt(String(req.query.limit ?? "20"), 10);
      const recent = await runs.listRecent(Number.isNaN(limit) || limit <= 0 ? 20 : Math.min(limit, 200));
      res.json({ runs: recent.map(toRunView) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id/keywords", async (req, res, next) => {
    try {
      const id = Number.parseInt(req.params.id, 10);
      if (Number.isNaN(id)) {
        res.status(400).json({ error: "Run id must be a number" });
        return;
      }

      const run = await runs.findById(id);
      if (!run) {
        res.status(404).json({ error: "Run not found" });
        return;
      }

      const keywords = await runs.findKeywordCrawlsByRunId(id);
      res.json({ run: toRunView(run), keywords });
    } catch (error) {
      next(error);
    }
  });

  router.get("/:id", async (req, res, next) => {
    try {
      const id = Number.parseInt(req.params.id, 10);
      if (Number.isNaN(id)) {
        res.status(400).json({ error: "Run id must be a number" });
        return;
      }

      const run = await runs.findById(id);
      if (!run) {
        res.status(404).json({ error: "Run not found" });
        return;
      }
      res.json({ run: toRunView(run) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
