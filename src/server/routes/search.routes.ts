import { Router } from "express";
import { z } from "zod";
import type { AppConfig } from "../../core/config";
import { DestinationKindSchema } from "../../core/config";
import type { CollectionRequest, CollectionResult } from "../../orchestration/collection-coordinator";
import { extractCount, extractKeyword } from "../prompt";
import { logger } from "../../core/logger";

export interface Collector {
  run(request: CollectionRequest, signal?: AbortSignal): Promise<CollectionResult>;
}

const SearchBodySchema = z.object({
  keyword: z.string().trim().optional(),
  prompt: z.string().optional(),
  count: z.coerce.number().int().min(1).max(200).optional(),
  export: z.union([z.boolean(), DestinationKindSchema]).optional(),
});

export interface SearchRoutesState {
  readonly busy: boolean;
}

export function createSearchRoutes(config: AppConfig, collector: Collector): { router: Router; state: SearchRoutesState } {
  const router = Router();
  let busy = false;

  router.post("/", async (req, res, next) => {
    const parsed = SearchBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid request body", issues: parsed.error.issues, results: [] });
      return;
    }

    const body = parsed.data;
    const prompt = body.prompt ?? "";
    const keyword = body.keyword || extractKeyword(prompt);
    const count = body.count ?? extractCount(prompt, config.search.targetCount);

    if (!keyword) {
      res.status(400).json({ error: "Could not extract keyword from prompt. Please include a keyword.", results: [] });
      return;
    }

    // One browser session at a time.
    if (busy) {
      res.status(409).json({ error: "A collection is already running", results: [] });
      return;
    }

    const destination = body.export === true ? config.export.destination : body.export || "none";

    busy = true;
    try {
      logger.info({ keyword, count, destination }, "Search requested");
      const result = await collector.run({
        keywords: [keyword],
        targetCount: count,
        destination,
        headless: true,
        minLikes: config.search.minLikes,
        trigger: "api",
      });

      if (result.error) {
        res.status(503).json({ error: result.error.message, code: result.error.code, runId: result.runId, results: [] });
        return;
      }

      const outcome = result.keywords[0];
      const results = outcome?.results ?? [];
      res.json({
        success: result.status !== "failed",
        runId: result.runId,
        status: result.status,
        keyword,
        count: results.length,
        terminal: outcome?.terminal ?? null,
        exported: outcome?.exported ?? null,
        usedFallback: outcome?.usedFallback ?? false,
        error: outcome?.error ?? null,
        results,
        ...(results.length === 0 ? { message: `No posts found for "${keyword}"` } : {}),
      });
    } catch (error) {
      next(error);
    } finally {
      busy = false;
    }
  });

  return {
    router,
    state: {
      get busy() {
        return busy;
      },
    },
  };
}
