import type { Command } from "commander";
import { z } from "zod";
import type { AppConfig } from "../../core/config";
import { DestinationKindSchema } from "../../core/config";
import { createAppContext } from "../../app-context";
import { TerminalOperatorSignal } from "../../services/operator-signal";
import { logger } from "../../core/logger";

const CollectOptionsSchema = z.object({
  keyword: z.array(z.string().trim().min(1)).optional(),
  count: z.coerce.number().int().positive().optional(),
  headful: z.boolean().optional(),
  destination: DestinationKindSchema.optional(),
  minLikes: z.coerce.number().int().min(0).optional(),
});

export const commands = (program: Command, config: AppConfig) => {
  program
    .command("collect")
    .description("Collect the most-liked posts for one or more keywords")
    .option("-k, --keyword <keyword...>", "Keyword(s) to search (defaults to SEARCH_KEYWORDS)")
    .option("-n, --count <n>", "Posts to keep per keyword")
    .option("--headful", "Show the browser window")
    .option("-d, --destination <kind>", "Export destination: spreadsheet or file")
    .option("--min-likes <n>", "Only search posts with at least this many likes")
    .action(async (raw: unknown) => {
      const parsed = CollectOptionsSchema.safeParse(raw);
      if (!parsed.success) {
        logger.error({ issues: parsed.error.issues }, "Invalid options");
        process.exitCode = 1;
        return;
      }

      const options = parsed.data;
      const keywords = options.keyword?.length ? options.keyword : config.search.keywords;
      if (keywords.length === 0) {
        logger.error("No keywords given; pass --keyword or set SEARCH_KEYWORDS");
        process.exitCode = 1;
        return;
      }

      const controller = new AbortController();
      const abort = (signal: string) => {
        logger.warn({ signal }, "Interrupt received, stopping after cleanup");
        controller.abort();
      };
      process.once("SIGINT", () => abort("SIGINT"));
      process.once("SIGTERM", () => abort("SIGTERM"));

      const context = createAppContext(config);
      try {
        const coordinator = context.createCoordinator(new TerminalOperatorSignal());
        const result = await coordinator.run(
          {
            keywords,
            targetCount: options.count ?? config.search.targetCount,
            destination: options.destination ?? config.export.destination,
            headless: options.headful ? false : config.browser.headless,
            minLikes: options.minLikes ?? config.search.minLikes,
            trigger: "cli",
          },
          controller.signal
        );

        console.log(`\nRun ${result.runId}: ${result.status}`);
        if (result.error) {
          console.log(`  ✗ ${result.error.code}: ${result.error.message}`);
        }
        for (const keyword of result.keywords) {
          const icon = keyword.status === "success" ? "✓" : keyword.status === "partial" ? "◐" : "✗";
          const where = keyword.exported
            ? `${keyword.exported.kind}${keyword.usedFallback ? " (fallback)" : ""}: ${keyword.exported.location}`
            : "not exported";
          console.log(`  ${icon} "${keyword.keyword}" ${keyword.terminal ?? "-"}, ${keyword.results.length} posts, ${where}`);
          if (keyword.error) {
            console.log(`      ${keyword.error.code}: ${keyword.error.message}`);
          }
          for (const post of keyword.results) {
            const likes = post.likeConfidence === "confident" ? String(post.likeCount) : "?";
            console.log(`      #${post.rank} ${likes.padStart(7)}  ${post.postUrl}`);
          }
        }

        process.exitCode = result.status === "failed" ? 1 : 0;
      } finally {
        context.close();
      }
    });
};
