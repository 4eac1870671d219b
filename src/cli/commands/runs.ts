import type { Command } from "commander";
import type { AppConfig } from "../../core/config";
import { openDatabase } from "../../db/client";
import { runMigrations } from "../../db/migrate";
import { RunsRepository } from "../../db/repositories/runs.repo";
import { logger } from "../../core/logger";

const STATUS_ICONS: Record<string, string> = { success: "✓", partial: "◐", failed: "✗", running: "○" };

export const commands = (program: Command, config: AppConfig) => {
  const runsCmd = program.command("runs");

  runsCmd
    .command("list")
    .option("--limit <n>", "Number of runs to show", "20")
    .action(async (options: { limit: string }) => {
      const database = openDatabase(config.databasePath);
      try {
        runMigrations(database.sqlite);
        const runsRepo = new RunsRepository(database.db);
        const runs = await runsRepo.listRecent(parseInt(options.limit, 10) || 20);

        logger.info({ count: runs.length }, "Recent collection runs");

        for (const run of runs) {
          console.log(
            `  [${run.id}] ${run.trigger} - ${run.status} - ${new Date(run.startedAt * 1000).toISOString()} - ${run.keywordsJson}`
          );
        }
      } finally {
        database.close();
      }
    });

  runsCmd
    .command("show")
    .requiredOption("--id <id>", "Run ID")
    .action(async (options: { id: string }) => {
      const id = parseInt(options.id, 10);
      const database = openDatabase(config.databasePath);
      try {
        runMigrations(database.sqlite);
        const runsRepo = new RunsRepository(database.db);
        const run = await runsRepo.findById(id);
        if (!run) {
          logger.error({ id }, "Run not found");
          process.exitCode = 1;
          return;
        }

        console.log(`  [${run.id}] ${run.trigger} - ${run.status} - target ${run.targetCount} - ${run.destination}`);
        if (run.notes) console.log(`    ${run.notes}`);

        for (const crawl of await runsRepo.findKeywordCrawlsByRunId(id)) {
          const icon = STATUS_ICONS[crawl.status] ?? "?";
          console.log(
            `    ${icon} "${crawl.keyword}": ${crawl.terminal ?? "-"} after ${crawl.rounds} rounds, ` +
              `${crawl.uniqueFound} found, ${crawl.exportedCount} exported to ${crawl.exportedTo ?? "nowhere"}` +
              (crawl.lowConfidenceCount > 0 ? ` (${crawl.lowConfidenceCount} with unknown likes)` : "")
          );
          if (crawl.errorCode) console.log(`      ${crawl.errorCode}: ${crawl.errorDetail ?? ""}`);
        }
      } finally {
        database.close();
      }
    });
};
