import type { Command } from "commander";
import type { AppConfig } from "../../core/config";
import { openDatabase } from "../../db/client";
import { runMigrations } from "../../db/migrate";
import { logger } from "../../core/logger";

export const commands = (program: Command, config: AppConfig) => {
  const dbCmd = program.command("db");

  dbCmd
    .command("migrate")
    .description("Run database migrations")
    .action(() => {
      const database = openDatabase(config.databasePath);
      try {
        const applied = runMigrations(database.sqlite);
        logger.info({ path: config.databasePath, applied }, "Database schema is up to date");
      } finally {
        database.close();
      }
    });
};
