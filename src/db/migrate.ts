import type Database from "better-sqlite3";
import { readFileSync, readdirSync, existsSync } from "fs";
import { join } from "path";
import { errorMessage } from "../core/errors";
import { logger } from "../core/logger";

export const MIGRATIONS_DIR = join(__dirname, "migrations");

const IDEMPOTENT_FAILURES = ["already exists", "duplicate column"];

export function runMigrations(sqlite: Database.Database, migrationsDir: string = MIGRATIONS_DIR): string[] {
  logger.info("Running database migrations...");

  if (!existsSync(migrationsDir)) {
    logger.info({ migrationsDir }, "No migrations directory found");
    return [];
  }

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS __drizzle_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      created_at INTEGER NOT NULL
    )
  `);

  const appliedMigrations = new Set<string>();
  const appliedRows = sqlite.prepare<[], { hash: string }>("SELECT hash FROM __drizzle_migrations").all();
  for (const row of appliedRows) {
    appliedMigrations.add(row.hash);
  }

  const files = readdirSync(migrationsDir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
  const applied: string[] = [];

  for (const file of files) {
    if (appliedMigrations.has(file)) {
      logger.debug({ file }, "Migration already applied, skipping");
      continue;
    }

    const content = readFileSync(join(migrationsDir, file), "utf-8");
    logger.info({ file }, "Applying migration...");

    const statements = content
      .split("--> statement-breakpoint")
      .map((s) => s.trim())
      .filter((s) => s.length > 0);

    const apply = sqlite.transaction(() => {
      for (const statement of statements) {
        try {
          sqlite.exec(statement);
        } catch (error) {
          const message = errorMessage(error);
          if (!IDEMPOTENT_FAILURES.some((fragment) => message.includes(fragment))) {
            logger.error({ err: error, statement: statement.substring(0, 200) }, "Statement failed");
            throw error;
          }
          logger.debug({ statement: statement.substring(0, 100) }, "Object already exists, continuing");
        }
      }
      sqlite.prepare("INSERT INTO __drizzle_migrations (hash, created_at) VALUES (?, ?)").run(file, Date.now());
    });
    apply();

    applied.push(file);
    logger.info({ file }, "Migration applied successfully");
  }

  logger.info({ applied: applied.length }, "All migrations completed");
  return applied;
}
