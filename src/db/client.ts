import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { logger } from "../core/logger";

export type AppDatabase = BetterSQLite3Database;

export interface DatabaseHandle {
  db: AppDatabase;
  sqlite: Database.Database;
  close(): void;
}

/** Opens a SQLite file, or an in-memory database for `":memory:"`. */
export function openDatabase(path: string): DatabaseHandle {
  if (path !== ":memory:") {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma("foreign_keys = ON");
  const db = drizzle(sqlite);
  logger.debug({ path }, "Database connected");

  return {
    db,
    sqlite,
    close() {
      sqlite.close();
      logger.debug({ path }, "Database connection closed");
    },
  };
}
