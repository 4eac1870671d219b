import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";

export const collectionRuns = sqliteTable("collection_runs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  trigger: text("trigger", { enum: ["cli", "api"] }).notNull(),
  keywordsJson: text("keywords_json").notNull(),
  targetCount: integer("target_count").notNull(),
  destination: text("destination", { enum: ["spreadsheet", "file", "none"] }).notNull(),
  startedAt: integer("started_at").notNull(),
  endedAt: integer("ended_at"),
  status: text("status", { enum: ["running", "success", "partial", "failed"] }).notNull().default("running"),
  notes: text("notes"),
});

export const keywordCrawls = sqliteTable(
  "keyword_crawls",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    runId: integer("run_id").notNull().references(() => collectionRuns.id),
    keyword: text("keyword").notNull(),
    status: text("status", { enum: ["running", "success", "partial", "failed"] }).notNull().default("running"),
    terminal: text("terminal", {
      enum: ["stagnant", "target_reached", "blocked", "aborted", "round_limit", "failed"],
    }),
    rounds: integer("rounds").notNull().default(0),
    uniqueFound: integer("unique_found").notNull().default(0),
    exportedCount: integer("exported_count").notNull().default(0),
    lowConfidenceCount: integer("low_confidence_count").notNull().default(0),
    exportedTo: text("exported_to", { enum: ["spreadsheet", "file"] }),
    exportLocation: text("export_location"),
    errorCode: text("error_code"),
    errorDetail: text("error_detail"),
    startedAt: integer("started_at").notNull(),
    endedAt: integer("ended_at"),
  },
  (table) => ({
    runIdx: index("keyword_crawls_run_idx").on(table.runId),
  })
);

export type CollectionRun = typeof collectionRuns.$inferSelect;
export type NewCollectionRun = typeof collectionRuns.$inferInsert;
export type KeywordCrawl = typeof keywordCrawls.$inferSelect;
export type NewKeywordCrawl = typeof keywordCrawls.$inferInsert;
