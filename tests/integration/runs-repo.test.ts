import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { DatabaseHandle } from "../../src/db/client";
import { runMigrations } from "../../src/db/migrate";
import type { RunsRepository } from "../../src/db/repositories/runs.repo";
import { createTestDatabase } from "../helpers/database";

describe("Run history persistence", () => {
  let database: DatabaseHandle;
  let runs: RunsRepository;

  beforeEach(() => {
    ({ database, runs } = createTestDatabase());
  });

  afterEach(() => {
    database.close();
  });

  it("should not reapply migrations", () => {
    expect(runMigrations(database.sqlite)).toEqual([]);
  });

  it("should create and retrieve collection runs", async () => {
    const run = await runs.createRun({
      trigger: "cli",
      keywordsJson: JSON.stringify(["Clawbot"]),
      targetCount: 10,
      destination: "file",
      startedAt: 1000,
      status: "running",
    });

    expect(run.id).toBeGreaterThan(0);
    expect(run.status).toBe("running");
    expect(run.endedAt).toBeNull();

    await runs.finishRun(run.id, "partial", "RATE_LIMITED_OR_BLOCKED: blocked");
    const finished = await runs.findById(run.id);

    expect(finished?.status).toBe("partial");
    expect(finished?.notes).toBe("RATE_LIMITED_OR_BLOCKED: blocked");
    expect(finished?.endedAt).not.toBeNull();
  });

  it("should list the most recent runs first", async () => {
    for (const startedAt of [100, 300, 200]) {
      await runs.createRun({
        trigger: "api",
        keywordsJson: "[]",
        targetCount: 5,
        destination: "none",
        startedAt,
      });
    }

    const recent = await runs.listRecent(2);
    expect(recent.map((r) => r.startedAt)).toEqual([300, 200]);
  });

  it("should record keyword crawl outcomes per run", async () => {
    const run = await runs.createRun({
      trigger: "cli",
      keywordsJson: JSON.stringify(["a", "b"]),
      targetCount: 10,
      destination: "spreadsheet",
      startedAt: 1000,
    });

    const first = await runs.createKeywordCrawl({ runId: run.id, keyword: "a", startedAt: 1000 });
    await runs.createKeywordCrawl({ runId: run.id, keyword: "b", startedAt: 1001 });

    await runs.finishKeywordCrawl(first.id, {
      status: "success",
      terminal: "stagnant",
      rounds: 5,
      uniqueFound: 7,
      exportedCount: 7,
      lowConfidenceCount: 1,
      exportedTo: "file",
      exportLocation: "output/a.json",
    });

    const crawls = await runs.findKeywordCrawlsByRunId(run.id);
    expect(crawls.map((c) => [c.keyword, c.status])).toEqual([
      ["a", "success"],
      ["b", "running"],
    ]);
    expect(crawls[0]).toMatchObject({
      terminal: "stagnant",
      rounds: 5,
      uniqueFound: 7,
      exportedCount: 7,
      lowConfidenceCount: 1,
      exportedTo: "file",
      exportLocation: "output/a.json",
      errorCode: null,
    });
    expect(crawls[0]?.endedAt).not.toBeNull();
  });
});
