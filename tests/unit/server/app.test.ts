import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import type { Server } from "http";
import { loadConfig } from "../../../src/core/config";
import type { DatabaseHandle } from "../../../src/db/client";
import type { RunsRepository } from "../../../src/db/repositories/runs.repo";
import type { CollectionRequest, CollectionResult } from "../../../src/orchestration/collection-coordinator";
import { rank } from "../../../src/orchestration/ranker";
import { createApp } from "../../../src/server/app";
import type { Collector } from "../../../src/server/routes/search.routes";
import { createTestDatabase } from "../../helpers/database";
import { makeRecord } from "../../helpers/records";

function successResult(request: CollectionRequest): CollectionResult {
  const results = rank([makeRecord("a", 5), makeRecord("b", 9)], request.targetCount);
  return {
    runId: 1,
    status: "success",
    error: null,
    keywords: [
      {
        keyword: request.keywords[0] ?? "",
        status: "success",
        terminal: "stagnant",
        results,
        rounds: 4,
        uniqueCount: 2,
        exported: null,
        usedFallback: false,
        error: null,
      },
    ],
  };
}

describe("HTTP app", () => {
  let database: DatabaseHandle;
  let runs: RunsRepository;
  let server: Server;
  let baseUrl: string;
  let run: Mock<(request: CollectionRequest) => Promise<CollectionResult>>;

  const start = async () => {
    const collector: Collector = { run };
    const app = createApp({ config: loadConfig({}), collector, runs });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("Server is not listening on a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  };

  const post = (body: unknown) =>
    fetch(`${baseUrl}/api/search`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body),
    });

  beforeEach(async () => {
    ({ database, runs } = createTestDatabase());
    run = vi.fn(async (request: CollectionRequest) => successResult(request));
    await start();
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    database.close();
  });

  describe("GET /health", () => {
    it("should report ok", async () => {
      const response = await fetch(`${baseUrl}/health`);
      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({ status: "ok" });
    });
  });

  describe("POST /api/search", () => {
    it("should parse keyword and count from a prompt", async () => {
      const response = await post({ prompt: "top 5 posts about Clawbot" });

      expect(response.status).toBe(200);
      expect(run).toHaveBeenCalledWith({
        keywords: ["Clawbot"],
        targetCount: 5,
        destination: "none",
        headless: true,
        minLikes: 0,
        trigger: "api",
      });

      const body: unknown = await response.json();
      expect(body).toMatchObject({ success: true, runId: 1, keyword: "Clawbot", count: 2, terminal: "stagnant" });
    });

    it("should use the configured destination when export is true", async () => {
      await post({ keyword: "moltbot", count: 3, export: true });

      expect(run).toHaveBeenCalledWith(
        expect.objectContaining({ keywords: ["moltbot"], targetCount: 3, destination: "spreadsheet" })
      );
    });

    it("should reject a request without a keyword", async () => {
      const response = await post({ prompt: "" });

      expect(response.status).toBe(400);
      expect(run).not.toHaveBeenCalled();
    });

    it("should reject a second search while one is running", async () => {
      let release: (() => void) | undefined;
      run.mockImplementationOnce(
        (request: CollectionRequest) =>
          new Promise<CollectionResult>((resolve) => {
            release = () => resolve(successResult(request));
          })
      );

      const first = post({ keyword: "Clawbot" });
      await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));

      const second = await post({ keyword: "Clawbot" });
      expect(second.status).toBe(409);

      release?.();
      expect((await first).status).toBe(200);
    });

    it("should answer 503 when the run could not start", async () => {
      run.mockResolvedValueOnce({
        runId: 7,
        status: "failed",
        keywords: [],
        error: { code: "INTERACTIVE_LOGIN_REQUIRED", message: "Run auth:login first" },
      });

      const response = await post({ keyword: "Clawbot" });

      expect(response.status).toBe(503);
      expect(await response.json()).toEqual({
        error: "Run auth:login first",
        code: "INTERACTIVE_LOGIN_REQUIRED",
        runId: 7,
        results: [],
      });
    });
  });

  describe("GET /api/runs", () => {
    it("should return 404 for an unknown run", async () => {
      const response = await fetch(`${baseUrl}/api/runs/99`);
      expect(response.status).toBe(404);
    });

    it("should return 400 for a non-numeric id", async () => {
      const response = await fetch(`${baseUrl}/api/runs/abc`);
      expect(response.status).toBe(400);
    });

    it("should return a recorded run with its keywords parsed", async () => {
      const recorded = await runs.createRun({
        trigger: "cli",
        keywordsJson: '["Clawbot","moltbot"]',
        targetCount: 10,
        destination: "file",
        startedAt: 1000,
        status: "running",
      });

      const response = await fetch(`${baseUrl}/api/runs/${recorded.id}`);

      expect(response.status).toBe(200);
      expect(await response.json()).toMatchObject({
        run: { id: recorded.id, keywords: ["Clawbot", "moltbot"], status: "running", destination: "file" },
      });
    });
  });
});
