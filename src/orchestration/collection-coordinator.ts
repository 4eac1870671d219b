import { join } from "path";
import type { AppConfig, DestinationKind } from "../core/config";
import type {
  CollectionRunStatus,
  CrawlOutcome,
  CrawlTerminal,
  KeywordCrawlStatus,
  PipelinePhase,
  RankedPost,
} from "../domain/models";
import type { PlatformAdapter } from "../platforms/adapter";
import type { BrowserDriver, BrowserDriverFactory } from "../services/browser-driver";
import type { OperatorSignal } from "../services/operator-signal";
import type { SessionLoadResult } from "../services/session-store";
import type { RunsRepository } from "../db/repositories/runs.repo";
import type { ExportReceipt, ExportSink, ExportTarget } from "../export/sink";
import { withBrowserDriver } from "../services/browser-driver";
import { exportWithFallback, slugify } from "../export/sink";
import { worksheetTitle } from "../export/spreadsheet-sink";
import { enrichPosts } from "../enrich/content-analysis";
import { FeedCrawler, type FeedCrawlerOptions } from "./feed-crawler";
import { rank } from "./ranker";
import { applyCooldown } from "../core/cooldown";
import { InteractiveLoginRequiredError, errorCode, errorMessage } from "../core/errors";
import { logger } from "../core/logger";

export interface SessionSource {
  readonly path: string;
  load(): Promise<SessionLoadResult>;
}

export interface CollectionRequest {
  keywords: string[];
  targetCount: number;
  destination: DestinationKind | "none";
  headless: boolean;
  minLikes: number;
  trigger: "cli" | "api";
}

export interface KeywordResult {
  keyword: string;
  status: KeywordCrawlStatus;
  terminal: CrawlTerminal | null;
  results: RankedPost[];
  rounds: number;
  uniqueCount: number;
  exported: ExportReceipt | null;
  usedFallback: boolean;
  error: { code: string; message: string } | null;
}

export interface CollectionResult {
  runId: number;
  status: CollectionRunStatus;
  keywords: KeywordResult[];
  error: { code: string; message: string } | null;
}

export interface CollectionCoordinatorDeps {
  config: AppConfig;
  session: SessionSource;
  adapter: PlatformAdapter;
  launchDriver: BrowserDriverFactory;
  operator: OperatorSignal;
  sinks: { spreadsheet: ExportSink; file: ExportSink };
  runs: RunsRepository;
  cooldown?: (seconds: number) => Promise<void>;
  crawlerOptions?: Pick<FeedCrawlerOptions, "now" | "delay">;
}

const COMPLETE_TERMINALS: ReadonlySet<CrawlTerminal> = new Set(["target_reached", "stagnant", "round_limit"]);

/**
 * Runs the whole pipeline for a list of keywords on one browser session:
 * session load, optional operator login, then crawl, rank, enrich and
 * export for each keyword in turn. Every keyword is recorded in run history.
 */
export class CollectionCoordinator {
  private phase: PipelinePhase = "done";

  constructor(private deps: CollectionCoordinatorDeps) {}

  get currentPhase(): PipelinePhase {
    return this.phase;
  }

  async run(request: CollectionRequest, signal?: AbortSignal): Promise<CollectionResult> {
    const { runs } = this.deps;
    logger.info({ request }, "Starting collection run");

    const run = await runs.createRun({
      trigger: request.trigger,
      keywordsJson: JSON.stringify(request.keywords),
      targetCount: request.targetCount,
      destination: request.destination,
      startedAt: Math.floor(Date.now() / 1000),
      status: "running",
    });

    const result: CollectionResult = { runId: run.id, status: "success", keywords: [], error: null };

    try {
      this.setPhase("loading_session");
      const session = await this.deps.session.load();
      const needsLogin = session.status === "requires_interactive_login";
      if (needsLogin && !this.deps.operator.interactive) {
        throw new InteractiveLoginRequiredError(
          `No session cookies at ${this.deps.session.path}; run "top-posts auth:login" first`
        );
      }

      await withBrowserDriver(
        () => this.deps.launchDriver({ headless: needsLogin ? false : request.headless }),
        async (driver) => {
          if (session.status === "ready") {
            await driver.inject(session);
          } else {
            this.setPhase("awaiting_operator_login");
            await driver.open(this.deps.adapter.loginUrl);
            await this.deps.operator.waitForLogin(
              { loginUrl: this.deps.adapter.loginUrl, cookiesPath: this.deps.session.path },
              signal
            );
            logger.info("Operator confirmed login, continuing");
          }

          for (const [index, keyword] of request.keywords.entries()) {
            if (signal?.aborted) {
              logger.warn({ keyword }, "Run aborted, skipping remaining keywords");
              break;
            }

            result.keywords.push(await this.collectKeyword(run.id, driver, keyword, request, signal));

            if (index < request.keywords.length - 1 && !signal?.aborted) {
              await (this.deps.cooldown ?? applyCooldown)(this.deps.config.keywordCooldownSeconds);
            }
          }
        },
        signal
      );
    } catch (error) {
      result.error = { code: errorCode(error, "COLLECTION_FAILED"), message: errorMessage(error) };
      logger.error({ runId: run.id, err: error }, "Collection run failed");
    } finally {
      this.setPhase("done");
    }

    result.status = this.summarizeStatus(request, result, signal);
    await runs.finishRun(run.id, result.status, result.error ? `${result.error.code}: ${result.error.message}` : undefined);

    logger.info(
      {
        runId: run.id,
        status: result.status,
        keywords: result.keywords.map((k) => ({ keyword: k.keyword, status: k.status, count: k.results.length })),
      },
      "Collection run finished"
    );

    return result;
  }

  private async collectKeyword(
    runId: number,
    driver: BrowserDriver,
    keyword: string,
    request: CollectionRequest,
    signal?: AbortSignal
  ): Promise<KeywordResult> {
    const { config, adapter, runs } = this.deps;
    const crawlRecord = await runs.createKeywordCrawl({
      runId,
      keyword,
      status: "running",
      startedAt: Math.floor(Date.now() / 1000),
    });

    this.setPhase("crawling");
    const crawler = new FeedCrawler(driver, adapter, config.crawl, {
      minLikes: request.minLikes,
      ...this.deps.crawlerOptions,
    });
    const outcome = await crawler.crawl(keyword, request.targetCount, signal);

    const ranked = rank(outcome.records, request.targetCount);
    const results = config.enrich.summaries ? enrichPosts(ranked) : ranked;

    const keywordResult: KeywordResult = {
      keyword,
      status: "success",
      terminal: outcome.terminal,
      results,
      rounds: outcome.rounds,
      uniqueCount: outcome.uniqueCount,
      exported: null,
      usedFallback: false,
      error: this.crawlError(outcome),
    };

    // Partial records are exported too, whatever stopped the crawl.
    if (request.destination !== "none") {
      this.setPhase("exporting");
      try {
        const exported = await exportWithFallback(results, ...this.exportTargets(keyword, request.destination));
        keywordResult.exported = exported.receipt;
        keywordResult.usedFallback = exported.usedFallback;
      } catch (error) {
        keywordResult.error = { code: errorCode(error, "EXPORT_FAILED"), message: errorMessage(error) };
        logger.error({ keyword, err: error }, "Export failed");
      }
    }

    keywordResult.status = this.keywordStatus(outcome, keywordResult, request.destination !== "none");

    await runs.finishKeywordCrawl(crawlRecord.id, {
      status: keywordResult.status,
      terminal: outcome.terminal,
      rounds: outcome.rounds,
      uniqueFound: outcome.uniqueCount,
      exportedCount: keywordResult.exported ? results.length : 0,
      lowConfidenceCount: results.filter((post) => post.likeConfidence === "low").length,
      exportedTo: keywordResult.exported?.kind ?? null,
      exportLocation: keywordResult.exported?.location ?? null,
      errorCode: keywordResult.error?.code ?? null,
      errorDetail: keywordResult.error?.message ?? null,
    });

    return keywordResult;
  }

  private exportTargets(keyword: string, destination: DestinationKind): [ExportTarget, ExportTarget | null] {
    const { config, sinks } = this.deps;
    const fileTarget: ExportTarget = {
      sink: sinks.file,
      destination: { kind: "file", path: join(config.export.outputDir, `${slugify(keyword)}.json`) },
    };

    if (destination === "file") return [fileTarget, null];

    return [
      {
        sink: sinks.spreadsheet,
        destination: {
          kind: "spreadsheet",
          spreadsheetName: config.export.spreadsheetName,
          worksheetName: worksheetTitle(keyword),
        },
      },
      fileTarget,
    ];
  }

  private crawlError(outcome: CrawlOutcome): { code: string; message: string } | null {
    if (outcome.error) return outcome.error;
    if (outcome.terminal === "blocked") {
      return { code: "RATE_LIMITED_OR_BLOCKED", message: outcome.blockReason ?? "Feed blocked" };
    }
    if (outcome.terminal === "aborted") {
      return { code: "ABORTED", message: "Crawl aborted by operator" };
    }
    return null;
  }

  private keywordStatus(outcome: CrawlOutcome, result: KeywordResult, exportRequested: boolean): KeywordCrawlStatus {
    // Nothing was persisted, so the records are lost.
    if (exportRequested && result.exported === null) return "failed";
    if (COMPLETE_TERMINALS.has(outcome.terminal) && result.error === null) return "success";
    return result.results.length > 0 ? "partial" : "failed";
  }

  private summarizeStatus(request: CollectionRequest, result: CollectionResult, signal?: AbortSignal): CollectionRunStatus {
    const statuses = result.keywords.map((k) => k.status);
    if (statuses.length === 0) return "failed";

    const allProcessed = statuses.length === request.keywords.length && !signal?.aborted;
    if (allProcessed && result.error === null && statuses.every((s) => s === "success")) return "success";
    if (statuses.every((s) => s === "failed")) return "failed";
    return "partial";
  }

  private setPhase(next: PipelinePhase): void {
    if (this.phase === next) return;
    logger.debug({ from: this.phase, to: next }, "Pipeline phase");
    this.phase = next;
  }
}
