import type { CrawlSettings, DelayRange } from "../core/config";
import type { CrawlOutcome, CrawlPhase, CrawlState, CrawlTerminal, PostRecord } from "../domain/models";
import type { PlatformAdapter } from "../platforms/adapter";
import type { BrowserDriver } from "../services/browser-driver";
import { validateTransition } from "../domain/crawl-state-machine";
import { DriverTimeoutError, RateLimitedOrBlockedError, errorCode, errorMessage } from "../core/errors";
import { actionDelay } from "../core/cooldown";
import { logger } from "../core/logger";

export interface FeedCrawlerOptions {
  minLikes: number;
  now?: () => Date;
  delay?: (range: DelayRange) => Promise<void>;
}

/**
 * Drives one keyword search to a terminal state: wait for posts, extract,
 * scroll, repeat. Every extracted record is returned in round order;
 * duplicates across rounds are left for the ranker.
 */
export class FeedCrawler {
  private readonly now: () => Date;
  private readonly delay: (range: DelayRange) => Promise<void>;

  constructor(
    private driver: BrowserDriver,
    private adapter: PlatformAdapter,
    private settings: CrawlSettings,
    private options: FeedCrawlerOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.delay = options.delay ?? actionDelay;
  }

  async crawl(keyword: string, targetCount: number, signal?: AbortSignal): Promise<CrawlOutcome> {
    const state: CrawlState = {
      keyword,
      targetCount,
      seenIds: new Set(),
      scrollAttempts: 0,
      stagnantRounds: 0,
      phase: "init",
    };
    const records: PostRecord[] = [];
    let rounds = 0;
    let terminal: CrawlTerminal | null = null;
    let blockReason: string | null = null;
    let failure: { code: string; message: string } | null = null;

    const moveTo = (next: CrawlPhase) => {
      validateTransition(state.phase, next);
      state.phase = next;
    };

    const url = this.adapter.buildSearchUrl(keyword, { minLikes: this.options.minLikes });
    logger.info({ keyword, url, targetCount }, "Starting feed crawl");

    try {
      if (!signal?.aborted) {
        await this.driver.open(url);
      }

      while (terminal === null) {
        if (signal?.aborted) {
          moveTo("aborted");
          terminal = "aborted";
          break;
        }

        moveTo("loading");
        await this.waitForPosts(keyword, rounds);

        const html = await this.driver.currentHtml();
        const block = this.adapter.detectBlock(this.driver.currentUrl(), html);
        if (block.isBlocked) {
          throw new RateLimitedOrBlockedError(`Feed blocked for "${keyword}": ${block.reason ?? "unknown"}`);
        }

        moveTo("extracting");
        const extracted = this.adapter.extract(html, { keyword, capturedAt: this.now().toISOString() });
        let newCount = 0;
        for (const record of extracted) {
          records.push(record);
          if (!state.seenIds.has(record.postId)) {
            state.seenIds.add(record.postId);
            newCount++;
          }
        }

        rounds++;
        state.stagnantRounds = newCount === 0 ? state.stagnantRounds + 1 : 0;

        logger.debug(
          { keyword, round: rounds, extracted: extracted.length, newCount, unique: state.seenIds.size },
          "Crawl round complete"
        );

        if (state.seenIds.size >= targetCount) {
          moveTo("target_reached");
          terminal = "target_reached";
        } else if (state.stagnantRounds >= this.settings.maxStagnantRounds) {
          moveTo("stagnant");
          terminal = "stagnant";
        } else if (rounds >= this.settings.maxScrollRounds) {
          moveTo("more_available");
          terminal = "round_limit";
        } else {
          moveTo("more_available");
          await this.delay(this.settings.actionDelay);
          if (signal?.aborted) continue;
          await this.driver.scrollToBottom();
          state.scrollAttempts++;
        }
      }
    } catch (error) {
      if (signal?.aborted) {
        moveTo("aborted");
        terminal = "aborted";
      } else if (error instanceof RateLimitedOrBlockedError) {
        blockReason = error.message;
        moveTo("blocked");
        terminal = "blocked";
        logger.warn({ keyword, reason: blockReason }, "Crawl stopped by block or rate limit");
      } else {
        failure = { code: errorCode(error, "CRAWL_FAILED"), message: errorMessage(error) };
        moveTo("failed");
        terminal = "failed";
        logger.error({ keyword, err: error }, "Crawl failed, keeping partial records");
      }
    }

    moveTo("done");

    logger.info(
      { keyword, terminal, rounds, scrollAttempts: state.scrollAttempts, unique: state.seenIds.size },
      "Feed crawl finished"
    );

    return {
      keyword,
      terminal,
      records,
      rounds,
      scrollAttempts: state.scrollAttempts,
      stagnantRounds: state.stagnantRounds,
      uniqueCount: state.seenIds.size,
      blockReason,
      error: failure,
    };
  }

  // A timed-out wait is an empty round, not a failure; the page may still render late.
  private async waitForPosts(keyword: string, round: number): Promise<void> {
    try {
      await this.driver.waitFor(this.adapter.feedReadySelector, this.settings.readyTimeoutMs);
    } catch (error) {
      if (!(error instanceof DriverTimeoutError)) throw error;
      logger.debug({ keyword, round }, "No posts rendered before timeout");
    }
  }
}
