import { describe, it, expect } from "vitest";
import { readFileSync } from "fs";
import { join } from "path";
import { XAdapter } from "../../src/platforms/x";
import { FeedCrawler } from "../../src/orchestration/feed-crawler";
import { rank } from "../../src/orchestration/ranker";
import { BLOCKED_PAGE, FakeAdapter, FakeDriver, TEST_CRAWL_SETTINGS, noDelay } from "../helpers/fakes";

const fixedNow = () => new Date("2026-01-01T12:00:00.000Z");

function crawlerFor(driver: FakeDriver, settings = TEST_CRAWL_SETTINGS, delay = noDelay) {
  return new FeedCrawler(driver, new FakeAdapter(), settings, { minLikes: 0, now: fixedNow, delay });
}

describe("FeedCrawler", () => {
  it("should stop as stagnant after repeated empty rounds and keep every record", async () => {
    const driver = new FakeDriver(["a:10,b:50,c:5,d:40", "e:100,f:1,g:20", "", "", ""]);

    const outcome = await crawlerFor(driver).crawl("Clawbot", 10);

    expect(outcome.terminal).toBe("stagnant");
    expect(outcome.records).toHaveLength(7);
    expect(outcome.uniqueCount).toBe(7);
    expect(outcome.rounds).toBe(5);
    expect(outcome.scrollAttempts).toBe(4);
    expect(outcome.stagnantRounds).toBe(3);

    const ranked = rank(outcome.records, 10);
    expect(ranked.map((r) => r.postId)).toEqual(["e", "b", "d", "g", "a", "c", "f"]);
    expect(ranked.map((r) => r.rank)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it("should open the search url once before the first round", async () => {
    const driver = new FakeDriver(["a:1"]);
    await crawlerFor(driver).crawl("Claw bot", 1);

    expect(driver.opened).toEqual(["https://x.com/search?q=Claw%20bot&min=0"]);
    expect(driver.calls.slice(0, 2)).toEqual(["open", "waitFor"]);
  });

  it("should stop once the target number of unique posts is seen", async () => {
    const driver = new FakeDriver(["a:1,b:2,c:3", "d:4"]);

    const outcome = await crawlerFor(driver).crawl("Clawbot", 3);

    expect(outcome.terminal).toBe("target_reached");
    expect(outcome.rounds).toBe(1);
    expect(outcome.scrollAttempts).toBe(0);
    expect(driver.calls).not.toContain("scroll");
  });

  it("should count only new ids towards progress on a cumulative feed", async () => {
    const settings = { ...TEST_CRAWL_SETTINGS, maxStagnantRounds: 2 };
    const driver = new FakeDriver(["a:1,b:2", "a:1,b:2,c:3"]);

    const outcome = await crawlerFor(driver, settings).crawl("Clawbot", 10);

    expect(outcome.terminal).toBe("stagnant");
    expect(outcome.rounds).toBe(4);
    expect(outcome.uniqueCount).toBe(3);
    expect(outcome.records).toHaveLength(11);
  });

  it("should end as blocked and keep what was collected before the block", async () => {
    const driver = new FakeDriver(["a:1,b:2", BLOCKED_PAGE]);

    const outcome = await crawlerFor(driver).crawl("Clawbot", 10);

    expect(outcome.terminal).toBe("blocked");
    expect(outcome.records.map((r) => r.postId)).toEqual(["a", "b"]);
    expect(outcome.blockReason).toBe('Feed blocked for "Clawbot": RATE_LIMITED:test block');
    expect(outcome.error).toBeNull();
  });

  it("should stop at the scroll round cap", async () => {
    const settings = { ...TEST_CRAWL_SETTINGS, maxScrollRounds: 2 };
    const driver = new FakeDriver(["a:1", "b:1", "c:1"]);

    const outcome = await crawlerFor(driver, settings).crawl("Clawbot", 10);

    expect(outcome.terminal).toBe("round_limit");
    expect(outcome.rounds).toBe(2);
    expect(outcome.scrollAttempts).toBe(1);
  });

  it("should treat a ready timeout as an empty round", async () => {
    const driver = new FakeDriver(["", "", ""], { timeoutOn: [0, 1, 2] });

    const outcome = await crawlerFor(driver).crawl("Clawbot", 10);

    expect(outcome.terminal).toBe("stagnant");
    expect(outcome.rounds).toBe(3);
    expect(outcome.records).toEqual([]);
  });

  it("should still extract when the ready wait times out on a rendered page", async () => {
    const driver = new FakeDriver(["a:5"], { timeoutOn: [0] });

    const outcome = await crawlerFor(driver).crawl("Clawbot", 1);

    expect(outcome.terminal).toBe("target_reached");
    expect(outcome.records.map((r) => r.postId)).toEqual(["a"]);
  });

  it("should not navigate when aborted before starting", async () => {
    const controller = new AbortController();
    controller.abort();
    const driver = new FakeDriver(["a:1"]);

    const outcome = await crawlerFor(driver).crawl("Clawbot", 10, controller.signal);

    expect(outcome.terminal).toBe("aborted");
    expect(outcome.rounds).toBe(0);
    expect(driver.opened).toEqual([]);
  });

  it("should stop between rounds when aborted mid-crawl", async () => {
    const controller = new AbortController();
    const driver = new FakeDriver(["a:1", "b:1", "c:1"]);
    const abortingDelay = async () => {
      controller.abort();
    };

    const outcome = await crawlerFor(driver, TEST_CRAWL_SETTINGS, abortingDelay).crawl(
      "Clawbot",
      10,
      controller.signal
    );

    expect(outcome.terminal).toBe("aborted");
    expect(outcome.records.map((r) => r.postId)).toEqual(["a"]);
    expect(driver.calls).not.toContain("scroll");
  });

  it("should report a driver failure with the partial records", async () => {
    const driver = new FakeDriver(["a:1,b:2"], { scrollError: new Error("page crashed") });

    const outcome = await crawlerFor(driver).crawl("Clawbot", 10);

    expect(outcome.terminal).toBe("failed");
    expect(outcome.records).toHaveLength(2);
    expect(outcome.error).toEqual({ code: "CRAWL_FAILED", message: "page crashed" });
  });

  it("should not treat a post that mentions a rate limit as a block", async () => {
    const html = readFileSync(join(__dirname, "../fixtures/search-tweet-articles.html"), "utf-8").replace(
      "Introducing Clawbot 2",
      "Got Too many requests from the API again."
    );
    const driver = new FakeDriver([html]);
    const crawler = new FeedCrawler(driver, new XAdapter(), TEST_CRAWL_SETTINGS, { minLikes: 0, now: fixedNow, delay: noDelay });

    const outcome = await crawler.crawl("rate limit", 3);

    expect(outcome.terminal).toBe("target_reached");
    expect(outcome.records).toHaveLength(3);
    expect(outcome.blockReason).toBeNull();
  });
});
