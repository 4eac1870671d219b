import { describe, it, expect } from "vitest";
import { loadConfig } from "../../src/core/config";
import { ConfigError } from "../../src/core/errors";

describe("loadConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const config = loadConfig({});

    expect(config.search).toEqual({ baseUrl: "https://x.com", keywords: [], targetCount: 10, minLikes: 0 });
    expect(config.export.destination).toBe("spreadsheet");
    expect(config.crawl).toEqual({
      maxStagnantRounds: 3,
      maxScrollRounds: 50,
      readyTimeoutMs: 15000,
      scrollSettleMs: 2000,
      actionDelay: { minMs: 600, maxMs: 1800 },
    });
    expect(config.browser.headless).toBe(true);
    expect(config.session.cookiesPath).toBe("./twitter_cookies.json");
  });

  it("should parse keyword lists and flags", () => {
    const config = loadConfig({
      SEARCH_KEYWORDS: "Clawbot, moltbot ,,",
      PLAYWRIGHT_HEADLESS: "FALSE",
      TARGET_COUNT: "25",
      EXPORT_DESTINATION: "file",
      SEARCH_BASE_URL: "https://x.com/",
    });

    expect(config.search.keywords).toEqual(["Clawbot", "moltbot"]);
    expect(config.browser.headless).toBe(false);
    expect(config.search.targetCount).toBe(25);
    expect(config.export.destination).toBe("file");
    expect(config.search.baseUrl).toBe("https://x.com");
  });

  it("should return a frozen object", () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it("should reject invalid values", () => {
    expect(() => loadConfig({ EXPORT_DESTINATION: "ftp" })).toThrow(ConfigError);
    expect(() => loadConfig({ TARGET_COUNT: "0" })).toThrow(ConfigError);
  });

  it("should reject an inverted delay range", () => {
    expect(() => loadConfig({ SCRAPER_ACTION_DELAY_MIN_MS: "500", SCRAPER_ACTION_DELAY_MAX_MS: "100" })).toThrow(
      "SCRAPER_ACTION_DELAY_MAX_MS must be >= SCRAPER_ACTION_DELAY_MIN_MS"
    );
  });
});
