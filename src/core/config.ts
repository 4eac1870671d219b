import { z } from "zod";
import { ConfigError } from "./errors";

const booleanFlag = (fallback: "true" | "false") =>
  z.string().default(fallback).transform((v) => v.trim().toLowerCase() === "true");

const keywordList = z
  .string()
  .default("")
  .transform((v) =>
    v
      .split(",")
      .map((keyword) => keyword.trim())
      .filter((keyword) => keyword.length > 0)
  );

export const DestinationKindSchema = z.enum(["spreadsheet", "file"]);
export type DestinationKind = z.infer<typeof DestinationKindSchema>;

const envSchema = z.object({
  COOKIES_PATH: z.string().default("./twitter_cookies.json"),
  PLAYWRIGHT_HEADLESS: booleanFlag("true"),
  PLAYWRIGHT_SLOW_MO: z.coerce.number().int().min(0).default(0),
  SEARCH_BASE_URL: z.string().url().default("https://x.com"),
  SEARCH_KEYWORDS: keywordList,
  TARGET_COUNT: z.coerce.number().int().positive().default(10),
  MIN_LIKES: z.coerce.number().int().min(0).default(0),
  EXPORT_DESTINATION: DestinationKindSchema.default("spreadsheet"),
  SPREADSHEET_NAME: z.string().default("Top Posts"),
  GOOGLE_CREDENTIALS_PATH: z.string().default("./credentials.json"),
  OUTPUT_DIR: z.string().default("./output"),
  DATABASE_PATH: z.string().default("./data/app.db"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal"]).default("info"),
  LOG_PRETTY: booleanFlag("true"),
  SCRAPER_MAX_STAGNANT_ROUNDS: z.coerce.number().int().positive().default(3),
  SCRAPER_MAX_SCROLL_ROUNDS: z.coerce.number().int().positive().default(50),
  SCRAPER_READY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  SCRAPER_NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SCRAPER_SCROLL_SETTLE_MS: z.coerce.number().int().min(0).default(2000),
  SCRAPER_ACTION_DELAY_MIN_MS: z.coerce.number().int().min(0).default(600),
  SCRAPER_ACTION_DELAY_MAX_MS: z.coerce.number().int().min(0).default(1800),
  SCRAPER_KEYWORD_COOLDOWN_SECONDS: z.coerce.number().min(0).default(5),
  SUMMARY_ENABLED: booleanFlag("true"),
  API_HOST: z.string().default("127.0.0.1"),
  API_PORT: z.coerce.number().int().positive().default(3000),
});

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface CrawlSettings {
  maxStagnantRounds: number;
  maxScrollRounds: number;
  readyTimeoutMs: number;
  scrollSettleMs: number;
  actionDelay: DelayRange;
}

export interface AppConfig {
  session: {
    cookiesPath: string;
  };
  browser: {
    headless: boolean;
    slowMo: number;
    navigationTimeoutMs: number;
  };
  search: {
    baseUrl: string;
    keywords: string[];
    targetCount: number;
    minLikes: number;
  };
  crawl: CrawlSettings;
  export: {
    destination: DestinationKind;
    spreadsheetName: string;
    credentialsPath: string;
    outputDir: string;
  };
  enrich: {
    summaries: boolean;
  };
  keywordCooldownSeconds: number;
  databasePath: string;
  log: {
    level: string;
    pretty: boolean;
  };
  api: {
    host: string;
    port: number;
  };
}

/**
 * Builds the immutable run configuration. Called once at process start;
 * components receive the resulting object instead of reading the environment.
 */
export function loadConfig(source: Record<string, string | undefined>): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const env = parsed.data;
  if (env.SCRAPER_ACTION_DELAY_MAX_MS < env.SCRAPER_ACTION_DELAY_MIN_MS) {
    throw new ConfigError("SCRAPER_ACTION_DELAY_MAX_MS must be >= SCRAPER_ACTION_DELAY_MIN_MS");
  }

  const config: AppConfig = {
    session: { cookiesPath: env.COOKIES_PATH },
    browser: {
      headless: env.PLAYWRIGHT_HEADLESS,
      slowMo: env.PLAYWRIGHT_SLOW_MO,
      navigationTimeoutMs: env.SCRAPER_NAVIGATION_TIMEOUT_MS,
    },
    search: {
      baseUrl: env.SEARCH_BASE_URL.replace(/\/+$/, ""),
      keywords: env.SEARCH_KEYWORDS,
      targetCount: env.TARGET_COUNT,
      minLikes: env.MIN_LIKES,
    },
    crawl: {
      maxStagnantRounds: env.SCRAPER_MAX_STAGNANT_ROUNDS,
      maxScrollRounds: env.SCRAPER_MAX_SCROLL_ROUNDS,
      readyTimeoutMs: env.SCRAPER_READY_TIMEOUT_MS,
      scrollSettleMs: env.SCRAPER_SCROLL_SETTLE_MS,
      actionDelay: {
        minMs: env.SCRAPER_ACTION_DELAY_MIN_MS,
        maxMs: env.SCRAPER_ACTION_DELAY_MAX_MS,
      },
    },
    export: {
      destination: env.EXPORT_DESTINATION,
      spreadsheetName: env.SPREADSHEET_NAME,
      credentialsPath: env.GOOGLE_CREDENTIALS_PATH,
      outputDir: env.OUTPUT_DIR,
    },
    enrich: { summaries: env.SUMMARY_ENABLED },
    keywordCooldownSeconds: env.SCRAPER_KEYWORD_COOLDOWN_SECONDS,
    databasePath: env.DATABASE_PATH,
    log: { level: env.LOG_LEVEL, pretty: env.LOG_PRETTY },
    api: { host: env.API_HOST, port: env.API_PORT },
  };

  return Object.freeze(config);
}
