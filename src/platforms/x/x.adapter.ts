import { load } from "cheerio";
import type { PostRecord } from "../../domain/models";
import type { BlockStatus, ExtractionContext, PlatformAdapter, SearchOptions } from "../adapter";
import { RecordExtractor } from "./extractor";
import { X_BLOCK_URL_PATTERNS, X_RATE_LIMIT_NOTICES, X_SELECTORS } from "./selectors";
import type { ExtractionStrategy } from "./parsers";

/** Visible page text with every post removed, so post bodies never read as notices. */
function chromeText(html: string): string {
  if (!html) return "";
  const $ = load(html);
  $(`${X_SELECTORS.FEED.POST_NODES}, script, style`).remove();
  return $.root().text();
}

function pathOf(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url.split(/[?#]/)[0] ?? "";
  }
}

export class XAdapter implements PlatformAdapter {
  readonly platform = "x";
  readonly hosts: readonly string[];
  readonly loginUrl: string;
  readonly feedReadySelector = X_SELECTORS.FEED.READY;

  private extractor: RecordExtractor;

  constructor(
    private baseUrl: string = X_SELECTORS.HOME_URL,
    strategies?: readonly ExtractionStrategy[]
  ) {
    const host = new URL(baseUrl).hostname.toLowerCase();
    this.hosts = Array.from(new Set([host, "x.com", "twitter.com"]));
    this.loginUrl = `${baseUrl}${X_SELECTORS.LOGIN_PATH}`;
    this.extractor = new RecordExtractor(baseUrl, strategies);
  }

  /** "Top" tab of search, which orders by engagement. */
  buildSearchUrl(keyword: string, options: SearchOptions): string {
    const terms = [keyword.trim()];
    if (options.minLikes > 0) {
      terms.push(`min_faves:${options.minLikes}`);
    }

    const params = new URLSearchParams({ q: terms.join(" "), src: "typed_query", f: "top" });
    return `${this.baseUrl}/search?${params.toString()}`;
  }

  extract(html: string, context: ExtractionContext): PostRecord[] {
    return this.extractor.extract(html, context);
  }

  detectBlock(url: string, html: string): BlockStatus {
    // Only the path is checked so a keyword in the query string never trips a pattern.
    const path = pathOf(url);
    for (const pattern of X_BLOCK_URL_PATTERNS) {
      const match = path.match(pattern);
      if (match) {
        return { isBlocked: true, reason: `BLOCK_DETECTED:url_pattern:${match[0]}` };
      }
    }

    const chrome = chromeText(html);
    for (const notice of X_RATE_LIMIT_NOTICES) {
      const match = chrome.match(notice);
      if (match) {
        return { isBlocked: true, reason: `RATE_LIMITED:${match[0].toLowerCase()}` };
      }
    }

    return { isBlocked: false, reason: null };
  }
}
