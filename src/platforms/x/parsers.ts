import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import type { PostRecord } from "../../domain/models";
import type { ExtractionContext } from "../adapter";
import {
  canonicalPostUrl,
  normalizeContent,
  normalizeHandle,
  parseCompactCount,
  parseLabelledCount,
  parseStatusRef,
  type ParsedCount,
  type StatusRef,
} from "../../core/normalize";
import { X_SELECTORS, X_SELECTORS_FALLBACK } from "./selectors";

export interface StrategyContext extends ExtractionContext {
  baseUrl: string;
}

/**
 * One way of reading posts out of a rendered feed. Strategies are tried in
 * order and the first that yields a plausible record wins for the page.
 */
export interface ExtractionStrategy {
  readonly name: string;
  extract($: CheerioAPI, context: StrategyContext): PostRecord[];
}

const cleanText = (value: string | null | undefined): string => normalizeContent(value ?? "");

const UNKNOWN_COUNT: ParsedCount = { value: 0, confidence: "low" };

function buildRecord(
  ref: StatusRef,
  fields: { authorHandle: string; authorDisplayName: string; likes: ParsedCount; bodyText: string | null },
  context: StrategyContext,
  strategy: string
): PostRecord {
  return {
    postId: ref.postId,
    authorHandle: fields.authorHandle || ref.handle,
    authorDisplayName: fields.authorDisplayName || fields.authorHandle || ref.handle,
    postUrl: canonicalPostUrl(context.baseUrl, ref),
    likeCount: fields.likes.value,
    likeConfidence: fields.likes.confidence,
    bodyText: fields.bodyText,
    capturedAt: context.capturedAt,
    keyword: context.keyword,
    strategy,
  };
}

function firstStatusRef($: CheerioAPI, scope: Cheerio<Element>, selector: string): StatusRef | null {
  for (const anchor of scope.find(selector).toArray()) {
    const ref = parseStatusRef($(anchor).attr("href") ?? "");
    if (ref) return ref;
  }
  return null;
}

function pushUnique(records: PostRecord[], seen: Set<string>, record: PostRecord): void {
  if (seen.has(record.postId)) return;
  seen.add(record.postId);
  records.push(record);
}

function readLikeButton(button: Cheerio<Element>): ParsedCount {
  if (button.length === 0) return UNKNOWN_COUNT;

  const fromLabel = parseLabelledCount(button.attr("aria-label") ?? "", "like");
  if (fromLabel.confidence === "confident") return fromLabel;

  const counter = button.find(X_SELECTORS.POSTS.POST_LIKE_COUNT).first();
  const visible = cleanText(counter.length > 0 ? counter.text() : button.text());
  return parseCompactCount(visible);
}

function readAuthor($: CheerioAPI, article: Cheerio<Element>, fallbackHandle: string): { handle: string; displayName: string } {
  const userName = article.find(X_SELECTORS.POSTS.POST_USER_NAME).first();
  if (userName.length === 0) {
    return { handle: fallbackHandle, displayName: fallbackHandle };
  }

  let handle = "";
  for (const anchor of userName.find('a[href^="/"]').toArray()) {
    const href = $(anchor).attr("href") ?? "";
    if (href.includes("/status/")) continue;
    handle = normalizeHandle(href);
    if (handle) break;
  }

  const displayName = cleanText(userName.find("span").first().text());
  const resolvedHandle = handle || fallbackHandle;

  return {
    handle: resolvedHandle,
    displayName: displayName && !displayName.startsWith("@") ? displayName : resolvedHandle,
  };
}

/** Current markup: `article[data-testid="tweet"]` with test ids on every part. */
export const tweetArticleStrategy: ExtractionStrategy = {
  name: "tweet-article",
  extract($, context) {
    const records: PostRecord[] = [];
    const seen = new Set<string>();

    $<Element, string>(X_SELECTORS.POSTS.POST_ITEM).each((_, node) => {
      const article = $(node);
      const ref =
        firstStatusRef($, article, X_SELECTORS.POSTS.POST_PERMALINK) ??
        firstStatusRef($, article, X_SELECTORS_FALLBACK.LINKS.STATUS_LINK);
      if (!ref) return;

      const author = readAuthor($, article, ref.handle);
      const text = cleanText(article.find(X_SELECTORS.POSTS.POST_TEXT).first().text());

      pushUnique(
        records,
        seen,
        buildRecord(
          ref,
          {
            authorHandle: author.handle,
            authorDisplayName: author.displayName,
            likes: readLikeButton(article.find(X_SELECTORS.POSTS.POST_LIKE_BUTTON).first()),
            bodyText: text || null,
          },
          context,
          "tweet-article"
        )
      );
    });

    return records;
  },
};

/** Older layout: plain articles inside feed cells, counts only in the action bar label. */
export const cellArticleStrategy: ExtractionStrategy = {
  name: "cell-article",
  extract($, context) {
    const records: PostRecord[] = [];
    const seen = new Set<string>();

    $<Element, string>(X_SELECTORS_FALLBACK.POSTS.POST_ITEM).each((_, node) => {
      const article = $(node);
      const ref = firstStatusRef($, article, X_SELECTORS_FALLBACK.LINKS.STATUS_LINK);
      if (!ref) return;

      const actionGroup = article.find(X_SELECTORS_FALLBACK.POSTS.POST_ACTION_GROUP).first();
      const likes = parseLabelledCount(actionGroup.attr("aria-label") ?? "", "like");
      const text = cleanText(article.find(X_SELECTORS_FALLBACK.POSTS.POST_TEXT).first().text());

      let displayName = "";
      const profileLink = article.find(`a[href="/${ref.handle}"]`).first();
      if (profileLink.length > 0) {
        const linkText = cleanText(profileLink.text());
        if (linkText && !linkText.startsWith("@")) displayName = linkText;
      }

      pushUnique(
        records,
        seen,
        buildRecord(
          ref,
          { authorHandle: ref.handle, authorDisplayName: displayName, likes, bodyText: text || null },
          context,
          "cell-article"
        )
      );
    });

    return records;
  },
};

/** Last resort: timestamped status links anywhere on the page. Counts are unknown. */
export const statusLinkStrategy: ExtractionStrategy = {
  name: "status-link",
  extract($, context) {
    const records: PostRecord[] = [];
    const seen = new Set<string>();

    $(X_SELECTORS_FALLBACK.LINKS.STATUS_LINK).each((_, node) => {
      const anchor = $(node);
      if (anchor.find(X_SELECTORS.POSTS.POST_TIMESTAMP).length === 0) return;

      const ref = parseStatusRef(anchor.attr("href") ?? "");
      if (!ref) return;

      pushUnique(
        records,
        seen,
        buildRecord(
          ref,
          { authorHandle: ref.handle, authorDisplayName: ref.handle, likes: UNKNOWN_COUNT, bodyText: null },
          context,
          "status-link"
        )
      );
    });

    return records;
  },
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  tweetArticleStrategy,
  cellArticleStrategy,
  statusLinkStrategy,
];
