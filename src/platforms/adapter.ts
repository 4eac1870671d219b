import type { PostRecord } from "../domain/models";

export interface SearchOptions {
  minLikes: number;
}

export interface ExtractionContext {
  keyword: string;
  capturedAt: string;
}

export interface BlockStatus {
  isBlocked: boolean;
  reason: string | null;
}

export interface PlatformAdapter {
  readonly platform: string;

  /** Hosts the credential bundle must match. */
  readonly hosts: readonly string[];

  readonly loginUrl: string;

  /** Matches once at least one post node is rendered in the feed. */
  readonly feedReadySelector: string;

  buildSearchUrl(keyword: string, options: SearchOptions): string;

  extract(html: string, context: ExtractionContext): PostRecord[];

  detectBlock(url: string, html: string): BlockStatus;
}
