export { XAdapter } from "./x.adapter";
export { RecordExtractor } from "./extractor";
export { DEFAULT_STRATEGIES, tweetArticleStrategy, cellArticleStrategy, statusLinkStrategy } from "./parsers";
export type { ExtractionStrategy, StrategyContext } from "./parsers";
export { X_SELECTORS, X_SELECTORS_FALLBACK } from "./selectors";
