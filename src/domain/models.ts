import { z } from "zod";

export const LikeConfidenceSchema = z.enum(["confident", "low"]);
export type LikeConfidence = z.infer<typeof LikeConfidenceSchema>;

export const PostRecordSchema = z.object({
  postId: z.string().min(1),
  authorHandle: z.string(),
  authorDisplayName: z.string(),
  postUrl: z.string().url(),
  likeCount: z.number().int().min(0),
  likeConfidence: LikeConfidenceSchema,
  bodyText: z.string().nullable(),
  capturedAt: z.string(),
  keyword: z.string(),
  strategy: z.string(),
});
export type PostRecord = z.infer<typeof PostRecordSchema>;

export const ThemeSchema = z.enum(["Use Case", "Announcement", "Opinion", "Discussion"]);
export type Theme = z.infer<typeof ThemeSchema>;

export const RankedPostSchema = PostRecordSchema.extend({
  rank: z.number().int().positive(),
  summary: z.string().optional(),
  theme: ThemeSchema.optional(),
});
export type RankedPost = z.infer<typeof RankedPostSchema>;

export const CrawlPhaseSchema = z.enum([
  "init",
  "loading",
  "extracting",
  "more_available",
  "stagnant",
  "target_reached",
  "blocked",
  "aborted",
  "failed",
  "done",
]);
export type CrawlPhase = z.infer<typeof CrawlPhaseSchema>;

export const CrawlTerminalSchema = z.enum(["stagnant", "target_reached", "blocked", "aborted", "round_limit", "failed"]);
export type CrawlTerminal = z.infer<typeof CrawlTerminalSchema>;

export const CollectionRunStatusSchema = z.enum(["running", "success", "partial", "failed"]);
export type CollectionRunStatus = z.infer<typeof CollectionRunStatusSchema>;

export const KeywordCrawlStatusSchema = z.enum(["running", "success", "partial", "failed"]);
export type KeywordCrawlStatus = z.infer<typeof KeywordCrawlStatusSchema>;

export const PipelinePhaseSchema = z.enum([
  "loading_session",
  "awaiting_operator_login",
  "crawling",
  "exporting",
  "done",
]);
export type PipelinePhase = z.infer<typeof PipelinePhaseSchema>;

export interface CrawlState {
  keyword: string;
  targetCount: number;
  seenIds: Set<string>;
  scrollAttempts: number;
  stagnantRounds: number;
  phase: CrawlPhase;
}

export interface CrawlOutcome {
  keyword: string;
  terminal: CrawlTerminal;
  records: PostRecord[];
  rounds: number;
  scrollAttempts: number;
  stagnantRounds: number;
  uniqueCount: number;
  blockReason: string | null;
  error: { code: string; message: string } | null;
}
