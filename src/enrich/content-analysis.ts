import type { RankedPost, Theme } from "../domain/models";
import themeKeywords from "./theme-keywords.json";

const MAX_SUMMARY_LENGTH = 200;
// Sentences shorter than this are skipped when picking a summary.
const MIN_SENTENCE_LENGTH = 20;

export interface ContentAnalysis {
  theme: Theme;
  summary: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Whole-word matching so "use" does not fire on "because".
function compileMatcher(keywords: readonly string[]): RegExp {
  const alternatives = keywords.map((keyword) => escapeRegExp(keyword).replace(/ /g, "\\s+"));
  return new RegExp(`\\b(?:${alternatives.join("|")})\\b`, "i");
}

const USE_CASE = compileMatcher(themeKeywords.useCase);
const ANNOUNCEMENT = compileMatcher(themeKeywords.announcement);
const OPINION = compileMatcher(themeKeywords.opinion);

export function classifyTheme(text: string): Theme {
  if (USE_CASE.test(text)) return "Use Case";
  if (ANNOUNCEMENT.test(text)) return "Announcement";
  if (OPINION.test(text)) return "Opinion";
  return "Discussion";
}

function truncate(value: string): string {
  if (value.length <= MAX_SUMMARY_LENGTH) return value;
  return `${value.slice(0, MAX_SUMMARY_LENGTH - 3)}...`;
}

export function summarize(text: string, theme: Theme): string {
  const sentences = text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => sentence.length > 0);
  if (sentences.length === 0) return "";

  const picked =
    theme === "Use Case"
      ? sentences.find((sentence) => USE_CASE.test(sentence))
      : sentences.find((sentence) => sentence.length > MIN_SENTENCE_LENGTH);

  return truncate(picked ?? sentences[0] ?? "");
}

export function analyzeContent(text: string): ContentAnalysis {
  const theme = classifyTheme(text);
  return { theme, summary: summarize(text, theme) };
}

/** Adds theme and summary to every post that has body text. */
export function enrichPosts<T extends RankedPost>(posts: readonly T[]): T[] {
  return posts.map((post) => {
    if (!post.bodyText) return post;
    const { theme, summary } = analyzeContent(post.bodyText);
    return { ...post, theme, summary };
  });
}
