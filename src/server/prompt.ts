const KEYWORD_PATTERNS: readonly RegExp[] = [
  /keyword\s+["']([^"']+)["']/i,
  /about\s+["']([^"']+)["']/i,
  /keyword\s+([\w#@-]+)/i,
  /about\s+([\w#@-]+)/i,
];

const TRAILING_PUNCTUATION = /^["'.,!?]+|["'.,!?]+$/g;

/**
 * Pulls the search keyword out of a request such as
 * `top 20 posts about "claw bot"`. Falls back to the last word.
 */
export function extractKeyword(prompt: string): string {
  for (const pattern of KEYWORD_PATTERNS) {
    const match = prompt.match(pattern);
    const keyword = match?.[1]?.trim();
    if (keyword) return keyword;
  }

  const words = prompt.trim().split(/\s+/);
  return (words[words.length - 1] ?? "").replace(TRAILING_PUNCTUATION, "");
}

export function extractCount(prompt: string, fallback: number): number {
  const match = prompt.match(/top\s+(\d+)/i);
  if (!match?.[1]) return fallback;
  const count = Number.parseInt(match[1], 10);
  return count > 0 ? count : fallback;
}
