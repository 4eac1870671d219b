import type { CrawlPhase } from "./models";

export const ALLOWED_TRANSITIONS: ReadonlyMap<CrawlPhase, CrawlPhase[]> = new Map([
  ["init", ["loading", "aborted", "failed"]],
  ["loading", ["extracting", "blocked", "aborted", "failed"]],
  ["extracting", ["more_available", "stagnant", "target_reached", "aborted", "failed"]],
  ["more_available", ["loading", "aborted", "failed", "done"]],
  ["stagnant", ["done"]],
  ["target_reached", ["done"]],
  ["blocked", ["done"]],
  ["aborted", ["done"]],
  ["failed", ["done"]],
  ["done", []],
]);

export const TERMINAL_PHASES: ReadonlySet<CrawlPhase> = new Set([
  "stagnant",
  "target_reached",
  "blocked",
  "aborted",
  "failed",
]);

export function canTransition(from: CrawlPhase, to: CrawlPhase): boolean {
  const allowed = ALLOWED_TRANSITIONS.get(from);
  return allowed?.includes(to) ?? false;
}

export function validateTransition(from: CrawlPhase, to: CrawlPhase): void {
  if (!canTransition(from, to)) {
    throw new Error(
      `Invalid crawl state transition: ${from} -> ${to}. Allowed: ${ALLOWED_TRANSITIONS.get(from)?.join(", ") || "none"}`
    );
  }
}
