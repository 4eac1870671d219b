export function normalizeContent(content: string): string {
  return content
    .replace(/[\u200B-\u200D\uFEFF]/g, "")
    .normalize("NFKC")
    .replace(/\s+/g, " ")
    .trim();
}

const TRACKING_PARAMS = ["s", "t", "ref", "ref_src", "src", "utm_source", "utm_medium", "utm_campaign", "fbclid"];

export function normalizeUrl(url: string): string {
  try {
    const u = new URL(url);
    for (const param of TRACKING_PARAMS) {
      u.searchParams.delete(param);
    }
    return u.toString();
  } catch {
    return url;
  }
}

export function normalizeHandle(handle: string): string {
  return handle.trim().replace(/^\/+/, "").replace(/^@/, "").split(/[/?#]/)[0] ?? "";
}

export interface StatusRef {
  handle: string;
  postId: string;
}

// Path segments that look like handles but are app routes.
const RESERVED_PATHS = new Set(["i", "home", "search", "explore", "notifications", "messages", "settings"]);

/**
 * Reads `<handle>/status/<numeric id>` from an absolute or relative post link.
 * Media sub-pages (`/photo/1`, `/analytics`) resolve to the parent post.
 */
export function parseStatusRef(href: string): StatusRef | null {
  const match = href.match(/(?:^|\/)([A-Za-z0-9_]{1,15})\/status(?:es)?\/(\d{5,25})(?:[/?#]|$)/);
  if (!match || !match[1] || !match[2]) return null;

  const handle = match[1];
  if (RESERVED_PATHS.has(handle.toLowerCase())) return null;

  return { handle, postId: match[2] };
}

export function canonicalPostUrl(baseUrl: string, ref: StatusRef): string {
  return `${baseUrl.replace(/\/+$/, "")}/${ref.handle}/status/${ref.postId}`;
}

export type CountConfidence = "confident" | "low";

export interface ParsedCount {
  value: number;
  confidence: CountConfidence;
}

const MAGNITUDES: Readonly<Record<string, number>> = {
  K: 1_000,
  M: 1_000_000,
  B: 1_000_000_000,
};

const LOW_CONFIDENCE: ParsedCount = { value: 0, confidence: "low" };

/**
 * Parses abbreviated counts ("847", "1,234", "1.2K", "3M") into integers,
 * rounding down. Works on the decimal digits directly so "1.15K" is 1150
 * rather than a float artefact.
 */
export function parseCompactCount(raw: string | null | undefined): ParsedCount {
  if (!raw) return LOW_CONFIDENCE;

  const cleaned = raw.replace(/,/g, "").replace(/\s+/g, "").trim();
  const match = cleaned.match(/^(\d+)(?:\.(\d+))?([KMB])?$/i);
  if (!match || match[1] === undefined) return LOW_CONFIDENCE;

  const whole = Number.parseInt(match[1], 10);
  const fraction = match[2] ?? "";
  const suffix = (match[3] ?? "").toUpperCase();
  const multiplier = suffix ? MAGNITUDES[suffix] ?? 1 : 1;

  if (!suffix && fraction) {
    // "12.5" without a magnitude is not a count the platform renders.
    return LOW_CONFIDENCE;
  }

  let value = whole * multiplier;
  if (fraction) {
    const scale = Math.pow(10, fraction.length);
    value += Math.floor((Number.parseInt(fraction, 10) * multiplier) / scale);
  }

  if (!Number.isSafeInteger(value)) return LOW_CONFIDENCE;
  return { value, confidence: "confident" };
}

/**
 * Finds the count attached to a label inside free text such as
 * "12 replies, 5 reposts, 1,204 likes, 3 bookmarks".
 */
export function parseLabelledCount(text: string, label: string): ParsedCount {
  if (!text) return LOW_CONFIDENCE;

  const compact = "(\\d[\\d,]*(?:\\.\\d+)?\\s?[KMB]?)";
  const patterns = [
    new RegExp(`${compact}\\s*${label}s?\\b`, "i"),
    new RegExp(`\\b${label}s?\\s*:?\\s*${compact}`, "i"),
  ];

  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (!match?.[1]) continue;
    const parsed = parseCompactCount(match[1]);
    if (parsed.confidence === "confident") return parsed;
  }

  return LOW_CONFIDENCE;
}
