import type { RankedPost } from "../domain/models";
import { DestinationUnavailableError } from "../core/errors";
import { logger } from "../core/logger";

export type Destination =
  | { kind: "spreadsheet"; spreadsheetName: string; worksheetName: string }
  | { kind: "file"; path: string };

export interface ExportReceipt {
  kind: Destination["kind"];
  location: string;
  rows: number;
}

export interface ExportSink {
  readonly kind: Destination["kind"];
  /** Replaces whatever the destination held for this result set. */
  write(results: readonly RankedPost[], destination: Destination): Promise<ExportReceipt>;
}

export interface ExportTarget {
  sink: ExportSink;
  destination: Destination;
}

export interface ExportOutcome {
  receipt: ExportReceipt;
  usedFallback: boolean;
  primaryError: { code: string; message: string } | null;
}

/**
 * Writes to the primary target. When it reports itself unavailable the same
 * result set goes to the fallback; any other error propagates.
 */
export async function exportWithFallback(
  results: readonly RankedPost[],
  primary: ExportTarget,
  fallback: ExportTarget | null
): Promise<ExportOutcome> {
  try {
    const receipt = await primary.sink.write(results, primary.destination);
    return { receipt, usedFallback: false, primaryError: null };
  } catch (error) {
    if (!(error instanceof DestinationUnavailableError) || fallback === null) throw error;

    logger.warn(
      { primary: primary.destination.kind, fallback: fallback.destination.kind, code: error.code, error: error.message },
      "Primary destination unavailable, exporting to fallback"
    );
    const receipt = await fallback.sink.write(results, fallback.destination);
    return { receipt, usedFallback: true, primaryError: { code: error.code, message: error.message } };
  }
}

/** Lowercase, ascii-safe file stem for a keyword. */
export function slugify(keyword: string): string {
  const slug = keyword
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return slug || "keyword";
}
