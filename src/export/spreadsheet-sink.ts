import type { RankedPost } from "../domain/models";
import type { Destination, ExportReceipt, ExportSink } from "./sink";
import { DestinationUnavailableError, errorCode, errorMessage } from "../core/errors";
import { DEFAULT_RETRY_OPTIONS, retryWithBackoff, type RetryOptions } from "../core/retry";
import { logger } from "../core/logger";

export type SheetCell = string | number;

/** The handful of spreadsheet calls the sink needs. */
export interface SheetsGateway {
  /** Finds the spreadsheet by name, or creates it. Returns its id and URL. */
  openSpreadsheet(name: string): Promise<{ id: string; url: string }>;
  /** Creates the worksheet if missing, clears it and writes `rows` from A1. */
  replaceWorksheet(spreadsheetId: string, title: string, rows: SheetCell[][]): Promise<void>;
}

export const SHEET_HEADER: readonly string[] = [
  "Rank",
  "Link",
  "Author Handle",
  "Author Name",
  "Likes",
  "Like Confidence",
  "Summary",
];

const quoteFormulaText = (value: string) => `"${value.replace(/"/g, '""')}"`;

export function hyperlinkFormula(url: string): string {
  return `=HYPERLINK(${quoteFormulaText(url)}, ${quoteFormulaText(url)})`;
}

export function buildSheetRows(results: readonly RankedPost[]): SheetCell[][] {
  const rows: SheetCell[][] = [[...SHEET_HEADER]];
  for (const post of results) {
    rows.push([
      post.rank,
      hyperlinkFormula(post.postUrl),
      `@${post.authorHandle}`,
      post.authorDisplayName,
      // An unreadable count is left blank rather than shown as zero.
      post.likeConfidence === "confident" ? post.likeCount : "",
      post.likeConfidence,
      post.summary ?? "",
    ]);
  }
  return rows;
}

const INVALID_TITLE_CHARS = /[[\]:*?/\\]/g;

export function worksheetTitle(keyword: string): string {
  const title = keyword.replace(INVALID_TITLE_CHARS, " ").replace(/\s+/g, " ").trim().slice(0, 100);
  return title || "Results";
}

const TRANSIENT_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN", "ENOTFOUND"]);

function statusOf(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("code" in error && typeof error.code === "number") return error.code;
  if ("response" in error && typeof error.response === "object" && error.response !== null) {
    const response = error.response;
    if ("status" in response && typeof response.status === "number") return response.status;
  }
  return null;
}

/** Rate limits, server errors and dropped connections are worth another try. */
export function isTransientSheetsError(error: unknown): boolean {
  if (error instanceof DestinationUnavailableError) return false;
  const status = statusOf(error);
  if (status !== null) return status === 429 || status >= 500;
  return TRANSIENT_CODES.has(errorCode(error, ""));
}

export class SpreadsheetSink implements ExportSink {
  readonly kind = "spreadsheet";

  constructor(
    private gateway: SheetsGateway,
    private retryOptions: RetryOptions = DEFAULT_RETRY_OPTIONS
  ) {}

  async write(results: readonly RankedPost[], destination: Destination): Promise<ExportReceipt> {
    if (destination.kind !== "spreadsheet") {
      throw new Error(`SpreadsheetSink cannot write to a ${destination.kind} destination`);
    }

    const rows = buildSheetRows(results);
    const options: RetryOptions = { ...this.retryOptions, retryIf: isTransientSheetsError };

    try {
      const spreadsheet = await retryWithBackoff(
        () => this.gateway.openSpreadsheet(destination.spreadsheetName),
        options,
        "sheets.open"
      );
      await retryWithBackoff(
        () => this.gateway.replaceWorksheet(spreadsheet.id, destination.worksheetName, rows),
        options,
        "sheets.replace"
      );

      logger.info(
        { spreadsheet: destination.spreadsheetName, worksheet: destination.worksheetName, rows: results.length },
        "Exported results to spreadsheet"
      );
      return { kind: "spreadsheet", location: `${spreadsheet.url}#${destination.worksheetName}`, rows: results.length };
    } catch (error) {
      if (error instanceof DestinationUnavailableError) throw error;
      throw new DestinationUnavailableError(`Spreadsheet export failed: ${errorMessage(error)}`);
    }
  }
}
