import { access } from "fs/promises";
import { google, type drive_v3, type sheets_v4 } from "googleapis";
import type { SheetCell, SheetsGateway } from "./spreadsheet-sink";
import { DestinationUnavailableError } from "../core/errors";
import { logger } from "../core/logger";

const SCOPES = ["https://www.googleapis.com/auth/spreadsheets", "https://www.googleapis.com/auth/drive"];
const SPREADSHEET_MIME = "application/vnd.google-apps.spreadsheet";

interface Clients {
  sheets: sheets_v4.Sheets;
  drive: drive_v3.Drive;
}

const quoteRange = (title: string) => `'${title.replace(/'/g, "''")}'`;

/** Google Sheets via a service-account key file. */
export class GoogleSheetsGateway implements SheetsGateway {
  private clients: Clients | null = null;

  constructor(private credentialsPath: string) {}

  private async getClients(): Promise<Clients> {
    if (this.clients) return this.clients;

    try {
      await access(this.credentialsPath);
    } catch {
      throw new DestinationUnavailableError(
        `Service account key not found at ${this.credentialsPath}`,
        "SHEETS_CREDENTIALS_MISSING"
      );
    }

    const auth = new google.auth.GoogleAuth({ keyFile: this.credentialsPath, scopes: SCOPES });
    this.clients = {
      sheets: google.sheets({ version: "v4", auth }),
      drive: google.drive({ version: "v3", auth }),
    };
    return this.clients;
  }

  async openSpreadsheet(name: string): Promise<{ id: string; url: string }> {
    const { sheets, drive } = await this.getClients();

    const escaped = name.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
    const found = await drive.files.list({
      q: `name = '${escaped}' and mimeType = '${SPREADSHEET_MIME}' and trashed = false`,
      fields: "files(id, name)",
      pageSize: 1,
    });

    const existing = found.data.files?.[0]?.id;
    if (existing) {
      return { id: existing, url: `https://docs.google.com/spreadsheets/d/${existing}` };
    }

    const created = await sheets.spreadsheets.create({
      requestBody: { properties: { title: name } },
      fields: "spreadsheetId,spreadsheetUrl",
    });
    const id = created.data.spreadsheetId;
    if (!id) {
      throw new DestinationUnavailableError(`Spreadsheet "${name}" could not be created`, "SHEETS_CREATE_FAILED");
    }

    logger.info({ name, id }, "Created spreadsheet");
    return { id, url: created.data.spreadsheetUrl ?? `https://docs.google.com/spreadsheets/d/${id}` };
  }

  async replaceWorksheet(spreadsheetId: string, title: string, rows: SheetCell[][]): Promise<void> {
    const { sheets } = await this.getClients();

    const sheetId = await this.ensureWorksheet(sheets, spreadsheetId, title);

    await sheets.spreadsheets.values.clear({ spreadsheetId, range: quoteRange(title) });
    await sheets.spreadsheets.values.update({
      spreadsheetId,
      range: `${quoteRange(title)}!A1`,
      valueInputOption: "USER_ENTERED",
      requestBody: { values: rows },
    });

    const columnCount = rows[0]?.length ?? 0;
    await sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: {
        requests: [
          {
            repeatCell: {
              range: { sheetId, startRowIndex: 0, endRowIndex: 1, startColumnIndex: 0, endColumnIndex: columnCount },
              cell: {
                userEnteredFormat: {
                  backgroundColor: { red: 0.2, green: 0.4, blue: 0.8 },
                  textFormat: { bold: true, foregroundColor: { red: 1, green: 1, blue: 1 } },
                },
              },
              fields: "userEnteredFormat(backgroundColor,textFormat)",
            },
          },
          {
            autoResizeDimensions: {
              dimensions: { sheetId, dimension: "COLUMNS", startIndex: 0, endIndex: columnCount },
            },
          },
        ],
      },
    });
  }

  private async ensureWorksheet(sheets: sheets_v4.Sheets, spreadsheetId: string, title: string): Promise<number> {
    const meta = await sheets.spreadsheets.get({ spreadsheetId, fields: "sheets.properties" });
    const existing = meta.data.sheets?.find((sheet) => sheet.properties?.title === title);
    const existingId = existing?.properties?.sheetId;
    if (existingId !== undefined && existingId !== null) return existingId;

    const added = await sheets.spreadsheets.batchUpdate({
      spreadsheetId,
      requestBody: { requests: [{ addSheet: { properties: { title } } }] },
    });
    const addedId = added.data.replies?.[0]?.addSheet?.properties?.sheetId;
    if (addedId === undefined || addedId === null) {
      throw new DestinationUnavailableError(`Worksheet "${title}" could not be created`, "SHEETS_CREATE_FAILED");
    }
    return addedId;
  }
}
