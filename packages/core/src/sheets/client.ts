import { google, sheets_v4 } from "googleapis";
import type { ServiceAccountCredentials } from "../config/env";

export type CellValue = string | number;

/** The slice of the Sheets API the pipeline depends on. */
export interface SpreadsheetStore {
  getValues(range: string): Promise<string[][]>;
  updateValues(range: string, values: CellValue[][]): Promise<void>;
}

const SHEETS_SCOPE = "https://www.googleapis.com/auth/spreadsheets";

export class GoogleSheetsStore implements SpreadsheetStore {
  constructor(
    private readonly sheets: sheets_v4.Sheets,
    private readonly spreadsheetId: string
  ) {}

  async getValues(range: string): Promise<string[][]> {
    const res = await this.sheets.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range,
    });
    const rows: unknown[][] = res.data.values ?? [];
    return rows.map((row) => row.map((cell) => (cell == null ? "" : String(cell))));
  }

  async updateValues(range: string, values: CellValue[][]): Promise<void> {
    await this.sheets.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: "RAW",
      requestBody: { values },
    });
  }
}

export function createSheetsStore(
  credentials: ServiceAccountCredentials,
  spreadsheetId: string
): GoogleSheetsStore {
  const auth = new google.auth.GoogleAuth({
    credentials: {
      client_email: credentials.client_email,
      private_key: credentials.private_key,
    },
    scopes: [SHEETS_SCOPE],
  });
  const sheets = google.sheets({ version: "v4", auth });
  return new GoogleSheetsStore(sheets, spreadsheetId);
}
