import { google, type Auth, type sheets_v4 } from 'googleapis';
import type { SheetInfo, TabularStore } from './types';

export type GoogleApiAuth = Auth.OAuth2Client | string;

export function quoteSheetName(sheetName: string): string {
  return `'${sheetName.replace(/'/g, "''")}'`;
}

export function sheetRange(sheetName: string, cells: string): string {
  return `${quoteSheetName(sheetName)}!${cells}`;
}

function toCellString(value: unknown): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

export class SheetsGateway implements TabularStore {
  private readonly api: sheets_v4.Sheets;

  constructor(private readonly spreadsheetId: string, auth: GoogleApiAuth) {
    this.api = google.sheets({ version: 'v4', auth });
  }

  async getValues(range: string): Promise<string[][]> {
    const { data } = await this.api.spreadsheets.values.get({
      spreadsheetId: this.spreadsheetId,
      range
    });

    const values: unknown[][] = data.values ?? [];
    return values.map((row) => row.map(toCellString));
  }

  async updateValues(range: string, rows: string[][]): Promise<void> {
    await this.api.spreadsheets.values.update({
      spreadsheetId: this.spreadsheetId,
      range,
      valueInputOption: 'RAW',
      requestBody: { values: rows }
    });
  }

  async listSheets(): Promise<SheetInfo[]> {
    const { data } = await this.api.spreadsheets.get({
      spreadsheetId: this.spreadsheetId,
      fields: 'sheets.properties(sheetId,title)'
    });

    return (data.sheets ?? []).map((sheet) => ({
      sheetId: sheet.properties?.sheetId ?? 0,
      title: sheet.properties?.title ?? ''
    }));
  }

  async addSheet(title: string): Promise<void> {
    await this.batchUpdate([{ addSheet: { properties: { title } } }]);
  }

  async formatHeaderRow(sheetId: number, columnCount: number): Promise<void> {
    await this.batchUpdate([
      {
        repeatCell: {
          range: {
            sheetId,
            startRowIndex: 0,
            endRowIndex: 1,
            startColumnIndex: 0,
            endColumnIndex: columnCount
          },
          cell: {
            userEnteredFormat: {
              backgroundColor: { red: 0.2, green: 0.2, blue: 0.2 },
              textFormat: {
                foregroundColor: { red: 1, green: 1, blue: 1 },
                bold: true
              }
            }
          },
          fields: 'userEnteredFormat(backgroundColor,textFormat)'
        }
      }
    ]);
  }

  private async batchUpdate(requests: sheets_v4.Schema$Request[]): Promise<void> {
    await this.api.spreadsheets.batchUpdate({
      spreadsheetId: this.spreadsheetId,
      requestBody: { requests }
    });
  }
}
