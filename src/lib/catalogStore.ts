import { CATALOG_COLUMNS, VINYL_STATUSES } from './constants';
import { logError, logInfo, logWarn } from './logger';
import {
  FIRST_DATA_ROW,
  LAST_COLUMN_LETTER,
  columnLetter,
  formatPrice,
  formatSheetDate,
  recordToRow,
  rowToView
} from './sheetRows';
import { SheetsGateway, sheetRange, type GoogleApiAuth } from './sheets';
import type {
  CatalogColumn,
  CatalogRowView,
  CatalogWriter,
  PublicationStore,
  TabularStore,
  UpsertOutcome,
  VinylRecord,
  VinylStatus
} from './types';
import { buildVinylId } from './vinylId';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function findRowIndex(rows: CatalogRowView[], vinylId: string): number | null {
  return rows.find((row) => row.vinylId === vinylId)?.rowIndex ?? null;
}

/** First row after the last non-empty one, whatever its identifier cell holds. */
function nextFreeRow(rows: CatalogRowView[]): number {
  const lastRow = rows.length > 0 ? rows[rows.length - 1].rowIndex : FIRST_DATA_ROW - 1;
  return lastRow + 1;
}

export class CatalogStore implements CatalogWriter, PublicationStore {
  constructor(private readonly store: TabularStore, private readonly sheetName: string) {}

  private range(cells: string): string {
    return sheetRange(this.sheetName, cells);
  }

  private rowRange(rowIndex: number): string {
    return this.range(`A${rowIndex}:${LAST_COLUMN_LETTER}${rowIndex}`);
  }

  private cellRange(column: CatalogColumn, rowIndex: number): string {
    return this.range(`${columnLetter(column)}${rowIndex}`);
  }

  async initialize(): Promise<void> {
    const sheets = await this.store.listSheets();
    let sheet = sheets.find((candidate) => candidate.title === this.sheetName);

    if (!sheet) {
      await this.store.addSheet(this.sheetName);
      logInfo('Catalog sheet created', { sheetName: this.sheetName });
      sheet = (await this.store.listSheets()).find((candidate) => candidate.title === this.sheetName);
    }

    const headerRange = this.range(`A1:${LAST_COLUMN_LETTER}1`);
    const header = await this.store.getValues(headerRange);
    if (header.length > 0) {
      return;
    }

    await this.store.updateValues(headerRange, [[...CATALOG_COLUMNS]]);
    logInfo('Catalog header row written', { sheetName: this.sheetName });

    try {
      await this.store.formatHeaderRow(sheet?.sheetId ?? 0, CATALOG_COLUMNS.length);
    } catch (error) {
      logWarn('Failed to format catalog header row', { error });
    }
  }

  private async readRows(): Promise<CatalogRowView[]> {
    const values = await this.store.getValues(this.range(`A${FIRST_DATA_ROW}:${LAST_COLUMN_LETTER}`));
    return values.map((row, index) => rowToView(row, index + FIRST_DATA_ROW));
  }

  async listAll(statusFilter?: string): Promise<CatalogRowView[]> {
    let rows: CatalogRowView[];
    try {
      rows = await this.readRows();
    } catch (error) {
      logError('Failed to read catalog rows', { error });
      return [];
    }

    if (!statusFilter) {
      return rows;
    }

    const wanted = statusFilter.trim().toLowerCase();
    return rows.filter((row) => row.status.trim().toLowerCase() === wanted);
  }

  async listPendingForPublication(): Promise<CatalogRowView[]> {
    const pending = (await this.listAll(VINYL_STATUSES.PENDING)).filter(
      (row) => row.name.trim().length > 0 && row.salesPost.trim().length > 0
    );
    logInfo('Pending records eligible for publication', { count: pending.length });
    return pending;
  }

  async findByIdentifier(vinylId: string): Promise<number | null> {
    try {
      return await this.locate(vinylId);
    } catch (error) {
      logError('Failed to look up catalog row', { vinylId, error });
      return null;
    }
  }

  private async locate(vinylId: string): Promise<number | null> {
    return findRowIndex(await this.readRows(), vinylId);
  }

  async upsert(record: VinylRecord): Promise<UpsertOutcome> {
    if (!record.vinylId) {
      record.vinylId = buildVinylId(record.name, record.artist);
    }
    const vinylId = record.vinylId;

    try {
      const rows = await this.readRows();
      const existingRow = findRowIndex(rows, vinylId);
      const rowIndex = existingRow ?? nextFreeRow(rows);
      await this.store.updateValues(this.rowRange(rowIndex), [recordToRow(record)]);

      const action = existingRow === null ? 'inserted' : 'updated';
      logInfo(action === 'inserted' ? 'Catalog row inserted' : 'Catalog row overwritten', {
        vinylId,
        rowIndex,
        name: record.name,
        artist: record.artist
      });
      return { ok: true, action, rowIndex, vinylId };
    } catch (error) {
      logError('Failed to upsert catalog row', { vinylId, error });
      return { ok: false, vinylId, error: toError(error) };
    }
  }

  async updateStatus(rowIndex: number, status: VinylStatus, publishedAt?: Date): Promise<boolean> {
    try {
      await this.store.updateValues(this.cellRange('Status', rowIndex), [[status]]);
      if (publishedAt) {
        await this.store.updateValues(this.cellRange('Data Publicação', rowIndex), [[formatSheetDate(publishedAt)]]);
      }
      logInfo('Catalog status updated', { rowIndex, status });
      return true;
    } catch (error) {
      logError('Failed to update catalog status', { rowIndex, status, error });
      return false;
    }
  }

  async updatePrice(rowIndex: number, price: number): Promise<boolean> {
    try {
      await this.store.updateValues(this.cellRange('Preço', rowIndex), [[formatPrice(price)]]);
      logInfo('Catalog price updated', { rowIndex, price });
      return true;
    } catch (error) {
      logError('Failed to update catalog price', { rowIndex, error });
      return false;
    }
  }
}

export async function openCatalogStore(
  settings: { googleSheetsId: string; sheetName: string },
  auth: GoogleApiAuth
): Promise<CatalogStore> {
  const catalog = new CatalogStore(new SheetsGateway(settings.googleSheetsId, auth), settings.sheetName);
  await catalog.initialize();
  return catalog;
}
