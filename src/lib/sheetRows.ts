import { CATALOG_COLUMNS, VINYL_STATUSES } from './constants';
import type { CatalogColumn, CatalogRowView, VinylRecord, VinylStatus } from './types';

export const FIRST_DATA_ROW = 2;

const KNOWN_STATUSES: readonly string[] = Object.values(VINYL_STATUSES);

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatPrice(price: number): string {
  return `R$ ${price.toFixed(2)}`;
}

export function parsePrice(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  let cleaned = raw.replace(/R\$/i, '').replace(/\s+/g, '');
  if (!cleaned) return undefined;

  if (cleaned.includes(',')) {
    cleaned = cleaned.replace(/\./g, '').replace(',', '.');
  }

  if (!/^-?\d+(?:\.\d+)?$/.test(cleaned)) return undefined;
  const value = Number.parseFloat(cleaned);
  return Number.isFinite(value) ? value : undefined;
}

export function formatSheetDate(date: Date): string {
  return `${pad2(date.getDate())}/${pad2(date.getMonth() + 1)}/${date.getFullYear()} ${pad2(date.getHours())}:${pad2(
    date.getMinutes()
  )}`;
}

export function parseSheetDate(raw: string | undefined): Date | undefined {
  const match = raw?.trim().match(/^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2})$/);
  if (!match) return undefined;
  const [, day, month, year, hours, minutes] = match.map(Number);
  return new Date(year, month - 1, day, hours, minutes);
}

export function isVinylStatus(value: string): value is VinylStatus {
  return KNOWN_STATUSES.includes(value);
}

export function toVinylStatus(raw: string | undefined): VinylStatus {
  const normalized = (raw ?? '').trim().toLowerCase();
  return isVinylStatus(normalized) ? normalized : VINYL_STATUSES.PENDING;
}

/** Zero-based index of a column in the canonical order. */
export function columnIndex(column: CatalogColumn): number {
  return CATALOG_COLUMNS.indexOf(column);
}

/** Spreadsheet letter for a column (A, B, ... Z, AA, ...). */
export function columnLetter(column: CatalogColumn | number): string {
  let index = typeof column === 'number' ? column : columnIndex(column);
  let letter = '';
  do {
    letter = String.fromCharCode(65 + (index % 26)) + letter;
    index = Math.floor(index / 26) - 1;
  } while (index >= 0);
  return letter;
}

export const LAST_COLUMN_LETTER = columnLetter(CATALOG_COLUMNS.length - 1);

export function recordToRow(record: VinylRecord): string[] {
  const cells: Record<CatalogColumn, string> = {
    '#': record.vinylId ?? '',
    Nome: record.name,
    Artista: record.artist,
    Ano: record.year ?? '',
    'Descrição': record.description ?? '',
    'Condição': record.condition ?? '',
    'Preço': record.price === undefined ? '' : formatPrice(record.price),
    'Post Venda': record.salesPost ?? '',
    Status: record.status,
    imagem1: record.frontImageUrl ?? '',
    imagem2: record.backImageUrl ?? '',
    'Data Publicação': record.publishedAt ? formatSheetDate(record.publishedAt) : ''
  };

  return CATALOG_COLUMNS.map((column) => cells[column]);
}

export function rowToView(row: readonly string[], rowIndex: number): CatalogRowView {
  const cell = (column: CatalogColumn): string => row[columnIndex(column)] ?? '';

  return {
    rowIndex,
    vinylId: cell('#'),
    name: cell('Nome'),
    artist: cell('Artista'),
    year: cell('Ano'),
    description: cell('Descrição'),
    condition: cell('Condição'),
    price: cell('Preço'),
    salesPost: cell('Post Venda'),
    status: cell('Status'),
    frontImageUrl: cell('imagem1'),
    backImageUrl: cell('imagem2'),
    publishedAt: cell('Data Publicação')
  };
}

function optional(value: string): string | undefined {
  return value.length > 0 ? value : undefined;
}

export function viewToRecord(view: CatalogRowView): VinylRecord {
  return {
    vinylId: optional(view.vinylId),
    name: view.name,
    artist: view.artist,
    year: optional(view.year),
    description: optional(view.description),
    condition: optional(view.condition),
    price: parsePrice(view.price),
    salesPost: optional(view.salesPost),
    status: toVinylStatus(view.status),
    publishedAt: parseSheetDate(view.publishedAt),
    frontImageUrl: optional(view.frontImageUrl),
    backImageUrl: optional(view.backImageUrl)
  };
}
