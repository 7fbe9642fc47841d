import type { VINYL_STATUSES, CATALOG_COLUMNS } from './constants';

export type VinylStatus = (typeof VINYL_STATUSES)[keyof typeof VINYL_STATUSES];
export type CatalogColumn = (typeof CATALOG_COLUMNS)[number];

export interface VinylRecord {
  name: string;
  artist: string;
  vinylId?: string;
  year?: string;
  description?: string;
  condition?: string;
  price?: number;
  salesPost?: string;
  status: VinylStatus;
  publishedAt?: Date;
  frontImagePath?: string;
  backImagePath?: string;
  frontImageUrl?: string;
  backImageUrl?: string;
  needsReview?: boolean;
}

/** One sheet row as read back: every cell is a string, plus the row's position in the sheet. */
export interface CatalogRowView {
  rowIndex: number;
  vinylId: string;
  name: string;
  artist: string;
  year: string;
  description: string;
  condition: string;
  price: string;
  salesPost: string;
  status: string;
  frontImageUrl: string;
  backImageUrl: string;
  publishedAt: string;
}

export type UpsertOutcome =
  | { ok: true; action: 'inserted' | 'updated'; rowIndex: number; vinylId: string }
  | { ok: false; vinylId: string; error: Error };

export interface DriveImageFile {
  id: string;
  name: string;
  modifiedTime: string;
}

export interface DownloadedImage extends DriveImageFile {
  path: string;
}

export interface ImagePair {
  front: DownloadedImage;
  back: DownloadedImage | null;
}

export interface VinylAnalysis {
  name: string;
  artist: string;
  year?: string;
  tracklist: string[];
  label?: string;
  condition: string;
  notes?: string;
}

export interface PostHandle {
  mediaId: string;
  code?: string;
}

export interface SheetInfo {
  sheetId: number;
  title: string;
}

/** Range-based access to a spreadsheet, in A1 notation. */
export interface TabularStore {
  getValues(range: string): Promise<string[][]>;
  updateValues(range: string, rows: string[][]): Promise<void>;
  listSheets(): Promise<SheetInfo[]>;
  addSheet(title: string): Promise<void>;
  formatHeaderRow(sheetId: number, columnCount: number): Promise<void>;
}

export interface ImageSource {
  downloadAllImages(folderId: string): Promise<ImagePair[]>;
  downloadImage(fileId: string, fileName: string): Promise<string>;
  publicUrl(fileId: string): string;
}

export interface VinylAnalyzer {
  analyzeVinylImages(frontImagePath: string, backImagePath?: string): Promise<VinylRecord>;
  generateSalesPost(record: VinylRecord): Promise<string>;
}

export interface AlbumPublisher {
  login(): Promise<void>;
  postAlbum(imagePaths: string[], caption: string): Promise<PostHandle | null>;
}

export interface CatalogWriter {
  upsert(record: VinylRecord): Promise<UpsertOutcome>;
}

export interface PublicationStore {
  listPendingForPublication(): Promise<CatalogRowView[]>;
  updateStatus(rowIndex: number, status: VinylStatus, publishedAt?: Date): Promise<boolean>;
}

export interface ScanCatalogInput {
  limit?: number;
}

export interface ScanCatalogOutput {
  pairCount: number;
  processedCount: number;
  catalogedCount: number;
  reviewCount: number;
}

export interface PublishPendingInput {
  limit?: number;
  dryRun?: boolean;
}

export interface PublishPendingOutput {
  pendingCount: number;
  publishedCount: number;
  preview: Array<Pick<CatalogRowView, 'rowIndex' | 'name' | 'artist'>>;
}

export interface CatalogStats {
  total: number;
  pending: number;
  published: number;
  sold: number;
  publicationRate: number;
  conversionRate: number;
}
