import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  loadConfig: vi.fn(),
  authorize: vi.fn()
}));

vi.mock('@shared', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@shared')>();
  return { ...actual, loadConfig: mocks.loadConfig, authorize: mocks.authorize };
});

import { CATALOG_COLUMNS, CatalogStore, ConfigurationError, buildDriveUrl } from '@shared';
import type { DownloadedImage, ImagePair, ImageSource, UpsertOutcome, VinylAnalyzer, VinylRecord } from '@shared';
import { handler, scanAndCatalog } from '@flows/scanCatalog';
import { InMemorySheet } from '../helpers/inMemorySheet';

function loggedLine(spy: { mock: { calls: unknown[][] } }, message: string): unknown {
  return spy.mock.calls
    .map(([line]) => (typeof line === 'string' ? JSON.parse(line) : undefined))
    .find((entry) => entry?.message === message);
}

function downloaded(id: string): DownloadedImage {
  return { id, name: `${id}.jpg`, modifiedTime: '2025-01-01T00:00:00Z', path: `/downloads/${id}.jpg` };
}

function pair(index: number, withBack = true): ImagePair {
  return { front: downloaded(`front-${index}`), back: withBack ? downloaded(`back-${index}`) : null };
}

function fakeImages(pairs: ImagePair[]): ImageSource {
  return {
    downloadAllImages: vi.fn(async () => pairs),
    downloadImage: vi.fn(async () => ''),
    publicUrl: buildDriveUrl
  };
}

const RECORDS: Record<string, VinylRecord> = {
  '/downloads/front-1.jpg': { name: 'Abbey Road', artist: 'The Beatles', status: 'pendente' },
  '/downloads/front-2.jpg': { name: 'Clube da Esquina', artist: 'Milton Nascimento', status: 'pendente' },
  '/downloads/front-3.jpg': { name: 'Acabou Chorare', artist: 'Novos Baianos', status: 'pendente' }
};

function fakeAnalyzer(failOn?: string) {
  return {
    analyzeVinylImages: vi.fn(async (frontImagePath: string): Promise<VinylRecord> => {
      if (frontImagePath === failOn) {
        throw new Error('analyzer crashed');
      }
      return { ...RECORDS[frontImagePath], frontImagePath };
    }),
    generateSalesPost: vi.fn(async (record: VinylRecord) => `🎵 ${record.name}`)
  } satisfies VinylAnalyzer;
}

describe('scanAndCatalog', () => {
  let sheet: InMemorySheet;
  let catalog: CatalogStore;

  beforeEach(() => {
    sheet = new InMemorySheet('Página1', [[...CATALOG_COLUMNS]]);
    catalog = new CatalogStore(sheet, 'Página1');
  });

  it('catalogs every pair with image links and a sales post', async () => {
    const analyzer = fakeAnalyzer();

    const result = await scanAndCatalog({
      images: fakeImages([pair(1), pair(2, false)]),
      analyzer,
      catalog,
      folderId: 'folder-1'
    });

    expect(result).toEqual({ pairCount: 2, processedCount: 2, catalogedCount: 2, reviewCount: 0 });
    expect(analyzer.analyzeVinylImages).toHaveBeenNthCalledWith(1, '/downloads/front-1.jpg', '/downloads/back-1.jpg');
    expect(analyzer.analyzeVinylImages).toHaveBeenNthCalledWith(2, '/downloads/front-2.jpg', undefined);
    expect(sheet.row(2)).toEqual([
      '0E872CA7',
      'Abbey Road',
      'The Beatles',
      '',
      '',
      '',
      '',
      '🎵 Abbey Road',
      'pendente',
      'https://drive.google.com/file/d/front-1/view',
      'https://drive.google.com/file/d/back-1/view',
      ''
    ]);
    expect(sheet.row(3).slice(0, 2)).toEqual(['40088EB9', 'Clube da Esquina']);
    expect(sheet.row(3)[10]).toBe('');
  });

  it('logs the step plan when it starts', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      await scanAndCatalog({ images: fakeImages([]), analyzer: fakeAnalyzer(), catalog, folderId: 'folder-1' }, { limit: 3 });

      expect(loggedLine(log, 'ScanCatalog invoked')).toEqual({
        level: 'info',
        message: 'ScanCatalog invoked',
        limit: 3,
        startAt: 'AcquireImages',
        steps: ['AcquireImages', 'AnalyzeImages', 'AttachImageUrls', 'GenerateListing', 'UpsertRecord']
      });
    } finally {
      log.mockRestore();
    }
  });

  it('keeps going when one pair fails', async () => {
    const result = await scanAndCatalog({
      images: fakeImages([pair(1), pair(2), pair(3)]),
      analyzer: fakeAnalyzer('/downloads/front-2.jpg'),
      catalog,
      folderId: 'folder-1'
    });

    expect(result).toEqual({ pairCount: 3, processedCount: 2, catalogedCount: 2, reviewCount: 0 });
    expect(sheet.row(2)[1]).toBe('Abbey Road');
    expect(sheet.row(3)[1]).toBe('Acabou Chorare');
  });

  it('catalogs review placeholders without a sales post', async () => {
    const analyzer = fakeAnalyzer();
    analyzer.analyzeVinylImages.mockResolvedValueOnce({
      name: '[Erro na análise] front-1.jpg',
      artist: '[Verificar manualmente]',
      status: 'pendente',
      needsReview: true
    });

    const result = await scanAndCatalog({ images: fakeImages([pair(1)]), analyzer, catalog, folderId: 'folder-1' });

    expect(result).toEqual({ pairCount: 1, processedCount: 1, catalogedCount: 1, reviewCount: 1 });
    expect(analyzer.generateSalesPost).not.toHaveBeenCalled();
    expect(sheet.row(2)[7]).toBe('');
    expect(await catalog.listPendingForPublication()).toEqual([]);
  });

  it('counts rows the catalog could not write as processed only', async () => {
    const failed: UpsertOutcome = { ok: false, vinylId: '0E872CA7', error: new Error('quota exceeded') };
    const result = await scanAndCatalog({
      images: fakeImages([pair(1)]),
      analyzer: fakeAnalyzer(),
      catalog: { upsert: vi.fn(async () => failed) },
      folderId: 'folder-1'
    });

    expect(result).toEqual({ pairCount: 1, processedCount: 1, catalogedCount: 0, reviewCount: 0 });
  });

  it('honours the batch limit', async () => {
    const analyzer = fakeAnalyzer();
    const result = await scanAndCatalog(
      { images: fakeImages([pair(1), pair(2), pair(3)]), analyzer, catalog, folderId: 'folder-1' },
      { limit: 1 }
    );

    expect(result.pairCount).toBe(1);
    expect(analyzer.analyzeVinylImages).toHaveBeenCalledTimes(1);
  });

  it('returns zero counts when Drive has nothing or fails', async () => {
    const empty = await scanAndCatalog({ images: fakeImages([]), analyzer: fakeAnalyzer(), catalog, folderId: 'folder-1' });
    expect(empty).toEqual({ pairCount: 0, processedCount: 0, catalogedCount: 0, reviewCount: 0 });

    const images = fakeImages([]);
    vi.mocked(images.downloadAllImages).mockRejectedValue(new Error('folder not found'));
    const failed = await scanAndCatalog({ images, analyzer: fakeAnalyzer(), catalog, folderId: 'folder-1' });
    expect(failed).toEqual({ pairCount: 0, processedCount: 0, catalogedCount: 0, reviewCount: 0 });
    expect(sheet.grid).toHaveLength(1);
  });
});

describe('scanCatalog handler', () => {
  beforeEach(() => {
    mocks.loadConfig.mockReset();
    mocks.authorize.mockReset();
  });

  it('fails before touching Google when the Gemini key is missing', async () => {
    mocks.loadConfig.mockReturnValue({ googleSheetsId: 'sheet-123', sheetName: 'Página1', googleDriveFolderId: 'folder-1' });

    await expect(handler()).rejects.toBeInstanceOf(ConfigurationError);
    expect(mocks.authorize).not.toHaveBeenCalled();
  });

  it('fails when no Drive folder is configured', async () => {
    mocks.loadConfig.mockReturnValue({ googleSheetsId: 'sheet-123', sheetName: 'Página1', geminiApiKey: 'test-secret' });

    await expect(handler()).rejects.toThrow('GOOGLE_DRIVE_FOLDER_ID is not configured');
    expect(mocks.authorize).not.toHaveBeenCalled();
  });
});
