import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { Readable } from 'stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const mocks = vi.hoisted(() => ({
  list: vi.fn(),
  get: vi.fn()
}));

vi.mock('googleapis', () => ({
  google: {
    drive: vi.fn(() => ({ files: { list: mocks.list, get: mocks.get } }))
  }
}));

import { DriveGateway, buildDriveUrl, buildImageQuery, extractDriveFileId, pairImages } from '@shared';
import type { DownloadedImage } from '@shared';

function image(id: string, modifiedTime: string): DownloadedImage {
  return { id, name: `${id}.jpg`, modifiedTime, path: `/tmp/${id}.jpg` };
}

describe('Drive URLs', () => {
  it('builds the public view link', () => {
    expect(buildDriveUrl('ABC123xyz')).toBe('https://drive.google.com/file/d/ABC123xyz/view');
  });

  it.each([
    ['https://drive.google.com/file/d/ABC123xyz/view', 'ABC123xyz'],
    ['https://drive.google.com/file/d/a-b_c?usp=sharing', 'a-b_c'],
    ['https://drive.google.com/file/d/only-id', 'only-id']
  ])('extracts the file id from %s', (url, expected) => {
    expect(extractDriveFileId(url)).toBe(expected);
  });

  it.each(['', '   ', 'https://example.com/file/d/ABC/view', 'https://drive.google.com/file/d//view', 'not a url'])(
    'rejects %j',
    (url) => {
      expect(extractDriveFileId(url)).toBeNull();
    }
  );

  it('rejects absent values', () => {
    expect(extractDriveFileId(undefined)).toBeNull();
    expect(extractDriveFileId(null)).toBeNull();
  });
});

describe('pairImages', () => {
  it('pairs images newest first', () => {
    const pairs = pairImages([
      image('front', '2025-01-01T10:00:00Z'),
      image('back', '2025-01-01T10:05:00Z'),
      image('older-a', '2024-12-31T09:00:00Z'),
      image('older-b', '2024-12-31T08:00:00Z')
    ]);

    expect(pairs.map((pair) => [pair.front.id, pair.back?.id])).toEqual([
      ['back', 'front'],
      ['older-a', 'older-b']
    ]);
  });

  it('keeps an odd image out as a front-only pair', () => {
    const pairs = pairImages([
      image('a', '2025-01-03T00:00:00Z'),
      image('b', '2025-01-02T00:00:00Z'),
      image('c', '2025-01-01T00:00:00Z')
    ]);

    expect(pairs).toHaveLength(2);
    expect(pairs[1].front.id).toBe('c');
    expect(pairs[1].back).toBeNull();
  });

  it('returns no pairs for no images', () => {
    expect(pairImages([])).toEqual([]);
  });
});

describe('DriveGateway', () => {
  let downloadsDir: string;

  beforeEach(async () => {
    mocks.list.mockReset();
    mocks.get.mockReset();
    downloadsDir = await mkdtemp(path.join(tmpdir(), 'vinyl-downloads-'));
  });

  afterEach(async () => {
    await rm(downloadsDir, { recursive: true, force: true });
  });

  it('queries image types inside the folder', () => {
    expect(buildImageQuery('folder-1')).toBe(
      "'folder-1' in parents and (mimeType='image/jpeg' or mimeType='image/jpg' or mimeType='image/png') and trashed=false"
    );
  });

  it('follows page tokens and skips files without id or name', async () => {
    mocks.list
      .mockResolvedValueOnce({
        data: {
          files: [{ id: 'f1', name: 'one.jpg', modifiedTime: '2025-01-01T00:00:00Z' }, { id: 'f2' }],
          nextPageToken: 'page-2'
        }
      })
      .mockResolvedValueOnce({ data: { files: [{ id: 'f3', name: 'three.jpg' }] } });

    const images = await new DriveGateway('test-api-key', downloadsDir).listImages('folder-1');

    expect(images).toEqual([
      { id: 'f1', name: 'one.jpg', modifiedTime: '2025-01-01T00:00:00Z' },
      { id: 'f3', name: 'three.jpg', modifiedTime: '' }
    ]);
    expect(mocks.list).toHaveBeenCalledTimes(2);
    expect(mocks.list.mock.calls[1][0].pageToken).toBe('page-2');
  });

  it('streams the media into the downloads directory', async () => {
    mocks.get.mockResolvedValue({ data: Readable.from([Buffer.from('jpeg-bytes')]) });

    const target = await new DriveGateway('test-api-key', downloadsDir).downloadImage('file-1', 'cover.jpg');

    expect(target).toBe(path.join(downloadsDir, 'cover.jpg'));
    expect(await readFile(target, 'utf8')).toBe('jpeg-bytes');
    expect(mocks.get).toHaveBeenCalledWith({ fileId: 'file-1', alt: 'media' }, { responseType: 'stream' });
  });

  it('reuses a file that was already downloaded', async () => {
    await writeFile(path.join(downloadsDir, 'cover.jpg'), 'cached');

    const target = await new DriveGateway('test-api-key', downloadsDir).downloadImage('file-1', 'cover.jpg');

    expect(await readFile(target, 'utf8')).toBe('cached');
    expect(mocks.get).not.toHaveBeenCalled();
  });

  it('pairs the images that downloaded and skips the ones that failed', async () => {
    mocks.list.mockResolvedValue({
      data: {
        files: [
          { id: 'f1', name: 'one.jpg', modifiedTime: '2025-01-01T10:02:00Z' },
          { id: 'f2', name: 'two.jpg', modifiedTime: '2025-01-01T10:01:00Z' },
          { id: 'f3', name: 'three.jpg', modifiedTime: '2025-01-01T10:00:00Z' }
        ]
      }
    });
    mocks.get.mockImplementation(async ({ fileId }: { fileId: string }) => {
      if (fileId === 'f2') throw new Error('forbidden');
      return { data: Readable.from([Buffer.from(fileId)]) };
    });

    const pairs = await new DriveGateway('test-api-key', downloadsDir).downloadAllImages('folder-1');

    expect(pairs).toHaveLength(1);
    expect(pairs[0].front.id).toBe('f1');
    expect(pairs[0].back?.id).toBe('f3');
    expect(pairs[0].back?.path).toBe(path.join(downloadsDir, 'f3_three.jpg'));
  });

  it('keeps files with the same name apart', async () => {
    mocks.list.mockResolvedValue({
      data: {
        files: [
          { id: 'd1', name: 'IMG_0001.jpg', modifiedTime: '2025-01-01T10:01:00Z' },
          { id: 'd2', name: 'IMG_0001.jpg', modifiedTime: '2025-01-01T10:00:00Z' }
        ]
      }
    });
    mocks.get.mockImplementation(async ({ fileId }: { fileId: string }) => ({ data: Readable.from([Buffer.from(fileId)]) }));

    const [pair] = await new DriveGateway('test-api-key', downloadsDir).downloadAllImages('folder-1');

    expect(pair.front.path).toBe(path.join(downloadsDir, 'd1_IMG_0001.jpg'));
    expect(pair.back?.path).toBe(path.join(downloadsDir, 'd2_IMG_0001.jpg'));
    expect(await readFile(pair.front.path, 'utf8')).toBe('d1');
    expect(await readFile(path.join(downloadsDir, 'd2_IMG_0001.jpg'), 'utf8')).toBe('d2');
    expect(mocks.get).toHaveBeenCalledTimes(2);
  });

  it('returns no pairs for an empty folder', async () => {
    mocks.list.mockResolvedValue({ data: { files: [] } });
    expect(await new DriveGateway('test-api-key', downloadsDir).downloadAllImages('folder-1')).toEqual([]);
  });
});
