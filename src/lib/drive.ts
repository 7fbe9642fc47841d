import { createWriteStream, existsSync } from 'fs';
import { mkdir, rm } from 'fs/promises';
import path from 'path';
import { pipeline } from 'stream/promises';
import { google, type drive_v3 } from 'googleapis';
import { DRIVE_FILE_URL_PREFIX, IMAGE_MIME_TYPES } from './constants';
import { logDebug, logError, logInfo, logWarn } from './logger';
import type { GoogleApiAuth } from './sheets';
import type { DownloadedImage, DriveImageFile, ImagePair, ImageSource } from './types';

export function buildDriveUrl(fileId: string): string {
  return `${DRIVE_FILE_URL_PREFIX}${fileId}/view`;
}

export function extractDriveFileId(url: string | null | undefined): string | null {
  const trimmed = url?.trim();
  if (!trimmed || !trimmed.startsWith(DRIVE_FILE_URL_PREFIX)) {
    return null;
  }

  const match = trimmed.slice(DRIVE_FILE_URL_PREFIX.length).match(/^([A-Za-z0-9_-]+)(?:[/?#]|$)/);
  return match ? match[1] : null;
}

function modifiedAt(image: DriveImageFile): number {
  const parsed = Date.parse(image.modifiedTime);
  return Number.isNaN(parsed) ? 0 : parsed;
}

/** Groups images newest-first into (front, back) pairs; an odd image out becomes front-only. */
export function pairImages(images: DownloadedImage[]): ImagePair[] {
  const ordered = [...images].sort((a, b) => modifiedAt(b) - modifiedAt(a));
  const pairs: ImagePair[] = [];

  for (let i = 0; i < ordered.length; i += 2) {
    const front = ordered[i];
    const back = ordered[i + 1] ?? null;
    if (!back) {
      logWarn('Image without a pair, cataloging front only', { name: front.name });
    }
    pairs.push({ front, back });
  }

  return pairs;
}

export function buildImageQuery(folderId: string): string {
  const mimeQuery = IMAGE_MIME_TYPES.map((mimeType) => `mimeType='${mimeType}'`).join(' or ');
  return `'${folderId}' in parents and (${mimeQuery}) and trashed=false`;
}

/** Drive allows duplicate names in a folder, so local copies carry the file id. */
export function localImageName(image: DriveImageFile): string {
  return `${image.id}_${path.basename(image.name)}`;
}

export class DriveGateway implements ImageSource {
  private readonly api: drive_v3.Drive;

  constructor(auth: GoogleApiAuth, private readonly downloadsDir: string) {
    this.api = google.drive({ version: 'v3', auth });
  }

  publicUrl(fileId: string): string {
    return buildDriveUrl(fileId);
  }

  async listImages(folderId: string): Promise<DriveImageFile[]> {
    const results: DriveImageFile[] = [];
    let pageToken: string | undefined;

    do {
      const { data } = await this.api.files.list({
        q: buildImageQuery(folderId),
        spaces: 'drive',
        fields: 'nextPageToken, files(id, name, mimeType, modifiedTime)',
        orderBy: 'modifiedTime desc',
        pageToken
      });

      for (const file of data.files ?? []) {
        if (!file.id || !file.name) continue;
        results.push({ id: file.id, name: file.name, modifiedTime: file.modifiedTime ?? '' });
      }
      pageToken = data.nextPageToken ?? undefined;
    } while (pageToken);

    logInfo('Drive images listed', { folderId, count: results.length });
    return results;
  }

  async downloadImage(fileId: string, fileName: string): Promise<string> {
    const target = path.join(this.downloadsDir, path.basename(fileName));
    if (existsSync(target)) {
      logDebug('Image already downloaded', { fileName });
      return target;
    }

    await mkdir(this.downloadsDir, { recursive: true });
    const response = await this.api.files.get({ fileId, alt: 'media' }, { responseType: 'stream' });

    try {
      await pipeline(response.data, createWriteStream(target));
    } catch (error) {
      await rm(target, { force: true });
      throw error;
    }

    logInfo('Image downloaded', { fileName });
    return target;
  }

  async downloadAllImages(folderId: string): Promise<ImagePair[]> {
    const images = await this.listImages(folderId);
    if (images.length === 0) {
      logWarn('No images found in Drive folder', { folderId });
      return [];
    }

    const downloaded: DownloadedImage[] = [];
    for (const image of images) {
      try {
        const filePath = await this.downloadImage(image.id, localImageName(image));
        downloaded.push({ ...image, path: filePath });
      } catch (error) {
        logError('Failed to download Drive image', { name: image.name, error });
      }
    }

    const pairs = pairImages(downloaded);
    logInfo('Image pairs identified', { pairs: pairs.length });
    return pairs;
  }
}
