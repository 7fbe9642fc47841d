import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { IgApiClient } from 'instagram-private-api';
import { INSTAGRAM_MAX_ALBUM_IMAGES } from './constants';
import { logError, logInfo, logWarn } from './logger';
import type { AlbumPublisher, PostHandle } from './types';

function toPostHandle(media: { id: string; code: string }): PostHandle {
  return { mediaId: media.id, code: media.code };
}

export class InstagramGateway implements AlbumPublisher {
  private readonly client = new IgApiClient();
  private loggedIn = false;

  constructor(private readonly username: string, private readonly password: string) {}

  async login(): Promise<void> {
    if (this.loggedIn) return;

    logInfo('Logging in to Instagram', { username: this.username });
    this.client.state.generateDevice(this.username);
    await this.client.account.login(this.username, this.password);
    this.loggedIn = true;
    logInfo('Instagram login succeeded', { username: this.username });
  }

  async postAlbum(imagePaths: string[], caption: string): Promise<PostHandle | null> {
    if (imagePaths.length === 0) {
      logError('No images provided for Instagram post');
      return null;
    }

    let candidates = imagePaths;
    if (candidates.length > INSTAGRAM_MAX_ALBUM_IMAGES) {
      logWarn('Instagram albums take at most 10 images, truncating', { provided: candidates.length });
      candidates = candidates.slice(0, INSTAGRAM_MAX_ALBUM_IMAGES);
    }

    const validPaths = candidates.filter((imagePath) => {
      const exists = existsSync(imagePath);
      if (!exists) {
        logWarn('Image not found, leaving it out of the post', { imagePath });
      }
      return exists;
    });

    if (validPaths.length === 0) {
      logError('No valid images left for Instagram post');
      return null;
    }

    try {
      await this.login();
      const files = await Promise.all(validPaths.map((imagePath) => readFile(imagePath)));

      if (files.length === 1) {
        logInfo('Posting single image');
        const response = await this.client.publish.photo({ file: files[0], caption });
        const handle = toPostHandle(response.media);
        logInfo('Instagram post published', { mediaId: handle.mediaId });
        return handle;
      }

      logInfo('Posting album', { images: files.length });
      const response = await this.client.publish.album({
        items: files.map((file) => ({ file })),
        caption
      });
      const handle = toPostHandle(response.media);
      logInfo('Instagram album published', { mediaId: handle.mediaId });
      return handle;
    } catch (error) {
      logError('Failed to publish on Instagram', { error });
      return null;
    }
  }
}
