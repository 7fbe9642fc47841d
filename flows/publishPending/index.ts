import {
  DriveGateway,
  ENV_VARS,
  InstagramGateway,
  VINYL_STATUSES,
  authorize,
  describePublishWorkflow,
  extractDriveFileId,
  loadConfig,
  logError,
  logInfo,
  logWarn,
  openCatalogStore,
  requireSetting,
  takeBatch
} from '@shared';
import type {
  AlbumPublisher,
  CatalogRowView,
  ImageSource,
  PublicationStore,
  PublishPendingInput,
  PublishPendingOutput,
  PublishStepName
} from '@shared';

export interface PublishPendingServices {
  catalog: PublicationStore;
  images: Pick<ImageSource, 'downloadImage'>;
  publisher: AlbumPublisher;
  now?: () => Date;
}

function toPreview(rows: CatalogRowView[]): PublishPendingOutput['preview'] {
  return rows.map(({ rowIndex, name, artist }) => ({ rowIndex, name, artist }));
}

export async function resolveRowImages(
  row: CatalogRowView,
  images: Pick<ImageSource, 'downloadImage'>
): Promise<string[]> {
  const sides = [
    { side: 'front', url: row.frontImageUrl },
    { side: 'back', url: row.backImageUrl }
  ];
  const paths: string[] = [];

  for (const { side, url } of sides) {
    if (!url) continue;

    const fileId = extractDriveFileId(url);
    if (!fileId) {
      logWarn('Could not extract Drive file id from image URL', { rowIndex: row.rowIndex, side, url });
      continue;
    }

    try {
      paths.push(await images.downloadImage(fileId, `temp_${side}_${fileId}.jpg`));
    } catch (error) {
      logError('Failed to download image for post', { rowIndex: row.rowIndex, side, fileId, error });
    }
  }

  return paths;
}

export async function previewPending(
  catalog: Pick<PublicationStore, 'listPendingForPublication'>,
  input: PublishPendingInput = {}
): Promise<PublishPendingOutput> {
  const pending = await catalog.listPendingForPublication();
  const batch = takeBatch(pending, input.limit);
  logInfo('PublishPending dry run', { pending: pending.length, wouldPublish: batch.length });
  return { pendingCount: pending.length, publishedCount: 0, preview: toPreview(batch) };
}

export async function publishPending(
  services: PublishPendingServices,
  input: PublishPendingInput = {}
): Promise<PublishPendingOutput> {
  logInfo('PublishPending invoked', { limit: input.limit, ...describePublishWorkflow() });
  const now = services.now ?? (() => new Date());

  const pending = await services.catalog.listPendingForPublication();
  if (pending.length === 0) {
    logInfo('No pending records to publish');
    return { pendingCount: 0, publishedCount: 0, preview: [] };
  }

  const batch = takeBatch(pending, input.limit);

  try {
    await services.publisher.login();
  } catch (error) {
    logError('Instagram login failed, nothing was published', { error });
    return { pendingCount: pending.length, publishedCount: 0, preview: toPreview(batch) };
  }

  let publishedCount = 0;

  for (const row of batch) {
    let step: PublishStepName = 'ResolveImages';

    try {
      logInfo('Publishing record', { rowIndex: row.rowIndex, name: row.name, artist: row.artist });

      const imagePaths = await resolveRowImages(row, services.images);
      if (imagePaths.length === 0) {
        logError('No images could be downloaded for the post', { rowIndex: row.rowIndex });
        continue;
      }

      step = 'PostAlbum';
      const handle = await services.publisher.postAlbum(imagePaths, row.salesPost);
      if (!handle) {
        logError('Instagram post failed, record stays pending', { rowIndex: row.rowIndex });
        continue;
      }

      step = 'MarkPublished';
      publishedCount += 1;
      const marked = await services.catalog.updateStatus(row.rowIndex, VINYL_STATUSES.PUBLISHED, now());
      if (!marked) {
        logWarn('Post published but status was not saved; the record may be posted again', {
          rowIndex: row.rowIndex,
          mediaId: handle.mediaId
        });
      } else {
        logInfo('Record published', { rowIndex: row.rowIndex, mediaId: handle.mediaId });
      }
    } catch (error) {
      logError('Failed to publish record', { rowIndex: row.rowIndex, step, error });
    }
  }

  logInfo('PublishPending finished', { attempted: batch.length, publishedCount });
  return { pendingCount: pending.length, publishedCount, preview: toPreview(batch) };
}

export async function handler(input: PublishPendingInput = {}): Promise<PublishPendingOutput> {
  const config = loadConfig();
  const credentials = input.dryRun
    ? undefined
    : {
        username: requireSetting(config.instagramUsername, ENV_VARS.INSTAGRAM_USERNAME),
        password: requireSetting(config.instagramPassword, ENV_VARS.INSTAGRAM_PASSWORD)
      };

  const auth = await authorize(config);
  const catalog = await openCatalogStore(config, auth);

  if (!credentials) {
    return previewPending(catalog, input);
  }

  return publishPending(
    {
      catalog,
      images: new DriveGateway(auth, config.downloadsDir),
      publisher: new InstagramGateway(credentials.username, credentials.password)
    },
    input
  );
}
