import {
  DriveGateway,
  ENV_VARS,
  GeminiGateway,
  authorize,
  describeCatalogWorkflow,
  loadConfig,
  logError,
  logInfo,
  logWarn,
  openCatalogStore,
  requireSetting,
  takeBatch
} from '@shared';
import type {
  CatalogStepName,
  CatalogWriter,
  ImagePair,
  ImageSource,
  ScanCatalogInput,
  ScanCatalogOutput,
  VinylAnalyzer
} from '@shared';

export interface ScanCatalogServices {
  images: ImageSource;
  analyzer: VinylAnalyzer;
  catalog: CatalogWriter;
  folderId: string;
}

async function acquirePairs(services: ScanCatalogServices): Promise<ImagePair[]> {
  try {
    return await services.images.downloadAllImages(services.folderId);
  } catch (error) {
    const step: CatalogStepName = 'AcquireImages';
    logError('Failed to acquire images from Drive', { step, folderId: services.folderId, error });
    return [];
  }
}

export async function scanAndCatalog(
  services: ScanCatalogServices,
  input: ScanCatalogInput = {}
): Promise<ScanCatalogOutput> {
  logInfo('ScanCatalog invoked', { limit: input.limit, ...describeCatalogWorkflow() });

  const allPairs = await acquirePairs(services);
  if (allPairs.length === 0) {
    logWarn('No images found to catalog');
    return { pairCount: 0, processedCount: 0, catalogedCount: 0, reviewCount: 0 };
  }

  const pairs = takeBatch(allPairs, input.limit);
  let processedCount = 0;
  let catalogedCount = 0;
  let reviewCount = 0;

  for (const [index, pair] of pairs.entries()) {
    const position = index + 1;
    let step: CatalogStepName = 'AnalyzeImages';

    try {
      logInfo('Processing image pair', {
        position,
        total: pairs.length,
        front: pair.front.name,
        back: pair.back?.name
      });

      const record = await services.analyzer.analyzeVinylImages(pair.front.path, pair.back?.path);

      step = 'AttachImageUrls';
      record.frontImageUrl = services.images.publicUrl(pair.front.id);
      record.backImageUrl = pair.back ? services.images.publicUrl(pair.back.id) : undefined;

      step = 'GenerateListing';
      if (record.needsReview) {
        reviewCount += 1;
        logWarn('Record needs manual review, leaving it without a sales post', { position, name: record.name });
      } else {
        record.salesPost = await services.analyzer.generateSalesPost(record);
      }

      step = 'UpsertRecord';
      const outcome = await services.catalog.upsert(record);
      processedCount += 1;

      if (outcome.ok) {
        catalogedCount += 1;
        logInfo('Record cataloged', { position, vinylId: outcome.vinylId, action: outcome.action });
      } else {
        logError('Record could not be written to the catalog', { position, vinylId: outcome.vinylId });
      }
    } catch (error) {
      logError('Failed to process image pair', { position, step, front: pair.front.name, error });
    }
  }

  logInfo('ScanCatalog finished', { pairs: pairs.length, processedCount, catalogedCount, reviewCount });
  return { pairCount: pairs.length, processedCount, catalogedCount, reviewCount };
}

export async function handler(input: ScanCatalogInput = {}): Promise<ScanCatalogOutput> {
  const config = loadConfig();
  const geminiApiKey = requireSetting(config.geminiApiKey, ENV_VARS.GEMINI_API_KEY);
  const folderId = requireSetting(config.googleDriveFolderId, ENV_VARS.GOOGLE_DRIVE_FOLDER_ID);

  const auth = await authorize(config);
  const catalog = await openCatalogStore(config, auth);

  return scanAndCatalog(
    {
      images: new DriveGateway(auth, config.downloadsDir),
      analyzer: new GeminiGateway(geminiApiKey, config.geminiModel),
      catalog,
      folderId
    },
    input
  );
}
