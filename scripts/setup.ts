import 'dotenv/config';
import { existsSync } from 'fs';
import {
  DriveGateway,
  authorize,
  loadConfig,
  openCatalogStore,
  runConsentFlow
} from '@shared';
import type { AppConfig } from '@shared';

async function ensureGoogleToken(config: AppConfig): Promise<void> {
  if (existsSync(config.tokenFile)) {
    return;
  }

  console.log('Opening the Google consent screen in your browser...');
  await runConsentFlow(config);
}

async function main() {
  const config = loadConfig();
  await ensureGoogleToken(config);
  const auth = await authorize(config);

  const catalog = await openCatalogStore(config, auth);
  const rows = await catalog.listAll();
  console.log(`Google Sheets OK (${rows.length} cataloged records in "${config.sheetName}")`);

  if (config.googleDriveFolderId) {
    const drive = new DriveGateway(auth, config.downloadsDir);
    const images = await drive.listImages(config.googleDriveFolderId);
    console.log(`Google Drive OK (${images.length} images in the folder)`);
  } else {
    console.warn('GOOGLE_DRIVE_FOLDER_ID is not set; scanning will not work.');
  }

  console.log('');
  console.log('Current settings:');
  console.log(`  Gemini API: ${config.geminiApiKey ? 'configured' : 'missing (set GEMINI_API_KEY to analyze images)'}`);
  console.log(
    `  Instagram:  ${
      config.instagramUsername && config.instagramPassword
        ? `configured as @${config.instagramUsername}`
        : 'missing (set INSTAGRAM_USERNAME and INSTAGRAM_PASSWORD to publish)'
    }`
  );
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
