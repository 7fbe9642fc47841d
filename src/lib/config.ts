import 'dotenv/config';
import path from 'path';
import { DEFAULT_GEMINI_MODEL, DEFAULT_SHEET_NAME, ENV_VARS } from './constants';

export interface AppConfig {
  googleSheetsId: string;
  googleDriveFolderId?: string;
  sheetName: string;
  geminiApiKey?: string;
  geminiModel: string;
  instagramUsername?: string;
  instagramPassword?: string;
  credentialsFile: string;
  tokenFile: string;
  downloadsDir: string;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function getEnv(key: string, required = true): string | undefined {
  const value = process.env[key]?.trim();
  if (required && !value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value || undefined;
}

export function requireSetting<T>(value: T | undefined, envVar: string): T {
  if (value === undefined || value === '') {
    throw new ConfigurationError(`${envVar} is not configured. Set it in .env before running this command.`);
  }
  return value;
}

export function loadConfig(): AppConfig {
  const home = path.resolve(getEnv(ENV_VARS.VINYL_BOT_HOME, false) ?? process.cwd());
  const credentialsDir = path.join(home, 'credentials');

  return {
    googleSheetsId: requireSetting(getEnv(ENV_VARS.GOOGLE_SHEETS_ID), ENV_VARS.GOOGLE_SHEETS_ID),
    googleDriveFolderId: getEnv(ENV_VARS.GOOGLE_DRIVE_FOLDER_ID, false),
    sheetName: getEnv(ENV_VARS.SHEET_NAME, false) ?? DEFAULT_SHEET_NAME,
    geminiApiKey: getEnv(ENV_VARS.GEMINI_API_KEY, false),
    geminiModel: getEnv(ENV_VARS.GEMINI_MODEL, false) ?? DEFAULT_GEMINI_MODEL,
    instagramUsername: getEnv(ENV_VARS.INSTAGRAM_USERNAME, false),
    instagramPassword: getEnv(ENV_VARS.INSTAGRAM_PASSWORD, false),
    credentialsFile: path.join(credentialsDir, 'credentials.json'),
    tokenFile: path.join(credentialsDir, 'token.json'),
    downloadsDir: path.join(home, 'downloads')
  };
}
