import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import path from 'path';
import { authenticate } from '@google-cloud/local-auth';
import { google, type Auth } from 'googleapis';
import { z } from 'zod';
import { ConfigurationError } from './config';
import { GOOGLE_SCOPES } from './constants';
import { logDebug, logError, logInfo } from './logger';

const ClientSecretsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional()
});

const ClientSecretsFileSchema = z.object({
  installed: ClientSecretsSchema.optional(),
  web: ClientSecretsSchema.optional()
});

const StoredTokenSchema = z
  .object({
    access_token: z.string().nullish(),
    refresh_token: z.string().nullish(),
    expiry_date: z.number().nullish(),
    scope: z.string().optional(),
    token_type: z.string().nullish(),
    id_token: z.string().nullish()
  })
  .passthrough();

type ClientSecrets = z.infer<typeof ClientSecretsSchema>;

export interface GoogleAuthPaths {
  credentialsFile: string;
  tokenFile: string;
}

async function readClientSecrets(credentialsFile: string): Promise<ClientSecrets> {
  if (!existsSync(credentialsFile)) {
    throw new ConfigurationError(
      `Google credentials file not found: ${credentialsFile}. Download an OAuth client (Desktop app) from Google Cloud Console and save it there.`
    );
  }

  const parsed = ClientSecretsFileSchema.safeParse(JSON.parse(await readFile(credentialsFile, 'utf8')));
  const secrets = parsed.success ? parsed.data.installed ?? parsed.data.web : undefined;
  if (!secrets) {
    throw new ConfigurationError(`Google credentials file ${credentialsFile} has no OAuth client id/secret`);
  }
  return secrets;
}

async function persistToken(tokenFile: string, credentials: Auth.Credentials): Promise<void> {
  await mkdir(path.dirname(tokenFile), { recursive: true });
  await writeFile(tokenFile, JSON.stringify(credentials, null, 2), 'utf8');
}

export async function createOAuthClient(paths: GoogleAuthPaths): Promise<Auth.OAuth2Client> {
  const secrets = await readClientSecrets(paths.credentialsFile);
  return new google.auth.OAuth2(secrets.client_id, secrets.client_secret, secrets.redirect_uris?.[0]);
}

/** Loads the stored token and keeps it up to date on disk whenever the client refreshes it. */
export async function authorize(paths: GoogleAuthPaths): Promise<Auth.OAuth2Client> {
  const client = await createOAuthClient(paths);

  if (!existsSync(paths.tokenFile)) {
    throw new ConfigurationError(`Google token not found at ${paths.tokenFile}. Run "npm run setup" first.`);
  }

  const stored: Auth.Credentials = StoredTokenSchema.parse(JSON.parse(await readFile(paths.tokenFile, 'utf8')));
  client.setCredentials(stored);
  logDebug('Google token loaded', { tokenFile: paths.tokenFile });

  client.on('tokens', (tokens) => {
    const merged: Auth.Credentials = { ...stored, ...tokens };
    persistToken(paths.tokenFile, merged)
      .then(() => logInfo('Refreshed Google token saved'))
      .catch((error: unknown) => logError('Failed to save refreshed Google token', { error }));
  });

  return client;
}

/** Opens the browser consent screen and catches the redirect on a loopback server. */
export async function runConsentFlow(paths: GoogleAuthPaths): Promise<void> {
  const secrets = await readClientSecrets(paths.credentialsFile);
  if (!secrets.redirect_uris?.some((uri) => uri.startsWith('http://localhost'))) {
    throw new ConfigurationError(
      `Google credentials file ${paths.credentialsFile} has no http://localhost redirect. Create the OAuth client as a Desktop app.`
    );
  }

  const client = await authenticate({ keyfilePath: paths.credentialsFile, scopes: GOOGLE_SCOPES });
  await persistToken(paths.tokenFile, client.credentials);
  logInfo('Google token saved', { tokenFile: paths.tokenFile });
}
