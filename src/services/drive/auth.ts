/**
 * Non-interactive Drive authorization
 *
 * Either a service account key file, or an OAuth client (credentials.json)
 * plus the tokens saved by a previous interactive authorization (token.json).
 * Running that interactive consent flow is outside this tool.
 *
 * @module services/drive/auth
 */

import fs from 'fs';
import { google } from 'googleapis';
import { z } from 'zod';

import type { AppConfig } from '../../config/settings.js';
import { ConfigurationError, toErrorMessage } from '../../errors.js';
import type { DriveAuth } from './source.js';

export const DRIVE_READONLY_SCOPE = 'https://www.googleapis.com/auth/drive.readonly';

const OAuthClientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

const ClientSecretsSchema = z
  .object({
    installed: OAuthClientSchema.optional(),
    web: OAuthClientSchema.optional(),
  })
  .refine((v) => v.installed !== undefined || v.web !== undefined, {
    message: 'expected an "installed" or "web" client',
  });

const SavedTokenSchema = z
  .object({
    access_token: z.string().optional(),
    refresh_token: z.string().optional(),
    expiry_date: z.number().optional(),
    token_type: z.string().optional(),
    scope: z.string().optional(),
  })
  .refine((v) => v.refresh_token !== undefined || v.access_token !== undefined, {
    message: 'token file holds neither a refresh_token nor an access_token',
  });

function readJsonFile(filePath: string, what: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(
      `${what} not found at ${filePath}. Authorize once and save the file, or set GOOGLE_SERVICE_ACCOUNT_KEY.`
    );
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`${what} at ${filePath} is not valid JSON: ${toErrorMessage(error)}`);
  }
}

export function createDriveAuth(config: AppConfig['drive']): DriveAuth {
  if (config.serviceAccountKeyPath) {
    if (!fs.existsSync(config.serviceAccountKeyPath)) {
      throw new ConfigurationError(`Service account key not found: ${config.serviceAccountKeyPath}`);
    }
    console.error('[DriveAuth] Using service account credentials');
    return new google.auth.GoogleAuth({
      keyFile: config.serviceAccountKeyPath,
      scopes: [DRIVE_READONLY_SCOPE],
    });
  }

  const secrets = ClientSecretsSchema.safeParse(readJsonFile(config.credentialsPath, 'OAuth client file'));
  if (!secrets.success) {
    throw new ConfigurationError(`Invalid OAuth client file ${config.credentialsPath}: ${secrets.error.message}`);
  }
  const token = SavedTokenSchema.safeParse(readJsonFile(config.tokenPath, 'Saved OAuth token'));
  if (!token.success) {
    throw new ConfigurationError(`Invalid OAuth token file ${config.tokenPath}: ${token.error.message}`);
  }

  const client = secrets.data.installed ?? secrets.data.web;
  if (!client) {
    throw new ConfigurationError(`Invalid OAuth client file ${config.credentialsPath}`);
  }

  const oauth = new google.auth.OAuth2(client.client_id, client.client_secret, client.redirect_uris?.[0]);
  oauth.setCredentials(token.data);
  console.error('[DriveAuth] Using saved OAuth credentials');
  return oauth;
}
