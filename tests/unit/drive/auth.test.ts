/**
 * Unit tests for Drive authorization from local files
 *
 * @see src/services/drive/auth.ts
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { google } from 'googleapis';

import { ConfigurationError } from '../../../src/errors.js';
import { createDriveAuth } from '../../../src/services/drive/auth.js';

const CLIENT = { installed: { client_id: 'test-client', client_secret: 'test-secret', redirect_uris: ['http://localhost'] } };
const TOKEN = { refresh_token: 'test-refresh-token', token_type: 'Bearer' };

describe('createDriveAuth', () => {
  let dir: string;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'paper-sync-auth-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function config(overrides: { serviceAccountKeyPath?: string } = {}) {
    return {
      folderId: 'folder-1',
      credentialsPath: path.join(dir, 'credentials.json'),
      tokenPath: path.join(dir, 'token.json'),
      requestTimeoutMs: 1000,
      ...overrides,
    };
  }

  it('builds an OAuth client from saved credentials', () => {
    fs.writeFileSync(path.join(dir, 'credentials.json'), JSON.stringify(CLIENT));
    fs.writeFileSync(path.join(dir, 'token.json'), JSON.stringify(TOKEN));

    const auth = createDriveAuth(config());

    expect(auth).toBeInstanceOf(google.auth.OAuth2);
  });

  it('prefers a service account key when configured', () => {
    const keyPath = path.join(dir, 'service-account.json');
    fs.writeFileSync(keyPath, JSON.stringify({ type: 'service_account' }));

    const auth = createDriveAuth(config({ serviceAccountKeyPath: keyPath }));

    expect(auth).toBeInstanceOf(google.auth.GoogleAuth);
  });

  it('fails with a configuration error when the client file is missing', () => {
    expect(() => createDriveAuth(config())).toThrow(ConfigurationError);
  });

  it('fails when the token file holds no token', () => {
    fs.writeFileSync(path.join(dir, 'credentials.json'), JSON.stringify(CLIENT));
    fs.writeFileSync(path.join(dir, 'token.json'), JSON.stringify({ token_type: 'Bearer' }));

    expect(() => createDriveAuth(config())).toThrow('token file holds neither a refresh_token nor an access_token');
  });

  it('fails when the service account key does not exist', () => {
    expect(() => createDriveAuth(config({ serviceAccountKeyPath: path.join(dir, 'missing.json') }))).toThrow(
      ConfigurationError
    );
  });
});
