/**
 * Google Drive boundary
 *
 * Two narrow calls: list a folder's files, fetch one file's bytes. Both are
 * read-only. Drive answers 403 for throttling as well as for missing access,
 * so the status alone decides nothing: only a token that lacks the Drive scope
 * (reason `insufficientPermissions`) is a ConfigurationError. Every other
 * failure, 401/403/404 included, is a TransientError and the orchestrator
 * retries or skips the document.
 *
 * @module services/drive/source
 */

import { google, type drive_v3 } from 'googleapis';

import { ConfigurationError, TransientError, httpStatusOf, toErrorMessage } from '../../errors.js';
import type { RemoteFile } from '../../models/document.js';

export type DriveAuth = NonNullable<drive_v3.Options['auth']>;

export interface DriveSource {
  listFolder(folderId: string): Promise<RemoteFile[]>;
  fetchContent(fileId: string): Promise<Uint8Array>;
}

export type DriveListParams = drive_v3.Params$Resource$Files$List;

/**
 * The two `files` calls the source makes, unwrapped from their responses
 */
export interface DriveFilesClient {
  list(params: DriveListParams, timeoutMs: number): Promise<drive_v3.Schema$FileList>;
  download(fileId: string, timeoutMs: number): Promise<unknown>;
}

export interface GoogleDriveSourceOptions {
  requestTimeoutMs: number;
  pageSize?: number;
}

const FATAL_REASONS = new Set(['insufficientPermissions']);

/**
 * Quote a value for the Drive query language
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function buildFolderQuery(folderId: string): string {
  return `'${escapeQueryValue(folderId)}' in parents and trashed = false`;
}

function firstReason(list: unknown): string | undefined {
  if (!Array.isArray(list)) return undefined;
  const first: unknown = list[0];
  if (typeof first === 'object' && first !== null && 'reason' in first && typeof first.reason === 'string') {
    return first.reason;
  }
  return undefined;
}

/**
 * The `errors[0].reason` Drive puts in its error body, read either from the
 * client error itself or from the raw response
 */
export function driveErrorReason(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('errors' in error) {
    const reason = firstReason(error.errors);
    if (reason) return reason;
  }
  if (!('response' in error) || typeof error.response !== 'object' || error.response === null) return undefined;
  const response = error.response;
  if (!('data' in response) || typeof response.data !== 'object' || response.data === null) return undefined;
  const data = response.data;
  if (!('error' in data) || typeof data.error !== 'object' || data.error === null) return undefined;
  const body = data.error;
  return 'errors' in body ? firstReason(body.errors) : undefined;
}

export function classifyDriveError(message: string, error: unknown): Error {
  const status = httpStatusOf(error);
  const reason = driveErrorReason(error);
  const label = reason ? `HTTP ${status ?? '?'} ${reason}` : status !== undefined ? `HTTP ${status}` : 'no response';

  if (status === 403 && reason !== undefined && FATAL_REASONS.has(reason)) {
    return new ConfigurationError(`${message} (${label}): ${toErrorMessage(error)}`, { cause: error });
  }
  return new TransientError(`${message} (${label}): ${toErrorMessage(error)}`, { cause: error, statusCode: status });
}

function googleFilesClient(auth: DriveAuth): DriveFilesClient {
  const drive = google.drive({ version: 'v3', auth });
  return {
    async list(params, timeoutMs) {
      const res = await drive.files.list(params, { timeout: timeoutMs });
      return res.data;
    },
    async download(fileId, timeoutMs) {
      const res = await drive.files.get(
        { fileId, alt: 'media', supportsAllDrives: true },
        { responseType: 'arraybuffer', timeout: timeoutMs }
      );
      return res.data;
    },
  };
}

export class GoogleDriveSource implements DriveSource {
  private readonly requestTimeoutMs: number;
  private readonly pageSize: number;

  constructor(
    private readonly files: DriveFilesClient,
    options: GoogleDriveSourceOptions
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.pageSize = options.pageSize ?? 100;
  }

  static fromAuth(auth: DriveAuth, options: GoogleDriveSourceOptions): GoogleDriveSource {
    return new GoogleDriveSource(googleFilesClient(auth), options);
  }

  async listFolder(folderId: string): Promise<RemoteFile[]> {
    const files: RemoteFile[] = [];
    let pageToken: string | undefined;

    do {
      let data: drive_v3.Schema$FileList;
      try {
        data = await this.files.list(
          {
            q: buildFolderQuery(folderId),
            fields: 'nextPageToken, files(id, name, mimeType, modifiedTime)',
            pageSize: this.pageSize,
            pageToken,
            supportsAllDrives: true,
            includeItemsFromAllDrives: true,
          },
          this.requestTimeoutMs
        );
      } catch (error) {
        throw classifyDriveError(`Drive listing failed for folder ${folderId}`, error);
      }

      for (const file of data.files ?? []) {
        if (!file.id) continue;
        files.push({
          id: file.id,
          name: file.name ?? file.id,
          modifiedTime: file.modifiedTime ?? '',
          mimeType: file.mimeType ?? '',
        });
      }
      pageToken = data.nextPageToken ?? undefined;
    } while (pageToken);

    return files;
  }

  async fetchContent(fileId: string): Promise<Uint8Array> {
    let payload: unknown;
    try {
      payload = await this.files.download(fileId, this.requestTimeoutMs);
    } catch (error) {
      throw classifyDriveError(`Drive download failed for ${fileId}`, error);
    }

    if (payload instanceof ArrayBuffer) return new Uint8Array(payload);
    if (payload instanceof Uint8Array) return payload;
    throw new TransientError(`Drive download for ${fileId} returned ${typeof payload}, expected bytes`);
  }
}
