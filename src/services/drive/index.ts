/**
 * Google Drive Service
 * Folder listing, content download and authorization
 */

export {
  GoogleDriveSource,
  buildFolderQuery,
  classifyDriveError,
  escapeQueryValue,
  type DriveSource,
  type DriveAuth,
  type DriveFilesClient,
  type GoogleDriveSourceOptions,
} from './source.js';
export { DocumentLister } from './lister.js';
export { createDriveAuth, DRIVE_READONLY_SCOPE } from './auth.js';
