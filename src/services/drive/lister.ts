/**
 * Document Lister
 *
 * Read-only query of the watched folder, reduced to PDF DocumentRefs, oldest
 * first. Performs no retry: boundary failures reach the caller as
 * TransientError.
 */

import { PDF_MIME_TYPE, type DocumentRef } from '../../models/document.js';
import type { DriveSource } from './source.js';

export class DocumentLister {
  constructor(private readonly source: DriveSource) {}

  async list(folderId: string): Promise<DocumentRef[]> {
    const files = await this.source.listFolder(folderId);

    const documents = files
      .filter((file) => file.mimeType === PDF_MIME_TYPE)
      .map((file): DocumentRef => ({ id: file.id, name: file.name, modifiedTime: file.modifiedTime }))
      .sort((a, b) => a.modifiedTime.localeCompare(b.modifiedTime) || a.id.localeCompare(b.id));

    console.error(`[Lister] Folder ${folderId}: ${files.length} file(s), ${documents.length} PDF(s)`);
    return documents;
  }
}
