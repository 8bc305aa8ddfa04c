/**
 * Document interfaces for the paper sync pipeline
 *
 * A document is a PDF discovered in the watched Drive folder. It lives for one
 * cycle only; nothing here is persisted except its id, via the ledger.
 */

/** MIME type the lister keeps */
export const PDF_MIME_TYPE = 'application/pdf';

/**
 * File as returned by the Drive folder listing boundary
 */
export interface RemoteFile {
  id: string;
  name: string;
  /** ISO 8601 timestamp */
  modifiedTime: string;
  mimeType: string;
}

/**
 * Candidate document. Identity is `id`; `name` and `modifiedTime` are descriptive.
 */
export interface DocumentRef {
  /** Provider-assigned, stable file id */
  readonly id: string;
  readonly name: string;
  /** ISO 8601 timestamp */
  readonly modifiedTime: string;
}

/**
 * Text derived from one document, discarded after the cycle
 */
export interface ExtractedContent {
  documentId: string;
  /** Empty when extractionFailed is true */
  text: string;
  /** Total pages in the file (0 when the file could not be parsed) */
  pageCount: number;
  extractionFailed: boolean;
  /** True when text was cut to the summarizer's input limit */
  truncated: boolean;
  /** Why extraction failed, for the log */
  failureReason?: string;
}

/**
 * Link to the file in the Drive web UI
 */
export function driveViewUrl(documentId: string): string {
  return `https://drive.google.com/file/d/${encodeURIComponent(documentId)}/view`;
}
