/**
 * Ledger entry: one per document recorded as fully processed
 */
export interface LedgerEntry {
  documentId: string;
  /** ISO 8601 timestamp */
  processedAt: string;
}

/**
 * Last unsuccessful outcome of a document that has not completed yet.
 * Kept for reporting only; it never decides whether a document is processed.
 */
export interface FailureRecord {
  documentId: string;
  documentName: string;
  status: 'skipped' | 'failed';
  reason: string;
  detail: string;
  /** Unsuccessful attempts since the document was first seen failing */
  attempts: number;
  firstFailedAt: string;
  lastFailedAt: string;
}
