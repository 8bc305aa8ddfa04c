/**
 * Per-document outcomes and per-cycle reports
 *
 * Every document that enters Processing ends in exactly one outcome. Only
 * `done` advances the ledger; the other two are kept in the failure log.
 */

import type { DocumentRef } from './document.js';

/** Nothing went wrong; the document simply has no usable text */
export type SkipReason = 'extraction_failed';

/** content_error: the document was rejected downstream and needs a look */
export type FailReason = 'transient_exhausted' | 'content_error' | 'unexpected';

export interface DoneOutcome {
  status: 'done';
  document: DocumentRef;
  /** Page id in the record database */
  recordId: string;
  /** False when the correlation guard found an existing record */
  created: boolean;
}

export interface SkippedOutcome {
  status: 'skipped';
  document: DocumentRef;
  reason: SkipReason;
  detail: string;
}

export interface FailedOutcome {
  status: 'failed';
  document: DocumentRef;
  reason: FailReason;
  detail: string;
}

export type DocumentOutcome = DoneOutcome | SkippedOutcome | FailedOutcome;

export interface CycleReport {
  cycleId: string;
  startedAt: string;
  finishedAt: string;
  /** PDFs returned by the lister */
  listed: number;
  /** Already in the ledger, never entered Processing */
  filtered: number;
  processed: number;
  skipped: number;
  failed: number;
  /** Cancellation was observed before every new document was handled */
  cancelled: boolean;
  outcomes: DocumentOutcome[];
}

export function summarizeCycle(report: CycleReport): string {
  return (
    `processed=${report.processed} skipped=${report.skipped} failed=${report.failed} ` +
    `filtered=${report.filtered}` +
    (report.cancelled ? ' (cancelled)' : '')
  );
}
