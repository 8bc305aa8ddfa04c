/**
 * Text printed by --status
 *
 * @module cli/status
 */

import type { FailureRecord, LedgerEntry } from '../models/ledger.js';

export const STATUS_RECENT_ENTRIES = 5;
export const STATUS_MAX_FAILURES = 20;

const DETAIL_WIDTH = 160;

function oneLine(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > DETAIL_WIDTH ? `${flat.slice(0, DETAIL_WIDTH - 3)}...` : flat;
}

/**
 * @param entries ledger entries in the order they were recorded
 * @param failures most recent first
 */
export function formatStatus(
  ledgerLocation: string,
  entries: LedgerEntry[],
  failureLocation: string,
  failures: FailureRecord[]
): string {
  const lines = [`Ledger: ${ledgerLocation}`, `Processed documents: ${entries.length}`];
  for (const entry of entries.slice(-STATUS_RECENT_ENTRIES).reverse()) {
    lines.push(`  ${entry.processedAt}  ${entry.documentId}`);
  }

  const skipped = failures.filter((f) => f.status === 'skipped').length;
  lines.push(
    '',
    `Failure log: ${failureLocation}`,
    `Unfinished documents: ${failures.length} (${failures.length - skipped} failed, ${skipped} skipped)`
  );
  for (const failure of failures.slice(0, STATUS_MAX_FAILURES)) {
    lines.push(
      `  ${failure.lastFailedAt}  ${failure.status}/${failure.reason}  ${failure.documentName} (${failure.documentId}), ` +
        `${failure.attempts} attempt(s)`,
      `      ${oneLine(failure.detail)}`
    );
  }
  if (failures.length > STATUS_MAX_FAILURES) {
    lines.push(`  ... and ${failures.length - STATUS_MAX_FAILURES} more`);
  }
  return lines.join('\n');
}
