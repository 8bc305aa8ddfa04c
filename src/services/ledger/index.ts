/**
 * Ledger Service
 * Persisted at-most-once record of processed documents, and the failure log
 * kept beside it
 */

import { FailureLog, JsonFailureStore, failureLogPath } from './failure-log.js';
import { FileLedgerStore } from './file-store.js';
import { Ledger } from './ledger.js';
import { SqliteLedgerStore } from './sqlite-store.js';
import type { LedgerStore } from './store.js';

export { Ledger } from './ledger.js';
export { FileLedgerStore, parseEntry, serializeEntry } from './file-store.js';
export { SqliteLedgerStore } from './sqlite-store.js';
export { FailureLog, JsonFailureStore, failureLogPath, type FailureStore } from './failure-log.js';
export { migrateLegacyList, type MigrationResult } from './migrate.js';
export type { LedgerStore } from './store.js';

export type LedgerBackend = 'file' | 'sqlite';

export function createLedgerStore(backend: LedgerBackend, filePath: string): LedgerStore {
  return backend === 'sqlite' ? new SqliteLedgerStore(filePath) : new FileLedgerStore(filePath);
}

export function createLedger(backend: LedgerBackend, filePath: string): Ledger {
  return new Ledger(createLedgerStore(backend, filePath));
}

/**
 * The failure log that belongs to the ledger at `ledgerPath`
 */
export function createFailureLog(ledgerPath: string): FailureLog {
  return new FailureLog(new JsonFailureStore(failureLogPath(ledgerPath)));
}
