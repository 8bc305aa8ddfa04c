/**
 * Shared test helpers and imports for ledger tests
 *
 * @see src/services/ledger
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import type { FailureRecord, LedgerEntry } from '../../../src/models/ledger.js';
import type { FailureStore } from '../../../src/services/ledger/failure-log.js';
import type { LedgerStore } from '../../../src/services/ledger/store.js';

export { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
export { fs, path };

export { Ledger } from '../../../src/services/ledger/ledger.js';
export { FileLedgerStore, isTornPrefix, parseEntry, serializeEntry } from '../../../src/services/ledger/file-store.js';
export { SqliteLedgerStore } from '../../../src/services/ledger/sqlite-store.js';
export { migrateLegacyList } from '../../../src/services/ledger/migrate.js';
export { FailureLog, JsonFailureStore, failureLogPath } from '../../../src/services/ledger/failure-log.js';
export { LedgerCorruptionError } from '../../../src/errors.js';
export type { LedgerStore, LedgerEntry, FailureRecord, FailureStore };

/** Prefix registered with tests/global-teardown.ts */
export const LEDGER_TEMP_PREFIX = 'paper-sync-ledger-';

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), LEDGER_TEMP_PREFIX));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Clock returning successive whole seconds from 2024-01-01T00:00:00Z */
export function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++));
}

/**
 * In-memory store that records the calls the ledger makes
 */
export class MemoryStore implements LedgerStore {
  readonly location = 'memory';
  readonly appended: LedgerEntry[] = [];
  flushes = 0;
  failNextFlush = false;
  /** Fail before anything is written, like a crash ahead of the append */
  failNextAppend = false;

  constructor(private readonly initial: LedgerEntry[] = []) {}

  async load(): Promise<LedgerEntry[]> {
    return [...this.initial];
  }

  async append(entry: LedgerEntry): Promise<void> {
    // Yield so concurrent marks would interleave without the ledger's lock
    await Promise.resolve();
    if (this.failNextAppend) {
      this.failNextAppend = false;
      throw new Error('disk unavailable');
    }
    this.appended.push(entry);
  }

  async flush(): Promise<void> {
    this.flushes++;
    if (this.failNextFlush) {
      this.failNextFlush = false;
      throw new Error('disk full');
    }
  }

  async close(): Promise<void> {}
}

/**
 * In-memory failure store keeping every version it was asked to write
 */
export class MemoryFailureStore implements FailureStore {
  readonly location = 'memory';
  readonly writes: FailureRecord[][] = [];
  failNextWrite = false;

  constructor(private readonly initial: FailureRecord[] = []) {}

  get current(): FailureRecord[] {
    return this.writes[this.writes.length - 1] ?? this.initial;
  }

  async read(): Promise<FailureRecord[]> {
    return [...this.initial];
  }

  async write(records: FailureRecord[]): Promise<void> {
    if (this.failNextWrite) {
      this.failNextWrite = false;
      throw new Error('disk full');
    }
    this.writes.push(records.map((record) => ({ ...record })));
  }
}
