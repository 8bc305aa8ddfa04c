/**
 * Durable backing store for the ledger
 *
 * Implementations are append-only. load() must detect corruption and throw
 * LedgerCorruptionError instead of returning a partial or empty set.
 */

import type { LedgerEntry } from '../../models/ledger.js';

export interface LedgerStore {
  /** Human-readable location, for diagnostics */
  readonly location: string;

  /** Every persisted entry. A missing store yields []. */
  load(): Promise<LedgerEntry[]>;

  append(entry: LedgerEntry): Promise<void>;

  /** After this resolves, every appended entry survives a crash */
  flush(): Promise<void>;

  close(): Promise<void>;
}
