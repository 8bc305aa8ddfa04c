/**
 * Dedup Ledger
 *
 * Persisted set of document ids that completed the whole pipeline. Source of
 * truth for "seen". Owned by one orchestrator; never a module-level singleton.
 *
 * Lifecycle: load() once at start, mark() after each successful write (which
 * flushes before resolving), close() on shutdown.
 *
 * @module services/ledger/ledger
 */

import type { LedgerEntry } from '../../models/ledger.js';
import type { LedgerStore } from './store.js';

export class Ledger {
  private readonly entriesById = new Map<string, LedgerEntry>();
  private loaded = false;

  /**
   * Serializes mark()/flush()/close(): at most one writer touches the store at a time.
   */
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: LedgerStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get location(): string {
    return this.store.location;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  get size(): number {
    return this.entriesById.size;
  }

  /**
   * Rebuild the in-memory set from the store.
   * @throws LedgerCorruptionError when the store fails validation
   */
  async load(): Promise<void> {
    const entries = await this.store.load();
    this.entriesById.clear();
    for (const entry of entries) {
      this.entriesById.set(entry.documentId, entry);
    }
    this.loaded = true;
    console.error(`[Ledger] Loaded ${entries.length} processed document(s) from ${this.store.location}`);
  }

  contains(documentId: string): boolean {
    this.assertLoaded();
    return this.entriesById.has(documentId);
  }

  /**
   * Record a document as processed and flush durably.
   * Marking an id that is already present is a no-op returning the existing entry.
   */
  async mark(documentId: string): Promise<LedgerEntry> {
    this.assertLoaded();
    if (documentId.length === 0) {
      throw new Error('Cannot mark an empty document id');
    }

    return this.exclusive(async () => {
      const existing = this.entriesById.get(documentId);
      if (existing) return existing;

      const entry: LedgerEntry = { documentId, processedAt: this.clock().toISOString() };
      await this.store.append(entry);
      // Once appended the id must never be appended again, even if flush fails
      this.entriesById.set(documentId, entry);
      await this.store.flush();
      return entry;
    });
  }

  /**
   * Make every mark so far durable. mark() already does this for its own entry.
   */
  async flush(): Promise<void> {
    await this.exclusive(() => this.store.flush());
  }

  /**
   * Entries in the order they were recorded
   */
  entries(): LedgerEntry[] {
    this.assertLoaded();
    return [...this.entriesById.values()];
  }

  async close(): Promise<void> {
    await this.exclusive(() => this.store.close());
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const prev = this.writeQueue;
    let release!: () => void;
    this.writeQueue = new Promise<void>((r) => {
      release = r;
    });

    try {
      await prev;
      return await fn();
    } finally {
      release();
    }
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new Error('Ledger used before load()');
    }
  }
}
