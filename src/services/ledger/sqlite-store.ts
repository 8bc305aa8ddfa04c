/**
 * SQLite ledger store
 *
 * Alternative to the JSON Lines file for deployments that already keep state
 * in SQLite. Uses WAL with synchronous=FULL so a committed INSERT survives a
 * crash; flush() is therefore a no-op.
 *
 * @module services/ledger/sqlite-store
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { LedgerCorruptionError } from '../../errors.js';
import type { LedgerEntry } from '../../models/ledger.js';
import { computeEntryChecksum } from '../../utils/hash.js';
import type { LedgerStore } from './store.js';

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS processed_documents (
    document_id TEXT PRIMARY KEY,
    processed_at TEXT NOT NULL,
    checksum TEXT NOT NULL
  )
`;

const LedgerRowSchema = z.object({
  document_id: z.string().min(1),
  processed_at: z.string(),
  checksum: z.string(),
});

function isCorruptionError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    /^SQLITE_(NOTADB|CORRUPT)/.test(error.code)
  );
}

export class SqliteLedgerStore implements LedgerStore {
  readonly location: string;
  private db: Database.Database | null = null;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async load(): Promise<LedgerEntry[]> {
    const db = this.connect();

    let rows: unknown[];
    try {
      const check = db.pragma('quick_check', { simple: true });
      if (check !== 'ok') {
        throw new LedgerCorruptionError(`SQLite integrity check failed: ${String(check)}`, this.location);
      }
      rows = db
        .prepare('SELECT document_id, processed_at, checksum FROM processed_documents ORDER BY rowid')
        .all();
    } catch (error) {
      if (isCorruptionError(error)) {
        throw new LedgerCorruptionError(
          `Ledger database is unreadable: ${error instanceof Error ? error.message : String(error)}`,
          this.location
        );
      }
      throw error;
    }

    return rows.map((row, index) => {
      const parsed = LedgerRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new LedgerCorruptionError('Invalid ledger row', this.location, index + 1);
      }
      const entry: LedgerEntry = {
        documentId: parsed.data.document_id,
        processedAt: parsed.data.processed_at,
      };
      if (computeEntryChecksum(entry) !== parsed.data.checksum) {
        throw new LedgerCorruptionError(
          `Checksum mismatch for ${entry.documentId}`,
          this.location,
          index + 1
        );
      }
      return entry;
    });
  }

  async append(entry: LedgerEntry): Promise<void> {
    this.connect()
      .prepare(
        'INSERT INTO processed_documents (document_id, processed_at, checksum) VALUES (?, ?, ?)'
      )
      .run(entry.documentId, entry.processedAt, computeEntryChecksum(entry));
  }

  async flush(): Promise<void> {
    // Each INSERT commits under synchronous=FULL
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private connect(): Database.Database {
    if (this.db) return this.db;

    fs.mkdirSync(path.dirname(this.location), { recursive: true });
    const db = new Database(this.location);
    try {
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = FULL');
      db.exec(SCHEMA_SQL);
    } catch (error) {
      db.close();
      if (isCorruptionError(error)) {
        throw new LedgerCorruptionError(
          `Ledger database is unreadable: ${error instanceof Error ? error.message : String(error)}`,
          this.location
        );
      }
      throw error;
    }
    this.db = db;
    return db;
  }
}
