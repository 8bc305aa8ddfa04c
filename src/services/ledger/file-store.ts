/**
 * JSON Lines ledger store
 *
 * One entry per line:
 *   {"documentId":"...","processedAt":"...","checksum":"sha256:..."}
 *
 * The checksum covers documentId and processedAt. A trailing line without its
 * newline may be a torn append (the process died inside mark(), so mark never
 * returned): a valid one is kept and re-terminated, a cut-off entry prefix is
 * dropped. Any other bad line, the unterminated one included, is corruption
 * and load() refuses it without touching the file.
 *
 * @module services/ledger/file-store
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { LedgerCorruptionError } from '../../errors.js';
import type { LedgerEntry } from '../../models/ledger.js';
import { computeEntryChecksum, isValidHashFormat } from '../../utils/hash.js';
import type { LedgerStore } from './store.js';

const LedgerLineSchema = z.object({
  documentId: z.string().min(1),
  processedAt: z.string().datetime(),
  checksum: z.string().refine(isValidHashFormat, 'checksum is not a sha256 digest'),
});

export function serializeEntry(entry: LedgerEntry): string {
  return (
    JSON.stringify({
      documentId: entry.documentId,
      processedAt: entry.processedAt,
      checksum: computeEntryChecksum(entry),
    }) + '\n'
  );
}

/**
 * Parse one line. Returns null when the line is not a valid entry.
 */
export function parseEntry(line: string): LedgerEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = LedgerLineSchema.safeParse(raw);
  if (!parsed.success) return null;

  const entry: LedgerEntry = {
    documentId: parsed.data.documentId,
    processedAt: parsed.data.processedAt,
  };
  return computeEntryChecksum(entry) === parsed.data.checksum ? entry : null;
}

const LINE_PREFIX = '{"documentId":';

/**
 * Whether an unterminated final line looks like the start of an entry this
 * store wrote: the line opening, or a cut-off piece of it, that is not yet
 * complete JSON. Anything else is not a torn append.
 */
export function isTornPrefix(tail: string): boolean {
  if (!(tail.startsWith(LINE_PREFIX) || LINE_PREFIX.startsWith(tail))) return false;
  try {
    JSON.parse(tail);
    return false;
  } catch {
    return true;
  }
}

export class FileLedgerStore implements LedgerStore {
  readonly location: string;
  private handle: fs.promises.FileHandle | null = null;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async load(): Promise<LedgerEntry[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.location, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const entries: LedgerEntry[] = [];
    const seen = new Set<string>();
    const lastNewline = content.lastIndexOf('\n');
    const complete = lastNewline === -1 ? '' : content.slice(0, lastNewline);
    const tail = content.slice(lastNewline + 1);

    const lines = complete.length > 0 ? complete.split('\n') : [];
    lines.forEach((line, index) => {
      const entry = parseEntry(line);
      if (!entry) {
        throw new LedgerCorruptionError('Invalid ledger line', this.location, index + 1);
      }
      if (seen.has(entry.documentId)) {
        throw new LedgerCorruptionError(
          `Duplicate ledger entry for ${entry.documentId}`,
          this.location,
          index + 1
        );
      }
      seen.add(entry.documentId);
      entries.push(entry);
    });

    if (tail.length > 0) {
      const entry = parseEntry(tail);
      if (entry && seen.has(entry.documentId)) {
        throw new LedgerCorruptionError(
          `Duplicate ledger entry for ${entry.documentId}`,
          this.location,
          lines.length + 1
        );
      }
      if (!entry && !isTornPrefix(tail)) {
        throw new LedgerCorruptionError('Invalid unterminated ledger line', this.location, lines.length + 1);
      }

      const keepBytes = Buffer.byteLength(content.slice(0, lastNewline + 1), 'utf-8');
      await fs.promises.truncate(this.location, keepBytes);

      if (entry) {
        console.error(`[Ledger] Re-terminating torn final entry for ${entry.documentId}`);
        await fs.promises.appendFile(this.location, serializeEntry(entry), 'utf-8');
        entries.push(entry);
      } else {
        console.error(
          `[Ledger] Discarded torn final line (${tail.length} bytes) at ${this.location}:${lines.length + 1}`
        );
      }
    }

    return entries;
  }

  async append(entry: LedgerEntry): Promise<void> {
    const handle = await this.open();
    await handle.appendFile(serializeEntry(entry), 'utf-8');
  }

  async flush(): Promise<void> {
    if (this.handle) {
      await this.handle.sync();
    }
  }

  async close(): Promise<void> {
    if (this.handle) {
      const handle = this.handle;
      this.handle = null;
      await handle.sync();
      await handle.close();
    }
  }

  private async open(): Promise<fs.promises.FileHandle> {
    if (!this.handle) {
      await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
      this.handle = await fs.promises.open(this.location, 'a', 0o600);
    }
    return this.handle;
  }
}
