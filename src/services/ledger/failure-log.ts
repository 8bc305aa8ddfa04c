/**
 * Failure log
 *
 * Sits beside the ledger and remembers, per document, the latest skipped or
 * failed outcome with a running attempt count. A document leaves the log when
 * it completes. The log is advisory: the ledger alone decides what counts as
 * processed, so an unreadable log is reported and started afresh.
 *
 * Stored as one JSON document, rewritten through a temporary file and a
 * rename so a crash leaves either the old or the new version.
 *
 * @module services/ledger/failure-log
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';

import { toErrorMessage } from '../../errors.js';
import type { FailureRecord } from '../../models/ledger.js';
import type { FailedOutcome, SkippedOutcome } from '../../models/outcome.js';

const FailureRecordSchema = z.object({
  documentId: z.string().min(1),
  documentName: z.string(),
  status: z.enum(['skipped', 'failed']),
  reason: z.string(),
  detail: z.string(),
  attempts: z.number().int().positive(),
  firstFailedAt: z.string().datetime(),
  lastFailedAt: z.string().datetime(),
});

const FailureFileSchema = z.object({
  version: z.literal(1),
  failures: z.array(FailureRecordSchema),
});

export interface FailureStore {
  readonly location: string;
  read(): Promise<FailureRecord[]>;
  write(records: FailureRecord[]): Promise<void>;
}

/**
 * `<dir>/<ledger name without extension>.failures.json`
 */
export function failureLogPath(ledgerPath: string): string {
  const parsed = path.parse(ledgerPath);
  return path.join(parsed.dir, `${parsed.name}.failures.json`);
}

export class JsonFailureStore implements FailureStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(filePath);
  }

  async read(): Promise<FailureRecord[]> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.location, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new Error(`Failure log ${this.location} is not JSON: ${toErrorMessage(error)}`);
    }
    const parsed = FailureFileSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(
        `Failure log ${this.location} is invalid at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown'}`
      );
    }
    return parsed.data.failures;
  }

  async write(records: FailureRecord[]): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.location), { recursive: true });
    const temp = `${this.location}.tmp`;
    await fs.promises.writeFile(temp, JSON.stringify({ version: 1, failures: records }, null, 2) + '\n', {
      encoding: 'utf-8',
      mode: 0o600,
    });
    await fs.promises.rename(temp, this.location);
  }
}

export class FailureLog {
  private readonly records = new Map<string, FailureRecord>();
  private loaded = false;

  constructor(
    private readonly store: FailureStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get location(): string {
    return this.store.location;
  }

  get isLoaded(): boolean {
    return this.loaded;
  }

  async load(): Promise<void> {
    this.records.clear();
    try {
      for (const record of await this.store.read()) {
        this.records.set(record.documentId, record);
      }
    } catch (error) {
      console.error(`[FailureLog] Starting a new log, the existing one was unreadable: ${toErrorMessage(error)}`);
    }
    this.loaded = true;
  }

  /**
   * Most recent failure first
   */
  list(): FailureRecord[] {
    return [...this.records.values()].sort((a, b) => b.lastFailedAt.localeCompare(a.lastFailedAt));
  }

  async record(outcome: SkippedOutcome | FailedOutcome): Promise<FailureRecord> {
    const now = this.clock().toISOString();
    const previous = this.records.get(outcome.document.id);
    const record: FailureRecord = {
      documentId: outcome.document.id,
      documentName: outcome.document.name,
      status: outcome.status,
      reason: outcome.reason,
      detail: outcome.detail,
      attempts: (previous?.attempts ?? 0) + 1,
      firstFailedAt: previous?.firstFailedAt ?? now,
      lastFailedAt: now,
    };
    this.records.set(record.documentId, record);
    await this.store.write(this.list());
    return record;
  }

  /**
   * Forget a document that has now completed
   *
   * @returns whether it was in the log
   */
  async clear(documentId: string): Promise<boolean> {
    if (!this.records.delete(documentId)) return false;
    await this.store.write(this.list());
    return true;
  }
}
