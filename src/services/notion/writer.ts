/**
 * Record Writer
 *
 * Upserts one SummaryRecord into the Notion database. Before writing it looks
 * the document up by its "Document ID" property, so a record that was written
 * before a crash (but never marked in the ledger) is updated instead of
 * duplicated. Every API request first takes a slot from the shared per-second
 * limiter.
 *
 * @module services/notion/writer
 */

import { ConfigurationError, TransientError, isRetryable } from '../../errors.js';
import type { SummaryRecord } from '../../models/summary.js';
import { withRetry, type RetryOptions } from '../../utils/backoff.js';
import type { SlidingWindowRateLimiter } from '../../utils/rate-limiter.js';
import type { DatabaseApi, PageRef } from './api.js';
import { DEFAULT_PROPERTY_MAP, buildBody, buildProperties, type PropertyMap } from './properties.js';

export interface UpsertResult {
  recordId: string;
  /** False when an existing record was updated */
  created: boolean;
}

export interface SchemaReport {
  databaseId: string;
  title: string;
  /** Mapped property names, all present with the expected type */
  properties: string[];
}

export interface RecordWriterOptions {
  databaseId: string;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  propertyMap?: PropertyMap;
  /** Replaceable for tests */
  clock?: () => Date;
  sleep?: RetryOptions['sleep'];
}

export class RecordWriter {
  private readonly map: PropertyMap;
  private readonly clock: () => Date;
  private schemaVerified = false;

  constructor(
    private readonly api: DatabaseApi,
    private readonly limiter: SlidingWindowRateLimiter,
    private readonly options: RecordWriterOptions
  ) {
    this.map = options.propertyMap ?? DEFAULT_PROPERTY_MAP;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Check that every mapped property exists with the expected type.
   *
   * @throws ConfigurationError naming each missing or mistyped property
   */
  async verifySchema(): Promise<SchemaReport> {
    const database = await this.call('retrieve database', () =>
      this.api.retrieveDatabase(this.options.databaseId)
    );

    const problems: string[] = [];
    for (const spec of Object.values(this.map)) {
      const actual = database.properties[spec.name];
      if (actual === undefined) {
        problems.push(`missing property "${spec.name}" (${spec.type})`);
      } else if (actual.type !== spec.type) {
        problems.push(`property "${spec.name}" is ${actual.type}, expected ${spec.type}`);
      }
    }

    if (problems.length > 0) {
      throw new ConfigurationError(
        `Notion database ${this.options.databaseId} does not match the record shape:\n  - ${problems.join('\n  - ')}`
      );
    }

    this.schemaVerified = true;
    const title = database.title.map((part) => part.plain_text).join('');
    console.error(`[Notion] Schema verified for "${title}" (${Object.keys(this.map).length} properties)`);
    return {
      databaseId: database.id,
      title,
      properties: Object.values(this.map).map((spec) => spec.name),
    };
  }

  /**
   * Write `record`, updating the existing page for its documentId if there is one.
   *
   * Each attempt re-queries before writing, so retrying after a create whose
   * response was lost still yields a single page.
   *
   * @throws ConfigurationError on a schema mismatch or rejected credentials
   * @throws TransientError with `exhausted = true` once retries are spent
   */
  async upsert(record: SummaryRecord): Promise<UpsertResult> {
    if (!this.schemaVerified) {
      await this.verifySchema();
    }

    return this.call(`upsert ${record.documentId}`, async () => {
      const existing = await this.findByDocumentId(record.documentId);
      const properties = buildProperties(record, this.clock().toISOString(), this.map);

      if (existing) {
        // Keep the first "added" date on updates
        delete properties[this.map.addedDate.name];
        await this.limiter.acquire();
        const page = await this.api.updatePage(existing.id, properties);
        console.error(`[Notion] Updated existing page ${page.id} for ${record.documentId}`);
        return { recordId: page.id, created: false };
      }

      await this.limiter.acquire();
      const page = await this.api.createPage(this.options.databaseId, properties, buildBody(record));
      console.error(`[Notion] Created page ${page.id} for ${record.documentId}`);
      return { recordId: page.id, created: true };
    }, false);
  }

  private async findByDocumentId(documentId: string): Promise<PageRef | undefined> {
    await this.limiter.acquire();
    const pages = await this.api.queryDatabase(this.options.databaseId, {
      property: this.map.documentId.name,
      rich_text: { equals: documentId },
    });
    if (pages.length > 1) {
      console.error(`[Notion] ${pages.length} pages carry document id ${documentId}; updating the first`);
    }
    return pages[0];
  }

  /**
   * Run `fn` with bounded retries on transient failures.
   *
   * @param acquire take a limiter slot before each attempt; false when `fn` acquires its own
   */
  private async call<T>(label: string, fn: () => Promise<T>, acquire = true): Promise<T> {
    try {
      return await withRetry(
        async () => {
          if (acquire) await this.limiter.acquire();
          return fn();
        },
        isRetryable,
        { ...this.options.retry, label: 'Notion', sleep: this.options.sleep }
      );
    } catch (error) {
      if (error instanceof TransientError) {
        throw new TransientError(
          `Notion ${label} failed after ${this.options.retry.maxAttempts} attempt(s): ${error.message}`,
          { cause: error, statusCode: error.statusCode, exhausted: true }
        );
      }
      throw error;
    }
  }
}
