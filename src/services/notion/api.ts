/**
 * Notion REST boundary
 *
 * The four calls the record writer needs, over plain fetch with a per-request
 * timeout. Failures leave this module already classified:
 * - network errors, timeouts, a body cut off mid-read, 408/429/5xx →
 *   TransientError
 * - 401/403/404 and 400 validation_error → ConfigurationError (bad key,
 *   database not shared with the integration, schema mismatch)
 * - any other 4xx → ContentError
 *
 * @module services/notion/api
 */

import { z } from 'zod';

import { ConfigurationError, ContentError, TransientError, toErrorMessage } from '../../errors.js';

export const NOTION_API_BASE = 'https://api.notion.com/v1';
export const NOTION_VERSION = '2022-06-28';

// ─── Payload types ──────────────────────────────────────────────────────────

export interface RichText {
  type: 'text';
  text: { content: string; link?: { url: string } | null };
}

export type PropertyValue =
  | { title: RichText[] }
  | { rich_text: RichText[] }
  | { number: number | null }
  | { date: { start: string } | null };

export type PageProperties = Record<string, PropertyValue>;

export type Block =
  | { object: 'block'; type: 'heading_2'; heading_2: { rich_text: RichText[] } }
  | { object: 'block'; type: 'paragraph'; paragraph: { rich_text: RichText[] } };

export type QueryFilter = {
  property: string;
  rich_text: { equals: string };
};

// ─── Response schemas ───────────────────────────────────────────────────────

const DatabaseResponseSchema = z.object({
  id: z.string(),
  title: z.array(z.object({ plain_text: z.string() })).default([]),
  properties: z.record(z.object({ id: z.string(), type: z.string() })),
});

export type DatabaseSchema = z.infer<typeof DatabaseResponseSchema>;

const PageResponseSchema = z.object({
  id: z.string(),
  url: z.string().optional(),
});

export type PageRef = z.infer<typeof PageResponseSchema>;

const QueryResponseSchema = z.object({
  results: z.array(PageResponseSchema),
  has_more: z.boolean().default(false),
});

const ErrorBodySchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
});

// ─── Boundary ───────────────────────────────────────────────────────────────

export interface DatabaseApi {
  retrieveDatabase(databaseId: string): Promise<DatabaseSchema>;
  /** Pages matching `filter`, at most `pageSize` of them */
  queryDatabase(databaseId: string, filter: QueryFilter, pageSize?: number): Promise<PageRef[]>;
  createPage(databaseId: string, properties: PageProperties, children: Block[]): Promise<PageRef>;
  updatePage(pageId: string, properties: PageProperties): Promise<PageRef>;
}

/**
 * Map a Notion error response to the pipeline taxonomy
 */
export function classifyNotionError(status: number, code: string | undefined, message: string): Error {
  const detail = `Notion API error ${status}${code ? ` (${code})` : ''}: ${message}`;
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientError(detail, { statusCode: status });
  }
  if (status === 401 || status === 403 || status === 404) {
    return new ConfigurationError(`${detail}. Check NOTION_API_KEY and that the database is shared with the integration`);
  }
  if (status === 400 && code === 'validation_error') {
    return new ConfigurationError(`${detail}. The database schema does not accept the mapped properties`);
  }
  return new ContentError(detail);
}

export interface NotionHttpApiOptions {
  apiKey: string;
  requestTimeoutMs: number;
  baseUrl?: string;
  /** Replaceable for tests */
  fetch?: typeof fetch;
}

export class NotionHttpApi implements DatabaseApi {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(private readonly options: NotionHttpApiOptions) {
    this.baseUrl = options.baseUrl ?? NOTION_API_BASE;
    this.fetchFn = options.fetch ?? fetch;
  }

  async retrieveDatabase(databaseId: string): Promise<DatabaseSchema> {
    const body = await this.request('GET', `/databases/${encodeURIComponent(databaseId)}`);
    return this.parse(DatabaseResponseSchema, body, 'database');
  }

  async queryDatabase(databaseId: string, filter: QueryFilter, pageSize = 10): Promise<PageRef[]> {
    const body = await this.request('POST', `/databases/${encodeURIComponent(databaseId)}/query`, {
      filter,
      page_size: pageSize,
    });
    return this.parse(QueryResponseSchema, body, 'query').results;
  }

  async createPage(databaseId: string, properties: PageProperties, children: Block[]): Promise<PageRef> {
    const body = await this.request('POST', '/pages', {
      parent: { database_id: databaseId },
      properties,
      children,
    });
    return this.parse(PageResponseSchema, body, 'page');
  }

  async updatePage(pageId: string, properties: PageProperties): Promise<PageRef> {
    const body = await this.request('PATCH', `/pages/${encodeURIComponent(pageId)}`, { properties });
    return this.parse(PageResponseSchema, body, 'page');
  }

  private async request(method: 'GET' | 'POST' | 'PATCH', path: string, payload?: object): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          'Notion-Version': NOTION_VERSION,
          'Content-Type': 'application/json',
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs),
      });
    } catch (error) {
      throw this.transportError(method, path, 'failed', error);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw this.transportError(method, path, `response body (HTTP ${response.status}) was cut off`, error);
    }
    const body = this.decode(text);

    if (!response.ok) {
      const parsed = ErrorBodySchema.safeParse(body);
      const code = parsed.success ? parsed.data.code : undefined;
      const message = parsed.success && parsed.data.message ? parsed.data.message : response.statusText;
      throw classifyNotionError(response.status, code, message);
    }
    return body;
  }

  private transportError(method: string, path: string, what: string, error: unknown): TransientError {
    const reason =
      error instanceof Error && error.name === 'TimeoutError'
        ? `timed out after ${this.options.requestTimeoutMs}ms`
        : toErrorMessage(error);
    return new TransientError(`Notion ${method} ${path} ${what}: ${reason}`, { cause: error });
  }

  private decode(text: string): unknown {
    if (text === '') return {};
    try {
      return JSON.parse(text);
    } catch {
      return { message: text.slice(0, 200) };
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, what: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new TransientError(`Unexpected Notion ${what} response: ${result.error.issues[0]?.message ?? 'invalid'}`);
    }
    return result.data;
  }
}
