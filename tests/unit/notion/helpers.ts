/**
 * Shared fixtures for Notion writer tests: a sample record and an in-memory
 * database behind the DatabaseApi boundary
 *
 * @see src/services/notion
 */

import { ContentError, TransientError } from '../../../src/errors.js';
import type { SummaryRecord } from '../../../src/models/summary.js';
import type {
  Block,
  DatabaseApi,
  DatabaseSchema,
  PageProperties,
  PageRef,
  PropertyValue,
  QueryFilter,
} from '../../../src/services/notion/api.js';
import { DEFAULT_PROPERTY_MAP, type PropertyMap } from '../../../src/services/notion/properties.js';

export function sampleRecord(overrides: Partial<SummaryRecord> = {}): SummaryRecord {
  return {
    documentId: 'doc-1',
    title: 'Sleep and Memory Consolidation in Adolescents',
    authors: 'A. Researcher, B. Scientist',
    journal: 'Journal of Example Studies',
    year: 2023,
    background: 'Sleep supports memory.',
    methods: 'Randomized crossover trial.',
    results: 'Recall improved after sleep.',
    discussion: 'Effects were larger in younger participants.',
    limitations: 'Small sample.',
    conclusions: 'Sleep matters for learning.',
    strengths: 'Preregistered design.',
    ...overrides,
  };
}

export function schemaFor(map: PropertyMap = DEFAULT_PROPERTY_MAP): DatabaseSchema {
  const properties: DatabaseSchema['properties'] = {};
  Object.values(map).forEach((spec, index) => {
    properties[spec.name] = { id: `prop-${index}`, type: spec.type };
  });
  return { id: 'db-1', title: [{ plain_text: 'Papers' }], properties };
}

export function plainText(value: PropertyValue | undefined): string {
  if (value === undefined) return '';
  if ('title' in value) return value.title.map((part) => part.text.content).join('');
  if ('rich_text' in value) return value.rich_text.map((part) => part.text.content).join('');
  return '';
}

type Operation = 'retrieve' | 'query' | 'create' | 'update';

/**
 * In-memory Notion database. Pages are matched on the rich-text filter the
 * writer sends; queued failures are thrown before the operation runs.
 */
export class FakeDatabaseApi implements DatabaseApi {
  schema: DatabaseSchema = schemaFor();
  readonly pages = new Map<string, PageProperties>();
  readonly bodies = new Map<string, Block[]>();
  readonly calls: Operation[] = [];
  /** Store the next created page, then fail as if the response was lost */
  loseNextCreateResponse = false;

  private readonly failures: Partial<Record<Operation, Error[]>> = {};
  private nextId = 1;

  failNext(operation: Operation, ...errors: Error[]): void {
    this.failures[operation] = [...(this.failures[operation] ?? []), ...errors];
  }

  count(operation: Operation): number {
    return this.calls.filter((call) => call === operation).length;
  }

  async retrieveDatabase(databaseId: string): Promise<DatabaseSchema> {
    this.enter('retrieve');
    return { ...this.schema, id: databaseId };
  }

  async queryDatabase(_databaseId: string, filter: QueryFilter): Promise<PageRef[]> {
    this.enter('query');
    const matches: PageRef[] = [];
    for (const [id, properties] of this.pages) {
      if (plainText(properties[filter.property]) === filter.rich_text.equals) {
        matches.push({ id });
      }
    }
    return matches;
  }

  async createPage(_databaseId: string, properties: PageProperties, children: Block[]): Promise<PageRef> {
    this.enter('create');
    const id = `page-${this.nextId++}`;
    this.pages.set(id, properties);
    this.bodies.set(id, children);
    if (this.loseNextCreateResponse) {
      this.loseNextCreateResponse = false;
      throw new TransientError('socket hang up');
    }
    return { id, url: `https://notion.example/${id}` };
  }

  async updatePage(pageId: string, properties: PageProperties): Promise<PageRef> {
    this.enter('update');
    const current = this.pages.get(pageId);
    if (current === undefined) {
      throw new ContentError(`No page ${pageId}`);
    }
    this.pages.set(pageId, { ...current, ...properties });
    return { id: pageId };
  }

  private enter(operation: Operation): void {
    this.calls.push(operation);
    const error = this.failures[operation]?.shift();
    if (error) throw error;
  }
}
