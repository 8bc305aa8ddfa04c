/**
 * SummaryRecord → Notion page properties and body blocks
 *
 * Notion caps a rich-text element at 2000 characters and a rich-text array at
 * 100 elements; longer values are split across elements and then cut.
 */

import { driveViewUrl } from '../../models/document.js';
import { ANALYTICAL_FIELDS, type AnalyticalField, type SummaryField, type SummaryRecord } from '../../models/summary.js';
import { safeCutIndex } from '../../utils/text.js';
import type { Block, PageProperties, PropertyValue, RichText } from './api.js';

export const RICH_TEXT_LIMIT = 2000;
export const RICH_TEXT_MAX_ELEMENTS = 100;

export type PropertyType = 'title' | 'rich_text' | 'number' | 'date';

export interface PropertySpec {
  name: string;
  type: PropertyType;
}

/** Everything written as a database property */
export type MappedField = SummaryField | 'documentId' | 'addedDate';

export type PropertyMap = Record<MappedField, PropertySpec>;

export const DEFAULT_PROPERTY_MAP: PropertyMap = {
  title: { name: 'Title', type: 'title' },
  authors: { name: 'Authors', type: 'rich_text' },
  journal: { name: 'Journal', type: 'rich_text' },
  year: { name: 'Year', type: 'number' },
  background: { name: 'Background', type: 'rich_text' },
  methods: { name: 'Methods', type: 'rich_text' },
  results: { name: 'Results', type: 'rich_text' },
  discussion: { name: 'Discussion', type: 'rich_text' },
  limitations: { name: 'Limitations', type: 'rich_text' },
  conclusions: { name: 'Conclusions', type: 'rich_text' },
  strengths: { name: 'Strengths', type: 'rich_text' },
  documentId: { name: 'Document ID', type: 'rich_text' },
  addedDate: { name: 'Added Date', type: 'date' },
};

export const SECTION_HEADINGS: Record<AnalyticalField, string> = {
  background: 'Background',
  methods: 'Methods',
  results: 'Results',
  discussion: 'Discussion',
  limitations: 'Limitations',
  conclusions: 'Conclusions',
  strengths: 'Strengths',
};

/**
 * Split `text` into chunks of at most `limit` UTF-16 units without cutting a
 * surrogate pair in half
 */
export function chunkText(text: string, limit = RICH_TEXT_LIMIT): string[] {
  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = safeCutIndex(text, start + limit);
    // A limit of one cannot hold a pair; take it whole rather than stall
    if (end === start) end = start + 2;
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}

export function toRichText(text: string, link?: string): RichText[] {
  return chunkText(text)
    .slice(0, RICH_TEXT_MAX_ELEMENTS)
    .map((content): RichText => ({
      type: 'text',
      text: link === undefined ? { content } : { content, link: { url: link } },
    }));
}

function propertyValue(spec: PropertySpec, value: string | number): PropertyValue {
  switch (spec.type) {
    case 'title':
      return { title: toRichText(String(value)) };
    case 'rich_text':
      return { rich_text: toRichText(String(value)) };
    case 'number': {
      const n = typeof value === 'number' ? value : Number(value);
      // Year 0 means unknown
      return { number: Number.isFinite(n) && n !== 0 ? n : null };
    }
    case 'date':
      return { date: value === '' ? null : { start: String(value) } };
  }
}

/**
 * @param addedAt ISO timestamp written to the "added" date property
 */
export function buildProperties(
  record: SummaryRecord,
  addedAt: string,
  map: PropertyMap = DEFAULT_PROPERTY_MAP
): PageProperties {
  const values: Record<MappedField, string | number> = {
    title: record.title,
    authors: record.authors,
    journal: record.journal,
    year: record.year,
    background: record.background,
    methods: record.methods,
    results: record.results,
    discussion: record.discussion,
    limitations: record.limitations,
    conclusions: record.conclusions,
    strengths: record.strengths,
    documentId: record.documentId,
    addedDate: addedAt,
  };

  const properties: PageProperties = {};
  for (const [field, spec] of Object.entries(map)) {
    if (isMappedField(field)) {
      properties[spec.name] = propertyValue(spec, values[field]);
    }
  }
  return properties;
}

function isMappedField(field: string): field is MappedField {
  return field in DEFAULT_PROPERTY_MAP;
}

function heading(text: string): Block {
  return { object: 'block', type: 'heading_2', heading_2: { rich_text: toRichText(text) } };
}

function paragraph(richText: RichText[]): Block {
  return { object: 'block', type: 'paragraph', paragraph: { rich_text: richText } };
}

/**
 * Page body: one heading and paragraph per non-empty section, then a link
 * back to the source file
 */
export function buildBody(record: SummaryRecord): Block[] {
  const blocks: Block[] = [];
  for (const field of ANALYTICAL_FIELDS) {
    const text = record[field].trim();
    if (text === '') continue;
    blocks.push(heading(SECTION_HEADINGS[field]), paragraph(toRichText(text)));
  }

  const url = driveViewUrl(record.documentId);
  blocks.push(heading('Source'), paragraph(toRichText('Open in Google Drive', url)));
  return blocks;
}
