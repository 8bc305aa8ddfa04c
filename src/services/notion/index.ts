/**
 * Notion Service
 * Database boundary, property mapping and record writer
 */

export {
  NotionHttpApi,
  classifyNotionError,
  NOTION_API_BASE,
  NOTION_VERSION,
  type DatabaseApi,
  type DatabaseSchema,
  type PageRef,
  type PageProperties,
  type PropertyValue,
  type Block,
  type RichText,
  type QueryFilter,
  type NotionHttpApiOptions,
} from './api.js';
export {
  DEFAULT_PROPERTY_MAP,
  RICH_TEXT_LIMIT,
  buildBody,
  buildProperties,
  chunkText,
  toRichText,
  type PropertyMap,
  type PropertySpec,
} from './properties.js';
export { RecordWriter, type RecordWriterOptions, type SchemaReport, type UpsertResult } from './writer.js';
