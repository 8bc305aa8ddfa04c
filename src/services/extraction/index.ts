export {
  ContentExtractor,
  assemblePages,
  hasPdfSignature,
  type ExtractorOptions,
} from './extractor.js';
export { PdfjsTextReader, normalizePageText, type PdfText, type PdfTextReader } from './pdf-reader.js';
