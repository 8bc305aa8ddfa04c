/**
 * Content Extractor
 *
 * Downloads a document and derives the plain text the summarizer sees.
 *
 * A file that cannot be parsed, or whose text layer is too thin to be a real
 * text PDF (image-only scans), yields `extractionFailed: true` with empty text.
 * That outcome is returned, never thrown. Download failures are thrown as
 * TransientError.
 *
 * @module services/extraction/extractor
 */

import type { DocumentRef, ExtractedContent } from '../../models/document.js';
import { toErrorMessage } from '../../errors.js';
import { withTimeout } from '../../utils/sleep.js';
import { truncateText } from '../../utils/text.js';
import type { DriveSource } from '../drive/source.js';
import type { PdfTextReader } from './pdf-reader.js';

export interface ExtractorOptions {
  /** Pages read from the start of the file */
  maxPages: number;
  /** Summarizer input limit; longer text is truncated */
  maxChars: number;
  /** Below this many characters the text layer counts as missing */
  minTextLength: number;
  parseTimeoutMs: number;
}

const PDF_MAGIC = '%PDF-';

export function hasPdfSignature(bytes: Uint8Array): boolean {
  if (bytes.length < PDF_MAGIC.length) return false;
  // The header may follow a few bytes of junk; readers accept it within the first 1KB
  const head = Buffer.from(bytes.subarray(0, 1024)).toString('latin1');
  return head.includes(PDF_MAGIC);
}

/**
 * Join page texts as "--- Page N ---" sections, skipping empty pages
 */
export function assemblePages(pages: string[]): string {
  return pages
    .map((text, index) => ({ text: text.trim(), pageNumber: index + 1 }))
    .filter((page) => page.text.length > 0)
    .map((page) => `--- Page ${page.pageNumber} ---\n${page.text}`)
    .join('\n\n');
}

export class ContentExtractor {
  constructor(
    private readonly source: Pick<DriveSource, 'fetchContent'>,
    private readonly reader: PdfTextReader,
    private readonly options: ExtractorOptions
  ) {}

  async extract(document: DocumentRef): Promise<ExtractedContent> {
    const bytes = await this.source.fetchContent(document.id);

    if (!hasPdfSignature(bytes)) {
      return this.failed(document, 0, 'file does not carry a PDF header');
    }

    let pageCount: number;
    let pages: string[];
    try {
      const result = await withTimeout(
        this.reader.read(bytes, this.options.maxPages),
        this.options.parseTimeoutMs,
        `PDF parsing timed out after ${this.options.parseTimeoutMs}ms`
      );
      pageCount = result.pageCount;
      pages = result.pages;
    } catch (error) {
      return this.failed(document, 0, `unparseable PDF: ${toErrorMessage(error)}`);
    }

    const fullText = assemblePages(pages);
    const textLength = pages.reduce((sum, page) => sum + page.trim().length, 0);
    if (textLength < this.options.minTextLength) {
      return this.failed(
        document,
        pageCount,
        `text layer too short (${textLength} chars over ${pages.length} page(s)), likely an image-only scan`
      );
    }

    const truncated = fullText.length > this.options.maxChars;
    const text = truncated ? truncateText(fullText, this.options.maxChars) : fullText;

    console.error(
      `[Extractor] ${document.name}: ${pageCount} page(s), ${text.length} chars${truncated ? ' (truncated)' : ''}`
    );
    return { documentId: document.id, text, pageCount, extractionFailed: false, truncated };
  }

  private failed(document: DocumentRef, pageCount: number, reason: string): ExtractedContent {
    console.error(`[Extractor] ${document.name}: extraction failed, ${reason}`);
    return {
      documentId: document.id,
      text: '',
      pageCount,
      extractionFailed: true,
      truncated: false,
      failureReason: reason,
    };
  }
}
