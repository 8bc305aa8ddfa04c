/**
 * PDF text layer reader backed by pdfjs-dist (legacy build, runs under Node)
 *
 * Image-only scans come back with empty page strings; deciding what that
 * means is the extractor's job.
 *
 * @module services/extraction/pdf-reader
 */

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

export interface PdfText {
  /** Total pages in the document */
  pageCount: number;
  /** Text of the first min(pageCount, maxPages) pages, in order */
  pages: string[];
}

export interface PdfTextReader {
  read(bytes: Uint8Array, maxPages: number): Promise<PdfText>;
}

/**
 * Collapse runs of horizontal whitespace and drop blank lines
 */
export function normalizePageText(raw: string): string {
  return raw
    .split('\n')
    .map((line) => line.replace(/[ \t ]+/g, ' ').trim())
    .filter((line) => line.length > 0)
    .join('\n');
}

export class PdfjsTextReader implements PdfTextReader {
  async read(bytes: Uint8Array, maxPages: number): Promise<PdfText> {
    // pdfjs detaches the buffer it is given; hand it a copy
    const task = getDocument({
      data: new Uint8Array(bytes),
      isEvalSupported: false,
      disableFontFace: true,
      useSystemFonts: false,
      verbosity: 0,
    });
    const doc = await task.promise;

    try {
      const pageCount = doc.numPages;
      const pages: string[] = [];
      const limit = Math.min(pageCount, maxPages);

      for (let pageNumber = 1; pageNumber <= limit; pageNumber++) {
        const page = await doc.getPage(pageNumber);
        const content = await page.getTextContent();
        let raw = '';
        for (const item of content.items) {
          if ('str' in item) {
            raw += item.str + (item.hasEOL ? '\n' : '');
          }
        }
        pages.push(normalizePageText(raw));
        page.cleanup();
      }

      return { pageCount, pages };
    } finally {
      await doc.destroy();
    }
  }
}
