/**
 * Text extraction from uploaded manuals
 *
 * Plain text is decoded as UTF-8. PDFs are read page by page with the
 * pdfjs-dist legacy build, which runs under Node without a DOM.
 *
 * @module services/extraction/extractor
 */

import { isSupportedFileType } from '../../models/document.js';
import type { PageText } from '../chunking/text-normalizer.js';

export type ExtractionErrorCode =
  | 'UNSUPPORTED_FILE_TYPE'
  | 'EMPTY_FILE'
  | 'CORRUPT_FILE'
  | 'PASSWORD_PROTECTED'
  | 'INSUFFICIENT_TEXT'
  | 'EXTRACTION_FAILED';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ExtractionError';
    Error.captureStackTrace?.(this, ExtractionError);
  }
}

export interface ExtractedText {
  /** Raw text of all pages, separated by blank lines */
  text: string;
  pages: PageText[];
}

export interface TextExtractor {
  /**
   * @throws ExtractionError for unsupported, unreadable, corrupt or
   *   password-protected input
   */
  extract(bytes: Uint8Array, fileType: string): Promise<ExtractedText>;
}

/** Reads the text of every page of a PDF */
export type PdfPageReader = (bytes: Uint8Array) => Promise<PageText[]>;

/**
 * Read PDF pages with pdfjs-dist. Text items are concatenated in content
 * order with a newline wherever pdfjs reports an end of line.
 */
export const readPdfPages: PdfPageReader = async (bytes) => {
  const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs');
  // pdfjs transfers the buffer to its worker, so hand it a copy
  const doc = await pdfjs.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    useSystemFonts: true,
  }).promise;

  try {
    const pages: PageText[] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      const content = await page.getTextContent();
      let text = '';
      for (const item of content.items) {
        if (!('str' in item)) continue;
        text += item.str;
        if (item.hasEOL) text += '\n';
      }
      pages.push({ page: pageNumber, text });
      page.cleanup();
    }
    return pages;
  } finally {
    await doc.destroy();
  }
};

export class DefaultTextExtractor implements TextExtractor {
  constructor(private readonly readPdf: PdfPageReader = readPdfPages) {}

  async extract(bytes: Uint8Array, fileType: string): Promise<ExtractedText> {
    const type = fileType.toLowerCase().replace(/^\./, '');
    if (!isSupportedFileType(type)) {
      throw new ExtractionError(`Unsupported file type: ${fileType}`, 'UNSUPPORTED_FILE_TYPE', {
        fileType,
      });
    }
    if (bytes.byteLength === 0) {
      throw new ExtractionError('File is empty', 'EMPTY_FILE');
    }

    const pages = type === 'txt' ? [{ page: 1, text: decodeText(bytes) }] : await this.extractPdf(bytes);
    console.error(`[Extractor] Extracted ${pages.length} page(s) from ${type} (${bytes.byteLength} bytes)`);
    return { text: pages.map((p) => p.text).join('\n\n'), pages };
  }

  private async extractPdf(bytes: Uint8Array): Promise<PageText[]> {
    try {
      return await this.readPdf(bytes);
    } catch (error) {
      const name = error instanceof Error ? error.name : '';
      const message = error instanceof Error ? error.message : String(error);
      if (name === 'PasswordException') {
        throw new ExtractionError('PDF is password-protected', 'PASSWORD_PROTECTED');
      }
      if (name === 'InvalidPDFException' || name === 'FormatError') {
        throw new ExtractionError(`PDF is corrupt or unreadable: ${message}`, 'CORRUPT_FILE');
      }
      throw new ExtractionError(`PDF text extraction failed: ${message}`, 'EXTRACTION_FAILED', {
        errorName: name || undefined,
      });
    }
  }
}

/** UTF-8 decode; a leading BOM is dropped */
function decodeText(bytes: Uint8Array): string {
  return new TextDecoder('utf-8').decode(bytes);
}
