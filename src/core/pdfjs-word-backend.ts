import type { PageGeometry, TopDownWordBox, WordBox } from '../types/geometry.js';
import type { WordBoxBackend } from './word-backend.js';
import { flipWordBox } from './geometry.js';
import { splitWordSpans } from './text-item-words.js';

type PDFJSDocument = {
  numPages: number;
  getPage: (pageNumber: number) => Promise<PDFJSPage>;
  destroy?: () => Promise<void>;
};

type PDFJSViewport = {
  width: number;
  height: number;
  convertToViewportPoint: (x: number, y: number) => number[];
};

type PDFJSPage = {
  getViewport: (options: { scale: number }) => PDFJSViewport;
  getTextContent: (options?: Record<string, unknown>) => Promise<PDFJSTextContent>;
};

type PDFJSTextContent = {
  items: PDFJSTextItem[];
};

type PDFJSTextItem = {
  str?: string;
  transform?: number[];
  width?: number;
  height?: number;
};

type PDFJSModule = {
  getDocument: (params: Record<string, unknown>) => { promise: Promise<PDFJSDocument> };
};

let cachedPdfjs: Promise<PDFJSModule> | null = null;

/**
 * Splits one pdf.js text item into whitespace-delimited words in viewport space
 * (origin top-left, y down). Horizontal extents are apportioned by code point offset.
 */
export function splitItemIntoWords(item: PDFJSTextItem, viewport: PDFJSViewport): TopDownWordBox[] {
  const str = item.str ?? '';
  if (str.trim().length === 0) return [];

  const [, , , , e, f] = item.transform ?? [1, 0, 0, 1, 0, 0];
  const width = typeof item.width === 'number' ? item.width : 0;
  const height = typeof item.height === 'number' ? item.height : 0;
  const spans = splitWordSpans(str);
  const charWidth = spans.length > 0 ? width / spans.length : 0;

  const words: TopDownWordBox[] = [];
  for (const { text, start, end } of spans.words) {
    const [ax, ay] = viewport.convertToViewportPoint(e + start * charWidth, f + height);
    const [bx, by] = viewport.convertToViewportPoint(e + end * charWidth, f);
    words.push({
      text,
      x0: Math.min(ax, bx),
      x1: Math.max(ax, bx),
      top: Math.min(ay, by),
      bottom: Math.max(ay, by)
    });
  }
  return words;
}

/**
 * Word boxes from pdfjs-dist read in viewport (y-down) coordinates, the way a
 * top-down extractor reports them, then flipped into page space.
 */
export class PdfjsWordBackend implements WordBoxBackend {
  readonly name = 'pdfjs' as const;
  private document: PDFJSDocument | null = null;

  private async getPdfjs(): Promise<PDFJSModule> {
    if (!cachedPdfjs) {
      // The legacy build is the one pdfjs-dist supports under Node.
      cachedPdfjs = import('pdfjs-dist/legacy/build/pdf.mjs') as unknown as Promise<PDFJSModule>;
    }
    return await cachedPdfjs;
  }

  async load(data: Uint8Array): Promise<void> {
    try {
      const pdfjs = await this.getPdfjs();
      const task = pdfjs.getDocument({
        data,
        disableFontFace: true,
        isEvalSupported: false,
        useSystemFonts: false
      });
      this.document = await task.promise;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load PDF document with pdfjs-dist: ${errorMessage}`);
    }
  }

  async getPageCount(): Promise<number> {
    if (!this.document) {
      throw new Error('Document not loaded');
    }
    return this.document.numPages;
  }

  private async getPage(pageIndex: number): Promise<PDFJSPage> {
    if (!this.document) {
      throw new Error('Document not loaded');
    }
    return await this.document.getPage(pageIndex + 1);
  }

  async getPageGeometry(pageIndex: number): Promise<PageGeometry> {
    const page = await this.getPage(pageIndex);
    const viewport = page.getViewport({ scale: 1.0 });
    return { width: viewport.width, height: viewport.height };
  }

  async extractWords(pageIndex: number): Promise<WordBox[]> {
    const page = await this.getPage(pageIndex);
    const viewport = page.getViewport({ scale: 1.0 });
    const content = await page.getTextContent({ disableCombineTextItems: true });

    const words: WordBox[] = [];
    for (const item of content.items) {
      for (const word of splitItemIntoWords(item, viewport)) {
        words.push(flipWordBox(word, viewport.height));
      }
    }
    return words;
  }

  dispose(): void {
    const document = this.document;
    this.document = null;
    if (document?.destroy) {
      document.destroy().catch((error: unknown) => {
        console.debug('[pdfjs] Failed to destroy document:', error);
      });
    }
  }
}
