import type { PageGeometry, WordBox } from '../types/geometry.js';
import type { WordBoxBackend } from './word-backend.js';
import { normalizeRect } from './geometry.js';
import { splitWordSpans } from './text-item-words.js';

type PDFJSDocument = {
  numPages: number;
  getPage: (pageNumber: number) => Promise<PDFJSPage>;
  destroy?: () => Promise<void>;
};

type PDFJSPage = {
  getViewport: (options: { scale: number }) => { width: number; height: number };
  getTextContent: (options?: Record<string, unknown>) => Promise<PDFJSTextContent>;
};

type PDFJSTextContent = {
  items: PDFJSTextItem[];
};

// Marked-content entries share the items array but carry no `str`.
type PDFJSTextItem = {
  str?: string;
  transform?: number[];
  width?: number;
  height?: number;
};

type UnpdfModule = {
  getDocumentProxy: (bytes: Uint8Array) => Promise<PDFJSDocument>;
  definePDFJSModule?: (pdfjs: () => Promise<unknown>) => Promise<void>;
};

let cachedUnpdf: Promise<UnpdfModule> | null = null;
let unpdfPdfjsDefined = false;

/**
 * Word boxes from unpdf. Item transforms are already in bottom-left page space;
 * each item is split into whitespace-delimited words with no coordinate flip.
 */
export class UnpdfWordBackend implements WordBoxBackend {
  readonly name = 'unpdf' as const;
  private document: PDFJSDocument | null = null;

  private async getUnpdf(): Promise<UnpdfModule> {
    if (!cachedUnpdf) {
      cachedUnpdf = import('unpdf') as unknown as Promise<UnpdfModule>;
    }
    return await cachedUnpdf;
  }

  // unpdf's bundled pdf.js registers a worker that the installed pdfjs-dist then
  // refuses on version mismatch, so both backends must run the same pdf.js.
  private async ensureOfficialPdfjs(): Promise<void> {
    if (unpdfPdfjsDefined) return;
    const unpdf = await this.getUnpdf();
    if (typeof unpdf.definePDFJSModule === 'function') {
      await unpdf.definePDFJSModule(() => import('pdfjs-dist/legacy/build/pdf.mjs'));
    }
    unpdfPdfjsDefined = true;
  }

  async load(data: Uint8Array): Promise<void> {
    try {
      await this.ensureOfficialPdfjs();
      const unpdf = await this.getUnpdf();
      this.document = await unpdf.getDocumentProxy(data);
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load PDF document with unpdf: ${errorMessage}`);
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
    const content = await page.getTextContent();
    const words: WordBox[] = [];

    for (const item of content.items) {
      words.push(...this.toWordBoxes(item));
    }

    return words;
  }

  private toWordBoxes(item: PDFJSTextItem): WordBox[] {
    if (typeof item.str !== 'string' || item.str.trim().length === 0) {
      return [];
    }
    const [, , , , e, f] = item.transform ?? [1, 0, 0, 1, 0, 0];
    const width = typeof item.width === 'number' ? item.width : 0;
    const height = typeof item.height === 'number' ? item.height : 0;
    const spans = splitWordSpans(item.str);
    const charWidth = spans.length > 0 ? width / spans.length : 0;

    return spans.words.map(({ text, start, end }) => ({
      text,
      rect: normalizeRect(e + start * charWidth, f, e + end * charWidth, f + height)
    }));
  }

  dispose(): void {
    const document = this.document;
    this.document = null;
    if (document?.destroy) {
      document.destroy().catch((error: unknown) => {
        console.debug('[unpdf] Failed to destroy document:', error);
      });
    }
  }
}
