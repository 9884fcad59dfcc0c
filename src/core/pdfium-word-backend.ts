import { readFile } from 'fs/promises';
import { createRequire } from 'module';
import { dirname, join } from 'path';
import type { PageGeometry, WordBox } from '../types/geometry.js';
import type { WordBoxBackend } from './word-backend.js';
import { CharRunBuffer } from './char-run-buffer.js';
import { isWhitespaceChar, normalizeRect } from './geometry.js';

export type PdfiumInitOptions = {
  wasmPath?: string;
  wasmBinary?: ArrayBuffer;
};

type WrappedPdfiumModule = {
  PDFiumExt_Init: () => void;

  pdfium: {
    HEAPU8: Uint8Array;
    wasmExports: {
      malloc: (size: number) => number;
      free: (ptr: number) => void;
    };
  };

  FPDF_GetLastError: () => number;
  FPDF_LoadMemDocument: (dataPtr: number, size: number, password: number) => number;
  FPDF_CloseDocument: (docPtr: number) => void;
  FPDF_GetPageCount: (docPtr: number) => number;
  FPDF_LoadPage: (docPtr: number, pageIndex: number) => number;
  FPDF_ClosePage: (pagePtr: number) => void;
  FPDF_GetPageWidthF: (pagePtr: number) => number;
  FPDF_GetPageHeightF: (pagePtr: number) => number;

  FPDFText_LoadPage: (pagePtr: number) => number;
  FPDFText_ClosePage: (textPagePtr: number) => void;
  FPDFText_CountChars: (textPagePtr: number) => number;
  FPDFText_GetUnicode: (textPagePtr: number, index: number) => number;
  FPDFText_GetCharBox: (
    textPagePtr: number,
    index: number,
    leftPtr: number,
    rightPtr: number,
    bottomPtr: number,
    topPtr: number
  ) => number;
};

type LoadedEmbedPdfiumDocument = {
  docPtr: number;
  filePtr: number;
};

let cachedPdfiumInitPromise: Promise<WrappedPdfiumModule> | null = null;

const isValidWasmBinary = (buf: ArrayBuffer): boolean => {
  if (buf.byteLength < 4) return false;
  const u8 = new Uint8Array(buf, 0, 4);
  return u8[0] === 0x00 && u8[1] === 0x61 && u8[2] === 0x73 && u8[3] === 0x6d;
};

const resolveWasmPath = (): string => {
  const localRequire = createRequire(import.meta.url);
  try {
    return localRequire.resolve('@embedpdf/pdfium/pdfium.wasm');
  } catch {
    // Older releases do not export the wasm subpath; it sits beside the entry file.
    return join(dirname(localRequire.resolve('@embedpdf/pdfium')), 'pdfium.wasm');
  }
};

/**
 * Word boxes rebuilt from PDFium's character stream. Char boxes are already in
 * bottom-left page space; runs are split on whitespace by a per-page CharRunBuffer.
 */
export class PdfiumWordBackend implements WordBoxBackend {
  readonly name = 'pdfium' as const;
  private pdfium: WrappedPdfiumModule | null = null;
  private document: LoadedEmbedPdfiumDocument | null = null;
  private readonly initOptions: PdfiumInitOptions;

  constructor(options: PdfiumInitOptions = {}) {
    this.initOptions = options;
  }

  async initialize(): Promise<void> {
    if (this.pdfium) return;
    try {
      if (!cachedPdfiumInitPromise) {
        cachedPdfiumInitPromise = this.createModule();
        // A failed init must not poison later attempts.
        cachedPdfiumInitPromise.catch(() => {
          cachedPdfiumInitPromise = null;
        });
      }
      this.pdfium = await cachedPdfiumInitPromise;
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to initialize PDFium: ${errorMessage}`);
    }
  }

  private async createModule(): Promise<WrappedPdfiumModule> {
    const mod = (await import('@embedpdf/pdfium')) as unknown as {
      init?: (options?: { wasmBinary?: ArrayBuffer }) => Promise<unknown>;
    };
    if (typeof mod.init !== 'function') {
      throw new Error('PDFium library not available. Please install @embedpdf/pdfium');
    }

    let wasmBinary = this.initOptions.wasmBinary;
    if (!wasmBinary) {
      const wasmPath = this.initOptions.wasmPath ?? resolveWasmPath();
      const file = await readFile(wasmPath);
      wasmBinary = new ArrayBuffer(file.byteLength);
      new Uint8Array(wasmBinary).set(file);
    }
    if (!isValidWasmBinary(wasmBinary)) {
      throw new Error('Invalid PDFium wasm binary');
    }

    const instance = (await mod.init({ wasmBinary })) as WrappedPdfiumModule;
    instance.PDFiumExt_Init();
    return instance;
  }

  async load(data: Uint8Array): Promise<void> {
    await this.initialize();
    const pdfium = this.requireModule();
    this.closeDocument();

    try {
      const filePtr = pdfium.pdfium.wasmExports.malloc(data.length);
      pdfium.pdfium.HEAPU8.set(data, filePtr);

      const docPtr = pdfium.FPDF_LoadMemDocument(filePtr, data.length, 0);
      if (!docPtr) {
        const err = pdfium.FPDF_GetLastError();
        pdfium.pdfium.wasmExports.free(filePtr);
        throw new Error(`PDFium error code ${err}`);
      }

      this.document = { docPtr, filePtr };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load PDF document: ${errorMessage}`);
    }
  }

  async getPageCount(): Promise<number> {
    const { pdfium, document } = this.requireDocument();
    return pdfium.FPDF_GetPageCount(document.docPtr);
  }

  async getPageGeometry(pageIndex: number): Promise<PageGeometry> {
    return this.withPage(pageIndex, (pagePtr, pdfium) => ({
      width: pdfium.FPDF_GetPageWidthF(pagePtr),
      height: pdfium.FPDF_GetPageHeightF(pagePtr)
    }));
  }

  async extractWords(pageIndex: number): Promise<WordBox[]> {
    return this.withPage(pageIndex, (pagePtr, pdfium) => {
      const textPagePtr = pdfium.FPDFText_LoadPage(pagePtr);
      if (!textPagePtr) {
        throw new Error(`Failed to load text layer for page ${pageIndex}`);
      }

      const malloc = pdfium.pdfium.wasmExports.malloc;
      const leftPtr = malloc(8);
      const rightPtr = malloc(8);
      const bottomPtr = malloc(8);
      const topPtr = malloc(8);

      try {
        const charCount = pdfium.FPDFText_CountChars(textPagePtr);
        const buffer = new CharRunBuffer();

        for (let i = 0; i < charCount; i++) {
          const codePoint = pdfium.FPDFText_GetUnicode(textPagePtr, i);
          if (!codePoint) continue;
          const ch = String.fromCodePoint(codePoint);

          const okBox = pdfium.FPDFText_GetCharBox(textPagePtr, i, leftPtr, rightPtr, bottomPtr, topPtr);
          if (!okBox) {
            // Generated characters (line breaks) have no box but still end a word.
            if (isWhitespaceChar(ch)) buffer.breakRun();
            continue;
          }

          const rect = normalizeRect(
            this.readFloat64(leftPtr),
            this.readFloat64(bottomPtr),
            this.readFloat64(rightPtr),
            this.readFloat64(topPtr)
          );
          buffer.push(ch, rect);
        }

        return buffer.finish();
      } finally {
        for (const ptr of [leftPtr, rightPtr, bottomPtr, topPtr]) {
          pdfium.pdfium.wasmExports.free(ptr);
        }
        pdfium.FPDFText_ClosePage(textPagePtr);
      }
    });
  }

  private withPage<T>(pageIndex: number, fn: (pagePtr: number, pdfium: WrappedPdfiumModule) => T): T {
    const { pdfium, document } = this.requireDocument();
    const pagePtr = pdfium.FPDF_LoadPage(document.docPtr, pageIndex);
    if (!pagePtr) {
      throw new Error(`Failed to load page ${pageIndex}`);
    }
    try {
      return fn(pagePtr, pdfium);
    } finally {
      pdfium.FPDF_ClosePage(pagePtr);
    }
  }

  private readFloat64(ptr: number): number {
    const heap = this.requireModule().pdfium.HEAPU8;
    const view = new DataView(heap.buffer, heap.byteOffset + ptr, 8);
    return view.getFloat64(0, true);
  }

  private requireModule(): WrappedPdfiumModule {
    if (!this.pdfium) throw new Error('PDFium not initialized');
    return this.pdfium;
  }

  private requireDocument(): { pdfium: WrappedPdfiumModule; document: LoadedEmbedPdfiumDocument } {
    if (!this.document || !this.pdfium) {
      throw new Error('Document not loaded');
    }
    return { pdfium: this.pdfium, document: this.document };
  }

  private closeDocument(): void {
    if (!this.document || !this.pdfium) return;
    this.pdfium.FPDF_CloseDocument(this.document.docPtr);
    this.pdfium.pdfium.wasmExports.free(this.document.filePtr);
    this.document = null;
  }

  dispose(): void {
    this.closeDocument();
    this.pdfium = null;
  }
}
