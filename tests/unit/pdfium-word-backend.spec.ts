import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PdfiumWordBackend } from '../../src/core/pdfium-word-backend.js';

type FakeChar = {
  code: number;
  // left, right, bottom, top
  box: [number, number, number, number] | null;
};

const heap = new Uint8Array(64 * 1024);
let nextPtr = 8;

const fakeState = {
  chars: [] as FakeChar[],
  loadError: 0
};

const writeFloat64 = (ptr: number, value: number) => {
  new DataView(heap.buffer).setFloat64(ptr, value, true);
};

const fakePdfium = {
  PDFiumExt_Init: vi.fn(),
  pdfium: {
    HEAPU8: heap,
    wasmExports: {
      malloc: vi.fn((size: number) => {
        const ptr = nextPtr;
        nextPtr += Math.ceil(size / 8) * 8;
        return ptr;
      }),
      free: vi.fn()
    }
  },
  FPDF_GetLastError: vi.fn(() => fakeState.loadError),
  FPDF_LoadMemDocument: vi.fn(() => (fakeState.loadError ? 0 : 1)),
  FPDF_CloseDocument: vi.fn(),
  FPDF_GetPageCount: vi.fn(() => 2),
  FPDF_LoadPage: vi.fn((_doc: number, pageIndex: number) => 100 + pageIndex),
  FPDF_ClosePage: vi.fn(),
  FPDF_GetPageWidthF: vi.fn(() => 612),
  FPDF_GetPageHeightF: vi.fn(() => 792),
  FPDFText_LoadPage: vi.fn(() => 200),
  FPDFText_ClosePage: vi.fn(),
  FPDFText_CountChars: vi.fn(() => fakeState.chars.length),
  FPDFText_GetUnicode: vi.fn((_textPage: number, index: number) => fakeState.chars[index].code),
  FPDFText_GetCharBox: vi.fn(
    (_textPage: number, index: number, leftPtr: number, rightPtr: number, bottomPtr: number, topPtr: number) => {
      const { box } = fakeState.chars[index];
      if (!box) return 0;
      writeFloat64(leftPtr, box[0]);
      writeFloat64(rightPtr, box[1]);
      writeFloat64(bottomPtr, box[2]);
      writeFloat64(topPtr, box[3]);
      return 1;
    }
  )
};

const mockInit = vi.fn(async () => fakePdfium);

vi.mock('@embedpdf/pdfium', () => ({
  init: mockInit
}));

const wasmBinary = new ArrayBuffer(4);
new Uint8Array(wasmBinary).set([0x00, 0x61, 0x73, 0x6d]);

describe('PdfiumWordBackend', () => {
  beforeEach(() => {
    fakeState.chars = [];
    fakeState.loadError = 0;
    vi.clearAllMocks();
  });

  // Runs first: a failed init must leave the module cache empty for the tests below.
  it('rejects a wasm binary without the wasm header', async () => {
    const backend = new PdfiumWordBackend({ wasmBinary: new ArrayBuffer(4) });

    await expect(backend.load(new Uint8Array([1]))).rejects.toThrow(
      'Failed to initialize PDFium: Invalid PDFium wasm binary'
    );
    expect(mockInit).not.toHaveBeenCalled();
  });

  it('rebuilds words from the character stream', async () => {
    fakeState.chars = [
      { code: 0x41, box: [0, 5, 0, 10] },
      { code: 0x42, box: [5, 10, 0, 12] },
      // generated space: no box, still ends the word
      { code: 0x20, box: null },
      { code: 0x43, box: [12, 17, 1, 10] },
      { code: 0, box: null },
      { code: 0x0a, box: [17, 18, 0, 10] },
      { code: 0x44, box: [20, 25, 0, 10] }
    ];
    const backend = new PdfiumWordBackend({ wasmBinary });
    await backend.load(new Uint8Array([0x25, 0x50, 0x44, 0x46]));

    const words = await backend.extractWords(0);

    expect(words).toEqual([
      { text: 'AB', rect: [0, 0, 10, 12] },
      { text: 'C', rect: [12, 1, 17, 10] },
      { text: 'D', rect: [20, 0, 25, 10] }
    ]);
    expect(fakePdfium.FPDF_LoadPage).toHaveBeenCalledWith(1, 0);
    expect(fakePdfium.FPDFText_ClosePage).toHaveBeenCalledWith(200);
    expect(fakePdfium.FPDF_ClosePage).toHaveBeenCalledWith(100);
    expect(fakePdfium.pdfium.wasmExports.free).toHaveBeenCalledTimes(4);
  });

  it('ends a word at a whitespace character that has a box', async () => {
    fakeState.chars = [
      { code: 0x78, box: [0, 5, 0, 10] },
      { code: 0x20, box: [5, 7, 0, 10] }
    ];
    const backend = new PdfiumWordBackend({ wasmBinary });
    await backend.load(new Uint8Array([1]));

    expect(await backend.extractWords(1)).toEqual([{ text: 'x', rect: [0, 0, 5, 10] }]);
  });

  it('copies the document into the wasm heap', async () => {
    const backend = new PdfiumWordBackend({ wasmBinary });
    await backend.load(new Uint8Array([7, 8, 9]));

    const filePtr = fakePdfium.pdfium.wasmExports.malloc.mock.results[0].value;
    expect(Array.from(heap.subarray(filePtr, filePtr + 3))).toEqual([7, 8, 9]);
    expect(fakePdfium.FPDF_LoadMemDocument).toHaveBeenCalledWith(filePtr, 3, 0);
  });

  it('reports page count and geometry', async () => {
    const backend = new PdfiumWordBackend({ wasmBinary });
    await backend.load(new Uint8Array([1]));

    expect(await backend.getPageCount()).toBe(2);
    expect(await backend.getPageGeometry(1)).toEqual({ width: 612, height: 792 });
    expect(fakePdfium.FPDF_ClosePage).toHaveBeenCalledWith(101);
  });

  it('reports the PDFium error code when loading fails', async () => {
    fakeState.loadError = 3;
    const backend = new PdfiumWordBackend({ wasmBinary });

    await expect(backend.load(new Uint8Array([1]))).rejects.toThrow(
      'Failed to load PDF document: PDFium error code 3'
    );
    expect(fakePdfium.pdfium.wasmExports.free).toHaveBeenCalledTimes(1);
  });

  it('requires a loaded document', async () => {
    const backend = new PdfiumWordBackend({ wasmBinary });

    await expect(backend.extractWords(0)).rejects.toThrow('Document not loaded');
  });

  it('closes the document and frees its buffer on dispose', async () => {
    const backend = new PdfiumWordBackend({ wasmBinary });
    await backend.load(new Uint8Array([1]));
    const filePtr = fakePdfium.pdfium.wasmExports.malloc.mock.results[0].value;

    backend.dispose();

    expect(fakePdfium.FPDF_CloseDocument).toHaveBeenCalledWith(1);
    expect(fakePdfium.pdfium.wasmExports.free).toHaveBeenCalledWith(filePtr);
    await expect(backend.getPageCount()).rejects.toThrow('Document not loaded');
  });
});
