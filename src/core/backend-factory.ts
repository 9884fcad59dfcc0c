import type { ApproachName } from '../types/config.js';
import type { WordBoxBackend } from './word-backend.js';
import { PdfiumWordBackend, type PdfiumInitOptions } from './pdfium-word-backend.js';
import { PdfjsWordBackend } from './pdfjs-word-backend.js';
import { UnpdfWordBackend } from './unpdf-word-backend.js';

export interface BackendOptions {
  pdfium?: PdfiumInitOptions;
}

export function createBackend(name: ApproachName, options: BackendOptions = {}): WordBoxBackend {
  switch (name) {
    case 'unpdf':
      return new UnpdfWordBackend();
    case 'pdfjs':
      return new PdfjsWordBackend();
    case 'pdfium':
      return new PdfiumWordBackend(options.pdfium);
    default: {
      const unknown: never = name;
      throw new Error(`Unknown backend: ${String(unknown)}`);
    }
  }
}
