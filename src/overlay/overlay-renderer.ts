import { PDFDocument, StandardFonts, type PDFFont, type PDFPage } from 'pdf-lib';
import type { PageGeometry } from '../types/geometry.js';

export interface OverlayPaintContext {
  page: PDFPage;
  pageIndex: number;
  geometry: PageGeometry;
  font: PDFFont;
}

export type OverlayPainter = (context: OverlayPaintContext) => void | Promise<void>;

/**
 * Builds an in-memory overlay PDF with one blank page per geometry entry, each
 * painted by `paint` in page order. The returned bytes are only meant for merging.
 */
export async function renderOverlay(
  pageGeometries: readonly PageGeometry[],
  paint: OverlayPainter
): Promise<Uint8Array> {
  if (pageGeometries.length === 0) {
    throw new Error('Cannot render an overlay without pages');
  }

  const overlay = await PDFDocument.create();
  const font = await overlay.embedFont(StandardFonts.Helvetica);

  for (let pageIndex = 0; pageIndex < pageGeometries.length; pageIndex++) {
    const geometry = pageGeometries[pageIndex];
    if (!(geometry.width > 0) || !(geometry.height > 0)) {
      throw new Error(`Invalid page size for page ${pageIndex}: ${geometry.width}x${geometry.height}`);
    }
    const page = overlay.addPage([geometry.width, geometry.height]);
    // Embedding needs a content stream even on pages with nothing to paint.
    page.pushOperators();
    await paint({ page, pageIndex, geometry, font });
  }

  return await overlay.save();
}
