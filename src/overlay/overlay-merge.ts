import { PDFDocument } from 'pdf-lib';

/**
 * Draws overlay page `i` over original page `i` and returns the merged document.
 * Original content stays underneath; the source bytes are not modified.
 */
export async function mergeOverlay(originalBytes: Uint8Array, overlayBytes: Uint8Array): Promise<Uint8Array> {
  let base: PDFDocument;
  let overlay: PDFDocument;
  try {
    base = await PDFDocument.load(originalBytes);
    overlay = await PDFDocument.load(overlayBytes);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load documents for merge: ${errorMessage}`);
  }

  const pageCount = base.getPageCount();
  const overlayCount = overlay.getPageCount();
  if (pageCount !== overlayCount) {
    throw new Error(`Page count mismatch: original has ${pageCount} pages, overlay has ${overlayCount}`);
  }

  const embedded = await base.embedPdf(overlay, overlay.getPageIndices());
  const pages = base.getPages();
  for (let i = 0; i < pages.length; i++) {
    pages[i].drawPage(embedded[i], { x: 0, y: 0 });
  }

  return await base.save();
}
