import { describe, it, expect, vi } from 'vitest';
import { PDFDocument } from 'pdf-lib';
import { renderOverlay } from '../../src/overlay/overlay-renderer.js';
import { mergeOverlay } from '../../src/overlay/overlay-merge.js';
import type { PageGeometry } from '../../src/types/geometry.js';

const geometries: PageGeometry[] = [
  { width: 200, height: 300 },
  { width: 400, height: 500 }
];

async function createSource(sizes: readonly PageGeometry[]): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  for (const { width, height } of sizes) {
    doc.addPage([width, height]);
  }
  return await doc.save();
}

describe('renderOverlay', () => {
  it('creates one page per geometry, painted in page order', async () => {
    const paint = vi.fn();

    const bytes = await renderOverlay(geometries, paint);
    const overlay = await PDFDocument.load(bytes);

    expect(overlay.getPages().map((page) => page.getSize())).toEqual(geometries);
    expect(paint.mock.calls.map(([context]) => [context.pageIndex, context.geometry])).toEqual([
      [0, geometries[0]],
      [1, geometries[1]]
    ]);
  });

  it('awaits asynchronous painters before the next page', async () => {
    const order: string[] = [];

    await renderOverlay(geometries, async ({ pageIndex }) => {
      order.push(`start ${pageIndex}`);
      await Promise.resolve();
      order.push(`end ${pageIndex}`);
    });

    expect(order).toEqual(['start 0', 'end 0', 'start 1', 'end 1']);
  });

  it('refuses an empty document', async () => {
    await expect(renderOverlay([], vi.fn())).rejects.toThrow('Cannot render an overlay without pages');
  });

  it('refuses a degenerate page size', async () => {
    await expect(renderOverlay([{ width: 0, height: 100 }], vi.fn())).rejects.toThrow(
      'Invalid page size for page 0: 0x100'
    );
  });
});

describe('mergeOverlay', () => {
  it('keeps the page count and page sizes of the original', async () => {
    const source = await createSource(geometries);
    const overlay = await renderOverlay(geometries, ({ page }) => {
      page.drawRectangle({ x: 10, y: 10, width: 20, height: 20 });
    });

    const merged = await PDFDocument.load(await mergeOverlay(source, overlay));

    expect(merged.getPageCount()).toBe(2);
    expect(merged.getPages().map((page) => page.getSize())).toEqual(geometries);
  });

  it('leaves the original bytes untouched', async () => {
    const source = await createSource(geometries);
    const before = Array.from(source);
    const overlay = await renderOverlay(geometries, vi.fn());

    await mergeOverlay(source, overlay);

    expect(Array.from(source)).toEqual(before);
  });

  it('rejects overlays with a different page count', async () => {
    const source = await createSource(geometries);
    const overlay = await renderOverlay(geometries.slice(0, 1), vi.fn());

    await expect(mergeOverlay(source, overlay)).rejects.toThrow(
      'Page count mismatch: original has 2 pages, overlay has 1'
    );
  });

  it('wraps unreadable input', async () => {
    const overlay = await renderOverlay(geometries, vi.fn());

    await expect(mergeOverlay(new Uint8Array([1, 2, 3]), overlay)).rejects.toThrow(
      'Failed to load documents for merge'
    );
  });
});
