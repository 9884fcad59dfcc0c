import type { Rect, TopDownWordBox, WordBox } from '../types/geometry.js';

export function normalizeRect(x0: number, y0: number, x1: number, y1: number): Rect {
  return [Math.min(x0, x1), Math.min(y0, y1), Math.max(x0, x1), Math.max(y0, y1)];
}

export function unionRect(rects: readonly Rect[]): Rect {
  if (rects.length === 0) {
    throw new Error('Cannot compute the union of zero rectangles');
  }
  let [minX, minY, maxX, maxY] = rects[0];
  for (const [x0, y0, x1, y1] of rects) {
    minX = Math.min(minX, x0, x1);
    minY = Math.min(minY, y0, y1);
    maxX = Math.max(maxX, x0, x1);
    maxY = Math.max(maxY, y0, y1);
  }
  return [minX, minY, maxX, maxY];
}

export function verticalCenter(word: WordBox): number {
  return (word.rect[1] + word.rect[3]) / 2;
}

/**
 * Converts a y-down word box into page space: `y0 = H - bottom`, `y1 = H - top`.
 */
export function flipWordBox(word: TopDownWordBox, pageHeight: number): WordBox {
  return {
    text: word.text,
    rect: normalizeRect(word.x0, pageHeight - word.bottom, word.x1, pageHeight - word.top)
  };
}

export function isWhitespaceChar(ch: string): boolean {
  return ch.length > 0 && /^\s+$/u.test(ch);
}
