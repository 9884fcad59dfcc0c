/**
 * Page-space rectangle `[x0, y0, x1, y1]`.
 * Origin is the bottom-left corner of the page and y grows upward.
 */
export type Rect = [number, number, number, number];

export interface WordBox {
  text: string;
  rect: Rect;
}

/** Words judged to share a vertical position. `line[0]` is the reference member. */
export type Line = WordBox[];

export interface PageGeometry {
  width: number;
  height: number;
}

export interface LineLabel {
  text: string;
  /** Line index shared across the whole document. */
  index: number;
  wordCount: number;
  /** Anchor of the label baseline, already offset from the line's right edge. */
  x: number;
  y: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/** Word box as reported by a y-down source (`top < bottom`). */
export interface TopDownWordBox {
  text: string;
  x0: number;
  x1: number;
  top: number;
  bottom: number;
}
