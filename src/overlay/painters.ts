import { rgb, type PDFFont, type PDFPage } from 'pdf-lib';
import type { RGBColor } from '../types/config.js';
import type { LineLabel, WordBox } from '../types/geometry.js';

export interface OutlineStyle {
  color: RGBColor;
  width: number;
}

export interface HighlightStyle {
  palette: readonly [RGBColor, RGBColor];
  opacity: number;
}

export interface AnnotationStyle {
  fontSize: number;
  color: RGBColor;
  tickLength: number;
  tickWidth: number;
}

const toColor = ([r, g, b]: RGBColor) => rgb(r, g, b);

export function paintOutlines(page: PDFPage, words: readonly WordBox[], style: OutlineStyle): void {
  const borderColor = toColor(style.color);
  for (const { rect } of words) {
    const [x0, y0, x1, y1] = rect;
    page.drawRectangle({
      x: x0,
      y: y0,
      width: x1 - x0,
      height: y1 - y0,
      borderColor,
      borderWidth: style.width
    });
  }
}

export function paintHighlights(page: PDFPage, words: readonly WordBox[], style: HighlightStyle): void {
  words.forEach(({ rect }, index) => {
    const [x0, y0, x1, y1] = rect;
    page.drawRectangle({
      x: x0,
      y: y0,
      width: x1 - x0,
      height: y1 - y0,
      color: toColor(style.palette[index % 2]),
      opacity: style.opacity,
      borderWidth: 0
    });
  });
}

export function paintAnnotations(
  page: PDFPage,
  labels: readonly LineLabel[],
  font: PDFFont,
  style: AnnotationStyle
): void {
  const color = toColor(style.color);
  for (const label of labels) {
    page.drawText(label.text, {
      x: label.x,
      y: label.y,
      size: style.fontSize,
      font,
      color
    });
    if (style.tickLength > 0) {
      page.drawLine({
        start: { x: label.maxX, y: label.minY },
        end: { x: label.maxX + style.tickLength, y: label.minY },
        thickness: style.tickWidth,
        color
      });
    }
  }
}
