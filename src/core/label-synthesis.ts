import type { Line, LineLabel, WordBox } from '../types/geometry.js';
import { clusterLines, type ClusteringStrategy } from './line-clustering.js';

/**
 * Running line index for one document. Create one per approach run and pass the
 * same instance to every page, in page order; it is never reset between pages.
 */
export class LineCounter {
  private current: number;

  constructor(start: number = 1) {
    if (!Number.isInteger(start)) {
      throw new Error(`Line counter start must be an integer, got ${start}`);
    }
    this.current = start;
  }

  /** Returns the current index and advances by one. */
  next(): number {
    const value = this.current;
    this.current += 1;
    return value;
  }

  peek(): number {
    return this.current;
  }
}

export interface LabelOptions {
  labelOffset: number;
}

export interface DocumentLabelOptions extends LabelOptions {
  tolerance: number;
  strategy?: ClusteringStrategy;
  counterStart?: number;
}

export interface DocumentLabels {
  pages: LineLabel[][];
  nextIndex: number;
}

export function formatLabel(index: number, wordCount: number): string {
  return `s${index}_c${wordCount}`;
}

export function parseLabel(text: string): { index: number; wordCount: number } | null {
  const match = /^s(-?\d+)_c(\d+)$/.exec(text);
  if (!match) return null;
  return { index: Number(match[1]), wordCount: Number(match[2]) };
}

export function synthesizeLabels(
  lines: readonly Line[],
  counter: LineCounter,
  options: LabelOptions
): LineLabel[] {
  const labels: LineLabel[] = [];

  for (const line of lines) {
    if (line.length === 0) continue;

    let maxX = -Infinity;
    let minY = Infinity;
    let maxY = -Infinity;
    for (const word of line) {
      maxX = Math.max(maxX, word.rect[2]);
      minY = Math.min(minY, word.rect[1]);
      maxY = Math.max(maxY, word.rect[3]);
    }

    const index = counter.next();
    labels.push({
      text: formatLabel(index, line.length),
      index,
      wordCount: line.length,
      x: maxX + options.labelOffset,
      y: minY,
      maxX,
      minY,
      maxY
    });
  }

  return labels;
}

/**
 * Clusters and labels every page in document order with one shared counter.
 */
export function labelDocument(
  pages: readonly (readonly WordBox[])[],
  options: DocumentLabelOptions
): DocumentLabels {
  const counter = new LineCounter(options.counterStart ?? 1);
  const labelled = pages.map((words) => {
    const lines = clusterLines(words, { tolerance: options.tolerance, strategy: options.strategy });
    return synthesizeLabels(lines, counter, options);
  });

  return {
    pages: labelled,
    nextIndex: counter.peek()
  };
}
