import type { Line, WordBox } from '../types/geometry.js';
import { verticalCenter } from './geometry.js';

/**
 * - `greedy`: each word joins the first line (in creation order) whose reference
 *   center, the center of its first-placed word, is within tolerance. The default;
 *   a row of words that drifts more than the tolerance away from its first word is
 *   split into two lines.
 * - `adjacent`: each word joins the current line when its center is within
 *   tolerance of the previous word's center in traversal order. Drifting rows stay
 *   together; the partition depends only on the set of centers.
 */
export type ClusteringStrategy = 'greedy' | 'adjacent';

export interface LineClusteringOptions {
  tolerance: number;
  strategy?: ClusteringStrategy;
}

export const DEFAULT_LINE_TOLERANCE = 2.0;

/** Top-to-bottom (descending center in page space), then left-to-right. */
export function sortForTraversal(words: readonly WordBox[]): WordBox[] {
  return [...words].sort((a, b) => {
    const dy = verticalCenter(b) - verticalCenter(a);
    if (dy !== 0) return dy;
    return a.rect[0] - b.rect[0];
  });
}

export function clusterLines(words: readonly WordBox[], options: LineClusteringOptions): Line[] {
  const { tolerance } = options;
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new Error(`Invalid line tolerance: ${tolerance}`);
  }
  const strategy = options.strategy ?? 'greedy';

  const lines: Line[] = [];
  const refCenters: number[] = [];
  let previousCenter = NaN;

  for (const word of sortForTraversal(words)) {
    const center = verticalCenter(word);
    let target = -1;

    if (strategy === 'adjacent') {
      if (lines.length > 0 && Math.abs(previousCenter - center) <= tolerance) {
        target = lines.length - 1;
      }
      previousCenter = center;
    } else {
      for (let i = 0; i < lines.length; i++) {
        if (Math.abs(refCenters[i] - center) <= tolerance) {
          target = i;
          break;
        }
      }
    }

    if (target >= 0) {
      lines[target].push(word);
    } else {
      lines.push([word]);
      refCenters.push(center);
    }
  }

  return lines;
}
