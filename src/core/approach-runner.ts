import { join } from 'path';
import type { ApproachConfig, OverlayStyle, OverlayVariant, ProgressCallback } from '../types/config.js';
import type { PageGeometry, WordBox } from '../types/geometry.js';
import type { ApproachReport, WrittenOutput } from '../types/output.js';
import type { WordBoxBackend } from './word-backend.js';
import type { ClusteringStrategy } from './line-clustering.js';
import { labelDocument } from './label-synthesis.js';
import { renderOverlay, type OverlayPainter } from '../overlay/overlay-renderer.js';
import { paintAnnotations, paintHighlights, paintOutlines } from '../overlay/painters.js';
import { mergeOverlay } from '../overlay/overlay-merge.js';
import { writeFilesAtomic } from '../utils/atomic-write.js';

export interface ApproachRunOptions {
  approach: ApproachConfig;
  outputRoot: string;
  sourceStem: string;
  variants: readonly OverlayVariant[];
  clusteringStrategy: ClusteringStrategy;
  lineIndexStart: number;
  style: OverlayStyle;
  onProgress?: ProgressCallback;
}

export interface ExtractedDocument {
  geometries: PageGeometry[];
  words: WordBox[][];
}

export function outputPathFor(options: Pick<ApproachRunOptions, 'approach' | 'outputRoot' | 'sourceStem'>, variant: OverlayVariant): string {
  return join(options.outputRoot, options.approach.outputDir, `${variant}_${options.sourceStem}.pdf`);
}

/**
 * Reads page sizes and word boxes for every page, in page order.
 */
export async function extractDocument(backend: WordBoxBackend, sourceBytes: Uint8Array): Promise<ExtractedDocument> {
  // Backends may take ownership of the buffer they are given.
  await backend.load(new Uint8Array(sourceBytes));
  const pageCount = await backend.getPageCount();

  const geometries: PageGeometry[] = [];
  const words: WordBox[][] = [];
  for (let pageIndex = 0; pageIndex < pageCount; pageIndex++) {
    geometries.push(await backend.getPageGeometry(pageIndex));
    words.push(await backend.extractWords(pageIndex));
  }
  return { geometries, words };
}

/**
 * Runs one approach end to end. Every variant is rendered and merged in memory,
 * then all outputs are written as one all-or-nothing group.
 */
export async function runApproach(
  backend: WordBoxBackend,
  sourceBytes: Uint8Array,
  options: ApproachRunOptions
): Promise<ApproachReport> {
  const startTime = Date.now();
  const { approach, style, onProgress } = options;
  const name = backend.name;

  try {
    onProgress?.({ stage: 'extracting', approach: name, progress: 0, message: `Extracting words with ${name}` });
    const { geometries, words } = await extractDocument(backend, sourceBytes);

    const labelled = labelDocument(words, {
      tolerance: approach.tolerance,
      strategy: options.clusteringStrategy,
      counterStart: options.lineIndexStart,
      labelOffset: style.labelOffset
    });

    const painters: Record<OverlayVariant, OverlayPainter> = {
      bbox: ({ page, pageIndex }) =>
        paintOutlines(page, words[pageIndex], { color: approach.outlineColor, width: approach.outlineWidth }),
      highlight: ({ page, pageIndex }) =>
        paintHighlights(page, words[pageIndex], { palette: style.highlightPalette, opacity: style.highlightOpacity }),
      annotation: ({ page, pageIndex, font }) =>
        paintAnnotations(page, labelled.pages[pageIndex], font, {
          fontSize: style.labelFontSize,
          color: style.labelColor,
          tickLength: style.tickLength,
          tickWidth: style.tickWidth
        })
    };

    const rendered: Array<{ variant: OverlayVariant; bytes: Uint8Array }> = [];
    for (let i = 0; i < options.variants.length; i++) {
      const variant = options.variants[i];
      onProgress?.({
        stage: 'rendering',
        approach: name,
        variant,
        progress: Math.round((i / options.variants.length) * 100),
        message: `Rendering ${variant} overlay`
      });
      const overlay = await renderOverlay(geometries, painters[variant]);
      rendered.push({ variant, bytes: await mergeOverlay(sourceBytes, overlay) });
    }

    const outputs: WrittenOutput[] = rendered.map(({ variant, bytes }) => ({
      variant,
      path: outputPathFor(options, variant),
      bytes: bytes.length
    }));
    for (const output of outputs) {
      onProgress?.({
        stage: 'writing',
        approach: name,
        variant: output.variant,
        progress: 100,
        message: `Writing ${output.path}`
      });
    }
    await writeFilesAtomic(rendered.map(({ bytes }, i) => ({ path: outputs[i].path, data: bytes })));

    return {
      approach: name,
      pageCount: geometries.length,
      wordsPerPage: words.map((pageWords) => pageWords.length),
      lineCount: labelled.pages.reduce((acc, labels) => acc + labels.length, 0),
      labels: labelled.pages,
      outputs,
      processingTime: Date.now() - startTime
    };
  } finally {
    backend.dispose();
  }
}
