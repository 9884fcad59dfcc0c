import { readFile } from 'fs/promises';
import { basename, extname } from 'path';
import type {
  ApproachConfig,
  ApproachName,
  ChainableOverlayBench,
  OverlayConfig,
  OverlayVariant,
  ProgressCallback
} from './types/index.js';
import type { ApproachFailure, ApproachReport, BenchReport } from './types/output.js';
import { DEFAULT_LINE_TOLERANCE, type ClusteringStrategy } from './core/line-clustering.js';
import { createBackend, type BackendOptions } from './core/backend-factory.js';
import { runApproach } from './core/approach-runner.js';

const DEFAULT_APPROACHES: ApproachConfig[] = [
  {
    backend: 'unpdf',
    outputDir: 'approach1',
    tolerance: DEFAULT_LINE_TOLERANCE,
    outlineColor: [1, 0.85, 0.1],
    outlineWidth: 0.9
  },
  {
    backend: 'pdfjs',
    outputDir: 'approach2',
    tolerance: DEFAULT_LINE_TOLERANCE,
    outlineColor: [1, 1, 0],
    outlineWidth: 1
  },
  {
    backend: 'pdfium',
    outputDir: 'approach3',
    tolerance: 2.5,
    outlineColor: [0.678, 0.847, 0.902],
    outlineWidth: 1
  }
];

export const DEFAULT_OVERLAY_CONFIG: OverlayConfig = {
  sourcePath: 'files/pi.pdf',
  outputRoot: '.',
  approaches: DEFAULT_APPROACHES,
  variants: ['bbox', 'highlight', 'annotation'],
  clusteringStrategy: 'greedy',
  lineIndexStart: 1,
  style: {
    highlightPalette: [
      [0, 1, 0],
      [1, 0, 0]
    ],
    highlightOpacity: 0.35,
    labelFontSize: 8,
    labelColor: [0.663, 0.663, 0.663],
    labelOffset: 4,
    tickLength: 2,
    tickWidth: 0.5
  }
};

// Convenience configuration presets
export const ConfigPresets: Record<'parity' | 'stable', Partial<OverlayConfig>> = {
  /**
   * First-match line grouping against each line's first word (the default).
   */
  parity: {
    clusteringStrategy: 'greedy'
  },

  /**
   * Each word linked to the previous one, so a drifting row stays one line.
   */
  stable: {
    clusteringStrategy: 'adjacent'
  }
};

export function sourceStem(sourcePath: string): string {
  return basename(sourcePath, extname(sourcePath));
}

async function readSource(sourcePath: string): Promise<Uint8Array> {
  try {
    return new Uint8Array(await readFile(sourcePath));
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Source PDF not found: ${sourcePath}`);
    }
    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read source PDF ${sourcePath}: ${errorMessage}`);
  }
}

export class OverlayBench implements ChainableOverlayBench {
  private config: OverlayConfig;
  private backendOptions: BackendOptions;

  constructor(config: Partial<OverlayConfig> = {}) {
    this.config = {
      ...DEFAULT_OVERLAY_CONFIG,
      ...config,
      style: { ...DEFAULT_OVERLAY_CONFIG.style, ...config.style },
      approaches: (config.approaches ?? DEFAULT_OVERLAY_CONFIG.approaches).map((a) => ({ ...a }))
    };
    this.backendOptions = this.config.pdfiumWasmPath
      ? { pdfium: { wasmPath: this.config.pdfiumWasmPath } }
      : {};
  }

  getConfig(): Readonly<OverlayConfig> {
    return this.config;
  }

  // Chainable configuration methods
  setSourcePath(path: string): this {
    this.config.sourcePath = path;
    return this;
  }

  setOutputRoot(path: string): this {
    this.config.outputRoot = path;
    return this;
  }

  setTolerance(backend: ApproachName, tolerance: number): this {
    const approach = this.config.approaches.find((a) => a.backend === backend);
    if (!approach) {
      throw new Error(`Approach not configured: ${backend}`);
    }
    approach.tolerance = tolerance;
    return this;
  }

  setClusteringStrategy(strategy: ClusteringStrategy): this {
    this.config.clusteringStrategy = strategy;
    return this;
  }

  setVariants(variants: OverlayVariant[]): this {
    this.config.variants = [...variants];
    return this;
  }

  setApproaches(backends: ApproachName[]): this {
    this.config.approaches = backends.map((backend) => {
      const known = DEFAULT_APPROACHES.find((a) => a.backend === backend);
      if (!known) {
        throw new Error(`Unknown backend: ${backend}`);
      }
      return this.config.approaches.find((a) => a.backend === backend) ?? { ...known };
    });
    return this;
  }

  applyPreset(preset: keyof typeof ConfigPresets): this {
    this.config = { ...this.config, ...ConfigPresets[preset] };
    return this;
  }

  /**
   * Runs every configured approach in sequence. A missing source aborts before
   * any output; a failing approach is reported and the remaining ones still run.
   */
  async run(progressCallback?: ProgressCallback): Promise<BenchReport> {
    const startTime = Date.now();
    const { sourcePath } = this.config;

    progressCallback?.({ stage: 'reading', progress: 0, message: `Reading ${sourcePath}` });
    const sourceBytes = await readSource(sourcePath);

    const approaches: ApproachReport[] = [];
    const failures: ApproachFailure[] = [];

    for (const approach of this.config.approaches) {
      try {
        const backend = createBackend(approach.backend, this.backendOptions);
        const report = await runApproach(backend, sourceBytes, {
          approach,
          outputRoot: this.config.outputRoot,
          sourceStem: sourceStem(sourcePath),
          variants: this.config.variants,
          clusteringStrategy: this.config.clusteringStrategy,
          lineIndexStart: this.config.lineIndexStart,
          style: this.config.style,
          onProgress: progressCallback
        });
        console.info(
          `[OverlayBench] ${approach.backend}: ${report.pageCount} pages, ${report.lineCount} lines, ` +
            `${report.outputs.length} files in ${report.processingTime}ms`
        );
        approaches.push(report);
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        console.error(`[OverlayBench] Approach ${approach.backend} failed; no output written:`, errorMessage);
        failures.push({ approach: approach.backend, error: errorMessage });
      }
    }

    progressCallback?.({ stage: 'complete', progress: 100 });

    return {
      sourcePath,
      approaches,
      failures,
      processingTime: Date.now() - startTime
    };
  }
}

export type * from './types/index.js';
export { clusterLines, sortForTraversal, DEFAULT_LINE_TOLERANCE, type ClusteringStrategy } from './core/line-clustering.js';
export { LineCounter, labelDocument, synthesizeLabels, formatLabel, parseLabel } from './core/label-synthesis.js';
export { CharRunBuffer, reconstructWords } from './core/char-run-buffer.js';
export { createBackend } from './core/backend-factory.js';
export type { WordBoxBackend } from './core/word-backend.js';
export { runApproach, extractDocument } from './core/approach-runner.js';
export { renderOverlay } from './overlay/overlay-renderer.js';
export { mergeOverlay } from './overlay/overlay-merge.js';
export { writeFileAtomic, writeFilesAtomic } from './utils/atomic-write.js';
