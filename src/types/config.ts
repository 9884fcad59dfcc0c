import type { ClusteringStrategy } from '../core/line-clustering.js';

export type ApproachName = 'unpdf' | 'pdfjs' | 'pdfium';

export type OverlayVariant = 'bbox' | 'highlight' | 'annotation';

export type RGBColor = [number, number, number];

export interface ApproachConfig {
  backend: ApproachName;
  // Directory (relative to outputRoot) receiving this approach's files
  outputDir: string;
  tolerance: number;
  outlineColor: RGBColor;
  outlineWidth: number;
}

export interface OverlayStyle {
  highlightPalette: [RGBColor, RGBColor];
  highlightOpacity: number;
  labelFontSize: number;
  labelColor: RGBColor;
  labelOffset: number;
  tickLength: number;
  tickWidth: number;
}

export interface OverlayConfig {
  sourcePath: string;
  outputRoot: string;
  approaches: ApproachConfig[];
  variants: OverlayVariant[];
  clusteringStrategy: ClusteringStrategy;
  lineIndexStart: number;
  style: OverlayStyle;
  pdfiumWasmPath?: string;
}

export interface BenchProgress {
  stage: 'reading' | 'extracting' | 'rendering' | 'writing' | 'complete';
  progress: number;
  approach?: ApproachName;
  variant?: OverlayVariant;
  message?: string;
}

export type ProgressCallback = (progress: BenchProgress) => void;

// Chainable configuration interface
export interface ChainableOverlayBench {
  setSourcePath(path: string): ChainableOverlayBench;
  setOutputRoot(path: string): ChainableOverlayBench;
  setTolerance(backend: ApproachName, tolerance: number): ChainableOverlayBench;
  setClusteringStrategy(strategy: ClusteringStrategy): ChainableOverlayBench;
  setVariants(variants: OverlayVariant[]): ChainableOverlayBench;
  setApproaches(backends: ApproachName[]): ChainableOverlayBench;
  applyPreset(preset: 'parity' | 'stable'): ChainableOverlayBench;
}
