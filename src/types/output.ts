import type { ApproachName, OverlayVariant } from './config.js';
import type { LineLabel } from './geometry.js';

export interface WrittenOutput {
  variant: OverlayVariant;
  path: string;
  bytes: number;
}

export interface ApproachReport {
  approach: ApproachName;
  pageCount: number;
  wordsPerPage: number[];
  lineCount: number;
  labels: LineLabel[][];
  outputs: WrittenOutput[];
  processingTime: number;
}

export interface ApproachFailure {
  approach: ApproachName;
  error: string;
}

export interface BenchReport {
  sourcePath: string;
  approaches: ApproachReport[];
  failures: ApproachFailure[];
  processingTime: number;
}
