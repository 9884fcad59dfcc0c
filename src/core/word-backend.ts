import type { ApproachName } from '../types/config.js';
import type { PageGeometry, WordBox } from '../types/geometry.js';

/**
 * A text-geometry backend producing word boxes in bottom-left-origin page space.
 * Any coordinate normalization is the backend's own job.
 */
export interface WordBoxBackend {
  readonly name: ApproachName;
  load(data: Uint8Array): Promise<void>;
  getPageCount(): Promise<number>;
  getPageGeometry(pageIndex: number): Promise<PageGeometry>;
  extractWords(pageIndex: number): Promise<WordBox[]>;
  dispose(): void;
}
