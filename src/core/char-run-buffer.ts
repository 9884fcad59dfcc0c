import type { Rect, WordBox } from '../types/geometry.js';
import { isWhitespaceChar, unionRect } from './geometry.js';

export interface PositionedChar {
  text: string;
  rect: Rect;
}

/**
 * Rebuilds words from a page's character stream. Whitespace ends the pending run;
 * the run becomes one word whose box is the union of its character boxes.
 * One buffer per page: `finish()` flushes the trailing run and returns the words.
 */
export class CharRunBuffer {
  private pending: PositionedChar[] = [];
  private readonly words: WordBox[] = [];

  push(text: string, rect: Rect): void {
    if (isWhitespaceChar(text)) {
      this.flush();
      return;
    }
    this.pending.push({ text, rect });
  }

  /** Ends the pending run without adding a character (e.g. on a whitespace char with no box). */
  breakRun(): void {
    this.flush();
  }

  finish(): WordBox[] {
    this.flush();
    return [...this.words];
  }

  private flush(): void {
    if (this.pending.length === 0) return;
    const run = this.pending;
    this.pending = [];

    const text = run.map((c) => c.text).join('');
    if (text.trim().length === 0) return;

    this.words.push({
      text,
      rect: unionRect(run.map((c) => c.rect))
    });
  }
}

export function reconstructWords(chars: Iterable<PositionedChar>): WordBox[] {
  const buffer = new CharRunBuffer();
  for (const ch of chars) {
    buffer.push(ch.text, ch.rect);
  }
  return buffer.finish();
}
