import { isWhitespaceChar } from './geometry.js';

export interface WordSpan {
  text: string;
  /** Offsets in code points from the start of the item string. */
  start: number;
  end: number;
}

export interface ItemWordSpans {
  words: WordSpan[];
  /** Code point length of the whole item, whitespace included. */
  length: number;
}

/**
 * Whitespace-delimited words of one text item. Offsets count code points so a
 * surrogate pair takes one share of the item width.
 */
export function splitWordSpans(str: string): ItemWordSpans {
  const chars = Array.from(str);
  const words: WordSpan[] = [];
  let start = -1;

  for (let i = 0; i <= chars.length; i++) {
    const boundary = i === chars.length || isWhitespaceChar(chars[i]);
    if (!boundary) {
      if (start < 0) start = i;
      continue;
    }
    if (start >= 0) {
      words.push({ text: chars.slice(start, i).join(''), start, end: i });
      start = -1;
    }
  }

  return { words, length: chars.length };
}
