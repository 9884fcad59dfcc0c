import { describe, it, expect } from 'vitest';
import {
  LineCounter,
  formatLabel,
  labelDocument,
  parseLabel,
  synthesizeLabels
} from '../../src/core/label-synthesis.js';
import type { WordBox } from '../../src/types/geometry.js';

const word = (text: string, x0: number, y0: number, x1: number, y1: number): WordBox => ({
  text,
  rect: [x0, y0, x1, y1]
});

const hello = word('Hello', 10, 780, 60, 800);
const world = word('World', 70, 780, 130, 800);

describe('LineCounter', () => {
  it('returns the current index and then advances', () => {
    const counter = new LineCounter();
    expect(counter.next()).toBe(1);
    expect(counter.next()).toBe(2);
    expect(counter.peek()).toBe(3);
  });

  it('accepts a custom start', () => {
    expect(new LineCounter(0).next()).toBe(0);
  });

  it('rejects a non-integer start', () => {
    expect(() => new LineCounter(1.5)).toThrow('Line counter start must be an integer, got 1.5');
  });
});

describe('formatLabel / parseLabel', () => {
  it('formats the line index and word count', () => {
    expect(formatLabel(12, 3)).toBe('s12_c3');
  });

  it('parses a formatted label back', () => {
    expect(parseLabel(formatLabel(12, 3))).toEqual({ index: 12, wordCount: 3 });
  });

  it('returns null for anything else', () => {
    expect(parseLabel('x1_c2')).toBeNull();
    expect(parseLabel('s1_c')).toBeNull();
  });
});

describe('synthesizeLabels', () => {
  it('anchors the label right of the line at its lowest edge', () => {
    const counter = new LineCounter();
    const [label] = synthesizeLabels([[hello, world]], counter, { labelOffset: 4 });

    expect(label).toEqual({
      text: 's1_c2',
      index: 1,
      wordCount: 2,
      x: 134,
      y: 780,
      maxX: 130,
      minY: 780,
      maxY: 800
    });
    expect(counter.peek()).toBe(2);
  });

  it('uses the extremes over every member of the line', () => {
    const low = word('low', 140, 770, 200, 801);
    const [label] = synthesizeLabels([[hello, low]], new LineCounter(), { labelOffset: 4 });

    expect(label.text).toBe('s1_c2');
    expect(label.x).toBe(204);
    expect(label.y).toBe(770);
    expect(label.maxY).toBe(801);
  });
});

describe('labelDocument', () => {
  const pageOne = [world, word('Second', 10, 760, 50, 770), hello];
  const pageTwo = [word('Third', 10, 700, 40, 710)];

  it('numbers lines continuously across pages', () => {
    const result = labelDocument([pageOne, pageTwo], { tolerance: 2, labelOffset: 4 });

    expect(result.pages.map((labels) => labels.map((l) => l.text))).toEqual([['s1_c2', 's2_c1'], ['s3_c1']]);
    expect(result.pages[0][1]).toMatchObject({ x: 54, y: 760 });
    expect(result.pages[1][0]).toMatchObject({ x: 44, y: 700 });
    expect(result.nextIndex).toBe(4);
  });

  it('keeps an empty page in place without consuming indices', () => {
    const result = labelDocument([pageOne, [], pageTwo], { tolerance: 2, labelOffset: 4 });

    expect(result.pages.map((labels) => labels.map((l) => l.text))).toEqual([['s1_c2', 's2_c1'], [], ['s3_c1']]);
  });

  it('starts from the configured index', () => {
    const result = labelDocument([pageTwo], { tolerance: 2, labelOffset: 4, counterStart: 0 });

    expect(result.pages[0][0].text).toBe('s0_c1');
    expect(result.nextIndex).toBe(1);
  });
});
