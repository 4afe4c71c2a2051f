import { describe, test, expect } from 'vitest';
import { renderReadableText, renderDocumentText } from '../ReadableText.js';
import { resolveLayoutConfig } from '../config.js';
import type { ReconstructedLine, ResolvedPage } from '../types.js';

function makeLine(text: string, y: number, overrides: Partial<ReconstructedLine> = {}): ReconstructedLine {
  return {
    bbox: { x: 10, y, width: 50, height: 10 },
    firstWord: 0,
    wordCount: 0,
    readingRank: 0,
    text,
    column: 0,
    ...overrides,
  };
}

function makePage(lines: ReconstructedLine[], index = 0): ResolvedPage {
  return { index, width: 200, height: 200, words: [], lines, columnBoundaries: [] };
}

describe('renderReadableText', () => {
  test('consecutive lines are written one per line', () => {
    expect(renderReadableText(makePage([makeLine('first', 10), makeLine('second', 22)]))).toBe('first\nsecond\n');
  });

  test('a gap of two line heights becomes two blank lines', () => {
    // gap = 40 - (10 + 10) = 20
    expect(renderReadableText(makePage([makeLine('a', 10), makeLine('b', 40)]))).toBe('a\n\n\nb\n');
  });

  test('blank lines are capped at three', () => {
    expect(renderReadableText(makePage([makeLine('a', 10), makeLine('b', 150)]))).toBe('a\n\n\n\nb\n');
  });

  test('moving up into the next column adds no blank line', () => {
    const page = makePage([
      makeLine('left', 100),
      makeLine('right', 10, { bbox: { x: 110, y: 10, width: 50, height: 10 }, column: 1 }),
    ]);
    expect(renderReadableText(page)).toBe('left\nright\n');
  });

  test('section gap factor is configurable', () => {
    const config = resolveLayoutConfig({ sectionGapFactor: 3 });
    expect(renderReadableText(makePage([makeLine('a', 10), makeLine('b', 40)]), config)).toBe('a\nb\n');
  });

  test('a page without lines is empty', () => {
    expect(renderReadableText(makePage([]))).toBe('');
  });
});

describe('renderDocumentText', () => {
  test('pages are separated by a form feed', () => {
    const text = renderDocumentText({
      sourcePath: 'x.pdf',
      pages: [makePage([makeLine('one', 10)]), makePage([makeLine('two', 10)], 1)],
      warnings: [],
    });
    expect(text).toBe('one\n\ftwo\n');
  });
});
