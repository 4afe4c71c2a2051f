import { describe, test, expect } from 'vitest';
import { DEFAULT_LAYOUT_CONFIG, resolveLayoutConfig } from '../config.js';

describe('resolveLayoutConfig', () => {
  test('no overrides gives the defaults', () => {
    expect(resolveLayoutConfig()).toEqual(DEFAULT_LAYOUT_CONFIG);
  });

  test('valid overrides replace defaults', () => {
    const config = resolveLayoutConfig({ aspectRatio: 2.4, columnGapChars: 4, horizontalAnchor: 'left' });
    expect(config.aspectRatio).toBe(2.4);
    expect(config.columnGapChars).toBe(4);
    expect(config.horizontalAnchor).toBe('left');
    expect(config.lineTolerance).toBe(0.5);
  });

  test('zero, negative and non-finite numbers are ignored', () => {
    const config = resolveLayoutConfig({ aspectRatio: 0, lineTolerance: -1, overlapRatio: Number.NaN, wordSpaceFactor: Infinity });
    expect(config.aspectRatio).toBe(2);
    expect(config.lineTolerance).toBe(0.5);
    expect(config.overlapRatio).toBe(0.5);
    expect(config.wordSpaceFactor).toBe(0.15);
  });

  test('does not mutate the defaults', () => {
    resolveLayoutConfig({ minColumnBands: 5 });
    expect(DEFAULT_LAYOUT_CONFIG.minColumnBands).toBe(2);
  });
});
