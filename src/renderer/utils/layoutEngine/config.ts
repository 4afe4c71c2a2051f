/**
 * Layout analysis thresholds. Every value can be overridden from the
 * settings store; the defaults are tuned for pdfalto output in points.
 */

export type HorizontalAnchor = 'center' | 'left';

export interface LayoutConfig {
  /**
   * Two fragments share a line when their vertical centres differ by less
   * than this fraction of the smaller fragment's height.
   */
  lineTolerance: number;
  /** Minimum gutter width between columns, in median character widths */
  columnGapChars: number;
  /** Number of lines that must share a gutter before it counts as a column boundary */
  minColumnBands: number;
  /** Gap between words (in median character widths) above which a space is materialized */
  wordSpaceFactor: number;
  /** Horizontal overlap, as a fraction of the narrower word, that marks a duplicate */
  overlapRatio: number;
  /** Terminal cell height divided by cell width */
  aspectRatio: number;
  /** Which x of a word's box picks its starting column */
  horizontalAnchor: HorizontalAnchor;
  /** Vertical gap, in line heights, that starts a new section in readable text */
  sectionGapFactor: number;
}

export const DEFAULT_LAYOUT_CONFIG: Readonly<LayoutConfig> = {
  lineTolerance: 0.5,
  columnGapChars: 3,
  minColumnBands: 2,
  wordSpaceFactor: 0.15,
  overlapRatio: 0.5,
  aspectRatio: 2.0,
  horizontalAnchor: 'center',
  sectionGapFactor: 1.5,
};

/**
 * Merge overrides onto the defaults. Non-finite or non-positive numbers are
 * ignored so a bad settings file cannot zero out a divisor.
 */
export function resolveLayoutConfig(overrides: Partial<LayoutConfig> = {}): LayoutConfig {
  const config: LayoutConfig = { ...DEFAULT_LAYOUT_CONFIG };

  const numericKeys = [
    'lineTolerance',
    'columnGapChars',
    'minColumnBands',
    'wordSpaceFactor',
    'overlapRatio',
    'aspectRatio',
    'sectionGapFactor',
  ] as const;

  for (const key of numericKeys) {
    const value = overrides[key];
    if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
      config[key] = value;
    }
  }

  if (overrides.horizontalAnchor === 'center' || overrides.horizontalAnchor === 'left') {
    config.horizontalAnchor = overrides.horizontalAnchor;
  }

  return config;
}
