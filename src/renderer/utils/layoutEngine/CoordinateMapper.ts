/**
 * Coordinate Mapper
 *
 * Projects a resolved page onto a fixed character grid. Horizontal scale fits
 * the page width to the grid. Vertical scale fits the page height to the
 * grid's rows, capped by the cell aspect ratio; a grid `naturalRows` tall
 * shows the page at its true proportions.
 *
 * Infallible: out-of-range positions are clamped, overflowing text is clipped.
 */

import { centerX, centerY, clamp } from './geometry.js';
import { DEFAULT_LAYOUT_CONFIG, type LayoutConfig } from './config.js';
import type {
  Cell,
  GridMapping,
  GridSize,
  LayoutWarning,
  ResolvedPage,
  TerminalGrid,
  Word,
} from './types.js';

// ─── Grid Helpers ────────────────────────────────────────────

const BLANK = ' ';

function blankCell(): Cell {
  return { char: BLANK, isFragmentStart: false };
}

function normalizeSize(size: GridSize): GridSize {
  return {
    rows: Math.max(0, Math.floor(size.rows)),
    cols: Math.max(0, Math.floor(size.cols)),
  };
}

export function createBlankGrid(size: GridSize): TerminalGrid {
  const { rows, cols } = normalizeSize(size);
  const cells: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: Cell[] = [];
    for (let c = 0; c < cols; c++) row.push(blankCell());
    cells.push(row);
  }
  return { rows, cols, cells };
}

/**
 * One string per row, trailing blanks removed.
 */
export function gridToLines(grid: TerminalGrid): string[] {
  return grid.cells.map(row => row.map(cell => cell.char).join('').replace(/\s+$/, ''));
}

/**
 * Write text into a row starting at `col`, clipping at the last column.
 * Returns the number of characters written.
 */
function writeText(grid: TerminalGrid, row: number, col: number, text: string): number {
  const chars = Array.from(text);
  let written = 0;
  for (let i = 0; i < chars.length; i++) {
    const c = col + i;
    if (c > grid.cols - 1) break;
    grid.cells[row][c] = { char: chars[i], isFragmentStart: i === 0 };
    written++;
  }
  return written;
}

/**
 * A grid holding plain text lines from the top-left corner, used for
 * diagnostics. Lines beyond the grid are dropped; long lines are clipped.
 */
export function textGrid(lines: string[], size: GridSize): TerminalGrid {
  const grid = createBlankGrid(size);
  for (let r = 0; r < Math.min(lines.length, grid.rows); r++) {
    if (lines[r] !== '' && grid.cols > 0) writeText(grid, r, 0, lines[r]);
  }
  return grid;
}

// ─── Scaling ─────────────────────────────────────────────────

export interface GridScale {
  scaleX: number;
  scaleY: number;
}

/**
 * Columns and rows per page unit for a grid of `size`.
 *
 * The vertical scale fits the page height to the grid's rows, then the aspect
 * correction caps it at `scaleX / aspectRatio` so line spacing is never
 * stretched past the page's proportions.
 */
export function computeScale(
  page: Pick<ResolvedPage, 'width' | 'height'>,
  size: GridSize,
  config: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
): GridScale {
  const scaleX = page.width > 0 ? size.cols / page.width : 0;
  const fitY = page.height > 0 ? size.rows / page.height : 0;
  return { scaleX, scaleY: Math.min(fitY, aspectScale(scaleX, config)) };
}

function aspectScale(scaleX: number, config: LayoutConfig): number {
  return scaleX / config.aspectRatio;
}

/**
 * Row count that shows the whole page height at aspect-true spacing for a
 * `cols`-wide grid.
 */
export function naturalRows(page: Pick<ResolvedPage, 'width' | 'height'>, cols: number, config: LayoutConfig = DEFAULT_LAYOUT_CONFIG): number {
  const scaleX = page.width > 0 ? cols / page.width : 0;
  return Math.max(1, Math.ceil(page.height * aspectScale(scaleX, config)));
}

// ─── Mapping ─────────────────────────────────────────────────

interface Placement {
  word: Word;
  row: number;
  col: number;
  rank: number;
}

/**
 * Map a resolved page onto a grid of the requested size.
 *
 * Words on the same row are laid out by mapped column; when rounding would
 * make a word touch or overlap its left neighbour it is pushed right so that
 * exactly one blank cell separates them.
 */
export function mapToGrid(page: ResolvedPage, size: GridSize, config: LayoutConfig = DEFAULT_LAYOUT_CONFIG): GridMapping {
  const grid = createBlankGrid(size);
  const warnings: LayoutWarning[] = [];
  if (grid.rows === 0 || grid.cols === 0) return { grid, warnings };

  const { scaleX, scaleY } = computeScale(page, grid, config);

  const rows = new Map<number, Placement[]>();
  for (const line of page.lines) {
    for (let w = line.firstWord; w < line.firstWord + line.wordCount; w++) {
      const word = page.words[w];
      const anchorX = config.horizontalAnchor === 'left' ? word.bbox.x : centerX(word.bbox);
      const row = clamp(Math.floor(centerY(word.bbox) * scaleY), 0, grid.rows - 1);
      const col = clamp(Math.floor(anchorX * scaleX), 0, grid.cols - 1);
      const placement: Placement = { word, row, col, rank: line.readingRank };
      const list = rows.get(row);
      if (list) list.push(placement);
      else rows.set(row, [placement]);
    }
  }

  let clipped = 0;
  for (const [row, placements] of rows) {
    placements.sort((a, b) => a.col - b.col || a.rank - b.rank || a.word.bbox.x - b.word.bbox.x);

    // Last occupied column on this row; -2 lets a word start at column 0
    let lastUsed = -2;
    for (const placement of placements) {
      const start = Math.max(placement.col, lastUsed + 2);
      const length = Array.from(placement.word.text).length;
      if (start > grid.cols - 1) {
        clipped++;
        continue;
      }
      const written = writeText(grid, row, start, placement.word.text);
      if (written < length) clipped++;
      lastUsed = start + written - 1;
    }
  }

  if (clipped > 0) {
    warnings.push({
      kind: 'word-clipped',
      pageIndex: page.index,
      message: `Page ${page.index + 1}: ${clipped} word(s) clipped at the right edge`,
    });
  }

  return { grid, warnings };
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  writeText,
  normalizeSize,
};
