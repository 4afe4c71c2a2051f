/**
 * Turns a TerminalGrid into escape sequences for a full-screen frame.
 * Pure: the caller writes the returned string.
 */

import { gridToLines } from './utils/layoutEngine/CoordinateMapper.js';
import type { GridSize, TerminalGrid } from './utils/layoutEngine/types.js';

const ESC = '\x1b[';

export const ansi = {
  home: `${ESC}H`,
  clearLine: `${ESC}K`,
  clearScreen: `${ESC}2J`,
  inverse: `${ESC}7m`,
  reset: `${ESC}0m`,
  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,
  enterAltScreen: `${ESC}?1049h`,
  exitAltScreen: `${ESC}?1049l`,
} as const;

export interface StatusInfo {
  title: string;
  pageIndex: number;
  pageCount: number;
  indicator: string;
}

export const KEY_HELP = 'n/p page  j/k scroll  r reload  q quit';

/**
 * Keep the scroll offset inside the grid.
 */
export function clampScroll(scroll: number, gridRows: number, viewportRows: number): number {
  return Math.max(0, Math.min(scroll, gridRows - viewportRows));
}

/** Pad or clip to exactly `width` characters */
function fit(text: string, width: number): string {
  const chars = Array.from(text);
  if (chars.length >= width) return chars.slice(0, width).join('');
  return text + ' '.repeat(width - chars.length);
}

export function formatStatus(info: StatusInfo, width: number): string {
  const page = info.pageCount > 0 ? `page ${info.pageIndex + 1}/${info.pageCount}` : '';
  const left = [info.title, page, info.indicator].filter(s => s !== '').join('  ');
  const gap = width - Array.from(left).length - KEY_HELP.length;
  return gap >= 2 ? left + ' '.repeat(gap) + KEY_HELP : fit(left, width);
}

export function gridRowText(grid: TerminalGrid, row: number): string {
  const cells = grid.cells[row];
  return cells ? cells.map(c => c.char).join('').replace(/\s+$/, '') : '';
}

/**
 * One frame: `viewport.rows` grid rows starting at `scroll`, then an inverse
 * status line. Rows past the end of the grid are cleared.
 */
export function paintFrame(grid: TerminalGrid, viewport: GridSize, scroll: number, status: string): string {
  let out = ansi.home;
  for (let r = 0; r < viewport.rows; r++) {
    const text = Array.from(gridRowText(grid, scroll + r)).slice(0, viewport.cols).join('');
    out += text + ansi.clearLine + '\r\n';
  }
  out += ansi.inverse + fit(status, viewport.cols) + ansi.reset;
  return out;
}

/**
 * Plain text for non-interactive output: every row, trailing blanks removed,
 * trailing empty rows dropped.
 */
export function gridToText(grid: TerminalGrid): string {
  const rows = gridToLines(grid);
  while (rows.length > 0 && rows[rows.length - 1] === '') rows.pop();
  return rows.length > 0 ? rows.join('\n') + '\n' : '';
}
