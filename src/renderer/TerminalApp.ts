/**
 * Interactive viewer loop: paints the current page into the alternate screen
 * and reacts to keypresses and terminal resizes until the user quits.
 */

import path from 'node:path';
import type { Key } from 'node:readline';
import {
  ansi,
  clampScroll,
  formatStatus,
  paintFrame,
} from './TerminalPainter.js';
import type { ViewSession } from './ViewSession.js';

export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: 'keypress', listener: (str: string | undefined, key: Key | undefined) => void): unknown;
  off(event: 'keypress', listener: (str: string | undefined, key: Key | undefined) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalOutput {
  columns?: number;
  rows?: number;
  write(chunk: string): boolean;
  on(event: 'resize', listener: () => void): unknown;
  off(event: 'resize', listener: () => void): unknown;
}

export type ViewerAction = 'next' | 'prev' | 'down' | 'up' | 'pageDown' | 'pageUp' | 'top' | 'bottom' | 'reload' | 'quit';

const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;

/**
 * Map a keypress to a viewer action, or null for keys without a binding.
 */
export function actionForKey(str: string | undefined, key: Key | undefined): ViewerAction | null {
  if (key?.ctrl && key.name === 'c') return 'quit';
  switch (key?.name) {
    case 'right':
    case 'pagedown':
      return 'next';
    case 'left':
    case 'pageup':
      return 'prev';
    case 'down':
      return 'down';
    case 'up':
      return 'up';
    case 'space':
      return 'pageDown';
    case 'home':
      return 'top';
    case 'end':
      return 'bottom';
    case 'escape':
      return 'quit';
  }
  switch (str) {
    case 'n': return 'next';
    case 'p': return 'prev';
    case 'j': return 'down';
    case 'k': return 'up';
    case 'b': return 'pageUp';
    case 'g': return 'top';
    case 'G': return 'bottom';
    case 'r': return 'reload';
    case 'q': return 'quit';
    default: return null;
  }
}

export class TerminalApp {
  private pageIndex: number;
  private scroll = 0;
  /** Rows of the last painted grid, for scroll clamping */
  private gridRows = 0;
  private finish: (() => void) | null = null;

  constructor(
    private readonly session: ViewSession,
    private readonly input: TerminalInput,
    private readonly output: TerminalOutput,
    initialPage = 0,
  ) {
    this.pageIndex = initialPage;
  }

  private get viewport(): { rows: number; cols: number } {
    const cols = this.output.columns ?? DEFAULT_COLUMNS;
    const rows = this.output.rows ?? DEFAULT_ROWS;
    // Last row is the status line
    return { rows: Math.max(1, rows - 1), cols: Math.max(1, cols) };
  }

  get currentPage(): number {
    return this.pageIndex;
  }

  get scrollOffset(): number {
    return this.scroll;
  }

  /**
   * Take over the terminal and resolve once the user quits.
   */
  run(): Promise<void> {
    return new Promise((resolve) => {
      this.finish = resolve;
      if (this.input.isTTY) this.input.setRawMode?.(true);
      this.input.on('keypress', this.onKeypress);
      this.output.on('resize', this.onResize);
      this.input.resume();
      this.output.write(ansi.enterAltScreen + ansi.hideCursor + ansi.clearScreen);
      this.paint();
    });
  }

  paint(): void {
    const viewport = this.viewport;
    const rows = Math.max(viewport.rows, this.session.pageRows(this.pageIndex, viewport.cols));
    const view = this.session.renderPage(this.pageIndex, { rows, cols: viewport.cols });

    this.pageIndex = view.pageIndex;
    this.gridRows = view.grid.rows;
    this.scroll = clampScroll(this.scroll, this.gridRows, viewport.rows);

    const title = path.basename(this.session.sourcePath ?? '');
    const status = formatStatus(
      { title, pageIndex: view.pageIndex, pageCount: view.pageCount, indicator: view.indicator },
      viewport.cols,
    );
    this.output.write(paintFrame(view.grid, viewport, this.scroll, status));
  }

  /**
   * Apply one action. Returns a promise only for actions that wait on a load.
   */
  handle(action: ViewerAction): Promise<void> | void {
    const step = this.viewport.rows;
    switch (action) {
      case 'next':
        if (this.pageIndex < this.session.pageCount - 1) {
          this.pageIndex++;
          this.scroll = 0;
        }
        break;
      case 'prev':
        if (this.pageIndex > 0) {
          this.pageIndex--;
          this.scroll = 0;
        }
        break;
      case 'down':
        this.scroll++;
        break;
      case 'up':
        this.scroll--;
        break;
      case 'pageDown':
        this.scroll += step;
        break;
      case 'pageUp':
        this.scroll -= step;
        break;
      case 'top':
        this.scroll = 0;
        break;
      case 'bottom':
        this.scroll = this.gridRows;
        break;
      case 'reload':
        return this.reload();
      case 'quit':
        this.stop();
        return;
    }
    this.paint();
  }

  private async reload(): Promise<void> {
    const outcome = await this.session.reload();
    if (outcome.status !== 'stale' && this.finish) this.paint();
  }

  stop(): void {
    if (this.finish === null) return;
    this.input.off('keypress', this.onKeypress);
    this.output.off('resize', this.onResize);
    if (this.input.isTTY) this.input.setRawMode?.(false);
    this.input.pause();
    this.output.write(ansi.showCursor + ansi.exitAltScreen);
    const finish = this.finish;
    this.finish = null;
    finish();
  }

  private readonly onKeypress = (str: string | undefined, key: Key | undefined): void => {
    const action = actionForKey(str, key);
    if (action === null) return;
    const pending = this.handle(action);
    if (pending) {
      pending.catch((err: unknown) => console.error('[TerminalApp] Reload failed:', err));
    }
  };

  private readonly onResize = (): void => {
    this.paint();
  };
}
