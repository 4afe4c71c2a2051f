/**
 * View Session
 *
 * Owns the document currently on screen. Each load is tagged with a generation
 * number; a load that finishes after a newer one started is discarded without
 * touching the session. Grids are built on demand per (page, size) and are
 * always complete.
 */

import {
  DEFAULT_LAYOUT_CONFIG,
  mapToGrid,
  naturalRows,
  parseAltoDescription,
  resolveDocument,
  textGrid,
  type GridSize,
  type LayoutConfig,
  type LayoutDocument,
  type LayoutWarning,
  type LoadError,
  type TerminalGrid,
} from './utils/layoutEngine/index.js';
import type { Extractor } from '../main/extraction/types.js';

export type LoadOutcome =
  | { status: 'loaded'; document: LayoutDocument }
  | { status: 'failed'; error: LoadError }
  | { status: 'stale' };

export interface PageView {
  grid: TerminalGrid;
  /** Index of the page actually shown (requested index clamped to the document) */
  pageIndex: number;
  pageCount: number;
  warnings: LayoutWarning[];
  /** Status-line marker, empty when there is nothing to report */
  indicator: string;
}

export interface ViewSessionOptions {
  extractor: Extractor;
  config?: LayoutConfig;
}

// ─── Diagnostics ─────────────────────────────────────────────

const ERROR_TITLES: Record<LoadError['kind'], string> = {
  conversion: 'Could not extract text from this document',
  parse: 'Could not read the layout description',
  layout: 'Could not lay out this document',
};

/**
 * Greedy word wrap; words longer than `width` are split.
 */
export function wrapText(text: string, width: number): string[] {
  if (width <= 0) return [];
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter(w => w !== '')) {
    let rest = word;
    while (Array.from(rest).length > width) {
      if (current !== '') {
        lines.push(current);
        current = '';
      }
      const chars = Array.from(rest);
      lines.push(chars.slice(0, width).join(''));
      rest = chars.slice(width).join('');
    }
    if (current === '') {
      current = rest;
    } else if (Array.from(current).length + 1 + Array.from(rest).length <= width) {
      current += ' ' + rest;
    } else {
      lines.push(current);
      current = rest;
    }
  }
  if (current !== '') lines.push(current);
  return lines;
}

export function diagnosticLines(error: LoadError, width: number): string[] {
  return [
    ...wrapText(ERROR_TITLES[error.kind], width),
    '',
    ...wrapText(error.message, width),
    '',
    ...wrapText(`(${error.kind}: ${error.reason})`, width),
  ];
}

export function warningIndicator(count: number): string {
  return count > 0 ? `⚠ ${count}` : '';
}

// ─── Session ─────────────────────────────────────────────────

export class ViewSession {
  private readonly extractor: Extractor;
  private readonly config: LayoutConfig;
  private generation = 0;
  private inFlight: AbortController | null = null;
  private current: LayoutDocument | null = null;
  private failure: LoadError | null = null;
  private source: string | null = null;

  constructor(options: ViewSessionOptions) {
    this.extractor = options.extractor;
    this.config = options.config ?? DEFAULT_LAYOUT_CONFIG;
  }

  get document(): LayoutDocument | null {
    return this.current;
  }

  get error(): LoadError | null {
    return this.failure;
  }

  get sourcePath(): string | null {
    return this.source;
  }

  get pageCount(): number {
    return this.current?.pages.length ?? 0;
  }

  /**
   * Extract, parse and resolve `sourcePath`. Starting a load cancels the one
   * in flight.
   */
  async load(sourcePath: string): Promise<LoadOutcome> {
    const generation = ++this.generation;
    this.inFlight?.abort();
    const controller = new AbortController();
    this.inFlight = controller;
    this.source = sourcePath;

    console.log(`[ViewSession] Loading ${sourcePath} with ${this.extractor.name}`);
    const extracted = await this.extractor.extract(sourcePath, { signal: controller.signal });

    if (generation !== this.generation) {
      console.log(`[ViewSession] Discarding stale load #${generation} of ${sourcePath}`);
      return { status: 'stale' };
    }
    this.inFlight = null;

    if (!extracted.success) return this.fail(extracted.error);

    const parsed = parseAltoDescription(extracted.description);
    if (!parsed.success) return this.fail(parsed.error);

    const resolved = resolveDocument(parsed.document, sourcePath, this.config);
    if (!resolved.success) return this.fail(resolved.error);

    this.current = resolved.document;
    this.failure = null;
    for (const warning of resolved.document.warnings) {
      console.warn(`[ViewSession] ${warning.message}`);
    }
    console.log(`[ViewSession] Loaded ${resolved.document.pages.length} page(s) from ${sourcePath}`);
    return { status: 'loaded', document: resolved.document };
  }

  /** Load the last source again; stale when nothing was loaded yet */
  reload(): Promise<LoadOutcome> {
    if (this.source === null) return Promise.resolve({ status: 'stale' });
    return this.load(this.source);
  }

  /** Abort any extraction still running */
  dispose(): void {
    this.generation++;
    this.inFlight?.abort();
    this.inFlight = null;
  }

  /**
   * Rows a `cols`-wide grid needs to show the whole page.
   */
  pageRows(pageIndex: number, cols: number): number {
    const page = this.current?.pages[this.clampPage(pageIndex)];
    return page ? naturalRows(page, cols, this.config) : 1;
  }

  renderPage(pageIndex: number, size: GridSize): PageView {
    if (this.failure) {
      return this.diagnostic(diagnosticLines(this.failure, size.cols), size);
    }
    if (!this.current) {
      return this.diagnostic(['No document loaded'], size);
    }

    const index = this.clampPage(pageIndex);
    const page = this.current.pages[index];
    const mapping = mapToGrid(page, size, this.config);
    const warnings = [
      ...this.current.warnings.filter(w => w.pageIndex === index),
      ...mapping.warnings,
    ];

    return {
      grid: mapping.grid,
      pageIndex: index,
      pageCount: this.current.pages.length,
      warnings,
      indicator: warningIndicator(warnings.length),
    };
  }

  private clampPage(pageIndex: number): number {
    const last = this.pageCount - 1;
    return Math.max(0, Math.min(last, Math.floor(pageIndex)));
  }

  private diagnostic(lines: string[], size: GridSize): PageView {
    return { grid: textGrid(lines, size), pageIndex: 0, pageCount: 0, warnings: [], indicator: '' };
  }

  private fail(error: LoadError): LoadOutcome {
    this.current = null;
    this.failure = error;
    console.error(`[ViewSession] Load failed (${error.kind}/${error.reason}): ${error.message}`);
    return { status: 'failed', error };
  }
}
