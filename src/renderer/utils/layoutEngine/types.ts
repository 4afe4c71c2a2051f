/**
 * Layout Engine Type Definitions
 *
 * Types for the positioned-text pipeline:
 *   AltoParser (ParsedDocument) -> ReadingOrderResolver (LayoutDocument) -> CoordinateMapper (TerminalGrid)
 *
 * All coordinates are page units with a top-left origin.
 */

// ─── Geometry ──────────────────────────────────────────────────

export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

// ─── Parser Output ─────────────────────────────────────────────

/**
 * Where a fragment sat in the extractor's own output. The extractor's order
 * is only a hint; the resolver's readingRank is authoritative.
 */
export interface FragmentHint {
  /** Running index of the fragment in document order */
  order: number;
  /** Index of the source text block on the page */
  block: number;
  /** Index of the source text line on the page */
  line: number;
}

/** A word-level text unit exactly as read from the description */
export interface RawFragment {
  bbox: BoundingBox;
  text: string;
  baseline: number;
  hint: FragmentHint;
}

export interface ParsedPage {
  index: number;
  width: number;
  height: number;
  fragments: RawFragment[];
}

export interface ParsedDocument {
  pages: ParsedPage[];
  warnings: LayoutWarning[];
}

// ─── Resolver Output ───────────────────────────────────────────

export interface Word {
  bbox: BoundingBox;
  text: string;
  baseline: number;
  /** hint.order of the fragment this word came from */
  sourceOrder: number;
}

/**
 * A text line in reading order. Words live in the page's flat `words` array;
 * the line owns the range [firstWord, firstWord + wordCount).
 */
export interface ReconstructedLine {
  bbox: BoundingBox;
  firstWord: number;
  wordCount: number;
  readingRank: number;
  text: string;
  /** Column group index, or FULL_WIDTH_COLUMN for a line crossing a column boundary */
  column: number;
}

export const FULL_WIDTH_COLUMN = -1;

export interface ResolvedPage {
  index: number;
  width: number;
  height: number;
  words: Word[];
  lines: ReconstructedLine[];
  /** Detected column boundaries (x positions), ascending */
  columnBoundaries: number[];
}

export interface LayoutDocument {
  sourcePath: string;
  pages: ResolvedPage[];
  warnings: LayoutWarning[];
}

// ─── Terminal Grid ─────────────────────────────────────────────

export interface Cell {
  /** A single character, or ' ' for a blank cell */
  char: string;
  isFragmentStart: boolean;
}

export interface GridSize {
  rows: number;
  cols: number;
}

export interface TerminalGrid extends GridSize {
  /** cells[row][col], dense */
  cells: Cell[][];
}

export interface GridMapping {
  grid: TerminalGrid;
  warnings: LayoutWarning[];
}

// ─── Errors & Warnings ─────────────────────────────────────────

export type ConversionErrorReason =
  | 'missing-extractor'
  | 'extractor-failed'
  | 'no-output'
  | 'cancelled';

/** The external extractor is missing, crashed, or produced nothing */
export interface ConversionError {
  kind: 'conversion';
  reason: ConversionErrorReason;
  message: string;
}

export type ParseErrorReason = 'malformed-structure' | 'missing-geometry' | 'encoding-error';

export interface ParseError {
  kind: 'parse';
  reason: ParseErrorReason;
  message: string;
}

export interface LayoutError {
  kind: 'layout';
  reason: 'invalid-page';
  message: string;
}

export type LoadError = ConversionError | ParseError | LayoutError;

export type LayoutWarningKind =
  | 'missing-geometry'
  | 'fragment-clamped'
  | 'page-size-inferred'
  | 'degenerate-clustering'
  | 'overlap-dropped'
  | 'word-clipped';

/** Recoverable problem; rendering continues */
export interface LayoutWarning {
  kind: LayoutWarningKind;
  pageIndex: number;
  message: string;
}

// ─── Results ───────────────────────────────────────────────────

export type ParseResult =
  | { success: true; document: ParsedDocument }
  | { success: false; error: ParseError };

export type ResolveResult =
  | { success: true; page: ResolvedPage; warnings: LayoutWarning[] }
  | { success: false; error: LayoutError };

export type ResolveDocumentResult =
  | { success: true; document: LayoutDocument }
  | { success: false; error: LayoutError };
