/**
 * Reading Order Resolver
 *
 * Rebuilds human reading order from a page's unordered fragments:
 * - Bands fragments into typographic lines by vertical centre
 * - Splits bands at wide gaps and votes on column gutters
 * - Orders lines column by column, letting full-width lines interrupt
 * - Sorts and de-duplicates words inside each line
 *
 * Pure: the same page and config always produce the same ResolvedPage.
 */

import {
  centerY,
  charWidth,
  horizontalOverlap,
  median,
  mergeBoundingBoxes,
  right,
} from './geometry.js';
import { DEFAULT_LAYOUT_CONFIG, type LayoutConfig } from './config.js';
import {
  FULL_WIDTH_COLUMN,
  type BoundingBox,
  type LayoutDocument,
  type LayoutWarning,
  type ParsedDocument,
  type ParsedPage,
  type RawFragment,
  type ReconstructedLine,
  type ResolveDocumentResult,
  type ResolveResult,
  type ResolvedPage,
  type Word,
} from './types.js';

// ─── Internal Types ──────────────────────────────────────────

/** Fragment indices (into page.fragments) with their merged box */
interface FragmentGroup {
  members: number[];
  bbox: BoundingBox;
}

type Band = FragmentGroup;

interface Segment extends FragmentGroup {
  band: number;
}

interface LineDraft extends FragmentGroup {
  column: number;
}

// ─── Helper Functions ────────────────────────────────────────

function groupOf(members: number[], fragments: RawFragment[]): FragmentGroup {
  return { members, bbox: mergeBoundingBoxes(members.map(i => fragments[i].bbox)) };
}

/** Left to right, then description order */
function byX(fragments: RawFragment[]): (a: number, b: number) => number {
  return (a, b) => {
    const dx = fragments[a].bbox.x - fragments[b].bbox.x;
    if (dx !== 0) return dx;
    return fragments[a].hint.order - fragments[b].hint.order;
  };
}

/** Top to bottom, ties leftmost first */
function byPosition(a: FragmentGroup, b: FragmentGroup): number {
  const dy = a.bbox.y - b.bbox.y;
  if (dy !== 0) return dy;
  return a.bbox.x - b.bbox.x;
}

/**
 * Median per-character width over fragments that have a positive width.
 */
function medianCharWidth(fragments: RawFragment[]): number {
  const widths = fragments
    .map(f => charWidth(f.bbox, f.text))
    .filter(w => w > 0);
  return median(widths);
}

/**
 * A page carries no spatial information when all of its fragments sit at the
 * same origin (typically every geometry attribute was missing).
 */
function isDegenerate(fragments: RawFragment[]): boolean {
  if (fragments.length < 2) return false;
  const { x, y } = fragments[0].bbox;
  return fragments.every(f => f.bbox.x === x && f.bbox.y === y);
}

// ─── Step 1: Line Banding ────────────────────────────────────

/**
 * Cluster fragments into horizontal bands. Two fragments are linked when their
 * vertical centres are closer than `tolerance` × the smaller height; bands are
 * the connected components of that relation.
 */
function bandFragments(fragments: RawFragment[], tolerance: number): Band[] {
  const parent = fragments.map((_, i) => i);
  const rank = new Array<number>(fragments.length).fill(0);

  function find(i: number): number {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  }

  function union(a: number, b: number): void {
    const ra = find(a);
    const rb = find(b);
    if (ra === rb) return;
    if (rank[ra] < rank[rb]) parent[ra] = rb;
    else if (rank[ra] > rank[rb]) parent[rb] = ra;
    else { parent[rb] = ra; rank[ra]++; }
  }

  const centers = fragments.map(f => centerY(f.bbox));
  const order = fragments
    .map((_, i) => i)
    .sort((a, b) => centers[a] - centers[b] || fragments[a].hint.order - fragments[b].hint.order);

  for (let i = 0; i < order.length; i++) {
    const a = order[i];
    const heightA = fragments[a].bbox.height;
    for (let j = i + 1; j < order.length; j++) {
      const b = order[j];
      const distance = centers[b] - centers[a];
      // min(hA, hB) <= hA, so nothing further down can link to a
      if (distance >= tolerance * heightA) break;
      if (distance < tolerance * Math.min(heightA, fragments[b].bbox.height)) {
        union(a, b);
      }
    }
  }

  const groups = new Map<number, number[]>();
  for (const i of order) {
    const root = find(i);
    const members = groups.get(root);
    if (members) members.push(i);
    else groups.set(root, [i]);
  }

  const bands: Band[] = [];
  for (const members of groups.values()) {
    bands.push(groupOf([...members].sort(byX(fragments)), fragments));
  }
  return bands.sort(byPosition);
}

// ─── Step 2: Column Detection ────────────────────────────────

/**
 * Split a band wherever the horizontal gap between consecutive fragments
 * exceeds `gap`.
 */
function splitBand(band: Band, bandIndex: number, fragments: RawFragment[], gap: number): Segment[] {
  const segments: Segment[] = [];
  let current: number[] = [];
  let currentRight = -Infinity;

  for (const i of band.members) {
    const box = fragments[i].bbox;
    if (current.length > 0 && box.x - currentRight > gap) {
      segments.push({ ...groupOf(current, fragments), band: bandIndex });
      current = [];
      currentRight = -Infinity;
    }
    current.push(i);
    currentRight = Math.max(currentRight, right(box));
  }

  if (current.length > 0) {
    segments.push({ ...groupOf(current, fragments), band: bandIndex });
  }
  return segments;
}

/**
 * Find column boundaries from the gutters between segments.
 *
 * Every gap between consecutive segments of a band votes for its x-interval.
 * A region where at least `minBands` bands agree is a gutter; its boundary is
 * the midpoint of the most-voted piece inside the region.
 */
function detectColumnBoundaries(segmentsByBand: Segment[][], minBands: number): number[] {
  const intervals: Array<{ left: number; right: number }> = [];
  for (const segments of segmentsByBand) {
    for (let i = 1; i < segments.length; i++) {
      const left = Math.max(...segments.slice(0, i).map(s => right(s.bbox)));
      const rightEdge = segments[i].bbox.x;
      if (rightEdge > left) intervals.push({ left, right: rightEdge });
    }
  }
  if (intervals.length < minBands) return [];

  const breakpoints = [...new Set(intervals.flatMap(iv => [iv.left, iv.right]))].sort((a, b) => a - b);

  const pieces: Array<{ from: number; to: number; votes: number }> = [];
  for (let i = 0; i < breakpoints.length - 1; i++) {
    const from = breakpoints[i];
    const to = breakpoints[i + 1];
    const mid = (from + to) / 2;
    const votes = intervals.filter(iv => iv.left < mid && mid < iv.right).length;
    pieces.push({ from, to, votes });
  }

  const boundaries: number[] = [];
  let best: { from: number; to: number; votes: number } | null = null;

  for (const piece of pieces) {
    if (piece.votes >= minBands) {
      if (best === null || piece.votes > best.votes) best = piece;
    } else if (best !== null) {
      boundaries.push((best.from + best.to) / 2);
      best = null;
    }
  }
  if (best !== null) {
    boundaries.push((best.from + best.to) / 2);
  }

  return boundaries;
}

/**
 * Column index for a segment, or FULL_WIDTH_COLUMN when a boundary falls
 * strictly inside it.
 */
function assignColumn(bbox: BoundingBox, boundaries: number[]): number {
  const left = bbox.x;
  const rightEdge = right(bbox);
  if (boundaries.some(b => left < b && b < rightEdge)) {
    return FULL_WIDTH_COLUMN;
  }
  return boundaries.filter(b => b <= left).length;
}

/**
 * Merge the segments of each band that fall into the same column; every
 * straddling segment stays a line of its own.
 */
function buildLineDrafts(
  segmentsByBand: Segment[][],
  boundaries: number[],
  fragments: RawFragment[],
): LineDraft[] {
  const drafts: LineDraft[] = [];

  for (const segments of segmentsByBand) {
    const perColumn = new Map<number, number[]>();
    for (const segment of segments) {
      const column = assignColumn(segment.bbox, boundaries);
      if (column === FULL_WIDTH_COLUMN) {
        drafts.push({ ...groupOf(segment.members, fragments), column });
        continue;
      }
      const members = perColumn.get(column);
      if (members) members.push(...segment.members);
      else perColumn.set(column, [...segment.members]);
    }
    for (const [column, members] of perColumn) {
      drafts.push({ ...groupOf(members.sort(byX(fragments)), fragments), column });
    }
  }

  return drafts;
}

// ─── Step 3: Ordering ────────────────────────────────────────

/**
 * Column lines are read top to bottom, columns left to right. Before a
 * full-width line is emitted, every column line whose centre lies above it is
 * read first.
 */
function orderLines(drafts: LineDraft[]): LineDraft[] {
  const fullWidth = drafts.filter(d => d.column === FULL_WIDTH_COLUMN).sort(byPosition);

  const columns = new Map<number, LineDraft[]>();
  for (const draft of drafts) {
    if (draft.column === FULL_WIDTH_COLUMN) continue;
    const list = columns.get(draft.column);
    if (list) list.push(draft);
    else columns.set(draft.column, [draft]);
  }
  const columnIds = [...columns.keys()].sort((a, b) => a - b);
  for (const id of columnIds) {
    columns.get(id)?.sort(byPosition);
  }

  const cursor = new Map<number, number>(columnIds.map(id => [id, 0]));
  const ordered: LineDraft[] = [];

  function drainColumns(limit: number): void {
    for (const id of columnIds) {
      const list = columns.get(id) ?? [];
      let next = cursor.get(id) ?? 0;
      while (next < list.length && centerY(list[next].bbox) < limit) {
        ordered.push(list[next]);
        next++;
      }
      cursor.set(id, next);
    }
  }

  for (const interrupt of fullWidth) {
    drainColumns(centerY(interrupt.bbox));
    ordered.push(interrupt);
  }
  drainColumns(Infinity);

  return ordered;
}

// ─── Step 4: Words ───────────────────────────────────────────

function toWord(fragment: RawFragment): Word {
  return {
    bbox: { ...fragment.bbox },
    text: fragment.text,
    baseline: fragment.baseline,
    sourceOrder: fragment.hint.order,
  };
}

/**
 * Drop extraction duplicates: of two neighbours overlapping by more than
 * `ratio` of the narrower width, keep the wider (the earlier one on a tie).
 * Members must already be sorted left to right.
 */
function dedupeWords(members: number[], fragments: RawFragment[], ratio: number): { kept: number[]; dropped: number } {
  const kept: number[] = [];
  let dropped = 0;

  for (const i of members) {
    const last = kept[kept.length - 1];
    if (last === undefined) {
      kept.push(i);
      continue;
    }
    const a = fragments[last].bbox;
    const b = fragments[i].bbox;
    const narrower = Math.min(a.width, b.width);
    if (narrower > 0 && horizontalOverlap(a, b) > ratio * narrower) {
      dropped++;
      const replace =
        b.width > a.width ||
        (b.width === a.width && fragments[i].hint.order < fragments[last].hint.order);
      if (replace) kept[kept.length - 1] = i;
      continue;
    }
    kept.push(i);
  }

  return { kept, dropped };
}

/**
 * Join word texts, separating neighbours with one space when their gap is
 * wider than `threshold` or either has no width.
 */
function materializeText(words: Word[], threshold: number): string {
  let text = '';
  for (let i = 0; i < words.length; i++) {
    const word = words[i];
    if (i > 0) {
      const prev = words[i - 1];
      const gap = word.bbox.x - right(prev.bbox);
      if (prev.bbox.width === 0 || word.bbox.width === 0 || gap > threshold) {
        text += ' ';
      }
    }
    text += word.text;
  }
  return text;
}

// ─── Fallback ────────────────────────────────────────────────

/**
 * Rebuild lines from the description's own line hints, in description order.
 */
function hintLineDrafts(fragments: RawFragment[]): LineDraft[] {
  const byLine = new Map<number, number[]>();
  const indices = fragments.map((_, i) => i).sort((a, b) => fragments[a].hint.order - fragments[b].hint.order);
  for (const i of indices) {
    const line = fragments[i].hint.line;
    const members = byLine.get(line);
    if (members) members.push(i);
    else byLine.set(line, [i]);
  }
  return [...byLine.values()].map(members => ({ ...groupOf(members, fragments), column: 0 }));
}

// ─── Public API ──────────────────────────────────────────────

/**
 * Resolve one page's fragments into reading-order lines.
 */
export function resolvePage(page: ParsedPage, config: LayoutConfig = DEFAULT_LAYOUT_CONFIG): ResolveResult {
  if (!Number.isFinite(page.width) || !Number.isFinite(page.height) || page.width <= 0 || page.height <= 0) {
    return {
      success: false,
      error: {
        kind: 'layout',
        reason: 'invalid-page',
        message: `Page ${page.index + 1} has an unusable size ${page.width}×${page.height}`,
      },
    };
  }

  const { fragments } = page;
  const warnings: LayoutWarning[] = [];
  const charW = medianCharWidth(fragments);

  let drafts: LineDraft[];
  let boundaries: number[] = [];

  if (isDegenerate(fragments)) {
    drafts = hintLineDrafts(fragments);
    warnings.push({
      kind: 'degenerate-clustering',
      pageIndex: page.index,
      message: `Page ${page.index + 1}: fragments carry no usable positions; using extractor order`,
    });
  } else {
    const bands = bandFragments(fragments, config.lineTolerance);
    const columnGap = charW > 0 ? config.columnGapChars * charW : Infinity;
    const segmentsByBand = bands.map((band, i) => splitBand(band, i, fragments, columnGap));
    boundaries = detectColumnBoundaries(segmentsByBand, config.minColumnBands);
    drafts = orderLines(buildLineDrafts(segmentsByBand, boundaries, fragments));
  }

  const words: Word[] = [];
  const lines: ReconstructedLine[] = [];
  const spaceThreshold = config.wordSpaceFactor * charW;
  let droppedTotal = 0;

  for (const draft of drafts) {
    const { kept, dropped } = dedupeWords(draft.members, fragments, config.overlapRatio);
    droppedTotal += dropped;

    const lineWords = kept.map(i => toWord(fragments[i]));
    const firstWord = words.length;
    words.push(...lineWords);

    lines.push({
      bbox: mergeBoundingBoxes(lineWords.map(w => w.bbox)),
      firstWord,
      wordCount: lineWords.length,
      readingRank: lines.length,
      text: materializeText(lineWords, spaceThreshold),
      column: draft.column,
    });
  }

  if (droppedTotal > 0) {
    warnings.push({
      kind: 'overlap-dropped',
      pageIndex: page.index,
      message: `Page ${page.index + 1}: dropped ${droppedTotal} overlapping duplicate word(s)`,
    });
  }

  return {
    success: true,
    page: { index: page.index, width: page.width, height: page.height, words, lines, columnBoundaries: boundaries },
    warnings,
  };
}

/**
 * Resolve every page of a parsed document. The parsed fragments are not
 * carried over into the result.
 */
export function resolveDocument(
  parsed: ParsedDocument,
  sourcePath: string,
  config: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
): ResolveDocumentResult {
  const pages: ResolvedPage[] = [];
  const warnings: LayoutWarning[] = [...parsed.warnings];

  for (const page of parsed.pages) {
    const result = resolvePage(page, config);
    if (!result.success) return result;
    pages.push(result.page);
    warnings.push(...result.warnings);
  }

  const document: LayoutDocument = { sourcePath, pages, warnings };
  return { success: true, document };
}

/**
 * The words of a line, in left-to-right order.
 */
export function wordsOf(page: ResolvedPage, line: ReconstructedLine): Word[] {
  return page.words.slice(line.firstWord, line.firstWord + line.wordCount);
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  bandFragments,
  splitBand,
  detectColumnBoundaries,
  assignColumn,
  orderLines,
  dedupeWords,
  materializeText,
  medianCharWidth,
  isDegenerate,
};
