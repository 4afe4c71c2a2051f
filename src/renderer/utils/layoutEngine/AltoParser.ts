/**
 * ALTO Description Parser
 *
 * Reads the positioned-text description written by the extractor
 * (ALTO XML: Page → PrintSpace → TextBlock → TextLine → String) into a
 * ParsedDocument of flat per-page fragment lists.
 *
 * Geometry is loosely validated: a missing or non-numeric HPOS/VPOS/WIDTH/HEIGHT
 * counts as zero and only produces a warning. Unknown elements and attributes
 * are walked through or ignored. The whole parse fails only when the input is
 * not XML, cannot be decoded, or yields no fragment on any page.
 */

import { DOMParser } from '@xmldom/xmldom';
import { clamp } from './geometry.js';
import type {
  BoundingBox,
  LayoutWarning,
  ParseError,
  ParseErrorReason,
  ParseResult,
  ParsedPage,
  RawFragment,
} from './types.js';

// ─── Constants ───────────────────────────────────────────────

const ELEMENT_NODE = 1;

/** How many leading bytes to scan for the XML declaration */
const PROLOG_SCAN_BYTES = 256;

// ─── Decoding ────────────────────────────────────────────────

function parseError(reason: ParseErrorReason, message: string): ParseError {
  return { kind: 'parse', reason, message };
}

/**
 * Pick the decoder label for raw description bytes: a UTF-16 byte order mark
 * wins, then the encoding named in the XML declaration, then UTF-8.
 */
function detectEncoding(bytes: Uint8Array): string {
  if (bytes.length >= 2) {
    if (bytes[0] === 0xff && bytes[1] === 0xfe) return 'utf-16le';
    if (bytes[0] === 0xfe && bytes[1] === 0xff) return 'utf-16be';
  }

  let head = '';
  const end = Math.min(bytes.length, PROLOG_SCAN_BYTES);
  for (let i = 0; i < end; i++) {
    head += String.fromCharCode(bytes[i]);
  }

  const declared = /^(?:\uFEFF|\xEF\xBB\xBF)?<\?xml[^>]*\bencoding\s*=\s*["']([A-Za-z0-9._:-]+)["']/.exec(head);
  return declared ? declared[1].toLowerCase() : 'utf-8';
}

export type DecodeResult = { success: true; text: string } | { success: false; error: ParseError };

/**
 * Decode raw description bytes to text; strings pass through unchanged.
 */
export function decodeDescription(input: string | Uint8Array): DecodeResult {
  if (typeof input === 'string') {
    return { success: true, text: input };
  }

  const label = detectEncoding(input);
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(label, { fatal: true });
  } catch {
    return { success: false, error: parseError('encoding-error', `Unsupported encoding "${label}"`) };
  }

  try {
    return { success: true, text: decoder.decode(input) };
  } catch {
    return { success: false, error: parseError('encoding-error', `Description is not valid ${label}`) };
  }
}

// ─── DOM Helpers ─────────────────────────────────────────────

function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** Element name without any namespace prefix */
function nameOf(el: Element): string {
  const name = el.localName || el.nodeName;
  const colon = name.indexOf(':');
  return colon >= 0 ? name.slice(colon + 1) : name;
}

function childElements(node: Node): Element[] {
  const result: Element[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i);
    if (child && isElement(child)) result.push(child);
  }
  return result;
}

/** Depth-first search for Page elements (Page elements are not nested) */
function findPages(root: Element): Element[] {
  if (nameOf(root) === 'Page') return [root];
  const pages: Element[] = [];
  for (const child of childElements(root)) {
    pages.push(...findPages(child));
  }
  return pages;
}

/**
 * Numeric attribute, or null when absent, blank or not a finite number.
 */
function readNumber(el: Element, name: string): number | null {
  const raw = el.getAttribute(name);
  if (raw === null || raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) ? value : null;
}

function positive(value: number | null): number | null {
  return value !== null && value > 0 ? value : null;
}

// ─── Page Walking ────────────────────────────────────────────

interface PageDraft {
  declaredWidth: number | null;
  declaredHeight: number | null;
  printSpaceRight: number | null;
  printSpaceBottom: number | null;
  fragments: RawFragment[];
  missingGeometry: number;
}

interface WalkState {
  order: number;
  block: number;
  line: number;
  inLine: boolean;
  lineBaseline: number | null;
  /** Last fragment of the current line, for HYP continuation */
  lastInLine: RawFragment | null;
}

function readFragment(el: Element, state: WalkState, draft: PageDraft): RawFragment | null {
  const text = (el.getAttribute('CONTENT') ?? '').trim();
  if (text === '') return null;

  const x = readNumber(el, 'HPOS');
  const y = readNumber(el, 'VPOS');
  const width = readNumber(el, 'WIDTH');
  const height = readNumber(el, 'HEIGHT');
  if (x === null || y === null || width === null || height === null) {
    draft.missingGeometry++;
  }

  const bbox: BoundingBox = { x: x ?? 0, y: y ?? 0, width: width ?? 0, height: height ?? 0 };

  if (!state.inLine) {
    // A String outside any TextLine is its own source line
    state.line++;
  }

  return {
    bbox,
    text,
    baseline: state.lineBaseline ?? bbox.y + bbox.height,
    hint: { order: state.order++, block: state.block, line: state.line },
  };
}

function walk(node: Element, state: WalkState, draft: PageDraft): void {
  for (const child of childElements(node)) {
    switch (nameOf(child)) {
      case 'PrintSpace': {
        const x = readNumber(child, 'HPOS') ?? 0;
        const y = readNumber(child, 'VPOS') ?? 0;
        const width = positive(readNumber(child, 'WIDTH'));
        const height = positive(readNumber(child, 'HEIGHT'));
        if (width !== null) draft.printSpaceRight = x + width;
        if (height !== null) draft.printSpaceBottom = y + height;
        walk(child, state, draft);
        break;
      }
      case 'TextBlock':
        state.block++;
        walk(child, state, draft);
        break;
      case 'TextLine': {
        state.line++;
        const wasInLine = state.inLine;
        state.inLine = true;
        state.lineBaseline = readNumber(child, 'BASELINE');
        state.lastInLine = null;
        walk(child, state, draft);
        state.inLine = wasInLine;
        state.lineBaseline = null;
        state.lastInLine = null;
        break;
      }
      case 'String': {
        const fragment = readFragment(child, state, draft);
        if (fragment) {
          draft.fragments.push(fragment);
          state.lastInLine = state.inLine ? fragment : null;
        }
        break;
      }
      case 'HYP': {
        const content = child.getAttribute('CONTENT') ?? '';
        if (state.lastInLine && content !== '') {
          state.lastInLine.text += content;
        }
        break;
      }
      default:
        // Unknown wrappers (ComposedBlock, Illustration, ...) are walked through
        walk(child, state, draft);
    }
  }
}

function draftPage(pageEl: Element, order: number): { draft: PageDraft; nextOrder: number } {
  const draft: PageDraft = {
    declaredWidth: positive(readNumber(pageEl, 'WIDTH')),
    declaredHeight: positive(readNumber(pageEl, 'HEIGHT')),
    printSpaceRight: null,
    printSpaceBottom: null,
    fragments: [],
    missingGeometry: 0,
  };
  const state: WalkState = {
    order,
    block: -1,
    line: -1,
    inLine: false,
    lineBaseline: null,
    lastInLine: null,
  };
  walk(pageEl, state, draft);
  return { draft, nextOrder: state.order };
}

/**
 * Largest right and bottom edge over a page's fragments.
 */
function fragmentExtent(fragments: RawFragment[]): { right: number; bottom: number } {
  let maxRight = 0;
  let maxBottom = 0;
  for (const f of fragments) {
    maxRight = Math.max(maxRight, f.bbox.x + Math.max(0, f.bbox.width));
    maxBottom = Math.max(maxBottom, f.bbox.y + Math.max(0, f.bbox.height));
  }
  return { right: maxRight, bottom: maxBottom };
}

/**
 * Clamp a fragment into [0, width] × [0, height]. Returns true when anything moved.
 */
function clampFragment(fragment: RawFragment, width: number, height: number): boolean {
  const { x, y, width: w, height: h } = fragment.bbox;
  const left = clamp(x, 0, width);
  const top = clamp(y, 0, height);
  const rightEdge = clamp(x + Math.max(0, w), left, width);
  const bottomEdge = clamp(y + Math.max(0, h), top, height);

  const clamped: BoundingBox = { x: left, y: top, width: rightEdge - left, height: bottomEdge - top };
  const changed =
    clamped.x !== x || clamped.y !== y || clamped.width !== w || clamped.height !== h;

  fragment.bbox = clamped;
  fragment.baseline = clamp(fragment.baseline, 0, height);
  return changed;
}

// ─── Public API ──────────────────────────────────────────────

/**
 * Parse an ALTO positioned-text description.
 *
 * Fails with `encoding-error` when raw bytes cannot be decoded,
 * `malformed-structure` when the XML is broken or no page yields a fragment, and
 * `missing-geometry` when no page size can be determined at all.
 */
export function parseAltoDescription(input: string | Uint8Array): ParseResult {
  const decoded = decodeDescription(input);
  if (!decoded.success) return decoded;

  const problems: string[] = [];
  let doc: Document | undefined;
  try {
    doc = new DOMParser({
      errorHandler: {
        warning: () => undefined,
        error: (msg: unknown) => { problems.push(String(msg)); },
        fatalError: (msg: unknown) => { problems.push(String(msg)); },
      },
    }).parseFromString(decoded.text, 'text/xml');
  } catch (err) {
    problems.push(err instanceof Error ? err.message : String(err));
  }

  const root = doc ? doc.documentElement : null;
  if (problems.length > 0 || !root) {
    const detail = problems[0] ?? 'no root element';
    return { success: false, error: parseError('malformed-structure', `Description is not well-formed XML: ${detail}`) };
  }

  const pageElements = findPages(root);
  if (pageElements.length === 0) {
    return { success: false, error: parseError('malformed-structure', 'Description contains no Page element') };
  }

  const drafts: PageDraft[] = [];
  let order = 0;
  for (const pageEl of pageElements) {
    const { draft, nextOrder } = draftPage(pageEl, order);
    drafts.push(draft);
    order = nextOrder;
  }

  const totalFragments = drafts.reduce((sum, d) => sum + d.fragments.length, 0);
  if (totalFragments === 0) {
    return { success: false, error: parseError('malformed-structure', 'No page contains any text fragment') };
  }

  // Resolve page sizes: declared → PrintSpace → fragment extent → borrowed
  const warnings: LayoutWarning[] = [];
  const sizes = drafts.map((draft) => {
    const extent = fragmentExtent(draft.fragments);
    const width = draft.declaredWidth ?? positive(draft.printSpaceRight) ?? positive(extent.right);
    const height = draft.declaredHeight ?? positive(draft.printSpaceBottom) ?? positive(extent.bottom);
    const inferred =
      (draft.declaredWidth === null && draft.printSpaceRight === null) ||
      (draft.declaredHeight === null && draft.printSpaceBottom === null);
    return { width, height, inferred };
  });

  const donor = sizes.find((s) => s.width !== null && s.height !== null);
  if (!donor || donor.width === null || donor.height === null) {
    return { success: false, error: parseError('missing-geometry', 'No page has a usable width and height') };
  }
  const fallbackWidth = donor.width;
  const fallbackHeight = donor.height;

  const pages: ParsedPage[] = drafts.map((draft, index) => {
    const size = sizes[index];
    const width = size.width ?? fallbackWidth;
    const height = size.height ?? fallbackHeight;

    if (size.inferred && draft.fragments.length > 0) {
      warnings.push({
        kind: 'page-size-inferred',
        pageIndex: index,
        message: `Page ${index + 1} has no declared size; using ${width.toFixed(1)}×${height.toFixed(1)}`,
      });
    }
    if (draft.missingGeometry > 0) {
      warnings.push({
        kind: 'missing-geometry',
        pageIndex: index,
        message: `${draft.missingGeometry} fragment(s) on page ${index + 1} had missing or non-numeric geometry`,
      });
    }

    let clampedCount = 0;
    for (const fragment of draft.fragments) {
      if (clampFragment(fragment, width, height)) clampedCount++;
    }
    if (clampedCount > 0) {
      warnings.push({
        kind: 'fragment-clamped',
        pageIndex: index,
        message: `${clampedCount} fragment(s) on page ${index + 1} extended past the page and were clamped`,
      });
    }

    return { index, width, height, fragments: draft.fragments };
  });

  return { success: true, document: { pages, warnings } };
}

/**
 * Re-indent a description for display: one tag or text run per line,
 * two spaces per nesting level.
 */
export function formatAltoDescription(xml: string): string {
  const lines: string[] = [];
  let depth = 0;
  const tokens = xml.match(/<[^>]+>|[^<]+/g) ?? [];

  for (const token of tokens) {
    if (!token.startsWith('<')) {
      const text = token.trim();
      if (text !== '') lines.push('  '.repeat(depth) + text);
      continue;
    }

    if (token.startsWith('</')) {
      depth = Math.max(0, depth - 1);
      lines.push('  '.repeat(depth) + token);
      continue;
    }

    lines.push('  '.repeat(depth) + token);
    const opensElement = !token.endsWith('/>') && !token.startsWith('<?') && !token.startsWith('<!');
    if (opensElement) depth++;
  }

  return lines.length > 0 ? lines.join('\n') + '\n' : '';
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  detectEncoding,
  readNumber,
  clampFragment,
  fragmentExtent,
};
