/**
 * In-process extractor built on pdfjs-dist.
 *
 * pdfjs getTextContent() handles the font encoding work (CID maps, ToUnicode,
 * ligatures); this module only converts its text runs into word-level ALTO
 * Strings so the result goes through the same parser as pdfalto output.
 */

import { readFile } from 'node:fs/promises';
import type { Extractor, ExtractOptions, ExtractionResult, PageRange } from './types.js';
import { cancelled, conversionFailure } from './types.js';

// ─── Types ───────────────────────────────────────────────────

/** One pdfjs text run, still in PDF user space (bottom-left origin) */
export interface PositionedRun {
  str: string;
  /** transform[0..5] of the run */
  transform: number[];
  width: number;
  height: number;
}

export interface ExtractedPage {
  width: number;
  height: number;
  runs: PositionedRun[];
}

interface AltoWord {
  text: string;
  x: number;
  y: number;
  width: number;
  height: number;
}

interface AltoLine {
  baseline: number;
  words: AltoWord[];
}

/** The part of the pdfjs-dist API the extractor reads */
interface PdfjsTextItem {
  str: string;
  transform: number[];
  width: number;
  height: number;
}

interface PdfjsPage {
  getViewport(params: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<{ items: Array<PdfjsTextItem | { type: string }> }>;
  cleanup(): unknown;
}

interface PdfjsDocument {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfjsPage>;
}

interface PdfjsLoadingTask {
  promise: Promise<PdfjsDocument>;
  destroy(): Promise<void>;
}

export interface PdfjsModule {
  getDocument(src: { data: Uint8Array; isEvalSupported: boolean }): PdfjsLoadingTask;
}

export type PdfjsLoader = () => Promise<PdfjsModule>;

const loadLegacyBuild: PdfjsLoader = () => import('pdfjs-dist/legacy/build/pdf.mjs');

const ALTO_NAMESPACE = 'http://www.loc.gov/standards/alto/ns-v3#';

// ─── Conversion ──────────────────────────────────────────────

/**
 * Escape special XML characters
 */
export function escXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function fmt(value: number): string {
  return String(Number(value.toFixed(3)));
}

/**
 * Convert a run to top-left coordinates and split it on whitespace. Each word
 * gets a share of the run width proportional to its character count.
 */
function runToLine(run: PositionedRun, pageHeight: number): AltoLine | null {
  if (!run.str.trim() || run.transform.length < 6) return null;

  const [a, b, , , e, f] = run.transform;
  // Font size from the text matrix: sqrt(a^2 + b^2)
  const fontSize = Math.sqrt(a * a + b * b);
  const height = run.height > 0 ? run.height : fontSize * 1.2;
  const chars = Array.from(run.str);
  const width = run.width > 0 ? run.width : chars.length * fontSize * 0.5;
  const charAdvance = chars.length > 0 ? width / chars.length : 0;

  // pdfjs uses bottom-left origin; convert to top-left
  const baseline = pageHeight - f;
  const top = baseline - height;

  const words: AltoWord[] = [];
  let start = -1;
  for (let i = 0; i <= chars.length; i++) {
    const isSpace = i === chars.length || /\s/.test(chars[i]);
    if (!isSpace && start < 0) start = i;
    if (isSpace && start >= 0) {
      words.push({
        text: chars.slice(start, i).join(''),
        x: e + start * charAdvance,
        y: top,
        width: (i - start) * charAdvance,
        height,
      });
      start = -1;
    }
  }

  return { baseline, words };
}

/**
 * Serialize extracted pages as an ALTO description. Every run becomes one
 * TextLine; runs are kept in content-stream order.
 */
export function buildAltoDescription(pages: ExtractedPage[], firstPageNumber = 1): string {
  const out: string[] = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    `<alto xmlns="${ALTO_NAMESPACE}">`,
    '<Layout>',
  ];

  pages.forEach((page, i) => {
    const number = firstPageNumber + i;
    out.push(`<Page ID="Page${number}" PHYSICAL_IMG_NR="${number}" WIDTH="${fmt(page.width)}" HEIGHT="${fmt(page.height)}">`);
    out.push(`<PrintSpace HPOS="0" VPOS="0" WIDTH="${fmt(page.width)}" HEIGHT="${fmt(page.height)}">`);
    out.push(`<TextBlock ID="p${number}_b1">`);

    page.runs.forEach((run, r) => {
      const line = runToLine(run, page.height);
      if (!line) return;
      out.push(`<TextLine ID="p${number}_l${r + 1}" BASELINE="${fmt(line.baseline)}">`);
      line.words.forEach((word, w) => {
        if (w > 0) out.push('<SP/>');
        out.push(
          `<String CONTENT="${escXml(word.text)}" HPOS="${fmt(word.x)}" VPOS="${fmt(word.y)}"`
          + ` WIDTH="${fmt(word.width)}" HEIGHT="${fmt(word.height)}"/>`,
        );
      });
      out.push('</TextLine>');
    });

    out.push('</TextBlock>', '</PrintSpace>', '</Page>');
  });

  out.push('</Layout>', '</alto>');
  return out.join('\n') + '\n';
}

// ─── Extractor ───────────────────────────────────────────────

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface PdfjsOptions extends PageRange {
  /** Loads pdfjs-dist; defaults to the legacy Node build */
  loadPdfjs?: PdfjsLoader;
}

export class PdfjsExtractor implements Extractor {
  readonly name = 'pdfjs';
  private readonly load: PdfjsLoader;

  constructor(private readonly options: PdfjsOptions = {}) {
    this.load = options.loadPdfjs ?? loadLegacyBuild;
  }

  async extract(sourcePath: string, { signal }: ExtractOptions = {}): Promise<ExtractionResult> {
    if (signal?.aborted) return cancelled(sourcePath);

    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(sourcePath));
    } catch (err) {
      return conversionFailure('extractor-failed', `Cannot read ${sourcePath}: ${errorMessage(err)}`);
    }

    let pdfjsLib: PdfjsModule;
    try {
      pdfjsLib = await this.load();
    } catch (err) {
      console.error('[PdfjsExtractor] Failed to load pdfjs-dist:', err);
      return conversionFailure('extractor-failed', `pdfjs-dist could not be loaded: ${errorMessage(err)}`);
    }

    const loadingTask = pdfjsLib.getDocument({ data, isEvalSupported: false });
    const abort = () => {
      loadingTask.destroy().catch((err: unknown) => console.warn('[PdfjsExtractor] Destroy after abort failed:', err));
    };
    signal?.addEventListener('abort', abort, { once: true });

    try {
      const pdf = await loadingTask.promise;
      const first = Math.max(1, this.options.firstPage ?? 1);
      const last = Math.min(pdf.numPages, this.options.lastPage ?? pdf.numPages);
      console.log(`[PdfjsExtractor] Reading pages ${first}-${last} of ${sourcePath}`);

      const pages: ExtractedPage[] = [];
      for (let pageNumber = first; pageNumber <= last; pageNumber++) {
        if (signal?.aborted) return cancelled(sourcePath);

        const page = await pdf.getPage(pageNumber);
        const viewport = page.getViewport({ scale: 1 });
        const textContent = await page.getTextContent();

        const runs: PositionedRun[] = [];
        for (const item of textContent.items) {
          if (!('str' in item)) continue;
          runs.push({
            str: item.str,
            transform: item.transform.map(Number),
            width: item.width,
            height: item.height,
          });
        }
        pages.push({ width: viewport.width, height: viewport.height, runs });
        page.cleanup();
      }

      if (pages.length === 0) {
        return conversionFailure('no-output', `${sourcePath} has no pages in the requested range`);
      }
      return { success: true, description: buildAltoDescription(pages, first) };
    } catch (err) {
      if (signal?.aborted) return cancelled(sourcePath);
      console.error('[PdfjsExtractor] Failed to read PDF:', err);
      return conversionFailure('extractor-failed', `pdfjs could not read ${sourcePath}: ${errorMessage(err)}`);
    } finally {
      signal?.removeEventListener('abort', abort);
      await loadingTask.destroy().catch((err: unknown) => console.warn('[PdfjsExtractor] Destroy failed:', err));
    }
  }
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  runToLine,
  fmt,
};
