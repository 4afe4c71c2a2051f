/**
 * Plain-text export of resolved pages in reading order.
 * Large vertical gaps inside a column become blank lines (at most three).
 */

import { bottom, median } from './geometry.js';
import { DEFAULT_LAYOUT_CONFIG, type LayoutConfig } from './config.js';
import type { LayoutDocument, ResolvedPage } from './types.js';

const MAX_SECTION_BLANK_LINES = 3;

/** Page separator, as pdftotext writes it */
export const PAGE_SEPARATOR = '\f';

export function renderReadableText(page: ResolvedPage, config: LayoutConfig = DEFAULT_LAYOUT_CONFIG): string {
  const lineHeight = median(page.lines.map(l => l.bbox.height).filter(h => h > 0));
  const out: string[] = [];

  for (let i = 0; i < page.lines.length; i++) {
    const line = page.lines[i];
    if (i > 0 && lineHeight > 0) {
      const prev = page.lines[i - 1];
      // Negative when reading moves up into the next column
      const gap = line.bbox.y - bottom(prev.bbox);
      if (gap > config.sectionGapFactor * lineHeight) {
        const blanks = Math.min(MAX_SECTION_BLANK_LINES, Math.max(1, Math.floor(gap / lineHeight)));
        for (let b = 0; b < blanks; b++) out.push('');
      }
    }
    out.push(line.text);
  }

  return out.length > 0 ? out.join('\n') + '\n' : '';
}

export function renderDocumentText(document: LayoutDocument, config: LayoutConfig = DEFAULT_LAYOUT_CONFIG): string {
  return document.pages.map(page => renderReadableText(page, config)).join(PAGE_SEPARATOR);
}
