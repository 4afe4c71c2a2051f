/**
 * Layout Engine Module
 *
 * Turns an extractor's positioned-text description into terminal grids:
 * - ALTO parsing into flat per-page fragments
 * - Reading-order and column reconstruction
 * - Page-to-grid coordinate mapping with collision handling
 * - Readable plain-text export
 */

// Types
export * from './types.js';

// Configuration
export { DEFAULT_LAYOUT_CONFIG, resolveLayoutConfig } from './config.js';
export type { LayoutConfig, HorizontalAnchor } from './config.js';

// Parser
export { parseAltoDescription, formatAltoDescription, decodeDescription } from './AltoParser.js';
export type { DecodeResult } from './AltoParser.js';

// Resolver
export { resolvePage, resolveDocument, wordsOf } from './ReadingOrderResolver.js';

// Mapper
export {
  mapToGrid,
  computeScale,
  naturalRows,
  createBlankGrid,
  gridToLines,
  textGrid,
} from './CoordinateMapper.js';
export type { GridScale } from './CoordinateMapper.js';

// Readable text
export { renderReadableText, renderDocumentText, PAGE_SEPARATOR } from './ReadableText.js';
