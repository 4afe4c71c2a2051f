/**
 * Extraction Module
 *
 * Produces ALTO descriptions for the layout engine, from pdfalto, from
 * pdfjs-dist, or from an already-extracted file.
 */

export * from './types.js';
export { withTempWorkspace } from './tempWorkspace.js';
export { PdfAltoExtractor, runProcess } from './PdfAltoExtractor.js';
export type { PdfAltoOptions, ProcessOutcome, ProcessRunner } from './PdfAltoExtractor.js';
export { PdfjsExtractor, buildAltoDescription } from './PdfjsExtractor.js';
export type { ExtractedPage, PositionedRun } from './PdfjsExtractor.js';
export { AltoFileSource, isAltoFile } from './AltoFileSource.js';
export { createExtractor, FallbackExtractor } from './createExtractor.js';
export type { ExtractionSettings } from './createExtractor.js';
