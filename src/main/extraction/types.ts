/**
 * Extraction Type Definitions
 *
 * An extractor turns a source path into a positioned-text description (ALTO XML)
 * for the layout engine. Failures come back as ConversionError results; an
 * extractor never throws for an expected failure.
 */

import type { ConversionError, ConversionErrorReason } from '../../renderer/utils/layoutEngine/types.js';

export type ExtractionResult =
  | { success: true; description: Uint8Array | string }
  | { success: false; error: ConversionError };

export interface ExtractOptions {
  signal?: AbortSignal;
}

export interface Extractor {
  /** Short name used in logs and settings */
  readonly name: string;
  extract(sourcePath: string, options?: ExtractOptions): Promise<ExtractionResult>;
}

export type ExtractorName = 'pdfalto' | 'pdfjs' | 'auto';

export const EXTRACTOR_NAMES: readonly ExtractorName[] = ['pdfalto', 'pdfjs', 'auto'];

export function isExtractorName(value: unknown): value is ExtractorName {
  return EXTRACTOR_NAMES.some(name => name === value);
}

/** Optional page range; 1-based and inclusive */
export interface PageRange {
  firstPage?: number;
  lastPage?: number;
}

export function conversionFailure(reason: ConversionErrorReason, message: string): ExtractionResult {
  return { success: false, error: { kind: 'conversion', reason, message } };
}

export function cancelled(sourcePath: string): ExtractionResult {
  return conversionFailure('cancelled', `Extraction of ${sourcePath} was cancelled`);
}
