import { AltoFileSource, isAltoFile } from './AltoFileSource.js';
import { PdfAltoExtractor, type ProcessRunner } from './PdfAltoExtractor.js';
import { PdfjsExtractor } from './PdfjsExtractor.js';
import type { Extractor, ExtractOptions, ExtractionResult, ExtractorName, PageRange } from './types.js';

export interface ExtractionSettings extends PageRange {
  extractor: ExtractorName;
  /** Executable for the pdfalto extractor; empty means `pdfalto` on PATH */
  pdfaltoPath?: string;
}

/**
 * Tries the external tool first and falls back when it is not installed.
 * Any other pdfalto failure is reported as is.
 */
export class FallbackExtractor implements Extractor {
  readonly name: string;

  constructor(private readonly primary: Extractor, private readonly fallback: Extractor) {
    this.name = `${primary.name}|${fallback.name}`;
  }

  async extract(sourcePath: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
    const result = await this.primary.extract(sourcePath, options);
    if (result.success || result.error.reason !== 'missing-extractor') return result;
    console.warn(`[Extraction] ${result.error.message}; falling back to ${this.fallback.name}`);
    return this.fallback.extract(sourcePath, options);
  }
}

/**
 * Pre-extracted `.xml` descriptions are read directly; everything else goes to
 * the PDF extractor.
 */
class SourceRouter implements Extractor {
  readonly name: string;
  private readonly altoFiles = new AltoFileSource();

  constructor(private readonly pdf: Extractor) {
    this.name = pdf.name;
  }

  extract(sourcePath: string, options?: ExtractOptions): Promise<ExtractionResult> {
    return isAltoFile(sourcePath)
      ? this.altoFiles.extract(sourcePath, options)
      : this.pdf.extract(sourcePath, options);
  }
}

export function createExtractor(settings: ExtractionSettings, runProcess?: ProcessRunner): Extractor {
  const range: PageRange = { firstPage: settings.firstPage, lastPage: settings.lastPage };
  const pdfalto = new PdfAltoExtractor({
    ...range,
    binaryPath: settings.pdfaltoPath || undefined,
    runProcess,
  });
  const pdfjs = new PdfjsExtractor(range);

  switch (settings.extractor) {
    case 'pdfalto':
      return new SourceRouter(pdfalto);
    case 'pdfjs':
      return new SourceRouter(pdfjs);
    case 'auto':
      return new SourceRouter(new FallbackExtractor(pdfalto, pdfjs));
  }
}
