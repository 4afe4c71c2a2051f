import { readFile } from 'node:fs/promises';
import type { Extractor, ExtractOptions, ExtractionResult } from './types.js';
import { cancelled, conversionFailure } from './types.js';

/**
 * A description that was extracted earlier (an `.xml` file) is passed through
 * as raw bytes; the parser handles its declared encoding.
 */
export class AltoFileSource implements Extractor {
  readonly name = 'alto-file';

  async extract(sourcePath: string, { signal }: ExtractOptions = {}): Promise<ExtractionResult> {
    if (signal?.aborted) return cancelled(sourcePath);
    try {
      const description = await readFile(sourcePath, { signal });
      if (description.length === 0) {
        return conversionFailure('no-output', `${sourcePath} is empty`);
      }
      return { success: true, description };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') return cancelled(sourcePath);
      const message = err instanceof Error ? err.message : String(err);
      return conversionFailure('extractor-failed', `Cannot read ${sourcePath}: ${message}`);
    }
  }
}

export function isAltoFile(sourcePath: string): boolean {
  return /\.xml$/i.test(sourcePath);
}
