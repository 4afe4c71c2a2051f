/**
 * Runs the external pdfalto tool and returns its ALTO output.
 *
 * pdfalto writes to a file inside a temporary workspace that is removed on
 * every exit path. The process runner is injectable so tests never spawn.
 */

import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { promisify } from 'node:util';
import { withTempWorkspace } from './tempWorkspace.js';
import type { Extractor, ExtractOptions, ExtractionResult, PageRange } from './types.js';
import { cancelled, conversionFailure } from './types.js';

const execFileAsync = promisify(execFile);

/** pdfalto output can be large for long documents */
const MAX_PROCESS_BUFFER = 64 * 1024 * 1024;

const OUTPUT_FILE = 'description.xml';

// ─── Process Runner ──────────────────────────────────────────

export type ProcessOutcome =
  | { status: 'exited'; exitCode: number; stderr: string }
  | { status: 'not-found' }
  | { status: 'aborted' }
  | { status: 'failed'; message: string };

export type ProcessRunner = (
  command: string,
  args: string[],
  options: { signal?: AbortSignal },
) => Promise<ProcessOutcome>;

function classifyProcessError(err: unknown): ProcessOutcome {
  if (err instanceof Error && err.name === 'AbortError') {
    return { status: 'aborted' };
  }
  if (typeof err === 'object' && err !== null && 'code' in err) {
    if (err.code === 'ENOENT') return { status: 'not-found' };
    if (typeof err.code === 'number') {
      const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : '';
      return { status: 'exited', exitCode: err.code, stderr };
    }
  }
  return { status: 'failed', message: err instanceof Error ? err.message : String(err) };
}

export const runProcess: ProcessRunner = async (command, args, { signal }) => {
  try {
    const { stderr } = await execFileAsync(command, args, { signal, maxBuffer: MAX_PROCESS_BUFFER });
    return { status: 'exited', exitCode: 0, stderr };
  } catch (err) {
    return classifyProcessError(err);
  }
};

// ─── Extractor ───────────────────────────────────────────────

export interface PdfAltoOptions extends PageRange {
  /** Executable name or path; defaults to `pdfalto` on PATH */
  binaryPath?: string;
  runProcess?: ProcessRunner;
  /** Parent of the per-run workspace; defaults to the OS temp directory */
  tempDir?: string;
}

export class PdfAltoExtractor implements Extractor {
  readonly name = 'pdfalto';
  private readonly binary: string;
  private readonly run: ProcessRunner;

  constructor(private readonly options: PdfAltoOptions = {}) {
    this.binary = options.binaryPath ?? 'pdfalto';
    this.run = options.runProcess ?? runProcess;
  }

  buildArgs(sourcePath: string, outputPath: string): string[] {
    const args: string[] = [];
    if (this.options.firstPage !== undefined) args.push('-f', String(this.options.firstPage));
    if (this.options.lastPage !== undefined) args.push('-l', String(this.options.lastPage));
    args.push('-readingOrder', '-noImage', '-noLineNumbers', sourcePath, outputPath);
    return args;
  }

  async extract(sourcePath: string, { signal }: ExtractOptions = {}): Promise<ExtractionResult> {
    if (signal?.aborted) return cancelled(sourcePath);

    try {
      return await withTempWorkspace(dir => this.runInWorkspace(sourcePath, dir, signal), this.options.tempDir);
    } catch (err) {
      console.error('[PdfAltoExtractor] Extraction failed:', err);
      const message = err instanceof Error ? err.message : String(err);
      return conversionFailure('extractor-failed', `${this.binary} could not run on ${sourcePath}: ${message}`);
    }
  }

  private async runInWorkspace(sourcePath: string, dir: string, signal: AbortSignal | undefined): Promise<ExtractionResult> {
    const outputPath = path.join(dir, OUTPUT_FILE);
    console.log(`[PdfAltoExtractor] Running ${this.binary} on ${sourcePath}`);

    const outcome = await this.run(this.binary, this.buildArgs(sourcePath, outputPath), { signal });
    switch (outcome.status) {
      case 'not-found':
        return conversionFailure('missing-extractor', `${this.binary} was not found; install pdfalto or choose the pdfjs extractor`);
      case 'aborted':
        return cancelled(sourcePath);
      case 'failed':
        return conversionFailure('extractor-failed', `${this.binary} could not be started: ${outcome.message}`);
      case 'exited':
        if (outcome.exitCode !== 0) {
          const detail = outcome.stderr.trim();
          return conversionFailure(
            'extractor-failed',
            `${this.binary} exited with code ${outcome.exitCode}${detail ? `: ${detail}` : ''}`,
          );
        }
    }

    let description: Uint8Array;
    try {
      description = await readFile(outputPath);
    } catch {
      return conversionFailure('no-output', `${this.binary} produced no description for ${sourcePath}`);
    }
    if (description.length === 0) {
      return conversionFailure('no-output', `${this.binary} produced an empty description for ${sourcePath}`);
    }

    console.log(`[PdfAltoExtractor] Read ${description.length} bytes of ALTO`);
    return { success: true, description };
  }
}

// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  classifyProcessError,
};
