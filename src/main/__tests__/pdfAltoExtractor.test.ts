/**
 * Unit Tests: pdfalto extractor
 *
 * The process runner is replaced by a fake that writes (or does not write)
 * the output file the real tool would produce.
 */
import { describe, test, expect } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { PdfAltoExtractor, _testExports } from '../extraction/PdfAltoExtractor.js';
import type { ProcessOutcome, ProcessRunner } from '../extraction/PdfAltoExtractor.js';
import type { ExtractionResult } from '../extraction/types.js';

const { classifyProcessError } = _testExports;

// ─── Helpers ─────────────────────────────────────────────────

function asText(description: Uint8Array | string): string {
  return typeof description === 'string' ? description : new TextDecoder().decode(description);
}

interface RecordedCall {
  command: string;
  args: string[];
}

function fakeRunner(behaviour: (outputPath: string) => Promise<ProcessOutcome>): { run: ProcessRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const run: ProcessRunner = async (command, args) => {
    calls.push({ command, args });
    return behaviour(args[args.length - 1]);
  };
  return { run, calls };
}

function failureOf(result: ExtractionResult) {
  if (result.success) throw new Error('expected extraction to fail');
  return result.error;
}

// ─── Success ─────────────────────────────────────────────────

describe('PdfAltoExtractor', () => {
  test('returns the bytes pdfalto wrote and removes the workspace', async () => {
    const { run, calls } = fakeRunner(async (outputPath) => {
      await writeFile(outputPath, '<alto/>');
      return { status: 'exited', exitCode: 0, stderr: '' };
    });

    const result = await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf');

    if (!result.success) throw new Error(result.error.message);
    expect(asText(result.description)).toBe('<alto/>');
    expect(calls).toHaveLength(1);
    expect(calls[0].command).toBe('pdfalto');

    const outputPath = calls[0].args[calls[0].args.length - 1];
    expect(path.basename(outputPath)).toBe('description.xml');
    expect(calls[0].args).toEqual(['-readingOrder', '-noImage', '-noLineNumbers', 'doc.pdf', outputPath]);
    expect(existsSync(path.dirname(outputPath))).toBe(false);
  });

  test('passes the page range and a custom binary', async () => {
    const { run, calls } = fakeRunner(async () => ({ status: 'not-found' }));
    const extractor = new PdfAltoExtractor({ firstPage: 2, lastPage: 3, binaryPath: '/opt/pdfalto/bin/pdfalto', runProcess: run });

    expect(extractor.buildArgs('a.pdf', 'out.xml')).toEqual([
      '-f', '2', '-l', '3', '-readingOrder', '-noImage', '-noLineNumbers', 'a.pdf', 'out.xml',
    ]);
    await extractor.extract('a.pdf');
    expect(calls[0].command).toBe('/opt/pdfalto/bin/pdfalto');
  });

  // ─── Failures ──────────────────────────────────────────────

  test('a missing executable is a missing-extractor error', async () => {
    const { run } = fakeRunner(async () => ({ status: 'not-found' }));
    const error = failureOf(await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf'));

    expect(error).toEqual({
      kind: 'conversion',
      reason: 'missing-extractor',
      message: 'pdfalto was not found; install pdfalto or choose the pdfjs extractor',
    });
  });

  test('a non-zero exit carries stderr into the message', async () => {
    const { run } = fakeRunner(async () => ({ status: 'exited', exitCode: 1, stderr: 'Syntax Error: bad xref\n' }));
    const error = failureOf(await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf'));

    expect(error.reason).toBe('extractor-failed');
    expect(error.message).toBe('pdfalto exited with code 1: Syntax Error: bad xref');
  });

  test('a process that cannot start is an extractor failure', async () => {
    const { run } = fakeRunner(async () => ({ status: 'failed', message: 'EACCES' }));
    const error = failureOf(await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf'));
    expect(error.message).toBe('pdfalto could not be started: EACCES');
  });

  test('exit 0 without an output file is no-output', async () => {
    const { run } = fakeRunner(async () => ({ status: 'exited', exitCode: 0, stderr: '' }));
    const error = failureOf(await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf'));
    expect(error.reason).toBe('no-output');
  });

  test('an empty output file is no-output', async () => {
    const { run } = fakeRunner(async (outputPath) => {
      await writeFile(outputPath, '');
      return { status: 'exited', exitCode: 0, stderr: '' };
    });
    const error = failureOf(await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf'));
    expect(error).toEqual({ kind: 'conversion', reason: 'no-output', message: 'pdfalto produced an empty description for doc.pdf' });
  });

  test('an aborted run is cancelled', async () => {
    const { run } = fakeRunner(async () => ({ status: 'aborted' }));
    const error = failureOf(await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf'));
    expect(error.reason).toBe('cancelled');
  });

  test('an already aborted signal never starts the process', async () => {
    const { run, calls } = fakeRunner(async () => ({ status: 'exited', exitCode: 0, stderr: '' }));
    const controller = new AbortController();
    controller.abort();

    const error = failureOf(await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf', { signal: controller.signal }));
    expect(error.reason).toBe('cancelled');
    expect(calls).toHaveLength(0);
  });

  test('a runner that throws is an extractor failure and the workspace is removed', async () => {
    const { run, calls } = fakeRunner(async () => {
      throw new Error('boom');
    });

    const error = failureOf(await new PdfAltoExtractor({ runProcess: run }).extract('doc.pdf'));
    expect(error).toEqual({ kind: 'conversion', reason: 'extractor-failed', message: 'pdfalto could not run on doc.pdf: boom' });
    const outputPath = calls[0].args[calls[0].args.length - 1];
    expect(existsSync(path.dirname(outputPath))).toBe(false);
  });

  test('a workspace that cannot be created is an extractor failure', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'pdfterm-parent-'));
    try {
      // A regular file cannot hold the workspace directory
      const notADirectory = path.join(dir, 'plain-file');
      await writeFile(notADirectory, '');
      const { run, calls } = fakeRunner(async () => ({ status: 'exited', exitCode: 0, stderr: '' }));

      const result = await new PdfAltoExtractor({ runProcess: run, tempDir: notADirectory }).extract('doc.pdf');

      const error = failureOf(result);
      expect(error.reason).toBe('extractor-failed');
      expect(error.message.startsWith('pdfalto could not run on doc.pdf: ')).toBe(true);
      expect(calls).toHaveLength(0);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

// ─── classifyProcessError ────────────────────────────────────

describe('classifyProcessError', () => {
  test('ENOENT means the executable is missing', () => {
    expect(classifyProcessError(Object.assign(new Error('spawn pdfalto ENOENT'), { code: 'ENOENT' }))).toEqual({ status: 'not-found' });
  });

  test('a numeric code is the exit status', () => {
    const err = Object.assign(new Error('Command failed'), { code: 3, stderr: 'Error: damaged file' });
    expect(classifyProcessError(err)).toEqual({ status: 'exited', exitCode: 3, stderr: 'Error: damaged file' });
  });

  test('AbortError means the run was aborted', () => {
    const err = new Error('The operation was aborted');
    err.name = 'AbortError';
    expect(classifyProcessError(err)).toEqual({ status: 'aborted' });
  });

  test('anything else is a start failure', () => {
    expect(classifyProcessError(new Error('weird'))).toEqual({ status: 'failed', message: 'weird' });
  });
});
