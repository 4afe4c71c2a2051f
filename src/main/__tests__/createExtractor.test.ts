import { describe, test, expect, afterEach, beforeEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { createExtractor, FallbackExtractor } from '../extraction/createExtractor.js';
import { AltoFileSource } from '../extraction/AltoFileSource.js';
import type { ProcessRunner } from '../extraction/PdfAltoExtractor.js';
import type { Extractor, ExtractionResult } from '../extraction/types.js';
import { conversionFailure } from '../extraction/types.js';

// ─── Helpers ─────────────────────────────────────────────────

function asText(description: Uint8Array | string): string {
  return typeof description === 'string' ? description : new TextDecoder().decode(description);
}

function stubExtractor(name: string, result: ExtractionResult): Extractor & { calls: number } {
  return {
    name,
    calls: 0,
    async extract() {
      this.calls++;
      return result;
    },
  };
}

const notFound: ProcessRunner = async () => ({ status: 'not-found' });

let dir = '';

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'pdfterm-test-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ─── FallbackExtractor ───────────────────────────────────────

describe('FallbackExtractor', () => {
  test('falls back when the primary tool is missing', async () => {
    const primary = stubExtractor('pdfalto', conversionFailure('missing-extractor', 'pdfalto was not found'));
    const fallback = stubExtractor('pdfjs', { success: true, description: '<alto/>' });

    const result = await new FallbackExtractor(primary, fallback).extract('doc.pdf');

    expect(result).toEqual({ success: true, description: '<alto/>' });
    expect(fallback.calls).toBe(1);
  });

  test('other failures are reported without a fallback', async () => {
    const failure = conversionFailure('extractor-failed', 'pdfalto exited with code 1');
    const primary = stubExtractor('pdfalto', failure);
    const fallback = stubExtractor('pdfjs', { success: true, description: '<alto/>' });

    expect(await new FallbackExtractor(primary, fallback).extract('doc.pdf')).toEqual(failure);
    expect(fallback.calls).toBe(0);
  });
});

// ─── createExtractor ─────────────────────────────────────────

describe('createExtractor', () => {
  test('names follow the setting', () => {
    expect(createExtractor({ extractor: 'pdfalto' }).name).toBe('pdfalto');
    expect(createExtractor({ extractor: 'pdfjs' }).name).toBe('pdfjs');
    expect(createExtractor({ extractor: 'auto' }).name).toBe('pdfalto|pdfjs');
  });

  test('pdfalto alone reports a missing tool', async () => {
    const sourcePath = path.join(dir, 'doc.pdf');
    await writeFile(sourcePath, '%PDF-1.4');

    const result = await createExtractor({ extractor: 'pdfalto' }, notFound).extract(sourcePath);
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.reason).toBe('missing-extractor');
  });

  test('xml sources are read directly, whatever the extractor', async () => {
    const sourcePath = path.join(dir, 'page.alto.XML');
    await writeFile(sourcePath, '<alto/>');
    let spawned = false;
    const runner: ProcessRunner = async () => {
      spawned = true;
      return { status: 'not-found' };
    };

    const result = await createExtractor({ extractor: 'pdfalto' }, runner).extract(sourcePath);

    if (!result.success) throw new Error(result.error.message);
    expect(asText(result.description)).toBe('<alto/>');
    expect(spawned).toBe(false);
  });
});

// ─── AltoFileSource ──────────────────────────────────────────

describe('AltoFileSource', () => {
  test('an unreadable file is an extractor failure', async () => {
    const result = await new AltoFileSource().extract(path.join(dir, 'missing.xml'));
    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.reason).toBe('extractor-failed');
  });

  test('an empty file is no-output', async () => {
    const sourcePath = path.join(dir, 'empty.xml');
    await writeFile(sourcePath, '');
    const result = await new AltoFileSource().extract(sourcePath);
    expect(result).toEqual({ success: false, error: { kind: 'conversion', reason: 'no-output', message: `${sourcePath} is empty` } });
  });
});
