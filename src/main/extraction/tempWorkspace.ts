import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

const WORKSPACE_PREFIX = 'pdfterm-';

/**
 * Run `fn` with a fresh temporary directory that is removed afterwards,
 * whether `fn` resolves or rejects. A directory that cannot be removed is
 * logged and left behind; it never changes the outcome of `fn`.
 */
export async function withTempWorkspace<T>(fn: (dir: string) => Promise<T>, parent: string = tmpdir()): Promise<T> {
  const dir = await mkdtemp(path.join(parent, WORKSPACE_PREFIX));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true }).catch((err: unknown) => {
      console.warn(`[tempWorkspace] Could not remove ${dir}:`, err);
    });
  }
}
