import { describe, test, expect } from 'vitest';
import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { withTempWorkspace } from '../extraction/tempWorkspace.js';

describe('withTempWorkspace', () => {
  test('provides an existing directory and removes it with its contents', async () => {
    let seen = '';
    const result = await withTempWorkspace(async (dir) => {
      seen = dir;
      expect(existsSync(dir)).toBe(true);
      expect(path.basename(dir).startsWith('pdfterm-')).toBe(true);
      await writeFile(path.join(dir, 'description.xml'), '<alto/>');
      return 42;
    });

    expect(result).toBe(42);
    expect(existsSync(seen)).toBe(false);
  });

  test('removes the directory when the callback rejects', async () => {
    let seen = '';
    await expect(withTempWorkspace(async (dir) => {
      seen = dir;
      throw new Error('extraction crashed');
    })).rejects.toThrow('extraction crashed');

    expect(seen).not.toBe('');
    expect(existsSync(seen)).toBe(false);
  });
});
