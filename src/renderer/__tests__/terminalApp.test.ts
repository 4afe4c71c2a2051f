/**
 * Unit Tests: interactive viewer
 *
 * The terminal is two EventEmitters; frames written to the output are recorded.
 */
import { describe, test, expect } from 'vitest';
import { EventEmitter } from 'node:events';
import { TerminalApp, actionForKey } from '../TerminalApp.js';
import { ViewSession } from '../ViewSession.js';
import { ansi } from '../TerminalPainter.js';
import type { Extractor, ExtractionResult } from '../../main/extraction/types.js';
import { conversionFailure } from '../../main/extraction/types.js';

// ─── Helpers ─────────────────────────────────────────────────

class FakeInput extends EventEmitter {
  isTTY = true;
  rawModes: boolean[] = [];
  paused = true;

  setRawMode(mode: boolean): this {
    this.rawModes.push(mode);
    return this;
  }

  resume(): this {
    this.paused = false;
    return this;
  }

  pause(): this {
    this.paused = true;
    return this;
  }

  press(str: string | undefined, name: string): void {
    this.emit('keypress', str, { name });
  }
}

class FakeOutput extends EventEmitter {
  columns = 80;
  rows = 5;
  frames: string[] = [];

  write(chunk: string): boolean {
    this.frames.push(chunk);
    return true;
  }

  get lastFrame(): string {
    return this.frames[this.frames.length - 1] ?? '';
  }
}

function page(word: string): string {
  return '<Page WIDTH="100" HEIGHT="100"><TextBlock><TextLine>'
    + `<String CONTENT="${word}" HPOS="10" VPOS="10" WIDTH="15" HEIGHT="10"/>`
    + '</TextLine></TextBlock></Page>';
}

const TWO_PAGES: ExtractionResult = {
  success: true,
  description: `<alto><Layout>${page('one')}${page('two')}</Layout></alto>`,
};

function scriptedExtractor(...results: ExtractionResult[]): Extractor {
  let next = 0;
  return {
    name: 'fake',
    async extract() {
      return results[Math.min(next++, results.length - 1)];
    },
  };
}

async function startApp(...results: ExtractionResult[]) {
  const session = new ViewSession({ extractor: scriptedExtractor(...results) });
  await session.load('/tmp/doc.pdf');
  const input = new FakeInput();
  const output = new FakeOutput();
  const app = new TerminalApp(session, input, output);
  const done = app.run();
  return { app, input, output, done };
}

// ─── Key Bindings ────────────────────────────────────────────

describe('actionForKey', () => {
  test('letters and named keys map to actions', () => {
    expect(actionForKey('n', { name: 'n' })).toBe('next');
    expect(actionForKey(undefined, { name: 'right' })).toBe('next');
    expect(actionForKey(undefined, { name: 'pageup' })).toBe('prev');
    expect(actionForKey(' ', { name: 'space' })).toBe('pageDown');
    expect(actionForKey('b', { name: 'b' })).toBe('pageUp');
    expect(actionForKey('G', { name: 'g', shift: true })).toBe('bottom');
    expect(actionForKey('g', { name: 'g' })).toBe('top');
    expect(actionForKey('r', { name: 'r' })).toBe('reload');
  });

  test('ctrl-c and escape quit', () => {
    expect(actionForKey('\x03', { name: 'c', ctrl: true })).toBe('quit');
    expect(actionForKey(undefined, { name: 'escape' })).toBe('quit');
  });

  test('unbound keys do nothing', () => {
    expect(actionForKey('x', { name: 'x' })).toBeNull();
    expect(actionForKey(undefined, undefined)).toBeNull();
  });
});

// ─── Viewer Loop ─────────────────────────────────────────────

describe('TerminalApp', () => {
  test('takes over the terminal and paints the first page', async () => {
    const { input, output, app, done } = await startApp(TWO_PAGES);

    expect(input.rawModes).toEqual([true]);
    expect(input.paused).toBe(false);
    expect(output.frames[0]).toBe(ansi.enterAltScreen + ansi.hideCursor + ansi.clearScreen);
    expect(output.frames[1].startsWith(ansi.home)).toBe(true);
    expect(output.frames[1]).toContain('doc.pdf  page 1/2');

    app.stop();
    await done;
  });

  test('page and scroll keys move the view', async () => {
    const { input, output, app, done } = await startApp(TWO_PAGES);

    // 80 cols over a 100-unit page: 40 grid rows, 4 visible
    input.press('G', 'g');
    expect(app.scrollOffset).toBe(36);
    input.press('k', 'k');
    expect(app.scrollOffset).toBe(35);
    input.press('g', 'g');
    expect(app.scrollOffset).toBe(0);
    input.press('b', 'b');
    expect(app.scrollOffset).toBe(0);

    input.press('j', 'j');
    input.press('n', 'n');
    expect(app.currentPage).toBe(1);
    expect(app.scrollOffset).toBe(0);
    expect(output.lastFrame).toContain('page 2/2');

    input.press('n', 'n');
    expect(app.currentPage).toBe(1);
    input.press('p', 'p');
    expect(app.currentPage).toBe(0);

    app.stop();
    await done;
  });

  test('a resize repaints at the new width', async () => {
    const { output, app, done } = await startApp(TWO_PAGES);
    const before = output.frames.length;

    output.columns = 40;
    output.emit('resize');
    expect(output.frames).toHaveLength(before + 1);

    // 40 cols: 20 grid rows, 4 visible
    app.handle('bottom');
    expect(app.scrollOffset).toBe(16);

    app.stop();
    await done;
  });

  test('reload repaints with the new outcome', async () => {
    const { app, output, done } = await startApp(
      TWO_PAGES,
      conversionFailure('extractor-failed', 'pdfalto exited with code 1'),
    );

    await app.handle('reload');
    expect(output.lastFrame).toContain('Could not extract text from this document');

    app.stop();
    await done;
  });

  test('q restores the terminal and ends the run', async () => {
    const { input, output, done } = await startApp(TWO_PAGES);

    input.press('q', 'q');
    await done;

    expect(input.rawModes).toEqual([true, false]);
    expect(input.paused).toBe(true);
    expect(output.lastFrame).toBe(ansi.showCursor + ansi.exitAltScreen);
    expect(input.listenerCount('keypress')).toBe(0);
    expect(output.listenerCount('resize')).toBe(0);
  });
});
