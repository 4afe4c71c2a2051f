/**
 * Command-line entry: argument handling, settings, and the choice between
 * one-shot output and the interactive viewer.
 */

import { access, constants } from 'node:fs/promises';
import { emitKeypressEvents } from 'node:readline';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import {
  decodeDescription,
  formatAltoDescription,
  renderDocumentText,
  type LoadError,
} from '../renderer/utils/layoutEngine/index.js';
import { ViewSession } from '../renderer/ViewSession.js';
import { TerminalApp } from '../renderer/TerminalApp.js';
import { gridToText } from '../renderer/TerminalPainter.js';
import { createExtractor, EXTRACTOR_NAMES, isExtractorName, type ProcessRunner } from './extraction/index.js';
import {
  DEFAULT_SETTINGS,
  extractionSettingsFrom,
  layoutConfigFrom,
  openSettings,
  type PdftermSettings,
} from './settings.js';

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_EXTRACTION = 2;
export const EXIT_PARSE = 3;

/** Width used when the output is not a terminal */
export const PIPE_COLUMNS = 80;

export const DEFAULT_SOURCE = fileURLToPath(new URL('../../assets/sample.alto.xml', import.meta.url));

export const USAGE = `Usage: pdfterm [file] [options]

Shows a PDF's text in the terminal with its layout preserved.
Without a file, a bundled sample description is shown.

Options:
  -p, --page N          start at page N (1-based)
      --text            print the text of every page in reading order
      --xml             print the extracted layout description
  -e, --extractor NAME  pdfalto, pdfjs or auto
  -h, --help            show this help

Keys: n/p page, j/k scroll, space/b screen, g/G top/bottom, r reload, q quit
`;

export interface OutputStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

export interface RunIO {
  stdout: OutputStream;
  stderr: OutputStream;
}

export interface RunDeps {
  /** Settings to use instead of the persisted store */
  settings?: PdftermSettings;
  runProcess?: ProcessRunner;
  /** Runs the interactive viewer until the user quits */
  interactive?: (session: ViewSession, pageIndex: number) => Promise<void>;
}

export function exitCodeFor(error: LoadError | null): number {
  if (error === null) return EXIT_OK;
  return error.kind === 'conversion' ? EXIT_EXTRACTION : EXIT_PARSE;
}

async function runTerminalApp(session: ViewSession, pageIndex: number): Promise<void> {
  emitKeypressEvents(process.stdin);
  await new TerminalApp(session, process.stdin, process.stdout, pageIndex).run();
}

function loadSettings(): PdftermSettings {
  const opened = openSettings();
  if (!opened.success) {
    console.warn(`[Settings] Ignoring invalid settings: ${opened.error}`);
    return { ...DEFAULT_SETTINGS };
  }
  return opened.store.get();
}

export async function run(
  argv: string[],
  io: RunIO = { stdout: process.stdout, stderr: process.stderr },
  deps: RunDeps = {},
): Promise<number> {
  const usageError = (message: string): number => {
    io.stderr.write(`pdfterm: ${message}\n\n${USAGE}`);
    return EXIT_USAGE;
  };

  let parsed;
  try {
    parsed = parseArgs({
      args: argv,
      options: {
        page: { type: 'string', short: 'p' },
        text: { type: 'boolean' },
        xml: { type: 'boolean' },
        extractor: { type: 'string', short: 'e' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    return usageError(error instanceof Error ? error.message : String(error));
  }
  const { values, positionals } = parsed;

  if (values.help) {
    io.stdout.write(USAGE);
    return EXIT_OK;
  }
  if (positionals.length > 1) {
    return usageError(`expected at most one file, got ${positionals.length}`);
  }

  let pageIndex = 0;
  if (values.page !== undefined) {
    if (!/^\d+$/.test(values.page) || Number(values.page) < 1) {
      return usageError(`invalid page number "${values.page}"`);
    }
    pageIndex = Number(values.page) - 1;
  }

  const settings = { ...(deps.settings ?? loadSettings()) };
  if (values.extractor !== undefined) {
    if (!isExtractorName(values.extractor)) {
      return usageError(`unknown extractor "${values.extractor}" (expected ${EXTRACTOR_NAMES.join(', ')})`);
    }
    settings.extractor = values.extractor;
  }

  const sourcePath = positionals[0] ?? DEFAULT_SOURCE;
  try {
    await access(sourcePath, constants.R_OK);
  } catch (error) {
    io.stderr.write(`pdfterm: cannot read ${sourcePath}: ${error instanceof Error ? error.message : String(error)}\n`);
    return EXIT_USAGE;
  }

  const extractor = createExtractor(extractionSettingsFrom(settings), deps.runProcess);
  const report = (error: LoadError): number => {
    io.stderr.write(`pdfterm: ${error.message}\n`);
    return exitCodeFor(error);
  };

  if (values.xml) {
    const extracted = await extractor.extract(sourcePath);
    if (!extracted.success) return report(extracted.error);
    const decoded = decodeDescription(extracted.description);
    if (!decoded.success) return report(decoded.error);
    io.stdout.write(formatAltoDescription(decoded.text));
    return EXIT_OK;
  }

  const config = layoutConfigFrom(settings);
  const session = new ViewSession({ extractor, config });
  const outcome = await session.load(sourcePath);
  if (outcome.status === 'failed' && (values.text || !io.stdout.isTTY)) {
    return report(outcome.error);
  }

  if (outcome.status === 'loaded' && pageIndex >= outcome.document.pages.length) {
    return usageError(`page ${pageIndex + 1} is out of range (1-${outcome.document.pages.length})`);
  }

  if (values.text && outcome.status === 'loaded') {
    io.stdout.write(renderDocumentText(outcome.document, config));
    return EXIT_OK;
  }

  if (!io.stdout.isTTY) {
    const rows = session.pageRows(pageIndex, PIPE_COLUMNS);
    io.stdout.write(gridToText(session.renderPage(pageIndex, { rows, cols: PIPE_COLUMNS }).grid));
    return EXIT_OK;
  }

  // A failed initial load is shown as a diagnostic; the exit code reports it on quit
  await (deps.interactive ?? runTerminalApp)(session, pageIndex);
  return exitCodeFor(session.error);
}
