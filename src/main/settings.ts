/**
 * Persisted user settings.
 *
 * Stored as JSON by conf under the `pdfterm` project directory (or
 * PDFTERM_CONFIG_DIR) and validated against a JSON schema on every read and
 * write.
 */

import Conf from 'conf';
import { DEFAULT_LAYOUT_CONFIG, resolveLayoutConfig, type LayoutConfig } from '../renderer/utils/layoutEngine/config.js';
import type { ExtractionSettings } from './extraction/createExtractor.js';
import type { ExtractorName } from './extraction/types.js';

export const CONFIG_DIR_ENV = 'PDFTERM_CONFIG_DIR';

export interface PdftermSettings extends LayoutConfig {
  extractor: ExtractorName;
  /** pdfalto executable; empty means `pdfalto` on PATH */
  pdfaltoPath: string;
  /** First page to extract (1-based); 0 means from the start */
  firstPage: number;
  /** Last page to extract (1-based); 0 means to the end */
  lastPage: number;
}

export const DEFAULT_SETTINGS: Readonly<PdftermSettings> = {
  ...DEFAULT_LAYOUT_CONFIG,
  extractor: 'auto',
  pdfaltoPath: '',
  firstPage: 0,
  lastPage: 0,
};

export interface SettingsStore {
  readonly path: string;
  get(): PdftermSettings;
  set<K extends keyof PdftermSettings>(key: K, value: PdftermSettings[K]): void;
  reset(): void;
}

export type OpenSettingsResult =
  | { success: true; store: SettingsStore }
  | { success: false; error: string };

export interface OpenSettingsOptions {
  /** Directory holding config.json; overrides PDFTERM_CONFIG_DIR */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function createConf(cwd: string | undefined): Conf<PdftermSettings> {
  const d = DEFAULT_SETTINGS;
  return new Conf<PdftermSettings>({
    projectName: 'pdfterm',
    cwd,
    schema: {
      lineTolerance: { type: 'number', exclusiveMinimum: 0, default: d.lineTolerance },
      columnGapChars: { type: 'number', exclusiveMinimum: 0, default: d.columnGapChars },
      minColumnBands: { type: 'integer', minimum: 1, default: d.minColumnBands },
      wordSpaceFactor: { type: 'number', exclusiveMinimum: 0, default: d.wordSpaceFactor },
      overlapRatio: { type: 'number', exclusiveMinimum: 0, maximum: 1, default: d.overlapRatio },
      aspectRatio: { type: 'number', exclusiveMinimum: 0, default: d.aspectRatio },
      horizontalAnchor: { type: 'string', enum: ['center', 'left'], default: d.horizontalAnchor },
      sectionGapFactor: { type: 'number', exclusiveMinimum: 0, default: d.sectionGapFactor },
      extractor: { type: 'string', enum: ['pdfalto', 'pdfjs', 'auto'], default: d.extractor },
      pdfaltoPath: { type: 'string', default: d.pdfaltoPath },
      firstPage: { type: 'integer', minimum: 0, default: d.firstPage },
      lastPage: { type: 'integer', minimum: 0, default: d.lastPage },
    },
  });
}

/**
 * Open the settings store. Fails when the stored file does not match the
 * schema; the caller decides whether to continue with DEFAULT_SETTINGS.
 */
export function openSettings(options: OpenSettingsOptions = {}): OpenSettingsResult {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? (env[CONFIG_DIR_ENV] || undefined);

  let conf: Conf<PdftermSettings>;
  try {
    conf = createConf(cwd);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  const store: SettingsStore = {
    path: conf.path,
    get: () => ({ ...DEFAULT_SETTINGS, ...conf.store }),
    set: (key, value) => conf.set(key, value),
    reset: () => conf.clear(),
  };
  return { success: true, store };
}

export function layoutConfigFrom(settings: PdftermSettings): LayoutConfig {
  return resolveLayoutConfig({
    lineTolerance: settings.lineTolerance,
    columnGapChars: settings.columnGapChars,
    minColumnBands: settings.minColumnBands,
    wordSpaceFactor: settings.wordSpaceFactor,
    overlapRatio: settings.overlapRatio,
    aspectRatio: settings.aspectRatio,
    horizontalAnchor: settings.horizontalAnchor,
    sectionGapFactor: settings.sectionGapFactor,
  });
}

export function extractionSettingsFrom(settings: PdftermSettings): ExtractionSettings {
  return {
    extractor: settings.extractor,
    pdfaltoPath: settings.pdfaltoPath,
    firstPage: settings.firstPage > 0 ? settings.firstPage : undefined,
    lastPage: settings.lastPage > 0 ? settings.lastPage : undefined,
  };
}
