/**
 * Run configuration: validation of raw CLI or interactive input
 */

import { resolve } from 'node:path';
import { buildDateCriterion } from './date-filter.js';
import { hostTimezone, isValidTimezone } from './timezone.js';
import {
  CATEGORIES,
  ConfigurationError,
  type Category,
  type CategoryMode,
  type ExportConfig,
} from './types.js';

export const DEFAULT_OUTPUT_DIR = './out';
export const DEFAULT_BEREAL_PATH = '.';
export const DEFAULT_WORKERS = 4;

/**
 * Unvalidated options as they come from commander or the prompts.
 * A category flag is true when given, false when negated, undefined when absent.
 */
export interface RawExportOptions {
  readonly berealPath?: string;
  readonly outPath?: string;
  readonly timezone?: string;
  readonly gpsTimezone?: boolean;
  readonly timespan?: string;
  readonly year?: string | number;
  readonly workers?: string | number;
  readonly composite?: boolean;
  readonly exiftoolPath?: string;
  readonly verbose?: boolean;
  readonly dryRun?: boolean;
  readonly allRealmojis?: boolean;
  readonly memories?: boolean;
  readonly posts?: boolean;
  readonly realmojis?: boolean;
  readonly conversations?: boolean;
}

function parseInteger(value: string | number, name: string): number {
  const parsed = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, got "${String(value)}"`);
  }
  return parsed;
}

export function categoryMode(flag: boolean | undefined): CategoryMode {
  if (flag === undefined) return 'auto';
  return flag ? 'required' : 'off';
}

/**
 * Validate raw options into a frozen ExportConfig
 */
export function buildConfig(raw: RawExportOptions): ExportConfig {
  const year = raw.year === undefined ? undefined : parseInteger(raw.year, '--year');
  const dateCriterion = buildDateCriterion(raw.timespan, year);

  const workers = raw.workers === undefined ? DEFAULT_WORKERS : parseInteger(raw.workers, '--workers');
  if (workers < 1) {
    throw new ConfigurationError(`--workers must be at least 1, got ${workers}`);
  }

  const fallbackTimezone = raw.timezone?.trim() || hostTimezone();
  if (!isValidTimezone(fallbackTimezone)) {
    throw new ConfigurationError(`Unknown timezone: ${fallbackTimezone}`);
  }

  const categories: Record<Category, CategoryMode> = {
    memories: categoryMode(raw.memories),
    posts: categoryMode(raw.posts),
    realmojis: categoryMode(raw.realmojis),
    conversations: categoryMode(raw.conversations),
  };
  if (CATEGORIES.every((category) => categories[category] === 'off')) {
    throw new ConfigurationError('Every category is disabled; nothing to export');
  }

  return Object.freeze({
    berealPath: resolve((raw.berealPath ?? DEFAULT_BEREAL_PATH).trim()),
    outputDir: resolve((raw.outPath ?? DEFAULT_OUTPUT_DIR).trim()),
    fallbackTimezone,
    useGpsTimezone: raw.gpsTimezone ?? true,
    dateCriterion,
    categories: Object.freeze(categories),
    allRealmojis: raw.allRealmojis ?? false,
    workers,
    composite: raw.composite ?? false,
    exiftoolPath: raw.exiftoolPath?.trim() || null,
    verbose: raw.verbose ?? false,
    dryRun: raw.dryRun ?? false,
  });
}
