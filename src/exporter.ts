/**
 * Exporter module: turns manifest records into jobs and runs them on a worker pool
 */

import { copyFile, mkdir, utimes } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { DateTime } from 'luxon';
import { compositeFiles } from './compositor.js';
import { describeCriterion, include } from './date-filter.js';
import { errorMessage, type Logger } from './logger.js';
import { fileStem, matchRecordFiles } from './matcher.js';
import { canEmbed, embedMetadata, formatGpsForDisplay, type MetadataWriter } from './metadata.js';
import { loadCategory } from './parser.js';
import { resolveTimestamp, TimezoneResolver } from './timezone.js';
import {
  CATEGORIES,
  ConfigurationError,
  CopyError,
  type Category,
  type CategoryStats,
  type ExportConfig,
  type ExportJob,
  type ExportRecord,
  type ExportSummary,
  type JobOutcome,
  type MediaFile,
  type MediaRole,
} from './types.js';

const FILENAME_TIMESTAMP_FORMAT = 'yyyy-MM-dd_HH-mm-ss';

/**
 * Filename label per media role
 */
const ROLE_LABELS: Readonly<Record<MediaRole, string>> = {
  front: 'front',
  rear: 'back',
  bts: 'bts',
  realmoji: 'realmoji',
  chat: 'chat',
};

export const COMPOSITE_LABEL = 'composited';
export const COMPOSITE_EXTENSION = 'webp';

/**
 * Collaborators of an export run
 */
export interface ExportDependencies {
  readonly writer: MetadataWriter;
  readonly logger: Logger;
  readonly resolver?: TimezoneResolver;
  readonly compositor?: (frontPath: string, rearPath: string, outputPath: string) => Promise<void>;
  readonly onJobsPlanned?: (total: number) => void;
  readonly onJobComplete?: (outcome: JobOutcome) => void;
}

/**
 * Records loaded for every enabled category
 */
export interface LoadedRecords {
  readonly records: Record<Category, ExportRecord[]>;
  readonly skipped: number;
}

function emptyStats(): CategoryStats {
  return {
    records: 0,
    filteredOut: 0,
    missingFiles: 0,
    planned: 0,
    done: 0,
    copyFailed: 0,
    compositeFailed: 0,
    embedFailed: 0,
  };
}

export function createSummary(): ExportSummary {
  return {
    categories: {
      memories: emptyStats(),
      posts: emptyStats(),
      realmojis: emptyStats(),
      conversations: emptyStats(),
    },
    manifestSkips: 0,
    durationMs: 0,
    dryRun: false,
  };
}

/**
 * Generate filename for an exported file: "2022-06-15_12-00-00_front.webp"
 */
export function generateFilename(local: DateTime, label: string, extension: string): string {
  return `${local.toFormat(FILENAME_TIMESTAMP_FORMAT)}_${label}.${extension}`;
}

function fileLabel(file: MediaFile): string {
  const label = ROLE_LABELS[file.role];
  return file.role === 'chat' ? `${label}_${fileStem(file)}` : label;
}

function categoryDir(config: ExportConfig, record: ExportRecord): string {
  const dir = join(config.outputDir, record.category);
  return record.category === 'conversations' ? join(dir, record.conversationId) : dir;
}

/**
 * Output paths already handed out in this run; a clash gets a numeric suffix
 */
class OutputPathRegistry {
  private readonly taken = new Set<string>();

  claim(dir: string, local: DateTime, label: string, extension: string): string {
    let path = join(dir, generateFilename(local, label, extension));
    for (let n = 2; this.taken.has(path); n++) {
      path = join(dir, generateFilename(local, `${label}_${n}`, extension));
    }
    this.taken.add(path);
    return path;
  }
}

/**
 * Load every enabled category. A missing required manifest is fatal.
 */
export async function loadRecords(config: ExportConfig, logger: Logger): Promise<LoadedRecords> {
  const records: Record<Category, ExportRecord[]> = {
    memories: [],
    posts: [],
    realmojis: [],
    conversations: [],
  };
  let skipped = 0;

  for (const category of CATEGORIES) {
    logger.verbose(`Reading ${category}`);
    const result = await loadCategory(config.berealPath, category, config.categories[category], logger);
    records[category] = result.records;
    skipped += result.skipped;
  }

  return { records, skipped };
}

/**
 * Filter records, locate their files and build the job list
 */
export async function planJobs(
  records: readonly ExportRecord[],
  config: ExportConfig,
  resolver: TimezoneResolver,
  summary: ExportSummary,
  logger: Logger
): Promise<ExportJob[]> {
  const jobs: ExportJob[] = [];
  const paths = new OutputPathRegistry();

  for (const record of records) {
    const stats = summary.categories[record.category];
    stats.records++;

    if (record.category === 'realmojis' && !record.isInstant && !config.allRealmojis) {
      stats.filteredOut++;
      logger.verbose(`Skipping realmoji ${record.id}: not an instant realmoji`);
      continue;
    }

    const timestamp = resolveTimestamp(
      resolver,
      record.takenAt,
      record.location,
      config.fallbackTimezone,
      config.useGpsTimezone
    );

    if (!include(timestamp.local, config.dateCriterion)) {
      stats.filteredOut++;
      logger.verbose(
        `Skipping ${record.category} ${record.id}: ${timestamp.local.toFormat('yyyy-MM-dd HH:mm:ss')} ` +
          `is outside ${describeCriterion(config.dateCriterion)}`
      );
      continue;
    }

    const { files, missing } = await matchRecordFiles(config.berealPath, record.media);
    for (const error of missing) {
      stats.missingFiles++;
      logger.warn(`${record.category} ${record.id}: ${error.message}`);
    }

    const dir = categoryDir(config, record);
    for (const file of files) {
      stats.planned++;
      jobs.push({
        type: 'copy',
        record,
        timestamp,
        file,
        outputPath: paths.claim(dir, timestamp.local, fileLabel(file), file.extension),
      });
    }

    if (config.composite && (record.category === 'memories' || record.category === 'posts')) {
      const front = files.find((file) => file.role === 'front' && file.kind === 'image');
      const rear = files.find((file) => file.role === 'rear' && file.kind === 'image');
      if (front && rear) {
        stats.planned++;
        jobs.push({
          type: 'composite',
          record,
          timestamp,
          front,
          rear,
          outputPath: paths.claim(dir, timestamp.local, COMPOSITE_LABEL, COMPOSITE_EXTENSION),
        });
      } else {
        logger.verbose(`Not compositing ${record.category} ${record.id}: front or back image missing`);
      }
    }
  }

  return jobs;
}

async function copyMedia(file: MediaFile, outputPath: string, takenAt: Date): Promise<void> {
  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await copyFile(file.sourcePath, outputPath);
    await utimes(outputPath, takenAt, takenAt);
  } catch (error) {
    throw new CopyError(file.sourcePath, outputPath, errorMessage(error));
  }
}

/**
 * Run one job: copy or composite, then embed. Never throws.
 */
export async function runJob(job: ExportJob, deps: ExportDependencies): Promise<JobOutcome> {
  const { logger, writer } = deps;
  const compositor = deps.compositor ?? compositeFiles;
  const { record, timestamp } = job;

  if (job.type === 'copy') {
    logger.verbose(`Copy ${job.file.sourcePath} -> ${job.outputPath}`);
    try {
      await copyMedia(job.file, job.outputPath, record.takenAt);
    } catch (error) {
      logger.error(errorMessage(error));
      return { job, status: 'copy-failed', error: errorMessage(error) };
    }
  } else {
    logger.verbose(`Composite ${job.front.sourcePath} + ${job.rear.sourcePath} -> ${job.outputPath}`);
    try {
      await mkdir(dirname(job.outputPath), { recursive: true });
      await compositor(job.front.sourcePath, job.rear.sourcePath, job.outputPath);
    } catch (error) {
      logger.error(errorMessage(error));
      return { job, status: 'composite-failed', error: errorMessage(error) };
    }
  }

  if (job.type === 'copy' && !canEmbed(job.file.extension)) {
    logger.verbose(`Not tagging ${job.outputPath}: exiftool cannot write .${job.file.extension} files`);
    return { job, status: 'done' };
  }

  const kind = job.type === 'copy' ? job.file.kind : 'image';
  logger.verbose(
    `Tag ${job.outputPath}: ${timestamp.local.toISO({ includeOffset: true }) ?? ''} (${timestamp.zone})` +
      (record.location ? ` GPS ${formatGpsForDisplay(record.location)}` : '')
  );

  try {
    await embedMetadata(writer, job.outputPath, {
      kind,
      local: timestamp.local,
      location: record.location,
      description: record.category === 'posts' ? record.caption : null,
    });
  } catch (error) {
    // the copied file stays in place, untagged
    logger.error(errorMessage(error));
    return { job, status: 'embed-failed', error: errorMessage(error) };
  }

  return { job, status: 'done' };
}

/**
 * Process items with a fixed number of workers pulling from one queue.
 * With one worker the items run strictly in order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  workers: number,
  task: (item: T) => Promise<R>
): Promise<R[]> {
  const queue = items.map((item, index) => ({ item, index }));
  const results = new Array<R>(items.length);

  const worker = async (): Promise<void> => {
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      results[next.index] = await task(next.item);
    }
  };

  const count = Math.max(1, Math.min(workers, items.length));
  await Promise.all(Array.from({ length: count }, () => worker()));
  return results;
}

/**
 * Add a job outcome to the summary
 */
export function recordOutcome(summary: ExportSummary, outcome: JobOutcome): void {
  const stats = summary.categories[outcome.job.record.category];
  switch (outcome.status) {
    case 'done':
      stats.done++;
      break;
    case 'copy-failed':
      stats.copyFailed++;
      break;
    case 'composite-failed':
      stats.compositeFailed++;
      break;
    case 'embed-failed':
      stats.embedFailed++;
      break;
  }
}

/**
 * Make sure the output root can be created before any job runs
 */
export async function prepareOutputDir(outputDir: string): Promise<void> {
  try {
    await mkdir(outputDir, { recursive: true });
  } catch (error) {
    throw new ConfigurationError(`Cannot create output directory ${outputDir}: ${errorMessage(error)}`);
  }
}

/**
 * Run a full export: load, filter, copy, composite, embed
 */
export async function exportArchive(
  config: ExportConfig,
  deps: ExportDependencies
): Promise<ExportSummary> {
  const started = Date.now();
  const { logger } = deps;
  const summary = createSummary();
  const resolver = deps.resolver ?? new TimezoneResolver();

  summary.dryRun = config.dryRun;
  const loaded = await loadRecords(config, logger);
  summary.manifestSkips = loaded.skipped;

  if (!config.dryRun) {
    await prepareOutputDir(config.outputDir);
  }

  const jobs: ExportJob[] = [];
  for (const category of CATEGORIES) {
    jobs.push(...(await planJobs(loaded.records[category], config, resolver, summary, logger)));
  }

  if (config.dryRun) {
    for (const job of jobs) {
      logger.info(`  ${job.timestamp.local.toFormat('yyyy-MM-dd HH:mm:ss')} ${job.timestamp.zone} -> ${job.outputPath}`);
    }
    summary.durationMs = Date.now() - started;
    return summary;
  }

  deps.onJobsPlanned?.(jobs.length);

  await runPool(jobs, config.workers, async (job) => {
    const outcome = await runJob(job, deps);
    recordOutcome(summary, outcome);
    deps.onJobComplete?.(outcome);
    return outcome;
  });

  summary.durationMs = Date.now() - started;
  return summary;
}

/**
 * Total jobs and successes across categories
 */
export function countJobs(summary: ExportSummary): { total: number; done: number } {
  let total = 0;
  let done = 0;
  for (const category of CATEGORIES) {
    const stats = summary.categories[category];
    done += stats.done;
    total += stats.done + stats.copyFailed + stats.compositeFailed + stats.embedFailed;
  }
  return { total, done };
}

/**
 * 0 unless there were jobs and every one of them failed
 */
export function exitCodeFor(summary: ExportSummary): number {
  const { total, done } = countJobs(summary);
  return total > 0 && done === 0 ? 1 : 0;
}

/**
 * Format export summary for display
 */
export function formatSummary(summary: ExportSummary): string {
  const lines: string[] = [];

  for (const category of CATEGORIES) {
    const stats = summary.categories[category];
    if (stats.records === 0) {
      continue;
    }

    lines.push(`${category}: ${stats.records} entries`);
    lines.push(summary.dryRun ? `  Planned: ${stats.planned}` : `  Exported: ${stats.done}`);
    if (stats.filteredOut > 0) lines.push(`  Filtered out: ${stats.filteredOut}`);
    if (stats.missingFiles > 0) lines.push(`  Missing files: ${stats.missingFiles}`);
    if (stats.copyFailed > 0) lines.push(`  Copy failed: ${stats.copyFailed}`);
    if (stats.compositeFailed > 0) lines.push(`  Composite failed: ${stats.compositeFailed}`);
    if (stats.embedFailed > 0) lines.push(`  Metadata failed: ${stats.embedFailed}`);
  }

  if (lines.length === 0) {
    lines.push('Nothing to export.');
  }
  if (summary.manifestSkips > 0) {
    lines.push(`Skipped manifest entries: ${summary.manifestSkips}`);
  }
  lines.push(`Duration: ${(summary.durationMs / 1000).toFixed(1)}s`);

  return lines.join('\n');
}
