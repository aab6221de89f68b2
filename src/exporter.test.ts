/**
 * Tests for the exporter module
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdir, mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { DateTime } from 'luxon';
import { buildConfig, type RawExportOptions } from './config.js';
import {
  createSummary,
  exitCodeFor,
  exportArchive,
  formatSummary,
  generateFilename,
  runPool,
} from './exporter.js';
import { silentLogger, type Logger } from './logger.js';
import type { EmbedTags, MetadataWriter } from './metadata.js';
import { TimezoneResolver } from './timezone.js';

class RecordingWriter implements MetadataWriter {
  readonly calls: Array<{ filePath: string; tags: EmbedTags }> = [];
  closed = false;

  async write(filePath: string, tags: EmbedTags): Promise<void> {
    this.calls.push({ filePath, tags });
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const failingWriter: MetadataWriter = {
  write: async () => {
    throw new Error('exiftool exited with code 1');
  },
  close: async () => undefined,
};

function recordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const record = (message: string): void => {
    lines.push(message);
  };
  return { logger: { info: record, verbose: record, warn: record, error: record }, lines };
}

const parisResolver = () => new TimezoneResolver(() => 'Europe/Paris');

const memoryEntry = {
  frontImage: { path: '/Photos/user123/post/front1.webp' },
  backImage: { path: '/Photos/user123/post/back1.webp' },
  btsMedia: { path: '/Photos/user123/bts/bts1.mp4' },
  isLate: false,
  takenTime: '2022-06-15T10:00:00.000Z',
  location: { latitude: 48.8566, longitude: 2.3522 },
};

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('generateFilename', () => {
  it('should use the local time and label', () => {
    const local = DateTime.fromISO('2022-06-15T10:00:00Z').setZone('Europe/Paris');
    expect(generateFilename(local, 'front', 'webp')).toBe('2022-06-15_12-00-00_front.webp');
  });
});

describe('runPool', () => {
  it('should keep results in input order', async () => {
    const results = await runPool([30, 10, 20], 3, async (delay) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return delay * 2;
    });
    expect(results).toEqual([60, 20, 40]);
  });

  it('should not run more tasks than workers at once', async () => {
    let running = 0;
    let peak = 0;
    await runPool([1, 2, 3, 4, 5, 6], 2, async () => {
      running++;
      peak = Math.max(peak, running);
      await new Promise((resolve) => setTimeout(resolve, 5));
      running--;
    });
    expect(peak).toBe(2);
  });

  it('should run items in order with one worker', async () => {
    const order: number[] = [];
    await runPool([1, 2, 3], 1, async (item) => {
      order.push(item);
    });
    expect(order).toEqual([1, 2, 3]);
  });

  it('should handle an empty list', async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});

describe('exitCodeFor', () => {
  it('should be 0 when nothing ran', () => {
    expect(exitCodeFor(createSummary())).toBe(0);
  });

  it('should be 0 when at least one job succeeded', () => {
    const summary = createSummary();
    summary.categories.posts.done = 1;
    summary.categories.posts.embedFailed = 3;
    expect(exitCodeFor(summary)).toBe(0);
  });

  it('should be 1 when every job failed', () => {
    const summary = createSummary();
    summary.categories.memories.copyFailed = 2;
    expect(exitCodeFor(summary)).toBe(1);
  });
});

describe('formatSummary', () => {
  it('should list categories with entries', () => {
    const summary = createSummary();
    summary.categories.memories.records = 3;
    summary.categories.memories.done = 4;
    summary.categories.memories.missingFiles = 1;
    summary.manifestSkips = 2;
    summary.durationMs = 1520;

    expect(formatSummary(summary)).toBe(
      [
        'memories: 3 entries',
        '  Exported: 4',
        '  Missing files: 1',
        'Skipped manifest entries: 2',
        'Duration: 1.5s',
      ].join('\n')
    );
  });

  it('should say when there was nothing to export', () => {
    expect(formatSummary(createSummary())).toBe('Nothing to export.\nDuration: 0.0s');
  });
});

describe('exportArchive', () => {
  let testDir: string;
  let exportDir: string;
  let outDir: string;

  const configFor = (options: RawExportOptions = {}) =>
    buildConfig({ berealPath: exportDir, outPath: outDir, timezone: 'UTC', workers: 2, ...options });

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'exporter-test-'));
    exportDir = join(testDir, 'export');
    outDir = join(testDir, 'out');
    await mkdir(join(exportDir, 'Photos', 'post'), { recursive: true });
    await mkdir(join(exportDir, 'Photos', 'realmoji'), { recursive: true });
    await writeFile(join(exportDir, 'Photos', 'post', 'front1.webp'), 'front-data');
    await writeFile(join(exportDir, 'Photos', 'post', 'back1.webp'), 'back-data');
    await writeFile(join(exportDir, 'Photos', 'realmoji', 'moji1.webp'), 'moji-data');
    await writeFile(
      join(exportDir, 'memories.json'),
      JSON.stringify([memoryEntry, { frontImage: { path: 'x.webp' }, takenTime: 'never' }])
    );
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should copy files under local-time names and tag them', async () => {
    const writer = new RecordingWriter();

    const summary = await exportArchive(configFor(), {
      writer,
      logger: silentLogger,
      resolver: parisResolver(),
    });

    const frontOut = join(outDir, 'memories', '2022-06-15_12-00-00_front.webp');
    const backOut = join(outDir, 'memories', '2022-06-15_12-00-00_back.webp');
    expect(await readFile(frontOut, 'utf8')).toBe('front-data');
    expect(await readFile(backOut, 'utf8')).toBe('back-data');

    expect(summary.categories.memories).toMatchObject({
      records: 1,
      filteredOut: 0,
      missingFiles: 1,
      done: 2,
      copyFailed: 0,
      embedFailed: 0,
    });
    expect(summary.manifestSkips).toBe(1);
    expect(exitCodeFor(summary)).toBe(0);

    const frontCall = writer.calls.find((call) => call.filePath === frontOut);
    expect(frontCall?.tags).toMatchObject({
      DateTimeOriginal: '2022:06:15 12:00:00',
      OffsetTimeOriginal: '+02:00',
      GPSLatitude: 48.8566,
      GPSLongitudeRef: 'E',
    });
  });

  it('should set the file time to the capture time', async () => {
    await exportArchive(configFor(), { writer: new RecordingWriter(), logger: silentLogger, resolver: parisResolver() });

    const info = await stat(join(outDir, 'memories', '2022-06-15_12-00-00_front.webp'));
    expect(info.mtime.toISOString()).toBe('2022-06-15T10:00:00.000Z');
  });

  it('should use the fallback timezone when GPS is off', async () => {
    await exportArchive(configFor({ gpsTimezone: false }), {
      writer: new RecordingWriter(),
      logger: silentLogger,
      resolver: parisResolver(),
    });

    expect(await exists(join(outDir, 'memories', '2022-06-15_10-00-00_front.webp'))).toBe(true);
  });

  it('should keep the copied file when embedding fails', async () => {
    const summary = await exportArchive(configFor(), {
      writer: failingWriter,
      logger: silentLogger,
      resolver: parisResolver(),
    });

    expect(summary.categories.memories.embedFailed).toBe(2);
    expect(summary.categories.memories.done).toBe(0);
    expect(exitCodeFor(summary)).toBe(1);
    expect(await exists(join(outDir, 'memories', '2022-06-15_12-00-00_front.webp'))).toBe(true);
  });

  it('should filter by year', async () => {
    const writer = new RecordingWriter();
    const summary = await exportArchive(configFor({ year: '2021' }), {
      writer,
      logger: silentLogger,
      resolver: parisResolver(),
    });

    expect(summary.categories.memories.records).toBe(1);
    expect(summary.categories.memories.filteredOut).toBe(1);
    expect(writer.calls).toHaveLength(0);
    expect(exitCodeFor(summary)).toBe(0);
  });

  it('should explain records skipped by the date filter', async () => {
    const { logger, lines } = recordingLogger();

    await exportArchive(configFor({ year: '2021', verbose: true }), {
      writer: new RecordingWriter(),
      logger,
      resolver: parisResolver(),
    });

    expect(lines).toContain('Skipping memories back1: 2022-06-15 12:00:00 is outside year 2021');
  });

  it('should log the tagged time, zone and position', async () => {
    const { logger, lines } = recordingLogger();

    await exportArchive(configFor({ workers: 1 }), { writer: new RecordingWriter(), logger, resolver: parisResolver() });

    const frontOut = join(outDir, 'memories', '2022-06-15_12-00-00_front.webp');
    expect(lines).toContain(
      `Tag ${frontOut}: 2022-06-15T12:00:00.000+02:00 (Europe/Paris) GPS 48.856600°N, 2.352200°E`
    );
  });

  it('should copy videos exiftool cannot write without tagging them', async () => {
    await mkdir(join(exportDir, 'Photos', 'bts'), { recursive: true });
    await writeFile(join(exportDir, 'Photos', 'bts', 'bts1.avi'), 'video-data');
    await writeFile(
      join(exportDir, 'memories.json'),
      JSON.stringify([{ ...memoryEntry, btsMedia: { path: '/Photos/user123/bts/bts1.avi' } }])
    );
    const writer = new RecordingWriter();

    const summary = await exportArchive(configFor(), { writer, logger: silentLogger, resolver: parisResolver() });

    const btsOut = join(outDir, 'memories', '2022-06-15_12-00-00_bts.avi');
    expect(await readFile(btsOut, 'utf8')).toBe('video-data');
    expect(writer.calls.map((call) => call.filePath)).not.toContain(btsOut);
    expect(writer.calls).toHaveLength(2);
    expect(summary.categories.memories).toMatchObject({ done: 3, embedFailed: 0 });
  });

  it('should add a suffix when two files get the same name', async () => {
    await writeFile(join(exportDir, 'memories.json'), JSON.stringify([memoryEntry, memoryEntry]));

    await exportArchive(configFor(), { writer: new RecordingWriter(), logger: silentLogger, resolver: parisResolver() });

    expect(await exists(join(outDir, 'memories', '2022-06-15_12-00-00_front.webp'))).toBe(true);
    expect(await exists(join(outDir, 'memories', '2022-06-15_12-00-00_front_2.webp'))).toBe(true);
  });

  it('should composite front and back images when asked', async () => {
    const writer = new RecordingWriter();
    const composited: string[] = [];

    const summary = await exportArchive(configFor({ composite: true }), {
      writer,
      logger: silentLogger,
      resolver: parisResolver(),
      compositor: async (frontPath, rearPath, outputPath) => {
        composited.push(`${frontPath}|${rearPath}`);
        await writeFile(outputPath, 'composited-data');
      },
    });

    const compositeOut = join(outDir, 'memories', '2022-06-15_12-00-00_composited.webp');
    expect(composited).toEqual([
      `${join(exportDir, 'Photos', 'post', 'front1.webp')}|${join(exportDir, 'Photos', 'post', 'back1.webp')}`,
    ]);
    expect(await readFile(compositeOut, 'utf8')).toBe('composited-data');
    expect(writer.calls.map((call) => call.filePath)).toContain(compositeOut);
    expect(summary.categories.memories.done).toBe(3);
  });

  it('should count a failed composite', async () => {
    const summary = await exportArchive(configFor({ composite: true }), {
      writer: new RecordingWriter(),
      logger: silentLogger,
      resolver: parisResolver(),
      compositor: async () => {
        throw new Error('bad image');
      },
    });

    expect(summary.categories.memories.compositeFailed).toBe(1);
    expect(summary.categories.memories.done).toBe(2);
  });

  it('should skip realmojis that were not instant unless asked', async () => {
    await writeFile(
      join(exportDir, 'realmojis.json'),
      JSON.stringify([
        {
          media: { path: '/Photos/user123/realmoji/moji1.webp' },
          emoji: '😂',
          isInstant: false,
          postedAt: '2022-08-01T18:30:00.000Z',
        },
      ])
    );

    const skipped = await exportArchive(configFor(), {
      writer: new RecordingWriter(),
      logger: silentLogger,
      resolver: parisResolver(),
    });
    expect(skipped.categories.realmojis).toMatchObject({ records: 1, filteredOut: 1, done: 0 });

    const included = await exportArchive(configFor({ allRealmojis: true }), {
      writer: new RecordingWriter(),
      logger: silentLogger,
      resolver: parisResolver(),
    });
    expect(included.categories.realmojis).toMatchObject({ records: 1, filteredOut: 0, done: 1 });
    expect(await exists(join(outDir, 'realmojis', '2022-08-01_18-30-00_realmoji.webp'))).toBe(true);
  });

  it('should write conversation media into a folder per conversation', async () => {
    const conversationDir = join(exportDir, 'conversations', 'conv1');
    await mkdir(conversationDir, { recursive: true });
    await writeFile(
      join(conversationDir, 'chat_log.json'),
      JSON.stringify([{ id: 'msg1', createdAt: '2023-03-01T08:00:00.000Z', type: 'image' }])
    );
    await writeFile(join(conversationDir, 'msg1.jpg'), 'chat-data');

    const summary = await exportArchive(configFor({ memories: false }), {
      writer: new RecordingWriter(),
      logger: silentLogger,
      resolver: parisResolver(),
    });

    expect(summary.categories.conversations.done).toBe(1);
    expect(summary.categories.memories.records).toBe(0);
    expect(
      await readFile(join(outDir, 'conversations', 'conv1', '2023-03-01_08-00-00_chat_msg1.jpg'), 'utf8')
    ).toBe('chat-data');
  });

  it('should not write anything on a dry run', async () => {
    const writer = new RecordingWriter();
    const summary = await exportArchive(configFor({ dryRun: true }), {
      writer,
      logger: silentLogger,
      resolver: parisResolver(),
    });

    expect(summary.categories.memories.records).toBe(1);
    expect(summary.categories.memories.planned).toBe(2);
    expect(writer.calls).toHaveLength(0);
    expect(await exists(outDir)).toBe(false);
    expect(formatSummary(summary).split('\n').slice(0, 3)).toEqual([
      'memories: 1 entries',
      '  Planned: 2',
      '  Missing files: 1',
    ]);
  });

  it('should fail when a required category is missing', async () => {
    await expect(
      exportArchive(configFor({ posts: true }), { writer: new RecordingWriter(), logger: silentLogger })
    ).rejects.toThrow('posts.json');
  });
});
