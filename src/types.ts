/**
 * Core type definitions for the BeReal export tool
 */

import type { DateTime } from 'luxon';

/**
 * GPS coordinates
 */
export interface GpsCoordinates {
  readonly latitude: number;
  readonly longitude: number;
}

/**
 * Export categories, in the order they are processed
 */
export const CATEGORIES = ['memories', 'posts', 'realmojis', 'conversations'] as const;

export type Category = (typeof CATEGORIES)[number];

/**
 * How a category was selected on the command line.
 * 'auto' exports it when present, 'required' fails the run when its manifest is missing.
 */
export type CategoryMode = 'auto' | 'required' | 'off';

export type MediaKind = 'image' | 'video';

export type MediaRole = 'front' | 'rear' | 'bts' | 'realmoji' | 'chat';

/**
 * A file referenced by a manifest entry, before it is located on disk
 */
export interface MediaReference {
  readonly role: MediaRole;
  readonly path: string; // relative path or URL as written in the manifest
}

interface BaseRecord {
  readonly id: string;
  readonly takenAt: Date; // UTC instant
  readonly location: GpsCoordinates | null;
  readonly media: readonly MediaReference[];
}

export interface MemoryRecord extends BaseRecord {
  readonly category: 'memories';
  readonly isLate: boolean;
}

export interface PostRecord extends BaseRecord {
  readonly category: 'posts';
  readonly caption: string | null;
  readonly retakeCounter: number;
}

export interface RealmojiRecord extends BaseRecord {
  readonly category: 'realmojis';
  readonly emoji: string;
  readonly isInstant: boolean;
}

export interface ConversationRecord extends BaseRecord {
  readonly category: 'conversations';
  readonly conversationId: string;
  readonly messageType: string | null;
  readonly text: string | null;
  readonly timestampSource: 'chat-log' | 'mtime';
}

/**
 * One captured moment from the export, tagged by category
 */
export type ExportRecord = MemoryRecord | PostRecord | RealmojiRecord | ConversationRecord;

/**
 * Capture time converted to the wall clock of the place it was taken
 */
export interface ResolvedTimestamp {
  readonly zone: string;
  readonly local: DateTime;
}

/**
 * A referenced file that exists on disk
 */
export interface MediaFile {
  readonly role: MediaRole;
  readonly sourcePath: string;
  readonly kind: MediaKind;
  readonly extension: string; // lower-case, without dot
}

interface BaseJob {
  readonly record: ExportRecord;
  readonly timestamp: ResolvedTimestamp;
  readonly outputPath: string;
}

export interface CopyJob extends BaseJob {
  readonly type: 'copy';
  readonly file: MediaFile;
}

export interface CompositeJob extends BaseJob {
  readonly type: 'composite';
  readonly front: MediaFile;
  readonly rear: MediaFile;
}

/**
 * One unit of work for the worker pool
 */
export type ExportJob = CopyJob | CompositeJob;

export type JobStatus = 'done' | 'copy-failed' | 'composite-failed' | 'embed-failed';

export interface JobOutcome {
  readonly job: ExportJob;
  readonly status: JobStatus;
  readonly error?: string;
}

/**
 * Date selection criterion. Bounds are wall-clock times; null means open.
 */
export type DateCriterion =
  | { readonly type: 'none' }
  | { readonly type: 'year'; readonly year: number }
  | { readonly type: 'range'; readonly start: DateTime | null; readonly end: DateTime | null };

/**
 * Validated, read-only settings for one run
 */
export interface ExportConfig {
  readonly berealPath: string;
  readonly outputDir: string;
  readonly fallbackTimezone: string;
  readonly useGpsTimezone: boolean;
  readonly dateCriterion: DateCriterion;
  readonly categories: Readonly<Record<Category, CategoryMode>>;
  readonly allRealmojis: boolean;
  readonly workers: number;
  readonly composite: boolean;
  readonly exiftoolPath: string | null;
  readonly verbose: boolean;
  readonly dryRun: boolean;
}

/**
 * Counters for one category
 */
export interface CategoryStats {
  records: number;
  filteredOut: number;
  missingFiles: number;
  planned: number;
  done: number;
  copyFailed: number;
  compositeFailed: number;
  embedFailed: number;
}

/**
 * Run summary
 */
export interface ExportSummary {
  readonly categories: Record<Category, CategoryStats>;
  manifestSkips: number;
  durationMs: number;
  dryRun: boolean;
}

/**
 * Fatal error raised before any job starts
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Custom error for malformed manifest files or entries
 */
export class ManifestParseError extends Error {
  constructor(
    public readonly source: string,
    message: string
  ) {
    super(`Failed to parse ${source}: ${message}`);
    this.name = 'ManifestParseError';
  }
}

/**
 * A referenced file could not be found or used
 */
export class FileMatchError extends Error {
  constructor(
    public readonly reference: string,
    message: string
  ) {
    super(`${message}: ${reference}`);
    this.name = 'FileMatchError';
  }
}

export class CopyError extends Error {
  constructor(
    public readonly sourcePath: string,
    public readonly destination: string,
    message: string
  ) {
    super(`Failed to copy ${sourcePath} to ${destination}: ${message}`);
    this.name = 'CopyError';
  }
}

/**
 * Custom error for metadata embedding failures
 */
export class EmbedError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(`Failed to embed metadata for ${filePath}: ${message}`);
    this.name = 'EmbedError';
  }
}
