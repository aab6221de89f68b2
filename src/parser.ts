/**
 * Parser module for BeReal export manifests
 */

import { readFile, readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { DateTime } from 'luxon';
import type { Logger } from './logger.js';
import { errorMessage } from './logger.js';
import {
  ConfigurationError,
  ManifestParseError,
  type Category,
  type CategoryMode,
  type ConversationRecord,
  type ExportRecord,
  type GpsCoordinates,
  type MediaReference,
  type MemoryRecord,
  type PostRecord,
  type RealmojiRecord,
} from './types.js';

/**
 * Manifest file per category, relative to the export root
 */
export const MANIFEST_FILES: Readonly<Record<Exclude<Category, 'conversations'>, string>> = {
  memories: 'memories.json',
  posts: 'posts.json',
  realmojis: 'realmojis.json',
};

export const CONVERSATIONS_DIR = 'conversations';
export const CHAT_LOG_FILE = 'chat_log.json';

/**
 * Records of one category plus the number of entries that were rejected
 */
export interface CategoryLoadResult {
  readonly records: ExportRecord[];
  readonly skipped: number;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Parse a location object: { "latitude": 48.85, "longitude": 2.35 }
 * Null island and out-of-range values count as no location.
 */
export function parseLocation(value: unknown): GpsCoordinates | null {
  if (!isObject(value)) {
    return null;
  }

  const latitude = toNumber(value.latitude);
  const longitude = toNumber(value.longitude);
  if (latitude === null || longitude === null) {
    return null;
  }
  if (Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    return null;
  }
  if (latitude === 0 && longitude === 0) {
    return null;
  }

  return { latitude, longitude };
}

/**
 * Parse a UTC timestamp such as "2022-06-15T10:00:00.000Z".
 * Strings without an offset are read as UTC.
 */
export function parseTimestamp(value: unknown, field: string): Date {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`missing ${field}`);
  }

  const parsed = DateTime.fromISO(value.trim(), { zone: 'utc' });
  if (!parsed.isValid) {
    throw new Error(`invalid ${field} "${value}"`);
  }
  return parsed.toJSDate();
}

/**
 * Read the path of a media object: { "path": "/Photos/<user>/post/abc.webp", ... }
 */
export function parseMediaPath(value: unknown, field: string): string {
  if (isObject(value) && typeof value.path === 'string' && value.path.trim() !== '') {
    return value.path.trim();
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return value.trim();
  }
  throw new Error(`missing ${field}.path`);
}

function optionalMediaPath(value: unknown, field: string): string | null {
  return value === undefined || value === null ? null : parseMediaPath(value, field);
}

/**
 * File name without extension, also for URLs
 */
export function referenceStem(reference: string): string {
  const withoutQuery = reference.split(/[?#]/)[0];
  const name = basename(withoutQuery);
  return name.slice(0, name.length - extname(name).length);
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

export function parseMemoryEntry(entry: unknown): MemoryRecord {
  if (!isObject(entry)) {
    throw new Error('entry is not an object');
  }

  const front = parseMediaPath(entry.frontImage, 'frontImage');
  const back = parseMediaPath(entry.backImage, 'backImage');
  const bts = optionalMediaPath(entry.btsMedia, 'btsMedia');

  const media: MediaReference[] = [
    { role: 'front', path: front },
    { role: 'rear', path: back },
  ];
  if (bts) {
    media.push({ role: 'bts', path: bts });
  }

  return {
    category: 'memories',
    id: referenceStem(back),
    takenAt: parseTimestamp(entry.takenTime, 'takenTime'),
    location: parseLocation(entry.location),
    media,
    isLate: entry.isLate === true,
  };
}

export function parsePostEntry(entry: unknown): PostRecord {
  if (!isObject(entry)) {
    throw new Error('entry is not an object');
  }

  const primary = parseMediaPath(entry.primary, 'primary');
  const secondary = parseMediaPath(entry.secondary, 'secondary');
  const bts = optionalMediaPath(entry.btsMedia, 'btsMedia');

  const media: MediaReference[] = [
    { role: 'front', path: secondary },
    { role: 'rear', path: primary },
  ];
  if (bts) {
    media.push({ role: 'bts', path: bts });
  }

  return {
    category: 'posts',
    id: referenceStem(primary),
    takenAt: parseTimestamp(entry.takenAt, 'takenAt'),
    location: parseLocation(entry.location),
    media,
    caption: optionalString(entry.caption),
    retakeCounter: toNumber(entry.retakeCounter) ?? 0,
  };
}

export function parseRealmojiEntry(entry: unknown): RealmojiRecord {
  if (!isObject(entry)) {
    throw new Error('entry is not an object');
  }

  const path = parseMediaPath(entry.media, 'media');

  return {
    category: 'realmojis',
    id: referenceStem(path),
    takenAt: parseTimestamp(entry.postedAt, 'postedAt'),
    location: null,
    media: [{ role: 'realmoji', path }],
    emoji: optionalString(entry.emoji) ?? '',
    isInstant: entry.isInstant === true,
  };
}

const ENTRY_PARSERS: Readonly<
  Record<Exclude<Category, 'conversations'>, (entry: unknown) => ExportRecord>
> = {
  memories: parseMemoryEntry,
  posts: parsePostEntry,
  realmojis: parseRealmojiEntry,
};

/**
 * Parse every entry of a manifest array, skipping malformed ones
 */
export function parseManifest(
  category: Exclude<Category, 'conversations'>,
  data: unknown,
  logger: Logger
): CategoryLoadResult {
  const source = MANIFEST_FILES[category];
  if (!Array.isArray(data)) {
    throw new ManifestParseError(source, 'expected a JSON array at the top level');
  }

  const parseEntry = ENTRY_PARSERS[category];
  const records: ExportRecord[] = [];
  let skipped = 0;

  data.forEach((entry: unknown, index: number) => {
    try {
      records.push(parseEntry(entry));
    } catch (error) {
      skipped++;
      logger.warn(new ManifestParseError(source, `entry ${index} skipped (${errorMessage(error)})`).message);
    }
  });

  return { records, skipped };
}

/**
 * Read a file, returning null when it does not exist
 */
async function tryReadFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function missingManifest(category: Category, mode: CategoryMode, path: string, logger: Logger): CategoryLoadResult {
  if (mode === 'required') {
    throw new ConfigurationError(`${category} were requested but ${path} does not exist`);
  }
  logger.verbose(`No ${category} found at ${path}, skipping`);
  return { records: [], skipped: 0 };
}

/**
 * A message from a conversation's chat_log.json
 */
export interface ChatMessage {
  readonly id: string;
  readonly createdAt: Date;
  readonly type: string | null;
  readonly text: string | null;
}

/**
 * Parse chat_log.json: either an array of messages or { "messages": [...] }
 */
export function parseChatLog(data: unknown, logger: Logger): Map<string, ChatMessage> {
  const list = isObject(data) ? data.messages : data;
  if (!Array.isArray(list)) {
    throw new ManifestParseError(CHAT_LOG_FILE, 'expected an array of messages');
  }

  const messages = new Map<string, ChatMessage>();
  list.forEach((entry: unknown, index: number) => {
    try {
      if (!isObject(entry)) {
        throw new Error('message is not an object');
      }
      const id = typeof entry.id === 'number' ? String(entry.id) : optionalString(entry.id);
      if (!id) {
        throw new Error('missing id');
      }
      messages.set(id, {
        id,
        createdAt: parseTimestamp(entry.createdAt, 'createdAt'),
        type: optionalString(entry.type),
        text: optionalString(entry.text),
      });
    } catch (error) {
      logger.warn(new ManifestParseError(CHAT_LOG_FILE, `message ${index} skipped (${errorMessage(error)})`).message);
    }
  });
  return messages;
}

async function loadChatLog(conversationDir: string, logger: Logger): Promise<Map<string, ChatMessage>> {
  const path = join(conversationDir, CHAT_LOG_FILE);
  const content = await tryReadFile(path);
  if (content === null) {
    return new Map();
  }

  try {
    return parseChatLog(JSON.parse(content), logger);
  } catch (error) {
    logger.warn(`${errorMessage(error)} in ${path}; using file times instead`);
    return new Map();
  }
}

/**
 * Build one record per media file in conversations/<id>/
 */
export async function loadConversations(
  berealPath: string,
  mode: CategoryMode,
  logger: Logger
): Promise<CategoryLoadResult> {
  const root = join(berealPath, CONVERSATIONS_DIR);

  let conversationDirs: string[];
  try {
    const entries = await readdir(root, { withFileTypes: true });
    conversationDirs = entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return missingManifest('conversations', mode, root, logger);
    }
    throw error;
  }

  const records: ConversationRecord[] = [];
  for (const conversationId of conversationDirs) {
    const dir = join(root, conversationId);
    const messages = await loadChatLog(dir, logger);
    const files = (await readdir(dir, { withFileTypes: true }))
      .filter((entry) => entry.isFile() && extname(entry.name).toLowerCase() !== '.json')
      .map((entry) => entry.name)
      .sort();

    for (const file of files) {
      const stem = referenceStem(file);
      const message = messages.get(stem);
      const relativePath = `${CONVERSATIONS_DIR}/${conversationId}/${file}`;
      const takenAt = message ? message.createdAt : (await stat(join(dir, file))).mtime;

      records.push({
        category: 'conversations',
        id: `${conversationId}/${stem}`,
        takenAt,
        location: null,
        media: [{ role: 'chat', path: relativePath }],
        conversationId,
        messageType: message?.type ?? null,
        text: message?.text ?? null,
        timestampSource: message ? 'chat-log' : 'mtime',
      });
    }
  }

  return { records, skipped: 0 };
}

/**
 * Load the records of one category from the export root
 */
export async function loadCategory(
  berealPath: string,
  category: Category,
  mode: CategoryMode,
  logger: Logger
): Promise<CategoryLoadResult> {
  if (mode === 'off') {
    return { records: [], skipped: 0 };
  }
  if (category === 'conversations') {
    return loadConversations(berealPath, mode, logger);
  }

  const path = join(berealPath, MANIFEST_FILES[category]);
  const content = await tryReadFile(path);
  if (content === null) {
    return missingManifest(category, mode, path, logger);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    logger.error(new ManifestParseError(MANIFEST_FILES[category], 'invalid JSON').message);
    return { records: [], skipped: 0 };
  }

  try {
    return parseManifest(category, data, logger);
  } catch (error) {
    if (error instanceof ManifestParseError) {
      logger.error(error.message);
      return { records: [], skipped: 0 };
    }
    throw error;
  }
}
