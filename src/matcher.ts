/**
 * Locates the files a manifest entry refers to inside the export folder
 */

import { access } from 'node:fs/promises';
import { basename, extname, join, normalize, sep } from 'node:path';
import {
  FileMatchError,
  type MediaFile,
  type MediaKind,
  type MediaReference,
  type MediaRole,
} from './types.js';

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  'jpg',
  'jpeg',
  'png',
  'webp',
  'heic',
  'heif',
  'tif',
  'tiff',
]);

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  'mp4',
  'mov',
  'm4v',
  'avi',
  'mkv',
  'webm',
  'hevc',
]);

/**
 * Photos/ sub-folder holding each role's files
 */
const ROLE_FOLDERS: Readonly<Record<MediaRole, string | null>> = {
  front: 'post',
  rear: 'post',
  bts: 'bts',
  realmoji: 'realmoji',
  chat: null,
};

/**
 * Detect image/video from a file extension
 */
export function detectKind(extension: string): MediaKind | null {
  const ext = extension.replace(/^\./, '').toLowerCase();
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  if (VIDEO_EXTENSIONS.has(ext)) return 'video';
  return null;
}

/**
 * Turn a manifest path or URL into a path relative to the export root
 */
export function toRelativePath(reference: string): string {
  let path = reference.trim();
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(path)) {
    try {
      path = decodeURIComponent(new URL(path).pathname);
    } catch {
      throw new FileMatchError(reference, 'Invalid media URL');
    }
  }
  return path.replace(/^[/\\]+/, '');
}

/**
 * Relative paths to try, in order, for a reference.
 * Manifests write /Photos/<userId>/post/x.webp while archives often
 * unpack as Photos/post/x.webp.
 */
export function candidatePaths(reference: MediaReference): string[] {
  const relative = toRelativePath(reference.path);
  const parts = relative.split('/').filter((part) => part !== '');
  const candidates = [parts.join('/')];

  if (parts.length > 3 && parts[0] === 'Photos') {
    candidates.push([parts[0], ...parts.slice(2)].join('/'));
  }

  const folder = ROLE_FOLDERS[reference.role];
  const name = parts[parts.length - 1];
  if (folder && name) {
    candidates.push(`Photos/${folder}/${name}`);
  }

  return [...new Set(candidates)];
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find a referenced file on disk and classify it
 */
export async function matchFile(berealPath: string, reference: MediaReference): Promise<MediaFile> {
  const root = normalize(berealPath);

  for (const candidate of candidatePaths(reference)) {
    const sourcePath = normalize(join(root, candidate));
    // keep lookups inside the export folder
    if (sourcePath !== root && !sourcePath.startsWith(root.endsWith(sep) ? root : root + sep)) {
      continue;
    }
    if (!(await exists(sourcePath))) {
      continue;
    }

    const extension = extname(sourcePath).replace(/^\./, '').toLowerCase();
    const kind = detectKind(extension);
    if (!kind) {
      throw new FileMatchError(sourcePath, `Unsupported file type .${extension}`);
    }
    return { role: reference.role, sourcePath, kind, extension };
  }

  throw new FileMatchError(reference.path, `Missing ${reference.role} file`);
}

/**
 * Result of matching every reference of a record
 */
export interface MatchResult {
  readonly files: MediaFile[];
  readonly missing: FileMatchError[];
}

/**
 * Match all references of a record; a missing file never hides the others
 */
export async function matchRecordFiles(
  berealPath: string,
  references: readonly MediaReference[]
): Promise<MatchResult> {
  const files: MediaFile[] = [];
  const missing: FileMatchError[] = [];

  for (const reference of references) {
    try {
      files.push(await matchFile(berealPath, reference));
    } catch (error) {
      if (error instanceof FileMatchError) {
        missing.push(error);
      } else {
        throw error;
      }
    }
  }

  return { files, missing };
}

/**
 * Stem of a matched file, used in conversation output names
 */
export function fileStem(file: MediaFile): string {
  const name = basename(file.sourcePath);
  return name.slice(0, name.length - file.extension.length - 1);
}
