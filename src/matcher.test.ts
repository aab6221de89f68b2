/**
 * Tests for the matcher module
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  candidatePaths,
  detectKind,
  fileStem,
  matchFile,
  matchRecordFiles,
  toRelativePath,
} from './matcher.js';
import { FileMatchError } from './types.js';

describe('detectKind', () => {
  it('should classify images and videos by extension', () => {
    expect(detectKind('webp')).toBe('image');
    expect(detectKind('.JPG')).toBe('image');
    expect(detectKind('mp4')).toBe('video');
    expect(detectKind('MOV')).toBe('video');
  });

  it('should return null for other files', () => {
    expect(detectKind('txt')).toBeNull();
  });
});

describe('toRelativePath', () => {
  it('should strip the leading slash', () => {
    expect(toRelativePath('/Photos/user123/post/a.webp')).toBe('Photos/user123/post/a.webp');
  });

  it('should use the pathname of a URL', () => {
    expect(toRelativePath('https://storage.example.com/Photos/user123/post/a%20b.webp?x=1')).toBe(
      'Photos/user123/post/a b.webp'
    );
  });
});

describe('candidatePaths', () => {
  it('should try the path as given, without the user folder, then the role folder', () => {
    expect(candidatePaths({ role: 'front', path: '/Photos/user123/post/a.webp' })).toEqual([
      'Photos/user123/post/a.webp',
      'Photos/post/a.webp',
    ]);
  });

  it('should fall back to the role folder for bare file names', () => {
    expect(candidatePaths({ role: 'bts', path: 'clip.mp4' })).toEqual(['clip.mp4', 'Photos/bts/clip.mp4']);
  });

  it('should not add a role folder for chat media', () => {
    expect(candidatePaths({ role: 'chat', path: 'conversations/c1/m1.webp' })).toEqual([
      'conversations/c1/m1.webp',
    ]);
  });
});

describe('matchFile', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'matcher-test-'));
    await mkdir(join(testDir, 'Photos', 'post'), { recursive: true });
    await mkdir(join(testDir, 'Photos', 'bts'), { recursive: true });
    await writeFile(join(testDir, 'Photos', 'post', 'front1.webp'), 'image-data');
    await writeFile(join(testDir, 'Photos', 'post', 'notes.txt'), 'text');
    await writeFile(join(testDir, 'Photos', 'bts', 'bts1.MP4'), 'video-data');
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should find a file stored without the user folder', async () => {
    const file = await matchFile(testDir, { role: 'front', path: '/Photos/user123/post/front1.webp' });
    expect(file).toEqual({
      role: 'front',
      sourcePath: join(testDir, 'Photos', 'post', 'front1.webp'),
      kind: 'image',
      extension: 'webp',
    });
  });

  it('should lower-case the extension and detect videos', async () => {
    const file = await matchFile(testDir, { role: 'bts', path: '/Photos/user123/bts/bts1.MP4' });
    expect(file.kind).toBe('video');
    expect(file.extension).toBe('mp4');
    expect(fileStem(file)).toBe('bts1');
  });

  it('should reject unsupported file types', async () => {
    await expect(
      matchFile(testDir, { role: 'front', path: 'Photos/post/notes.txt' })
    ).rejects.toThrow('Unsupported file type .txt');
  });

  it('should reject missing files', async () => {
    await expect(
      matchFile(testDir, { role: 'rear', path: '/Photos/user123/post/back1.webp' })
    ).rejects.toBeInstanceOf(FileMatchError);
  });

  it('should not leave the export folder', async () => {
    await expect(matchFile(testDir, { role: 'chat', path: '../outside.webp' })).rejects.toThrow(
      'Missing chat file'
    );
  });

  it('should keep the files that exist when others are missing', async () => {
    const result = await matchRecordFiles(testDir, [
      { role: 'front', path: '/Photos/user123/post/front1.webp' },
      { role: 'rear', path: '/Photos/user123/post/back1.webp' },
      { role: 'bts', path: '/Photos/user123/bts/bts1.MP4' },
    ]);

    expect(result.files.map((file) => file.role)).toEqual(['front', 'bts']);
    expect(result.missing).toHaveLength(1);
    expect(result.missing[0].message).toBe('Missing rear file: /Photos/user123/post/back1.webp');
  });
});
