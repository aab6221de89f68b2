/**
 * Metadata module for embedding date and GPS tags into exported media
 */

import { ExifTool, type WriteTags } from 'exiftool-vendored';
import type { DateTime } from 'luxon';
import { EmbedError, type GpsCoordinates, type MediaKind } from './types.js';

/**
 * Tags written to an exported file
 */
export interface EmbedTags {
  DateTimeOriginal?: string;
  OffsetTimeOriginal?: string;
  CreationDate?: string;
  CreateDate?: string;
  ModifyDate?: string;
  GPSLatitude?: number;
  GPSLongitude?: number;
  GPSLatitudeRef?: string;
  GPSLongitudeRef?: string;
  ImageDescription?: string;
}

/**
 * Writes tags into files. The exiftool implementation is used for real
 * runs; tests substitute one that records calls.
 */
export interface MetadataWriter {
  write(filePath: string, tags: EmbedTags): Promise<void>;
  close(): Promise<void>;
}

/**
 * Containers exiftool can write tags into
 */
const WRITABLE_EXTENSIONS: ReadonlySet<string> = new Set([
  'jpg',
  'jpeg',
  'png',
  'webp',
  'heic',
  'heif',
  'tif',
  'tiff',
  'mp4',
  'mov',
  'm4v',
]);

export function canEmbed(extension: string): boolean {
  return WRITABLE_EXTENSIONS.has(extension.toLowerCase());
}

/**
 * Format local time for EXIF: "YYYY:MM:DD HH:MM:SS"
 */
export function formatExifDate(local: DateTime): string {
  return local.toFormat('yyyy:MM:dd HH:mm:ss');
}

/**
 * UTC offset of a local time: "+02:00"
 */
export function formatOffset(local: DateTime): string {
  return local.toFormat('ZZ');
}

export interface EmbedInput {
  readonly kind: MediaKind;
  readonly local: DateTime;
  readonly location: GpsCoordinates | null;
  readonly description?: string | null;
}

/**
 * Build the tag set for an image or video container
 */
export function buildTags(input: EmbedInput): EmbedTags {
  const exifDate = formatExifDate(input.local);
  const tags: EmbedTags = {};

  if (input.kind === 'image') {
    tags.DateTimeOriginal = exifDate;
    tags.OffsetTimeOriginal = formatOffset(input.local);
    tags.CreateDate = exifDate;
    tags.ModifyDate = exifDate;
    if (input.description) {
      tags.ImageDescription = input.description;
    }
  } else {
    tags.CreationDate = `${exifDate}${formatOffset(input.local)}`;
    tags.CreateDate = exifDate;
    tags.ModifyDate = exifDate;
  }

  if (input.location) {
    tags.GPSLatitude = input.location.latitude;
    tags.GPSLongitude = input.location.longitude;
    tags.GPSLatitudeRef = input.location.latitude >= 0 ? 'N' : 'S';
    tags.GPSLongitudeRef = input.location.longitude >= 0 ? 'E' : 'W';
  }

  return tags;
}

/**
 * Embed metadata into an exported file
 */
export async function embedMetadata(
  writer: MetadataWriter,
  filePath: string,
  input: EmbedInput
): Promise<void> {
  const tags = buildTags(input);

  try {
    await writer.write(filePath, tags);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new EmbedError(filePath, message);
  }
}

/**
 * MetadataWriter backed by exiftool-vendored
 */
export class ExifToolWriter implements MetadataWriter {
  private readonly exiftool: ExifTool;

  constructor(options: { exiftoolPath?: string | null; maxProcs?: number } = {}) {
    this.exiftool = new ExifTool({
      maxProcs: options.maxProcs ?? 1,
      ...(options.exiftoolPath ? { exiftoolPath: options.exiftoolPath } : {}),
    });
  }

  async write(filePath: string, tags: EmbedTags): Promise<void> {
    const writeTags: WriteTags = { ...tags };
    await this.exiftool.write(filePath, writeTags, {
      writeArgs: ['-overwrite_original', '-P'],
    });
  }

  /**
   * Stop the exiftool processes (call once the run is over)
   */
  async close(): Promise<void> {
    await this.exiftool.end();
  }
}

/**
 * Format GPS coordinates for display
 */
export function formatGpsForDisplay(coords: GpsCoordinates): string {
  const latDir = coords.latitude >= 0 ? 'N' : 'S';
  const lonDir = coords.longitude >= 0 ? 'E' : 'W';
  return `${Math.abs(coords.latitude).toFixed(6)}°${latDir}, ${Math.abs(coords.longitude).toFixed(6)}°${lonDir}`;
}
