/**
 * Compositor module for merging the two camera images of a BeReal
 *
 * The rear image fills the frame and the front image is drawn as a
 * bordered inset in the top-left corner, as the app shows it.
 */

import { createJimp } from '@jimp/core';
import webp from '@jimp/wasm-webp';
import { defaultFormats, defaultPlugins } from 'jimp';
import { readFile, writeFile } from 'node:fs/promises';

/**
 * Jimp with WebP decoding/encoding, since exports store images as .webp
 */
export const Jimp = createJimp({
  formats: [...defaultFormats, webp],
  plugins: defaultPlugins,
});

export type JimpImage = InstanceType<typeof Jimp>;

/**
 * Inset width as a fraction of the rear image width
 */
export const INSET_SCALE = 0.3;

/**
 * Inset width / height (portrait 3:4)
 */
export const INSET_ASPECT = 3 / 4;

/**
 * Distance of the inset from the top and left edges, as a fraction of the rear width
 */
export const INSET_MARGIN = 0.04;

export const BORDER_RATIO = 0.006;
export const MIN_BORDER_PX = 2;
export const BORDER_COLOR = 0x000000ff;

/**
 * Error thrown when compositing fails
 */
export class CompositeError extends Error {
  constructor(
    public readonly outputPath: string,
    message: string
  ) {
    super(`Failed to composite ${outputPath}: ${message}`);
    this.name = 'CompositeError';
  }
}

/**
 * Position and size of the inset for a given rear image size
 */
export interface InsetLayout {
  readonly x: number;
  readonly y: number;
  readonly width: number; // inner width, without border
  readonly height: number;
  readonly border: number;
}

export function insetLayout(rearWidth: number, rearHeight: number): InsetLayout {
  const border = Math.max(MIN_BORDER_PX, Math.round(rearWidth * BORDER_RATIO));
  const margin = Math.round(rearWidth * INSET_MARGIN);

  let width = Math.round(rearWidth * INSET_SCALE);
  let height = Math.round(width / INSET_ASPECT);

  // Very wide rear images: shrink the inset to fit vertically
  const maxHeight = rearHeight - 2 * margin - 2 * border;
  if (height > maxHeight) {
    height = Math.max(1, maxHeight);
    width = Math.max(1, Math.round(height * INSET_ASPECT));
  }

  return { x: margin, y: margin, width, height, border };
}

/**
 * Centre-crop an image to the given width/height ratio
 */
export function cropToAspect(image: JimpImage, aspect: number): JimpImage {
  const { width, height } = image;
  if (width / height > aspect) {
    const w = Math.max(1, Math.round(height * aspect));
    image.crop({ x: Math.round((width - w) / 2), y: 0, w, h: height });
  } else if (width / height < aspect) {
    const h = Math.max(1, Math.round(width / aspect));
    image.crop({ x: 0, y: Math.round((height - h) / 2), w: width, h });
  }
  return image;
}

/**
 * Draw the front image as an inset over the rear image.
 * The result has the rear image's dimensions; inputs are not modified.
 */
export function compose(front: JimpImage, rear: JimpImage): JimpImage {
  const layout = insetLayout(rear.width, rear.height);

  const inset = cropToAspect(front.clone(), INSET_ASPECT);
  inset.resize({ w: layout.width, h: layout.height });

  const frame = new Jimp({
    width: layout.width + 2 * layout.border,
    height: layout.height + 2 * layout.border,
    color: BORDER_COLOR,
  });
  frame.composite(inset, layout.border, layout.border);

  const result = rear.clone();
  result.composite(frame, layout.x, layout.y);
  return result;
}

/**
 * Read both camera images, composite them and write a WebP file
 */
export async function compositeFiles(
  frontPath: string,
  rearPath: string,
  outputPath: string
): Promise<void> {
  try {
    const [front, rear] = await Promise.all([
      readFile(frontPath).then((data) => Jimp.read(data)),
      readFile(rearPath).then((data) => Jimp.read(data)),
    ]);

    if (!rear.width || !rear.height) {
      throw new CompositeError(outputPath, 'Could not determine rear image dimensions');
    }

    const composited = compose(front, rear);
    await writeFile(outputPath, await composited.getBuffer('image/webp'));
  } catch (error) {
    if (error instanceof CompositeError) {
      throw error;
    }
    throw new CompositeError(
      outputPath,
      error instanceof Error ? error.message : 'Unknown error during compositing'
    );
  }
}
