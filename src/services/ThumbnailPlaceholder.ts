/**
 * @fileoverview Generated stand-in thumbnails.
 *
 * Draws diagonal bands in three slate tones with an outlined rectangle over
 * the middle half, at the exact requested size, and encodes it as PNG with
 * sharp. Encoded images are memoized per size.
 */

import sharp from 'sharp';
import { THUMBNAIL_DIMENSIONS, type ThumbnailSize } from '../types/backend-client';

type Rgb = readonly [number, number, number];

const BACKGROUND: Rgb = [32, 36, 43];
const ACCENT: Rgb = [63, 74, 88];
const HIGHLIGHT: Rgb = [90, 104, 122];
const BAND_COLORS: readonly Rgb[] = [BACKGROUND, ACCENT, HIGHLIGHT];
const BAND_SIZE = 16;
const CHANNELS = 3;

const encoded = new Map<string, Promise<Buffer>>();

/**
 * Raw RGB pixels of the placeholder pattern.
 */
export function renderPlaceholderPixels(width: number, height: number): Buffer {
  const pixels = Buffer.alloc(width * height * CHANNELS);
  const paint = (x: number, y: number, color: Rgb): void => {
    const offset = (y * width + x) * CHANNELS;
    pixels[offset] = color[0];
    pixels[offset + 1] = color[1];
    pixels[offset + 2] = color[2];
  };

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const band = (Math.floor(x / BAND_SIZE) + Math.floor(y / BAND_SIZE)) % BAND_COLORS.length;
      paint(x, y, BAND_COLORS[band]);
    }
  }

  const left = Math.floor(width / 4);
  const right = Math.floor((width * 3) / 4);
  const top = Math.floor(height / 4);
  const bottom = Math.floor((height * 3) / 4);
  for (let x = left; x < right; x++) {
    paint(x, top, HIGHLIGHT);
    paint(x, bottom, HIGHLIGHT);
  }
  for (let y = top; y < bottom; y++) {
    paint(left, y, HIGHLIGHT);
    paint(right, y, HIGHLIGHT);
  }
  return pixels;
}

export function generatePlaceholder(width: number, height: number): Promise<Buffer> {
  const key = `${width}x${height}`;
  let pending = encoded.get(key);
  if (!pending) {
    pending = sharp(renderPlaceholderPixels(width, height), { raw: { width, height, channels: CHANNELS } })
      .png()
      .toBuffer();
    encoded.set(key, pending);
    // A failed encode must not stay memoized
    void pending.catch(() => encoded.delete(key));
  }
  return pending;
}

export function placeholderForSize(size: ThumbnailSize): Promise<Buffer> {
  const { width, height } = THUMBNAIL_DIMENSIONS[size];
  return generatePlaceholder(width, height);
}
