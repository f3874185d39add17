import { describe, it, expect } from '@jest/globals';
import sharp from 'sharp';
import { generatePlaceholder, placeholderForSize, renderPlaceholderPixels } from './ThumbnailPlaceholder';

function pixelAt(pixels: Buffer, width: number, x: number, y: number): number[] {
  const offset = (y * width + x) * 3;
  return [pixels[offset], pixels[offset + 1], pixels[offset + 2]];
}

describe('ThumbnailPlaceholder', () => {
  it('draws diagonal bands with an outlined centre', () => {
    const pixels = renderPlaceholderPixels(32, 32);

    expect(pixels.length).toBe(32 * 32 * 3);
    expect(pixelAt(pixels, 32, 0, 0)).toEqual([32, 36, 43]);
    expect(pixelAt(pixels, 32, 16, 0)).toEqual([63, 74, 88]);
    expect(pixelAt(pixels, 32, 16, 16)).toEqual([90, 104, 122]);
    expect(pixelAt(pixels, 32, 8, 12)).toEqual([90, 104, 122]);
  });

  it('encodes a PNG of the requested size', async () => {
    const png = await generatePlaceholder(40, 24);
    const metadata = await sharp(png).metadata();

    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(40);
    expect(metadata.height).toBe(24);
  });

  it('memoizes per size', () => {
    expect(generatePlaceholder(12, 12)).toBe(generatePlaceholder(12, 12));
  });

  it('uses the named thumbnail dimensions', async () => {
    const metadata = await sharp(await placeholderForSize('Large')).metadata();

    expect([metadata.width, metadata.height]).toEqual([800, 480]);
  });
});
