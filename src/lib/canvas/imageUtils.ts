import type { PixelBuffer, RGB, RGBA, RgbImage, RgbaImage } from './types';
import { DimensionMismatchError } from '../errors';

/**
 * Get RGBA color at pixel. 3-channel buffers report full opacity.
 */
export function getPixelColor(image: PixelBuffer, x: number, y: number): RGBA {
  const index = (y * image.width + x) * image.channels;
  return {
    r: image.data[index],
    g: image.data[index + 1],
    b: image.data[index + 2],
    a: image.channels === 4 ? image.data[index + 3] : 255,
  };
}

/**
 * Set color at pixel. Alpha is ignored on 3-channel buffers.
 */
export function setPixelColor(image: PixelBuffer, x: number, y: number, color: RGB | RGBA): void {
  const index = (y * image.width + x) * image.channels;
  image.data[index] = color.r;
  image.data[index + 1] = color.g;
  image.data[index + 2] = color.b;
  if (image.channels === 4) {
    image.data[index + 3] = 'a' in color ? color.a : 255;
  }
}

export function colorsEqual(c1: RGB, c2: RGB): boolean {
  return c1.r === c2.r && c1.g === c2.g && c1.b === c2.b;
}

/**
 * Parse a #RRGGBB brush color
 */
export function parseHexColor(hex: string): RGB {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!match) {
    throw new Error(`Invalid color: ${hex}`);
  }
  return {
    r: parseInt(match[1], 16),
    g: parseInt(match[2], 16),
    b: parseInt(match[3], 16),
  };
}

/**
 * Create RGB image filled with a single color (black by default)
 */
export function createRgbImage(width: number, height: number, fill?: RGB): RgbImage {
  const data = new Uint8ClampedArray(width * height * 3);
  if (fill) {
    for (let i = 0; i < data.length; i += 3) {
      data[i] = fill.r;
      data[i + 1] = fill.g;
      data[i + 2] = fill.b;
    }
  }
  return { width, height, channels: 3, data };
}

/**
 * Create fully transparent RGBA image
 */
export function createRgbaImage(width: number, height: number): RgbaImage {
  return { width, height, channels: 4, data: new Uint8ClampedArray(width * height * 4) };
}

/**
 * Drop the alpha channel. Color values are kept as stored, the same way a
 * decoder's "convert to RGB" does.
 */
export function toRgb(image: RgbaImage): RgbImage {
  const pixelCount = image.width * image.height;
  const data = new Uint8ClampedArray(pixelCount * 3);
  for (let i = 0; i < pixelCount; i++) {
    data[i * 3] = image.data[i * 4];
    data[i * 3 + 1] = image.data[i * 4 + 1];
    data[i * 3 + 2] = image.data[i * 4 + 2];
  }
  return { width: image.width, height: image.height, channels: 3, data };
}

/**
 * Add an opaque alpha channel
 */
export function toRgba(image: RgbImage): RgbaImage {
  const pixelCount = image.width * image.height;
  const data = new Uint8ClampedArray(pixelCount * 4);
  for (let i = 0; i < pixelCount; i++) {
    data[i * 4] = image.data[i * 3];
    data[i * 4 + 1] = image.data[i * 3 + 1];
    data[i * 4 + 2] = image.data[i * 3 + 2];
    data[i * 4 + 3] = 255;
  }
  return { width: image.width, height: image.height, channels: 4, data };
}

/**
 * Throw unless the buffer has the expected dimensions and a data array of
 * matching length.
 */
export function assertDimensions(
  image: PixelBuffer,
  expectedWidth: number,
  expectedHeight: number,
): void {
  if (
    image.width !== expectedWidth ||
    image.height !== expectedHeight ||
    image.data.length !== image.width * image.height * image.channels
  ) {
    throw new DimensionMismatchError(
      { width: expectedWidth, height: expectedHeight },
      { width: image.width, height: image.height },
    );
  }
}
