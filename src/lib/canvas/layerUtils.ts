import { v4 as uuidv4 } from 'uuid';
import type { Layer, RGB, RgbaImage } from './types';

/**
 * Create new layer from a painted stroke
 */
export function createLayer(image: RgbaImage, name: string): Layer {
  return {
    id: uuidv4(),
    name,
    image,
    createdAt: Date.now(),
  };
}

/**
 * Name for the next stroke in a session, 1-based
 */
export function strokeName(existing: readonly Layer[]): string {
  return `Stroke ${existing.length + 1}`;
}

/**
 * Snap an anti-aliased stroke to the brush palette: pixels at least half
 * covered get the exact brush color at full opacity, the rest are cleared.
 * Keeps stroke edges from turning into marks when flattened.
 */
export function hardenStroke(image: RgbaImage, color: RGB): RgbaImage {
  const data = new Uint8ClampedArray(image.data.length);

  for (let i = 0; i < data.length; i += 4) {
    if (image.data[i + 3] >= 128) {
      data[i] = color.r;
      data[i + 1] = color.g;
      data[i + 2] = color.b;
      data[i + 3] = 255;
    }
  }

  return { width: image.width, height: image.height, channels: 4, data };
}
