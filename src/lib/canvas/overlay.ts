import type { RgbImage } from './types';
import { DEFAULT_OVERLAY_ALPHA } from './constants';
import { assertDimensions } from './imageUtils';

/**
 * Blend the original image with its scribble mask for preview.
 *
 * `alpha` 0 keeps the original, 1 shows only the mask. Without a mask the
 * original is returned as-is.
 */
export function blendOverlay(
  image: RgbImage,
  mask: RgbImage | null,
  alpha: number = DEFAULT_OVERLAY_ALPHA
): RgbImage {
  if (alpha < 0 || alpha > 1 || Number.isNaN(alpha)) {
    throw new RangeError(`Overlay alpha must be within [0, 1], got ${alpha}`);
  }

  if (!mask) {
    return image;
  }

  assertDimensions(mask, image.width, image.height);

  const data = new Uint8ClampedArray(image.data.length);
  for (let i = 0; i < data.length; i++) {
    data[i] = Math.round(image.data[i] * (1 - alpha) + mask.data[i] * alpha);
  }

  return { width: image.width, height: image.height, channels: 3, data };
}
