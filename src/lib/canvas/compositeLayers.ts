import type { Layer, RGB, RgbImage, RgbaImage } from './types';
import { assertDimensions, createRgbaImage } from './imageUtils';

/**
 * Draw `src` over `dst` in place using straight-alpha "over" compositing
 */
export function alphaOver(dst: RgbaImage, src: RgbaImage): void {
  assertDimensions(src, dst.width, dst.height);

  const d = dst.data;
  const s = src.data;

  for (let i = 0; i < d.length; i += 4) {
    const srcAlpha = s[i + 3] / 255;
    if (srcAlpha === 0) continue;

    const dstAlpha = d[i + 3] / 255;
    const outAlpha = srcAlpha + dstAlpha * (1 - srcAlpha);
    const dstWeight = dstAlpha * (1 - srcAlpha);

    for (let c = 0; c < 3; c++) {
      d[i + c] = Math.round((s[i + c] * srcAlpha + d[i + c] * dstWeight) / outAlpha);
    }
    d[i + 3] = Math.round(outAlpha * 255);
  }
}

/**
 * Composite layers into a single RGBA image
 *
 * Process: bottom to top onto a fully transparent canvas
 */
export function compositeLayers(layers: Layer[], width: number, height: number): RgbaImage {
  const canvas = createRgbaImage(width, height);

  for (const layer of layers) {
    alphaOver(canvas, layer.image);
  }

  return canvas;
}

/**
 * Composite an RGBA image over an opaque background color, producing a
 * flat 3-channel image
 */
export function flattenOnto(image: RgbaImage, background: RGB): RgbImage {
  const pixelCount = image.width * image.height;
  const data = new Uint8ClampedArray(pixelCount * 3);
  const bg = [background.r, background.g, background.b];

  for (let p = 0; p < pixelCount; p++) {
    const alpha = image.data[p * 4 + 3] / 255;
    for (let c = 0; c < 3; c++) {
      data[p * 3 + c] = Math.round(image.data[p * 4 + c] * alpha + bg[c] * (1 - alpha));
    }
  }

  return { width: image.width, height: image.height, channels: 3, data };
}
