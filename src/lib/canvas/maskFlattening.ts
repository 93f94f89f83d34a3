import type { FlattenResult, Layer, RgbImage } from './types';
import { MASK_BACKGROUND, MASK_IGNORED, MASK_MARKED } from './constants';
import { compositeLayers, flattenOnto } from './compositeLayers';
import { assertDimensions, colorsEqual } from './imageUtils';

/**
 * Mask Flattening - turns the painted layers of one image into a scribble mask
 *
 * Layers are composited in order, laid over the mid-gray canvas background,
 * and every pixel that is neither background gray nor pure black becomes
 * pure white. Black strokes are left black. The rule assumes the fixed
 * two-color brush palette in BRUSH_COLORS.
 */
export function flattenLayers(layers: Layer[], width: number, height: number): FlattenResult {
  if (layers.length === 0) {
    return { kind: 'empty' };
  }

  for (const layer of layers) {
    assertDimensions(layer.image, width, height);
  }

  const composite = compositeLayers(layers, width, height);
  const flat = flattenOnto(composite, MASK_BACKGROUND);

  return { kind: 'mask', mask: classifyMaskPixels(flat) };
}

/**
 * Normalize marked pixels to white. Returns a new image; applying it to its
 * own output changes nothing.
 */
export function classifyMaskPixels(image: RgbImage): RgbImage {
  const data = new Uint8ClampedArray(image.data);

  for (let i = 0; i < data.length; i += 3) {
    const pixel = { r: data[i], g: data[i + 1], b: data[i + 2] };

    if (!colorsEqual(pixel, MASK_BACKGROUND) && !colorsEqual(pixel, MASK_IGNORED)) {
      data[i] = MASK_MARKED.r;
      data[i + 1] = MASK_MARKED.g;
      data[i + 2] = MASK_MARKED.b;
    }
  }

  return { width: image.width, height: image.height, channels: 3, data };
}
