import type { Point } from './types';

export interface ElementRect {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Convert a pointer position (CSS pixels) to image pixel coordinates
 *
 * The paint surface is a canvas at the image's native size scaled by CSS,
 * so the mapping is a plain scale from the element's box to the image.
 */
export function screenToImage(
  clientX: number,
  clientY: number,
  rect: ElementRect,
  imageWidth: number,
  imageHeight: number
): Point {
  if (rect.width === 0 || rect.height === 0) {
    return { x: 0, y: 0 };
  }

  return {
    x: ((clientX - rect.left) * imageWidth) / rect.width,
    y: ((clientY - rect.top) * imageHeight) / rect.height,
  };
}
