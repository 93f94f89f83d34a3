/**
 * Render Cache - Caches per-layer canvases
 *
 * Each stroke layer is uploaded to a canvas once and reused by every redraw
 * of the paint surface.
 */

import type { Layer, RgbaImage } from './types';

const layerRenderCache = new Map<string, HTMLCanvasElement>();

export function rgbaImageToCanvas(image: RgbaImage): HTMLCanvasElement {
  const canvas = document.createElement('canvas');
  canvas.width = image.width;
  canvas.height = image.height;

  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new Error('Failed to get canvas context');
  }

  const imageData = ctx.createImageData(image.width, image.height);
  imageData.data.set(image.data);
  ctx.putImageData(imageData, 0, 0);

  return canvas;
}

export function canvasToRgbaImage(canvas: HTMLCanvasElement): RgbaImage {
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new Error('Failed to get canvas context');
  }

  const imageData = ctx.getImageData(0, 0, canvas.width, canvas.height);
  return {
    width: imageData.width,
    height: imageData.height,
    channels: 4,
    data: new Uint8ClampedArray(imageData.data),
  };
}

export function getCachedLayerCanvas(layer: Layer): HTMLCanvasElement {
  const cached = layerRenderCache.get(layer.id);
  if (cached) {
    return cached;
  }

  const canvas = rgbaImageToCanvas(layer.image);
  layerRenderCache.set(layer.id, canvas);
  return canvas;
}

export function cleanupLayerCache(activeLayerIds: Set<string>): void {
  for (const id of layerRenderCache.keys()) {
    if (!activeLayerIds.has(id)) {
      layerRenderCache.delete(id);
    }
  }
}

/**
 * Encode a layer as a PNG data URL for upload
 */
export function layerToPngDataUrl(layer: Layer): string {
  return getCachedLayerCanvas(layer).toDataURL('image/png');
}
