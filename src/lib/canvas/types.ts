// Core types for the scribble editor

export interface Point {
  x: number;
  y: number;
}

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export interface RGBA extends RGB {
  a: number;
}

export type ChannelCount = 3 | 4;

/**
 * Row-major pixel buffer. Shaped like ImageData so the same functions run
 * in Node and in the browser, but with an explicit channel count.
 */
export interface PixelBuffer<C extends ChannelCount = ChannelCount> {
  width: number;
  height: number;
  channels: C;
  data: Uint8ClampedArray;
}

/** 3-channel color image: source images, masks and overlays */
export type RgbImage = PixelBuffer<3>;

/** 4-channel image with straight (non-premultiplied) alpha: paint layers */
export type RgbaImage = PixelBuffer<4>;

/**
 * A single in-session paint stroke. Layers are transient: they live until
 * they are flattened into a mask or the user moves to another image.
 */
export interface Layer {
  id: string;
  name: string;
  image: RgbaImage;
  createdAt: number;
}

export type FlattenResult =
  | { kind: 'mask'; mask: RgbImage }
  | { kind: 'empty' };

export interface BrushState {
  color: string;
  size: number;
}
