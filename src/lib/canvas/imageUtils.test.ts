import { describe, it, expect } from 'vitest';
import {
  assertDimensions,
  createRgbImage,
  getPixelColor,
  parseHexColor,
  toRgb,
  toRgba,
} from './imageUtils';
import { DimensionMismatchError } from '../errors';
import type { RgbImage } from './types';

describe('parseHexColor', () => {
  it('parses both brush colors', () => {
    expect(parseHexColor('#000000')).toEqual({ r: 0, g: 0, b: 0 });
    expect(parseHexColor('#CCCCCC')).toEqual({ r: 204, g: 204, b: 204 });
    expect(parseHexColor('#ccccCC')).toEqual({ r: 204, g: 204, b: 204 });
  });

  it('rejects anything else', () => {
    expect(() => parseHexColor('ccc')).toThrow('Invalid color: ccc');
    expect(() => parseHexColor('#12345g')).toThrow();
  });
});

describe('toRgb / toRgba', () => {
  it('drops alpha without touching color values', () => {
    const rgb = toRgb({
      width: 2,
      height: 1,
      channels: 4,
      data: new Uint8ClampedArray([50, 60, 70, 10, 1, 2, 3, 255]),
    });
    expect(rgb.channels).toBe(3);
    expect(Array.from(rgb.data)).toEqual([50, 60, 70, 1, 2, 3]);
  });

  it('adds an opaque alpha channel', () => {
    const rgba = toRgba(createRgbImage(1, 1, { r: 9, g: 8, b: 7 }));
    expect(getPixelColor(rgba, 0, 0)).toEqual({ r: 9, g: 8, b: 7, a: 255 });
  });
});

describe('assertDimensions', () => {
  it('accepts a matching buffer', () => {
    expect(() => assertDimensions(createRgbImage(3, 2), 3, 2)).not.toThrow();
  });

  it('names both sizes on a mismatch', () => {
    expect(() => assertDimensions(createRgbImage(3, 2), 4, 4)).toThrow(
      new DimensionMismatchError({ width: 4, height: 4 }, { width: 3, height: 2 })
    );
  });

  it('rejects a data array of the wrong length', () => {
    const broken: RgbImage = { width: 2, height: 2, channels: 3, data: new Uint8ClampedArray(6) };
    expect(() => assertDimensions(broken, 2, 2)).toThrow(DimensionMismatchError);
  });
});
