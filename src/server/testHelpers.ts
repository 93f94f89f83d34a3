import os from 'node:os';
import path from 'node:path';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { Jimp } from 'jimp';
import type { RGB, RgbImage, RgbaImage } from '../lib/canvas/types';
import { createRgbImage, createRgbaImage, setPixelColor, toRgba } from '../lib/canvas/imageUtils';
import { encodePng } from './imageCodec';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'scribble-editor-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function solidImage(width: number, height: number, color: RGB): RgbImage {
  return createRgbImage(width, height, color);
}

/**
 * Transparent stroke layer with the listed pixels painted opaque
 */
export function strokeImage(
  width: number,
  height: number,
  color: RGB,
  pixels: Array<[number, number]>
): RgbaImage {
  const image = createRgbaImage(width, height);
  for (const [x, y] of pixels) {
    setPixelColor(image, x, y, { ...color, a: 255 });
  }
  return image;
}

export async function writePng(dir: string, name: string, image: RgbImage | RgbaImage): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, name);
  await writeFile(filePath, await encodePng(image));
  return filePath;
}

export async function writeJpeg(dir: string, name: string, image: RgbImage): Promise<string> {
  await mkdir(dir, { recursive: true });
  const rgba = toRgba(image);
  const jpeg = await Jimp.fromBitmap({
    width: rgba.width,
    height: rgba.height,
    data: Buffer.from(rgba.data.buffer, rgba.data.byteOffset, rgba.data.byteLength),
  }).getBuffer('image/jpeg');
  const filePath = path.join(dir, name);
  await writeFile(filePath, jpeg);
  return filePath;
}

/**
 * Insert an EXIF block carrying only an orientation tag right after the
 * JPEG start-of-image marker
 */
export function withExifOrientation(jpeg: Buffer, orientation: number): Buffer {
  const exif = Buffer.from([
    // "Exif\0\0"
    0x45, 0x78, 0x69, 0x66, 0x00, 0x00,
    // big-endian TIFF header, IFD0 at offset 8
    0x4d, 0x4d, 0x00, 0x2a, 0x00, 0x00, 0x00, 0x08,
    // one entry: 0x0112 Orientation, SHORT, count 1
    0x00, 0x01,
    0x01, 0x12, 0x00, 0x03, 0x00, 0x00, 0x00, 0x01, 0x00, orientation, 0x00, 0x00,
    // no next IFD
    0x00, 0x00, 0x00, 0x00,
  ]);
  const header = Buffer.from([0xff, 0xe1, 0x00, exif.length + 2]);
  return Buffer.concat([jpeg.subarray(0, 2), header, exif, jpeg.subarray(2)]);
}
