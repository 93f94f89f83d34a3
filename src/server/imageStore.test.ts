import path from 'node:path';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { ImageStore, isSupportedImage } from './imageStore';
import { DecodeError, EmptyCollectionError, NotFoundError } from '../lib/errors';
import { createRgbaImage, setPixelColor } from '../lib/canvas/imageUtils';
import { makeTempDir, removeTempDir, solidImage, withExifOrientation, writeJpeg, writePng } from './testHelpers';

describe('isSupportedImage', () => {
  it('accepts png, jpg, jpeg and bmp in any case', () => {
    expect(['a.png', 'b.JPG', 'c.jpeg', 'd.Bmp'].every(isSupportedImage)).toBe(true);
    expect(['notes.txt', 'e.gif', 'png', 'archive.png.zip'].some(isSupportedImage)).toBe(false);
  });
});

describe('ImageStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('lists supported images sorted by name', async () => {
    for (const name of ['c.png', 'a.png', 'b.JPG', 'notes.txt', 'e.jpeg', 'd.bmp']) {
      await writeFile(path.join(dir, name), '');
    }

    expect(await new ImageStore(dir).list()).toEqual(['a.png', 'b.JPG', 'c.png', 'd.bmp', 'e.jpeg']);
  });

  it('fails on a directory without images', async () => {
    await writeFile(path.join(dir, 'readme.txt'), 'hello');
    await expect(new ImageStore(dir).list()).rejects.toThrow(EmptyCollectionError);
  });

  it('fails on a missing directory', async () => {
    await expect(new ImageStore(path.join(dir, 'nope')).list()).rejects.toThrow(EmptyCollectionError);
  });

  it('loads a PNG as 3-channel color', async () => {
    const source = solidImage(3, 2, { r: 10, g: 120, b: 250 });
    await writePng(dir, 'a.png', source);

    const image = await new ImageStore(dir).load('a.png');

    expect(image.channels).toBe(3);
    expect(image.width).toBe(3);
    expect(image.height).toBe(2);
    expect(Array.from(image.data)).toEqual(Array.from(source.data));
  });

  it('drops the alpha channel of an RGBA PNG', async () => {
    const rgba = createRgbaImage(2, 1);
    setPixelColor(rgba, 0, 0, { r: 50, g: 60, b: 70, a: 255 });
    setPixelColor(rgba, 1, 0, { r: 1, g: 2, b: 3, a: 255 });
    await writePng(dir, 'rgba.png', rgba);

    const image = await new ImageStore(dir).load('rgba.png');

    expect(Array.from(image.data)).toEqual([50, 60, 70, 1, 2, 3]);
  });

  it('loads a JPEG at its size', async () => {
    await writeJpeg(dir, 'b.jpg', solidImage(5, 3, { r: 128, g: 128, b: 128 }));

    const image = await new ImageStore(dir).load('b.jpg');

    expect(image.width).toBe(5);
    expect(image.height).toBe(3);
  });

  it('keeps the stored pixel grid of a JPEG with an orientation tag', async () => {
    const filePath = await writeJpeg(dir, 'rotated.jpg', solidImage(3, 2, { r: 200, g: 200, b: 200 }));
    await writeFile(filePath, withExifOrientation(await readFile(filePath), 6));

    const image = await new ImageStore(dir).load('rotated.jpg');

    expect(image.width).toBe(3);
    expect(image.height).toBe(2);
  });

  it('reports a missing file', async () => {
    await expect(new ImageStore(dir).load('gone.png')).rejects.toThrow(NotFoundError);
  });

  it('reports a file that is not an image', async () => {
    await mkdir(dir, { recursive: true });
    await writeFile(path.join(dir, 'broken.png'), 'not a png');
    await expect(new ImageStore(dir).load('broken.png')).rejects.toThrow(DecodeError);
  });
});
