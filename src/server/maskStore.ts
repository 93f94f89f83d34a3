import path from 'node:path';
import { mkdir, readdir, writeFile } from 'node:fs/promises';
import type { RgbImage } from '../lib/canvas/types';
import { MASK_EXTENSION } from '../lib/canvas/constants';
import { toRgb } from '../lib/canvas/imageUtils';
import { decodeImage, encodePng } from './imageCodec';
import { fileExists, isMissingFileError, readFileOrNotFound } from './fsUtils';

/**
 * MaskStore - scribble masks kept next to the image collection
 *
 * One PNG per image, named after the image's base filename:
 * `photo.jpg` -> `<directory>/photo.png`.
 */
export class MaskStore {
  constructor(readonly directory: string) {}

  pathFor(imageName: string): string {
    const { name } = path.parse(imageName);
    return path.join(this.directory, `${name}${MASK_EXTENSION}`);
  }

  async ensureDirectory(): Promise<void> {
    await mkdir(this.directory, { recursive: true });
  }

  exists(imageName: string): Promise<boolean> {
    return fileExists(this.pathFor(imageName));
  }

  /**
   * Load the mask for an image, or null when none has been saved yet
   */
  async load(imageName: string): Promise<RgbImage | null> {
    const maskPath = this.pathFor(imageName);
    if (!(await fileExists(maskPath))) {
      return null;
    }
    const bytes = await readFileOrNotFound(maskPath);
    return toRgb(await decodeImage(bytes, maskPath));
  }

  /**
   * Write (or overwrite) the mask for an image. Returns the written path.
   */
  async save(imageName: string, mask: RgbImage): Promise<string> {
    const maskPath = this.pathFor(imageName);
    await this.ensureDirectory();
    await writeFile(maskPath, await encodePng(mask));
    return maskPath;
  }

  /**
   * Number of mask files currently on disk
   */
  async count(): Promise<number> {
    try {
      const entries = await readdir(this.directory);
      return entries.filter((entry) => entry.toLowerCase().endsWith(MASK_EXTENSION)).length;
    } catch (error) {
      if (isMissingFileError(error)) return 0;
      throw error;
    }
  }
}
