import path from 'node:path';
import { readdir } from 'node:fs/promises';
import type { RgbImage } from '../lib/canvas/types';
import { SUPPORTED_IMAGE_EXTENSIONS } from '../lib/canvas/constants';
import { toRgb } from '../lib/canvas/imageUtils';
import { EmptyCollectionError } from '../lib/errors';
import { decodeImage } from './imageCodec';
import { isMissingFileError, readFileOrNotFound } from './fsUtils';

export function isSupportedImage(filename: string): boolean {
  const ext = path.extname(filename).toLowerCase();
  return SUPPORTED_IMAGE_EXTENSIONS.some((supported) => supported === ext);
}

/**
 * ImageStore - read-only access to the source images of a collection
 */
export class ImageStore {
  constructor(readonly directory: string) {}

  /**
   * Supported image filenames, sorted by name. Throws EmptyCollectionError
   * when there are none (or the directory does not exist).
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new EmptyCollectionError(this.directory);
      }
      throw error;
    }

    const images = entries.filter(isSupportedImage).sort();
    if (images.length === 0) {
      throw new EmptyCollectionError(this.directory);
    }
    return images;
  }

  /**
   * Read and decode one image as 3-channel color
   */
  async load(name: string): Promise<RgbImage> {
    const filePath = this.pathFor(name);
    const bytes = await readFileOrNotFound(filePath);
    return toRgb(await decodeImage(bytes, filePath));
  }

  pathFor(name: string): string {
    return path.join(this.directory, name);
  }
}
