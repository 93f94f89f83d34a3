import { readFile, stat } from 'node:fs/promises';
import { NotFoundError } from '../lib/errors';

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function isMissingFileError(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * Read a whole file, reporting a missing file as NotFoundError
 */
export async function readFileOrNotFound(filePath: string): Promise<Buffer> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new NotFoundError(filePath, { cause: error });
    }
    throw error;
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (isMissingFileError(error)) return false;
    throw error;
  }
}
