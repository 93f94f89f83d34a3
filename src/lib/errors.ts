/**
 * Error types for the scribble editor.
 *
 * Every failure the editor knows how to describe is one of these, so the
 * API layer can map them to a status code and the UI can show the message
 * as-is.
 */

/**
 * Base class for all scribble editor errors.
 */
export class ScribbleEditorError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScribbleEditorError';
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the image directory holds no supported image files.
 * Fatal at startup: the editor has nothing to show.
 */
export class EmptyCollectionError extends ScribbleEditorError {
  constructor(public readonly directory: string) {
    super(`No images found in '${directory}'`);
    this.name = 'EmptyCollectionError';
  }
}

export class NotFoundError extends ScribbleEditorError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`File not found: ${path}`, options);
    this.name = 'NotFoundError';
  }
}

/**
 * Thrown when a file exists but cannot be decoded as an image.
 */
export class DecodeError extends ScribbleEditorError {
  constructor(public readonly source: string, options?: { cause?: unknown }) {
    super(`Could not decode image: ${source}`, options);
    this.name = 'DecodeError';
  }
}

export class DimensionMismatchError extends ScribbleEditorError {
  constructor(
    public readonly expected: { width: number; height: number },
    public readonly actual: { width: number; height: number },
  ) {
    super(
      `Size mismatch: expected ${expected.width}x${expected.height}, got ${actual.width}x${actual.height}`,
    );
    this.name = 'DimensionMismatchError';
  }
}

/**
 * Thrown for invalid command line options.
 */
export class ConfigError extends ScribbleEditorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
