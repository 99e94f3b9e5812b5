/**
 * Error hierarchy shared by every module.
 *
 * Callers branch on `instanceof` or on the stable `code`, never on message text.
 */

import type { Image } from './image.js';

export type RasterErrorCode =
  | 'INVALID_ARGUMENT'
  | 'INVALID_FORMAT'
  | 'DECODE_FAILED'
  | 'INDEX_OUT_OF_RANGE';

interface RasterErrorOptions {
  readonly metadata?: Record<string, unknown>;
  readonly cause?: unknown;
}

export class RasterError extends Error {
  override readonly name: string = 'RasterError';
  readonly code: RasterErrorCode;
  readonly metadata?: Record<string, unknown>;

  constructor(code: RasterErrorCode, message: string, options: RasterErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    this.metadata = options.metadata;
  }
}

/** Invalid caller input */
export class ArgumentError extends RasterError {
  override readonly name = 'ArgumentError';

  constructor(message: string, options: RasterErrorOptions = {}) {
    super('INVALID_ARGUMENT', message, options);
  }
}

interface FormatErrorOptions extends RasterErrorOptions {
  readonly partialImage?: Image;
}

/**
 * Malformed binary content, or bytes no registered format recognises.
 * Decoders that fail mid-stream attach what they had built so far.
 */
export class FormatError extends RasterError {
  override readonly name = 'FormatError';
  readonly partialImage?: Image;

  constructor(message: string, options: FormatErrorOptions = {}) {
    super('INVALID_FORMAT', message, options);
    this.partialImage = options.partialImage;
  }
}

/** The source could not be read at all */
export class DecodeError extends RasterError {
  override readonly name = 'DecodeError';

  constructor(message: string, options: RasterErrorOptions = {}) {
    super('DECODE_FAILED', message, options);
  }
}

export class IndexError extends RasterError {
  override readonly name = 'IndexError';

  constructor(message: string, options: RasterErrorOptions = {}) {
    super('INDEX_OUT_OF_RANGE', message, options);
  }
}

/**
 * Wrap an error thrown by a third-party codec, passing ours through untouched
 */
export function toFormatError(error: unknown, context: string): RasterError {
  if (error instanceof RasterError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FormatError(`${context}: ${message}`, { cause: error });
}
