import type { Image } from '../image.js';

/**
 * Limits a decoder enforces while reading
 */
export interface DecodeOptions {
  maxWidth: number;
  maxHeight: number;
}

export interface EncodeOptions {
  /** 1-100, lossy formats only */
  quality: number;
}

/**
 * Format-specific decoder.
 *
 * The registry reads `headerSize` bytes from the start of the input and asks each
 * decoder in turn whether it recognises them.
 */
export interface ImageDecoder {
  readonly headerSize: number;
  isSupportedFileFormat(header: Uint8Array): boolean;
  decode(data: Uint8Array, options: DecodeOptions): Image;
}

export interface ImageEncoder {
  encode(image: Image, options: EncodeOptions): Uint8Array;
}

/**
 * A format pairs a decoder with an encoder under a name
 */
export interface ImageFormat {
  readonly name: string;
  readonly mimeType: string;
  /** Lower-case, without the leading dot */
  readonly extensions: readonly string[];
  readonly decoder: ImageDecoder;
  readonly encoder: ImageEncoder;
}
