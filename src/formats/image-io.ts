import { readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { Readable, type Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { getDefaultConfig, type RasterConfig } from '../config.js';
import { ArgumentError, DecodeError, FormatError, toFormatError } from '../errors.js';
import type { Image } from '../image.js';
import { createChildLogger } from '../logger.js';
import { FormatRegistry, getDefaultRegistry } from './format-registry.js';
import type { ImageFormat } from './types.js';

const log = createChildLogger({ module: 'image-io' });

export interface ImageIoOptions {
  registry?: FormatRegistry;
  config?: RasterConfig;
}

export interface EncodeImageOptions extends ImageIoOptions {
  /** Overrides the configured JPEG quality */
  quality?: number;
}

export type ImageSource = string | URL | Uint8Array | ArrayBuffer | Readable;

function toBytes(data: Uint8Array | ArrayBuffer): Uint8Array {
  return data instanceof Uint8Array ? data : new Uint8Array(data);
}

/**
 * Decode an in-memory image, detecting its format from the leading bytes
 */
export function decodeImage(data: Uint8Array | ArrayBuffer, options: ImageIoOptions = {}): Image {
  if (data === null || data === undefined) {
    throw new ArgumentError('Image data is required');
  }
  const bytes = toBytes(data);
  const registry = options.registry ?? getDefaultRegistry();
  const config = options.config ?? getDefaultConfig();

  const format = registry.detect(bytes.subarray(0, registry.headerSize));
  if (!format) {
    const names = registry.names();
    throw new FormatError(
      names.length === 0
        ? 'Image cannot be loaded: no image formats are registered'
        : `Image cannot be loaded. Available formats: ${names.join(', ')}`
    );
  }

  let image: Image;
  try {
    image = format.decoder.decode(bytes, { maxWidth: config.maxWidth, maxHeight: config.maxHeight });
  } catch (error) {
    throw toFormatError(error, `Failed to decode ${format.name}`);
  }
  image.currentFormat = format;
  log.debug({ format: format.name, width: image.width, height: image.height }, 'Decoded image');
  return image;
}

async function readStream(stream: Readable): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : new Uint8Array(chunk));
    }
  } catch (error) {
    throw new DecodeError('Failed to read image stream', { cause: error });
  }
  return Buffer.concat(chunks);
}

/**
 * Load an image from a file path, URL, buffer or readable stream
 */
export async function loadImage(source: ImageSource, options: ImageIoOptions = {}): Promise<Image> {
  if (source === null || source === undefined) {
    throw new ArgumentError('Image source is required');
  }

  let bytes: Uint8Array;
  if (typeof source === 'string' || source instanceof URL) {
    try {
      bytes = await readFile(source);
    } catch (error) {
      throw new DecodeError(`Failed to read image file ${String(source)}`, { cause: error });
    }
  } else if (source instanceof Uint8Array || source instanceof ArrayBuffer) {
    bytes = toBytes(source);
  } else {
    bytes = await readStream(source);
  }

  if (bytes.length === 0) {
    throw new DecodeError('Image source is empty');
  }
  return decodeImage(bytes, options);
}

function resolveFormat(
  image: Image,
  format: ImageFormat | string | undefined,
  registry: FormatRegistry
): ImageFormat {
  if (typeof format === 'string') {
    const found = registry.get(format) ?? registry.findByExtension(format);
    if (!found) {
      throw new ArgumentError(`Unknown image format: ${format}. Available formats: ${registry.names().join(', ')}`);
    }
    return found;
  }
  const resolved = format ?? image.currentFormat;
  if (!resolved) {
    throw new ArgumentError('No output format given and the image has no current format');
  }
  return resolved;
}

/**
 * Encode with an explicit format, or the format the image was decoded from
 */
export function encodeImage(
  image: Image,
  format?: ImageFormat | string,
  options: EncodeImageOptions = {}
): Uint8Array {
  const registry = options.registry ?? getDefaultRegistry();
  const config = options.config ?? getDefaultConfig();
  const target = resolveFormat(image, format, registry);
  const bytes = target.encoder.encode(image, { quality: options.quality ?? config.jpegQuality });
  log.debug({ format: target.name, bytes: bytes.length }, 'Encoded image');
  return bytes;
}

/**
 * Write an encoded image to a file or a writable stream. For file paths without
 * an explicit format the extension picks one before the image's own format.
 * A stream is ended once the image is written; its errors reject the promise.
 */
export async function saveImage(
  image: Image,
  destination: string | Writable,
  format?: ImageFormat | string,
  options: EncodeImageOptions = {}
): Promise<void> {
  const registry = options.registry ?? getDefaultRegistry();
  let target = format;
  if (target === undefined && typeof destination === 'string') {
    target = registry.findByExtension(extname(destination));
  }
  const bytes = encodeImage(image, target, options);

  if (typeof destination === 'string') {
    await writeFile(destination, bytes);
    return;
  }
  await pipeline(Readable.from([Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)]), destination);
}
