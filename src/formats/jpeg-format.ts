import jpeg from 'jpeg-js';
import { FormatError, toFormatError } from '../errors.js';
import { Image } from '../image.js';
import { createChildLogger } from '../logger.js';
import { PixelBuffer } from '../pixel-buffer.js';
import { bytesToString, clamp } from '../utils.js';
import type { DecodeOptions, EncodeOptions, ImageFormat } from './types.js';

const log = createChildLogger({ module: 'jpeg-format' });

/**
 * JPEG: FF D8 FF (Start of Image marker)
 */
export function isJpegHeader(bytes: Uint8Array): boolean {
  return bytes.length >= 3 && bytes[0] === 0xff && bytes[1] === 0xd8 && bytes[2] === 0xff;
}

/**
 * Density from a JFIF APP0 segment directly after SOI, in dots per inch
 */
export function readJfifDensity(data: Uint8Array): { x: number; y: number } | null {
  if (data.length < 18 || data[2] !== 0xff || data[3] !== 0xe0) return null;
  if (bytesToString(data, 6, 5) !== 'JFIF\0') return null;
  const units = data[13];
  const x = (data[14] << 8) | data[15];
  const y = (data[16] << 8) | data[17];
  if (x === 0 || y === 0) return null;
  switch (units) {
    case 1:
      return { x, y };
    case 2:
      return { x: x * 2.54, y: y * 2.54 };
    default:
      return null;
  }
}

export function decodeJpeg(data: Uint8Array, options: DecodeOptions): Image {
  let decoded: { width: number; height: number; data: Uint8Array };
  try {
    decoded = jpeg.decode(data, {
      useTArray: true,
      formatAsRGBA: true,
      maxResolutionInMP: (options.maxWidth * options.maxHeight) / 1_000_000
    });
  } catch (error) {
    throw toFormatError(error, 'Failed to decode JPEG');
  }

  if (decoded.width > options.maxWidth || decoded.height > options.maxHeight) {
    throw new FormatError(
      `JPEG size ${decoded.width}x${decoded.height} exceeds the maximum of ${options.maxWidth}x${options.maxHeight}`
    );
  }

  const image = new Image(PixelBuffer.fromRgba8(decoded.width, decoded.height, decoded.data));
  const density = readJfifDensity(data);
  if (density) {
    image.horizontalResolution = density.x;
    image.verticalResolution = density.y;
  }
  log.debug({ width: decoded.width, height: decoded.height }, 'Decoded JPEG');
  return image;
}

/**
 * Encode the primary frame. JPEG has no alpha; transparent pixels keep their color.
 */
export function encodeJpeg(image: Image, options: EncodeOptions): Uint8Array {
  const quality = clamp(Math.round(options.quality), 1, 100);
  const encoded = jpeg.encode(
    { width: image.width, height: image.height, data: image.pixels.toRgba8() },
    quality
  );
  return new Uint8Array(encoded.data);
}

export const jpegFormat: ImageFormat = {
  name: 'jpeg',
  mimeType: 'image/jpeg',
  extensions: ['jpg', 'jpeg', 'jpe', 'jfif'],
  decoder: {
    headerSize: 3,
    isSupportedFileFormat: isJpegHeader,
    decode: decodeJpeg
  },
  encoder: {
    encode: encodeJpeg
  }
};
