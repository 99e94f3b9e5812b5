/**
 * Windows bitmap.
 *
 * Reads uncompressed 1/4/8-bit paletted, 16-bit, 24-bit and 32-bit images
 * (BI_RGB or BI_BITFIELDS), bottom-up or top-down. Writes 32-bit BGRA.
 */

import { FormatError } from '../errors.js';
import { Image } from '../image.js';
import { createChildLogger } from '../logger.js';
import { PixelBuffer } from '../pixel-buffer.js';
import { ByteWriter, readInt32LE, readUInt16LE, readUInt32LE } from '../utils.js';
import type { DecodeOptions, ImageFormat } from './types.js';

const log = createChildLogger({ module: 'bmp-format' });

const FILE_HEADER_SIZE = 14;
const INFO_HEADER_SIZE = 40;
const BI_RGB = 0;
const BI_BITFIELDS = 3;
const BI_ALPHABITFIELDS = 6;
const METRES_PER_INCH = 0.0254;

interface BmpHeader {
  dataOffset: number;
  headerSize: number;
  width: number;
  height: number;
  topDown: boolean;
  bitsPerPixel: number;
  compression: number;
  xPixelsPerMetre: number;
  yPixelsPerMetre: number;
  colorsUsed: number;
}

interface ChannelMask {
  mask: number;
  shift: number;
  max: number;
}

export function isBmpHeader(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x42 && bytes[1] === 0x4d;
}

function readHeader(data: Uint8Array): BmpHeader {
  if (data.length < FILE_HEADER_SIZE + 12) {
    throw new FormatError('BMP file too short');
  }
  const headerSize = readUInt32LE(data, 14);
  if (headerSize === 12) {
    return {
      dataOffset: readUInt32LE(data, 10),
      headerSize,
      width: readUInt16LE(data, 18),
      height: readUInt16LE(data, 20),
      topDown: false,
      bitsPerPixel: readUInt16LE(data, 24),
      compression: BI_RGB,
      xPixelsPerMetre: 0,
      yPixelsPerMetre: 0,
      colorsUsed: 0
    };
  }
  if (headerSize < INFO_HEADER_SIZE || data.length < FILE_HEADER_SIZE + INFO_HEADER_SIZE) {
    throw new FormatError(`Unsupported BMP header size: ${headerSize}`);
  }
  const height = readInt32LE(data, 22);
  return {
    dataOffset: readUInt32LE(data, 10),
    headerSize,
    width: readInt32LE(data, 18),
    height: Math.abs(height),
    topDown: height < 0,
    bitsPerPixel: readUInt16LE(data, 28),
    compression: readUInt32LE(data, 30),
    xPixelsPerMetre: readInt32LE(data, 38),
    yPixelsPerMetre: readInt32LE(data, 42),
    colorsUsed: readUInt32LE(data, 46)
  };
}

function toChannelMask(mask: number): ChannelMask {
  if (mask === 0) {
    return { mask: 0, shift: 0, max: 0 };
  }
  let shift = 0;
  while (((mask >>> shift) & 1) === 0) shift++;
  return { mask, shift, max: mask >>> shift };
}

function readMasks(data: Uint8Array, header: BmpHeader): ChannelMask[] {
  if (header.compression === BI_RGB) {
    if (header.bitsPerPixel === 16) {
      return [0x7c00, 0x03e0, 0x001f, 0].map(toChannelMask);
    }
    return [0x00ff0000, 0x0000ff00, 0x000000ff, 0xff000000].map(toChannelMask);
  }
  const base = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
  const hasAlpha = header.compression === BI_ALPHABITFIELDS || header.headerSize >= 56;
  if (data.length < base + (hasAlpha ? 16 : 12)) {
    throw new FormatError('BMP bit field masks missing');
  }
  return [
    readUInt32LE(data, base),
    readUInt32LE(data, base + 4),
    readUInt32LE(data, base + 8),
    hasAlpha ? readUInt32LE(data, base + 12) : 0
  ].map(toChannelMask);
}

function readPalette(data: Uint8Array, header: BmpHeader): Uint8Array {
  const entrySize = header.headerSize === 12 ? 3 : 4;
  const count = header.colorsUsed || 1 << header.bitsPerPixel;
  const start = FILE_HEADER_SIZE + header.headerSize;
  if (start + count * entrySize > data.length) {
    throw new FormatError('BMP palette truncated');
  }
  const palette = new Uint8Array(count * 3);
  for (let i = 0; i < count; i++) {
    const o = start + i * entrySize;
    palette[i * 3] = data[o + 2];
    palette[i * 3 + 1] = data[o + 1];
    palette[i * 3 + 2] = data[o];
  }
  return palette;
}

function channelValue(value: number, channel: ChannelMask): number {
  return channel.max === 0 ? 0 : ((value & channel.mask) >>> channel.shift) / channel.max;
}

export function decodeBmp(data: Uint8Array, options: DecodeOptions): Image {
  const header = readHeader(data);
  const { width, height, bitsPerPixel } = header;

  if (width <= 0 || height === 0) {
    throw new FormatError(`Invalid BMP size ${width}x${height}`);
  }
  if (width > options.maxWidth || height > options.maxHeight) {
    throw new FormatError(
      `BMP size ${width}x${height} exceeds the maximum of ${options.maxWidth}x${options.maxHeight}`
    );
  }
  if (![BI_RGB, BI_BITFIELDS, BI_ALPHABITFIELDS].includes(header.compression)) {
    throw new FormatError(`Unsupported BMP compression: ${header.compression}`);
  }
  if (![1, 4, 8, 16, 24, 32].includes(bitsPerPixel)) {
    throw new FormatError(`Unsupported BMP bit depth: ${bitsPerPixel}`);
  }

  const rowSize = Math.ceil((width * bitsPerPixel) / 32) * 4;
  if (header.dataOffset + rowSize * height > data.length) {
    throw new FormatError('BMP pixel data truncated');
  }

  const palette = bitsPerPixel <= 8 ? readPalette(data, header) : null;
  const masks = bitsPerPixel === 16 || bitsPerPixel === 32 ? readMasks(data, header) : null;
  const pixels = new PixelBuffer(width, height);
  const out = pixels.data;
  let alphaSeen = false;

  for (let row = 0; row < height; row++) {
    const y = header.topDown ? row : height - 1 - row;
    const rowStart = header.dataOffset + row * rowSize;
    for (let x = 0; x < width; x++) {
      const o = pixels.offset(x, y);
      if (palette) {
        const bit = x * bitsPerPixel;
        const byte = data[rowStart + (bit >> 3)];
        const index = (byte >> (8 - bitsPerPixel - (bit & 7))) & ((1 << bitsPerPixel) - 1);
        const entry = index * 3 < palette.length ? index * 3 : 0;
        out[o] = palette[entry] / 255;
        out[o + 1] = palette[entry + 1] / 255;
        out[o + 2] = palette[entry + 2] / 255;
        out[o + 3] = 1;
      } else if (bitsPerPixel === 24) {
        const p = rowStart + x * 3;
        out[o] = data[p + 2] / 255;
        out[o + 1] = data[p + 1] / 255;
        out[o + 2] = data[p] / 255;
        out[o + 3] = 1;
      } else if (masks) {
        const value = bitsPerPixel === 16
          ? readUInt16LE(data, rowStart + x * 2)
          : readUInt32LE(data, rowStart + x * 4);
        out[o] = channelValue(value, masks[0]);
        out[o + 1] = channelValue(value, masks[1]);
        out[o + 2] = channelValue(value, masks[2]);
        if (masks[3].max === 0) {
          out[o + 3] = 1;
        } else {
          out[o + 3] = channelValue(value, masks[3]);
          if (out[o + 3] > 0) alphaSeen = true;
        }
      }
    }
  }

  // BI_RGB 32-bit files often leave the fourth byte zero
  if (masks && masks[3].max !== 0 && !alphaSeen) {
    for (let i = 3; i < out.length; i += 4) out[i] = 1;
  }

  const image = new Image(pixels);
  if (header.xPixelsPerMetre > 0 && header.yPixelsPerMetre > 0) {
    image.horizontalResolution = header.xPixelsPerMetre * METRES_PER_INCH;
    image.verticalResolution = header.yPixelsPerMetre * METRES_PER_INCH;
  }
  log.debug({ width, height, bitsPerPixel }, 'Decoded BMP');
  return image;
}

/**
 * Encode the primary frame as bottom-up 32-bit BGRA
 */
export function encodeBmp(image: Image): Uint8Array {
  const { width, height } = image;
  const rgba = image.pixels.toRgba8();
  const imageSize = width * height * 4;
  const dataOffset = FILE_HEADER_SIZE + INFO_HEADER_SIZE;
  const out = new ByteWriter(dataOffset + imageSize);

  out.writeString('BM');
  out.writeUInt32LE(dataOffset + imageSize);
  out.writeUInt32LE(0);
  out.writeUInt32LE(dataOffset);

  out.writeUInt32LE(INFO_HEADER_SIZE);
  out.writeUInt32LE(width);
  out.writeUInt32LE(height);
  out.writeUInt16LE(1);
  out.writeUInt16LE(32);
  out.writeUInt32LE(BI_RGB);
  out.writeUInt32LE(imageSize);
  out.writeUInt32LE(Math.round(image.horizontalResolution / METRES_PER_INCH));
  out.writeUInt32LE(Math.round(image.verticalResolution / METRES_PER_INCH));
  out.writeUInt32LE(0);
  out.writeUInt32LE(0);

  for (let y = height - 1; y >= 0; y--) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      out.writeBytes([rgba[i + 2], rgba[i + 1], rgba[i], rgba[i + 3]]);
    }
  }
  return out.toUint8Array();
}

export const bmpFormat: ImageFormat = {
  name: 'bmp',
  mimeType: 'image/bmp',
  extensions: ['bmp', 'dib'],
  decoder: {
    headerSize: 2,
    isSupportedFileFormat: isBmpHeader,
    decode: decodeBmp
  },
  encoder: {
    encode: (image) => encodeBmp(image)
  }
};
