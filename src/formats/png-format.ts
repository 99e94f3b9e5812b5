/**
 * PNG decoding and encoding on top of pako's zlib implementation.
 *
 * Decoding covers every color type and bit depth, Adam7 interlacing and tRNS
 * transparency; pHYs maps to resolution and tEXt to image properties.
 * Encoding writes 8-bit RGBA of the primary frame.
 */

import { deflate, inflate } from 'pako';
import { FormatError, toFormatError } from '../errors.js';
import { Image } from '../image.js';
import { createChildLogger } from '../logger.js';
import { PixelBuffer } from '../pixel-buffer.js';
import { bytesToString, concatBytes, readUInt32BE } from '../utils.js';
import { deinterlaceAdam7 } from './adam7.js';
import {
  filterScanline,
  getBytesPerPixel,
  getScanlineLength,
  unfilterScanline
} from './png-filter.js';
import { PngParser, PNG_SIGNATURE, isPngSignature } from './png-parser.js';
import { ColorType, VALID_BIT_DEPTHS, isColorType, type PngChunk, type PngHeader } from './png-types.js';
import { buildPng, createChunk, createIEND, createIHDR, createPHYs, createText } from './png-writer.js';
import type { DecodeOptions, ImageFormat } from './types.js';

const log = createChildLogger({ module: 'png-format' });

/** Transparency from a tRNS chunk, by color type */
interface Transparency {
  paletteAlpha?: Uint8Array;
  /** Gray or RGB sample values that are fully transparent */
  key?: number[];
}

function validateHeader(header: PngHeader, options: DecodeOptions): void {
  if (!isColorType(header.colorType)) {
    throw new FormatError(`Unsupported PNG color type: ${header.colorType}`);
  }
  if (!VALID_BIT_DEPTHS[header.colorType].includes(header.bitDepth)) {
    throw new FormatError(`Invalid bit depth ${header.bitDepth} for PNG color type ${header.colorType}`);
  }
  if (header.compressionMethod !== 0 || header.filterMethod !== 0 || header.interlaceMethod > 1) {
    throw new FormatError('Unsupported PNG compression, filter or interlace method');
  }
  if (header.width === 0 || header.height === 0) {
    throw new FormatError(`Invalid PNG size ${header.width}x${header.height}`);
  }
  if (header.width > options.maxWidth || header.height > options.maxHeight) {
    throw new FormatError(
      `PNG size ${header.width}x${header.height} exceeds the maximum of ${options.maxWidth}x${options.maxHeight}`
    );
  }
}

function parseTransparency(chunk: PngChunk, colorType: number): Transparency {
  if (colorType === ColorType.PALETTE) {
    return { paletteAlpha: chunk.data };
  }
  const key: number[] = [];
  for (let i = 0; i + 1 < chunk.data.length; i += 2) {
    key.push((chunk.data[i] << 8) | chunk.data[i + 1]);
  }
  return { key };
}

function inflateImageData(compressed: Uint8Array): Uint8Array {
  try {
    return inflate(compressed);
  } catch (error) {
    throw toFormatError(error, 'Corrupt PNG image data');
  }
}

/**
 * Undo per-scanline filters on non-interlaced data
 */
function unfilterAll(decompressed: Uint8Array, header: PngHeader): Uint8Array {
  const bytesPerPixel = getBytesPerPixel(header.bitDepth, header.colorType);
  const scanlineLength = getScanlineLength(header.width, header.bitDepth, header.colorType);
  const output = new Uint8Array(scanlineLength * header.height);
  if (decompressed.length < (scanlineLength + 1) * header.height) {
    throw new FormatError(
      `PNG image data too short: ${decompressed.length} bytes for ${header.height} scanlines`
    );
  }

  let previous: Uint8Array | null = null;
  for (let y = 0; y < header.height; y++) {
    const start = y * (scanlineLength + 1);
    const line = unfilterScanline(
      decompressed[start],
      decompressed.subarray(start + 1, start + 1 + scanlineLength),
      previous,
      bytesPerPixel
    );
    output.set(line, y * scanlineLength);
    previous = line;
  }
  return output;
}

function readSample(line: Uint8Array, lineStart: number, index: number, bitDepth: number): number {
  if (bitDepth === 8) return line[lineStart + index];
  if (bitDepth === 16) return (line[lineStart + index * 2] << 8) | line[lineStart + index * 2 + 1];
  const bit = index * bitDepth;
  const byte = line[lineStart + (bit >> 3)];
  return (byte >> (8 - bitDepth - (bit & 7))) & ((1 << bitDepth) - 1);
}

function toPixels(
  raw: Uint8Array,
  header: PngHeader,
  palette: Uint8Array | null,
  transparency: Transparency
): PixelBuffer {
  const { width, height, bitDepth, colorType } = header;
  const pixels = new PixelBuffer(width, height);
  const data = pixels.data;
  const scanlineLength = getScanlineLength(width, bitDepth, colorType);
  const max = (1 << bitDepth) - 1;
  const key = transparency.key;

  for (let y = 0; y < height; y++) {
    const lineStart = y * scanlineLength;
    for (let x = 0; x < width; x++) {
      const o = pixels.offset(x, y);
      switch (colorType) {
        case ColorType.GRAYSCALE: {
          const gray = readSample(raw, lineStart, x, bitDepth);
          data[o] = data[o + 1] = data[o + 2] = gray / max;
          data[o + 3] = key && key[0] === gray ? 0 : 1;
          break;
        }
        case ColorType.GRAYSCALE_ALPHA: {
          const gray = readSample(raw, lineStart, x * 2, bitDepth);
          data[o] = data[o + 1] = data[o + 2] = gray / max;
          data[o + 3] = readSample(raw, lineStart, x * 2 + 1, bitDepth) / max;
          break;
        }
        case ColorType.RGB: {
          const r = readSample(raw, lineStart, x * 3, bitDepth);
          const g = readSample(raw, lineStart, x * 3 + 1, bitDepth);
          const b = readSample(raw, lineStart, x * 3 + 2, bitDepth);
          data[o] = r / max;
          data[o + 1] = g / max;
          data[o + 2] = b / max;
          data[o + 3] = key && key[0] === r && key[1] === g && key[2] === b ? 0 : 1;
          break;
        }
        case ColorType.RGBA:
          for (let c = 0; c < 4; c++) {
            data[o + c] = readSample(raw, lineStart, x * 4 + c, bitDepth) / max;
          }
          break;
        case ColorType.PALETTE: {
          const index = readSample(raw, lineStart, x, bitDepth);
          if (!palette || index * 3 + 2 >= palette.length) {
            throw new FormatError(`PNG palette index ${index} out of range`);
          }
          data[o] = palette[index * 3] / 255;
          data[o + 1] = palette[index * 3 + 1] / 255;
          data[o + 2] = palette[index * 3 + 2] / 255;
          const alpha = transparency.paletteAlpha;
          data[o + 3] = alpha && index < alpha.length ? alpha[index] / 255 : 1;
          break;
        }
      }
    }
  }
  return pixels;
}

export function decodePng(data: Uint8Array, options: DecodeOptions): Image {
  const chunks = new PngParser(data).readAllChunks();
  if (chunks.length === 0) {
    throw new FormatError('PNG contains no chunks');
  }
  const header = PngParser.parseHeader(chunks[0]);
  validateHeader(header, options);

  let palette: Uint8Array | null = null;
  let transparency: Transparency = {};
  const idat: Uint8Array[] = [];
  const properties: { name: string; value: string }[] = [];
  let resolution: { x: number; y: number } | null = null;

  for (const chunk of chunks) {
    switch (chunk.type) {
      case 'PLTE':
        palette = chunk.data;
        break;
      case 'tRNS':
        transparency = parseTransparency(chunk, header.colorType);
        break;
      case 'IDAT':
        idat.push(chunk.data);
        break;
      case 'pHYs':
        // Unit 1 is metres; unknown units only give an aspect ratio
        if (chunk.data.length === 9 && chunk.data[8] === 1) {
          resolution = {
            x: readUInt32BE(chunk.data, 0) * 0.0254,
            y: readUInt32BE(chunk.data, 4) * 0.0254
          };
        }
        break;
      case 'tEXt': {
        const separator = chunk.data.indexOf(0);
        if (separator > 0) {
          properties.push({
            name: bytesToString(chunk.data, 0, separator),
            value: bytesToString(chunk.data, separator + 1)
          });
        }
        break;
      }
    }
  }

  if (idat.length === 0) {
    throw new FormatError('No IDAT chunks found in PNG');
  }
  if (header.colorType === ColorType.PALETTE && !palette) {
    throw new FormatError('Palette PNG without a PLTE chunk');
  }

  const decompressed = inflateImageData(concatBytes(idat));
  const raw = header.interlaceMethod === 1
    ? deinterlaceAdam7(decompressed, header)
    : unfilterAll(decompressed, header);

  const image = new Image(toPixels(raw, header, palette, transparency));
  image.properties = properties;
  if (resolution) {
    image.horizontalResolution = resolution.x;
    image.verticalResolution = resolution.y;
  }

  log.debug(
    { width: header.width, height: header.height, colorType: header.colorType, bitDepth: header.bitDepth },
    'Decoded PNG'
  );
  return image;
}

/**
 * Encode the primary frame as 8-bit RGBA with adaptive filtering
 */
export function encodePng(image: Image): Uint8Array {
  const header: PngHeader = {
    width: image.width,
    height: image.height,
    bitDepth: 8,
    colorType: ColorType.RGBA,
    compressionMethod: 0,
    filterMethod: 0,
    interlaceMethod: 0
  };

  const rgba = image.pixels.toRgba8();
  const scanlineLength = image.width * 4;
  const filtered = new Uint8Array((scanlineLength + 1) * image.height);
  let previous: Uint8Array | null = null;
  for (let y = 0; y < image.height; y++) {
    const line = rgba.subarray(y * scanlineLength, (y + 1) * scanlineLength);
    const { filterType, filtered: bytes } = filterScanline(line, previous, 4);
    const start = y * (scanlineLength + 1);
    filtered[start] = filterType;
    filtered.set(bytes, start + 1);
    previous = line;
  }

  const chunks: PngChunk[] = [
    createIHDR(header),
    createPHYs(image.horizontalResolution, image.verticalResolution)
  ];
  for (const property of image.properties) {
    chunks.push(createText(property.name, property.value));
  }
  chunks.push(createChunk('IDAT', deflate(filtered)));
  chunks.push(createIEND());

  if (image.isAnimated) {
    log.debug({ frames: image.frames.length + 1 }, 'PNG keeps only the primary frame');
  }
  return buildPng(chunks);
}

export const pngFormat: ImageFormat = {
  name: 'png',
  mimeType: 'image/png',
  extensions: ['png'],
  decoder: {
    headerSize: PNG_SIGNATURE.length,
    isSupportedFileFormat: isPngSignature,
    decode: decodePng
  },
  encoder: {
    encode: (image) => encodePng(image)
  }
};
