import { ArgumentError } from '../errors.js';
import { concatBytes, crc32, stringToBytes, writeUInt32BE } from '../utils.js';
import { PNG_SIGNATURE } from './png-parser.js';
import type { PngChunk, PngHeader } from './png-types.js';

/**
 * Create a PNG chunk, computing its CRC over type + data
 */
export function createChunk(type: string, data: Uint8Array): PngChunk {
  const typeBytes = stringToBytes(type);
  if (typeBytes.length !== 4) {
    throw new ArgumentError('Chunk type must be exactly 4 characters');
  }

  return {
    length: data.length,
    type,
    data,
    crc: crc32(concatBytes([typeBytes, data]))
  };
}

/**
 * Serialize a chunk to bytes
 */
export function serializeChunk(chunk: PngChunk): Uint8Array {
  const buffer = new Uint8Array(12 + chunk.length);
  writeUInt32BE(buffer, chunk.length, 0);
  buffer.set(stringToBytes(chunk.type), 4);
  buffer.set(chunk.data, 8);
  writeUInt32BE(buffer, chunk.crc, 8 + chunk.length);
  return buffer;
}

export function createIHDR(header: PngHeader): PngChunk {
  const data = new Uint8Array(13);

  writeUInt32BE(data, header.width, 0);
  writeUInt32BE(data, header.height, 4);
  data[8] = header.bitDepth;
  data[9] = header.colorType;
  data[10] = header.compressionMethod;
  data[11] = header.filterMethod;
  data[12] = header.interlaceMethod;

  return createChunk('IHDR', data);
}

/**
 * pHYs chunk in pixels per metre
 */
export function createPHYs(horizontalDpi: number, verticalDpi: number): PngChunk {
  const data = new Uint8Array(9);
  writeUInt32BE(data, Math.round(horizontalDpi / 0.0254), 0);
  writeUInt32BE(data, Math.round(verticalDpi / 0.0254), 4);
  data[8] = 1;
  return createChunk('pHYs', data);
}

/**
 * tEXt chunk. Keywords are 1-79 Latin-1 characters.
 */
export function createText(keyword: string, text: string): PngChunk {
  if (keyword.length < 1 || keyword.length > 79) {
    throw new ArgumentError(`PNG text keyword must be 1-79 characters: ${keyword}`);
  }
  return createChunk('tEXt', concatBytes([stringToBytes(keyword), new Uint8Array([0]), stringToBytes(text)]));
}

export function createIEND(): PngChunk {
  return createChunk('IEND', new Uint8Array(0));
}

/**
 * Build a complete PNG file from chunks
 */
export function buildPng(chunks: PngChunk[]): Uint8Array {
  return concatBytes([PNG_SIGNATURE, ...chunks.map(serializeChunk)]);
}
