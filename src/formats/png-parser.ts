import { FormatError } from '../errors.js';
import { bytesToString, crc32, readUInt32BE, startsWith } from '../utils.js';
import type { PngChunk, PngHeader } from './png-types.js';

/**
 * PNG file signature
 */
export const PNG_SIGNATURE = new Uint8Array([137, 80, 78, 71, 13, 10, 26, 10]);

export function isPngSignature(data: Uint8Array): boolean {
  return startsWith(data, PNG_SIGNATURE);
}

/**
 * Sequential chunk reader over a complete PNG file
 */
export class PngParser {
  private data: Uint8Array;
  private offset: number;

  constructor(data: Uint8Array) {
    if (!isPngSignature(data)) {
      throw new FormatError('Invalid PNG signature');
    }
    this.data = data;
    this.offset = PNG_SIGNATURE.length;
  }

  /**
   * Read the next chunk, or null at end of data
   */
  readChunk(): PngChunk | null {
    if (this.offset >= this.data.length) {
      return null;
    }

    // length + type + crc
    if (this.offset + 12 > this.data.length) {
      throw new FormatError('Incomplete PNG chunk');
    }

    const length = readUInt32BE(this.data, this.offset);
    const typeOffset = this.offset + 4;
    const type = bytesToString(this.data, typeOffset, 4);
    const dataOffset = typeOffset + 4;

    if (dataOffset + length + 4 > this.data.length) {
      throw new FormatError(`Incomplete PNG chunk data for ${type}`);
    }

    const data = this.data.subarray(dataOffset, dataOffset + length);
    const crc = readUInt32BE(this.data, dataOffset + length);

    // CRC covers type + data
    if (crc32(this.data, typeOffset, length + 4) !== crc) {
      throw new FormatError(`CRC mismatch for chunk ${type}`);
    }

    this.offset = dataOffset + length + 4;
    return { length, type, data, crc };
  }

  readAllChunks(): PngChunk[] {
    const chunks: PngChunk[] = [];
    let chunk: PngChunk | null;

    while ((chunk = this.readChunk()) !== null) {
      chunks.push(chunk);
      if (chunk.type === 'IEND') break;
    }

    return chunks;
  }

  /**
   * Parse an IHDR chunk
   */
  static parseHeader(chunk: PngChunk): PngHeader {
    if (chunk.type !== 'IHDR') {
      throw new FormatError('First PNG chunk must be IHDR');
    }

    if (chunk.data.length !== 13) {
      throw new FormatError('Invalid IHDR chunk length');
    }

    return {
      width: readUInt32BE(chunk.data, 0),
      height: readUInt32BE(chunk.data, 4),
      bitDepth: chunk.data[8],
      colorType: chunk.data[9],
      compressionMethod: chunk.data[10],
      filterMethod: chunk.data[11],
      interlaceMethod: chunk.data[12]
    };
  }
}

export function parsePngChunks(data: Uint8Array): PngChunk[] {
  return new PngParser(data).readAllChunks();
}
