import { FormatError } from '../errors.js';
import { concatBytes, readUInt16LE } from '../utils.js';

/**
 * Sequential reader over an in-memory byte array.
 * Reading past the end is a FormatError.
 */
export class ByteReader {
  private readonly data: Uint8Array;
  private position: number;

  constructor(data: Uint8Array, offset = 0) {
    this.data = data;
    this.position = offset;
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return this.data.length - this.position;
  }

  get atEnd(): boolean {
    return this.position >= this.data.length;
  }

  private require(count: number): void {
    if (this.position + count > this.data.length) {
      throw new FormatError(
        `Unexpected end of data at offset ${this.position} (needed ${count} bytes, ${this.remaining} left)`
      );
    }
  }

  readByte(): number {
    this.require(1);
    return this.data[this.position++];
  }

  readUInt16LE(): number {
    this.require(2);
    const value = readUInt16LE(this.data, this.position);
    this.position += 2;
    return value;
  }

  readBytes(count: number): Uint8Array {
    this.require(count);
    const bytes = this.data.subarray(this.position, this.position + count);
    this.position += count;
    return bytes;
  }

  skip(count: number): void {
    this.require(count);
    this.position += count;
  }

  /**
   * Read length-prefixed sub-blocks up to the zero terminator and join them.
   * When `limit` is given, a total larger than it is a FormatError.
   */
  readSubBlocks(limit = Infinity): Uint8Array {
    const blocks: Uint8Array[] = [];
    let total = 0;
    for (;;) {
      const size = this.readByte();
      if (size === 0) break;
      total += size;
      if (total > limit) {
        throw new FormatError(`Block data exceeds ${limit} bytes`);
      }
      blocks.push(this.readBytes(size));
    }
    return concatBytes(blocks);
  }

  skipSubBlocks(): void {
    for (;;) {
      const size = this.readByte();
      if (size === 0) return;
      this.skip(size);
    }
  }
}
