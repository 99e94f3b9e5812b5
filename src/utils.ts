/**
 * CRC32 lookup table (PNG chunk checksums)
 */
const CRC_TABLE = new Uint32Array(256);

for (let n = 0; n < 256; n++) {
  let c = n;
  for (let k = 0; k < 8; k++) {
    c = (c & 1) ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  }
  CRC_TABLE[n] = c;
}

/**
 * Calculate CRC32 checksum over a byte range
 */
export function crc32(data: Uint8Array, start = 0, length = data.length - start): number {
  let crc = 0xffffffff;
  for (let i = start; i < start + length; i++) {
    crc = CRC_TABLE[(crc ^ data[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Read a 32-bit big-endian unsigned integer
 */
export function readUInt32BE(buffer: Uint8Array, offset: number): number {
  return (
    (buffer[offset] << 24) |
    (buffer[offset + 1] << 16) |
    (buffer[offset + 2] << 8) |
    buffer[offset + 3]
  ) >>> 0;
}

/**
 * Write a 32-bit big-endian unsigned integer
 */
export function writeUInt32BE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = (value >>> 24) & 0xff;
  buffer[offset + 1] = (value >>> 16) & 0xff;
  buffer[offset + 2] = (value >>> 8) & 0xff;
  buffer[offset + 3] = value & 0xff;
}

/**
 * Read a 16-bit little-endian unsigned integer (GIF, BMP)
 */
export function readUInt16LE(buffer: Uint8Array, offset: number): number {
  return buffer[offset] | (buffer[offset + 1] << 8);
}

export function writeUInt16LE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = value & 0xff;
  buffer[offset + 1] = (value >>> 8) & 0xff;
}

export function readUInt32LE(buffer: Uint8Array, offset: number): number {
  return (
    buffer[offset] |
    (buffer[offset + 1] << 8) |
    (buffer[offset + 2] << 16) |
    (buffer[offset + 3] << 24)
  ) >>> 0;
}

/**
 * Read a 32-bit little-endian signed integer (BMP height is signed)
 */
export function readInt32LE(buffer: Uint8Array, offset: number): number {
  return readUInt32LE(buffer, offset) | 0;
}

export function writeUInt32LE(buffer: Uint8Array, value: number, offset: number): void {
  buffer[offset] = value & 0xff;
  buffer[offset + 1] = (value >>> 8) & 0xff;
  buffer[offset + 2] = (value >>> 16) & 0xff;
  buffer[offset + 3] = (value >>> 24) & 0xff;
}

/**
 * Convert string to Uint8Array (ASCII / Latin-1)
 */
export function stringToBytes(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Convert Uint8Array to string (ASCII / Latin-1)
 */
export function bytesToString(bytes: Uint8Array, start = 0, length = bytes.length - start): string {
  let str = '';
  for (let i = start; i < start + length; i++) {
    str += String.fromCharCode(bytes[i]);
  }
  return str;
}

/**
 * Check whether `data` begins with `signature`
 */
export function startsWith(data: Uint8Array, signature: ArrayLike<number>, offset = 0): boolean {
  if (data.length < offset + signature.length) return false;
  for (let i = 0; i < signature.length; i++) {
    if (data[offset + i] !== signature[i]) return false;
  }
  return true;
}

/**
 * Join byte arrays into one buffer
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) {
    total += part.length;
  }
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

export function clamp(value: number, min: number, max: number): number {
  return value < min ? min : value > max ? max : value;
}

/**
 * Growable byte sink used by the encoders
 */
export class ByteWriter {
  private buffer: Uint8Array;
  private length = 0;

  constructor(initialCapacity = 1024) {
    this.buffer = new Uint8Array(Math.max(16, initialCapacity));
  }

  get size(): number {
    return this.length;
  }

  private ensure(extra: number): void {
    const required = this.length + extra;
    if (required <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < required) capacity *= 2;
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
  }

  writeByte(value: number): void {
    this.ensure(1);
    this.buffer[this.length++] = value & 0xff;
  }

  writeUInt16LE(value: number): void {
    this.ensure(2);
    writeUInt16LE(this.buffer, value, this.length);
    this.length += 2;
  }

  writeUInt32LE(value: number): void {
    this.ensure(4);
    writeUInt32LE(this.buffer, value, this.length);
    this.length += 4;
  }

  writeBytes(bytes: ArrayLike<number>): void {
    this.ensure(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  writeString(str: string): void {
    this.writeBytes(stringToBytes(str));
  }

  toUint8Array(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }
}
