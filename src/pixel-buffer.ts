import { type Color } from './color.js';
import { ArgumentError, IndexError } from './errors.js';
import { clamp } from './utils.js';

export const CHANNELS = 4;

function assertDimensions(width: number, height: number): void {
  if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
    throw new ArgumentError(`Invalid pixel dimensions ${width}x${height}`);
  }
}

/**
 * Row-major RGBA pixels, one float per channel in the 0-1 range
 */
export class PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;

  constructor(width: number, height: number, data?: Float32Array) {
    assertDimensions(width, height);
    const length = width * height * CHANNELS;
    if (data && data.length !== length) {
      throw new ArgumentError(`Pixel data length ${data.length} does not match ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = data ?? new Float32Array(length);
  }

  /** Wraps existing channel data without copying */
  static from(width: number, height: number, data: Float32Array): PixelBuffer {
    return new PixelBuffer(width, height, data);
  }

  /**
   * Build a buffer from packed 8-bit RGBA bytes
   */
  static fromRgba8(width: number, height: number, bytes: Uint8Array): PixelBuffer {
    assertDimensions(width, height);
    if (bytes.length < width * height * CHANNELS) {
      throw new ArgumentError(`Expected ${width * height * CHANNELS} RGBA bytes, got ${bytes.length}`);
    }
    const buffer = new PixelBuffer(width, height);
    for (let i = 0; i < buffer.data.length; i++) {
      buffer.data[i] = bytes[i] / 255;
    }
    return buffer;
  }

  toRgba8(): Uint8Array {
    const bytes = new Uint8Array(this.data.length);
    for (let i = 0; i < this.data.length; i++) {
      bytes[i] = Math.round(clamp(this.data[i], 0, 1) * 255);
    }
    return bytes;
  }

  inBounds(x: number, y: number): boolean {
    return Number.isInteger(x) && Number.isInteger(y) && x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  /** Index of the red channel for (x, y); unchecked */
  offset(x: number, y: number): number {
    return (y * this.width + x) * CHANNELS;
  }

  getPixel(x: number, y: number): Color {
    if (!this.inBounds(x, y)) {
      throw new IndexError(`Pixel (${x}, ${y}) is outside ${this.width}x${this.height}`);
    }
    const i = this.offset(x, y);
    return { r: this.data[i], g: this.data[i + 1], b: this.data[i + 2], a: this.data[i + 3] };
  }

  setPixel(x: number, y: number, color: Color): void {
    if (!this.inBounds(x, y)) {
      throw new IndexError(`Pixel (${x}, ${y}) is outside ${this.width}x${this.height}`);
    }
    this.writeUnchecked(this.offset(x, y), color);
  }

  /** Write a color at a precomputed offset */
  writeUnchecked(offset: number, color: Color): void {
    this.data[offset] = color.r;
    this.data[offset + 1] = color.g;
    this.data[offset + 2] = color.b;
    this.data[offset + 3] = color.a;
  }

  readUnchecked(offset: number): Color {
    return {
      r: this.data[offset],
      g: this.data[offset + 1],
      b: this.data[offset + 2],
      a: this.data[offset + 3]
    };
  }

  fill(color: Color): void {
    for (let i = 0; i < this.data.length; i += CHANNELS) {
      this.writeUnchecked(i, color);
    }
  }

  clone(): PixelBuffer {
    return new PixelBuffer(this.width, this.height, this.data.slice());
  }

  sameSize(other: PixelBuffer): boolean {
    return this.width === other.width && this.height === other.height;
  }
}
