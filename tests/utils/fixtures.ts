/**
 * Byte-level builders for test images.
 */

import { compressLzw } from '../../src/formats/gif-lzw.js';
import { Image } from '../../src/image.js';
import { PixelBuffer } from '../../src/pixel-buffer.js';
import { ByteWriter, stringToBytes } from '../../src/utils.js';

export interface GifFrameLayout {
  left?: number;
  top?: number;
  width: number;
  height: number;
  /** Palette indices in display order */
  indices: number[];
  /** Flat RGB triples */
  localPalette?: number[];
  interlaced?: boolean;
  /** Hundredths of a second */
  delay?: number;
  disposal?: number;
  transparentIndex?: number;
  /** Written as-is, without checking it against the palette */
  minCodeSize?: number;
  /** Packed LZW stream written in place of compressing `indices` */
  lzwData?: number[];
}

export interface GifLayout {
  width: number;
  height: number;
  /** Flat RGB triples; entry count must be a power of two */
  palette?: number[];
  frames: GifFrameLayout[];
  comments?: string[];
  loop?: number;
  /** Raw bytes appended before the trailer */
  trailing?: number[];
  omitTrailer?: boolean;
}

function tableBits(palette: number[]): number {
  const entries = palette.length / 3;
  const bits = Math.log2(entries);
  if (!Number.isInteger(bits) || bits < 1 || bits > 8) {
    throw new Error(`Palette must have 2-256 entries and a power of two, got ${entries}`);
  }
  return bits;
}

function interlaceOrder(height: number): number[] {
  const order: number[] = [];
  for (const [start, step] of [[0, 8], [4, 8], [2, 4], [1, 2]]) {
    for (let y = start; y < height; y += step) order.push(y);
  }
  return order;
}

function writeSubBlocks(out: ByteWriter, data: Uint8Array): void {
  for (let i = 0; i < data.length; i += 255) {
    const block = data.subarray(i, i + 255);
    out.writeByte(block.length);
    out.writeBytes(block);
  }
  out.writeByte(0);
}

export function buildGif(layout: GifLayout): Uint8Array {
  const out = new ByteWriter();
  out.writeString('GIF89a');
  out.writeUInt16LE(layout.width);
  out.writeUInt16LE(layout.height);
  const globalBits = layout.palette ? tableBits(layout.palette) : 0;
  out.writeByte(layout.palette ? 0x80 | (globalBits - 1) : 0);
  out.writeByte(0);
  out.writeByte(0);
  if (layout.palette) out.writeBytes(layout.palette);

  if (layout.loop !== undefined) {
    out.writeBytes([0x21, 0xff, 11]);
    out.writeString('NETSCAPE2.0');
    out.writeBytes([3, 1, layout.loop & 0xff, layout.loop >> 8, 0]);
  }

  for (const comment of layout.comments ?? []) {
    out.writeBytes([0x21, 0xfe]);
    writeSubBlocks(out, stringToBytes(comment));
  }

  for (const frame of layout.frames) {
    if (frame.delay !== undefined || frame.disposal !== undefined || frame.transparentIndex !== undefined) {
      const delay = frame.delay ?? 0;
      const packed = ((frame.disposal ?? 0) << 2) | (frame.transparentIndex !== undefined ? 1 : 0);
      out.writeBytes([0x21, 0xf9, 4, packed, delay & 0xff, delay >> 8, frame.transparentIndex ?? 0, 0]);
    }

    out.writeByte(0x2c);
    out.writeUInt16LE(frame.left ?? 0);
    out.writeUInt16LE(frame.top ?? 0);
    out.writeUInt16LE(frame.width);
    out.writeUInt16LE(frame.height);
    const localBits = frame.localPalette ? tableBits(frame.localPalette) : 0;
    let packed = frame.interlaced ? 0x40 : 0;
    if (frame.localPalette) packed |= 0x80 | (localBits - 1);
    out.writeByte(packed);
    if (frame.localPalette) out.writeBytes(frame.localPalette);

    let indices = frame.indices;
    if (frame.interlaced) {
      indices = interlaceOrder(frame.height).flatMap((y) => frame.indices.slice(y * frame.width, (y + 1) * frame.width));
    }
    const codeSize = Math.max(2, frame.localPalette ? localBits : globalBits);
    out.writeByte(frame.minCodeSize ?? codeSize);
    writeSubBlocks(out, frame.lzwData ? Uint8Array.from(frame.lzwData) : compressLzw(Uint8Array.from(indices), codeSize));
  }

  if (layout.trailing) out.writeBytes(layout.trailing);
  if (!layout.omitTrailer) out.writeByte(0x3b);
  return out.toUint8Array();
}

/**
 * Image from packed RGBA bytes
 */
export function imageFromBytes(width: number, height: number, rgba: number[]): Image {
  return new Image(PixelBuffer.fromRgba8(width, height, Uint8Array.from(rgba)));
}

/**
 * Deterministic gradient with a transparent corner
 */
export function gradientImage(width: number, height: number): Image {
  const bytes: number[] = [];
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const alpha = x === 0 && y === 0 ? 0 : 255;
      bytes.push((x * 37) & 0xff, (y * 53) & 0xff, ((x + y) * 19) & 0xff, alpha);
    }
  }
  return imageFromBytes(width, height, bytes);
}

export function pixelBytes(image: Image): number[] {
  return Array.from(image.pixels.toRgba8());
}
