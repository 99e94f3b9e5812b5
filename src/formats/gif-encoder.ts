import { DisposalMethod, type Image } from '../image.js';
import { createChildLogger } from '../logger.js';
import type { PixelBuffer } from '../pixel-buffer.js';
import { ByteWriter } from '../utils.js';
import {
  APPLICATION_LABEL,
  COMMENTS_PROPERTY,
  COMMENT_LABEL,
  EXTENSION_INTRODUCER,
  GRAPHIC_CONTROL_LABEL,
  IMAGE_SEPARATOR,
  MAX_COMMENT_LENGTH,
  TRAILER
} from './gif-decoder.js';
import { compressLzw } from './gif-lzw.js';
import { applyPalette, buildPalette, type Palette } from './gif-quantizer.js';

const log = createChildLogger({ module: 'gif-encoder' });

const MAX_SUB_BLOCK = 255;

function tableBits(colorCount: number): number {
  let bits = 1;
  while ((1 << bits) < colorCount) bits++;
  return bits;
}

function writeSubBlocks(out: ByteWriter, data: Uint8Array): void {
  for (let offset = 0; offset < data.length; offset += MAX_SUB_BLOCK) {
    const chunk = data.subarray(offset, Math.min(offset + MAX_SUB_BLOCK, data.length));
    out.writeByte(chunk.length);
    out.writeBytes(chunk);
  }
  out.writeByte(0);
}

function writeLoopExtension(out: ByteWriter, repeatCount: number): void {
  out.writeByte(EXTENSION_INTRODUCER);
  out.writeByte(APPLICATION_LABEL);
  out.writeByte(11);
  out.writeString('NETSCAPE2.0');
  out.writeByte(3);
  out.writeByte(1);
  out.writeUInt16LE(repeatCount);
  out.writeByte(0);
}

function writeComment(out: ByteWriter, text: string): void {
  const bytes = new TextEncoder().encode(text).subarray(0, MAX_COMMENT_LENGTH);
  out.writeByte(EXTENSION_INTRODUCER);
  out.writeByte(COMMENT_LABEL);
  writeSubBlocks(out, bytes);
}

function writeFrame(out: ByteWriter, pixels: PixelBuffer, palette: Palette, delay: number, minCodeSize: number): void {
  const transparent = palette.transparentIndex !== -1;
  out.writeByte(EXTENSION_INTRODUCER);
  out.writeByte(GRAPHIC_CONTROL_LABEL);
  out.writeByte(4);
  out.writeByte((DisposalMethod.RestoreToBackground << 2) | (transparent ? 1 : 0));
  out.writeUInt16LE(Math.min(0xffff, Math.round(delay / 10)));
  out.writeByte(transparent ? palette.transparentIndex : 0);
  out.writeByte(0);

  out.writeByte(IMAGE_SEPARATOR);
  out.writeUInt16LE(0);
  out.writeUInt16LE(0);
  out.writeUInt16LE(pixels.width);
  out.writeUInt16LE(pixels.height);
  out.writeByte(0);

  out.writeByte(minCodeSize);
  writeSubBlocks(out, compressLzw(applyPalette(pixels, palette), minCodeSize));
}

/**
 * Encode as GIF89a with one global color table shared by all frames.
 * Every frame covers the whole canvas and is cleared to the background afterwards.
 */
export function encodeGif(image: Image): Uint8Array {
  const buffers = [image.pixels, ...image.frames.map((frame) => frame.pixels)];
  const palette = buildPalette(buffers);
  const bits = tableBits(Math.max(2, palette.colorCount));
  const minCodeSize = Math.max(2, bits);

  const out = new ByteWriter(image.width * image.height);
  out.writeString('GIF89a');
  out.writeUInt16LE(image.width);
  out.writeUInt16LE(image.height);
  out.writeByte(0x80 | (0x07 << 4) | (bits - 1));
  out.writeByte(0);
  out.writeByte(0);

  const table = new Uint8Array((1 << bits) * 3);
  table.set(palette.colors);
  out.writeBytes(table);

  if (image.isAnimated && image.repeatCount !== null) {
    writeLoopExtension(out, image.repeatCount);
  }
  for (const property of image.properties) {
    if (property.name === COMMENTS_PROPERTY) {
      writeComment(out, property.value);
    }
  }

  writeFrame(out, image.pixels, palette, image.frameDelay, minCodeSize);
  for (const frame of image.frames) {
    writeFrame(out, frame.pixels, palette, frame.delay, minCodeSize);
  }
  out.writeByte(TRAILER);

  log.debug({ frames: buffers.length, colors: palette.colorCount }, 'Encoded GIF');
  return out.toUint8Array();
}
