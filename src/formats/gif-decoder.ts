import { FormatError } from '../errors.js';
import { DisposalMethod, Image, ImageFrame } from '../image.js';
import { createChildLogger } from '../logger.js';
import { PixelBuffer } from '../pixel-buffer.js';
import { bytesToString } from '../utils.js';
import { ByteReader } from './byte-reader.js';
import { decompressLzw } from './gif-lzw.js';
import type { DecodeOptions } from './types.js';

const log = createChildLogger({ module: 'gif-decoder' });

export const GIF_HEADER_SIZE = 6;
export const MAX_COMMENT_LENGTH = 8192;
export const COMMENTS_PROPERTY = 'Comments';

export const EXTENSION_INTRODUCER = 0x21;
export const IMAGE_SEPARATOR = 0x2c;
export const TRAILER = 0x3b;
export const GRAPHIC_CONTROL_LABEL = 0xf9;
export const COMMENT_LABEL = 0xfe;
export const APPLICATION_LABEL = 0xff;
export const PLAIN_TEXT_LABEL = 0x01;

const LOOP_APPLICATIONS = ['NETSCAPE2.0', 'ANIMEXTS1.0'];

export interface LogicalScreenDescriptor {
  width: number;
  height: number;
  globalColorTableFlag: boolean;
  /** Number of entries */
  globalColorTableSize: number;
  backgroundColorIndex: number;
  pixelAspectRatio: number;
}

export interface GraphicControlExtension {
  /** Hundredths of a second */
  delayTime: number;
  transparencyFlag: boolean;
  transparencyIndex: number;
  disposalMethod: DisposalMethod;
}

export interface ImageDescriptor {
  left: number;
  top: number;
  width: number;
  height: number;
  localColorTableFlag: boolean;
  localColorTableSize: number;
  interlaceFlag: boolean;
}

/**
 * Everything one decode call accumulates. Never shared between calls.
 */
interface DecodeState {
  readonly globalColorTable: Uint8Array | null;
  canvas: PixelBuffer;
  graphicControl: GraphicControlExtension | null;
  image: Image | null;
  comments: string[];
  repeatCount: number | null;
}

export function isGifHeader(header: Uint8Array): boolean {
  if (header.length < GIF_HEADER_SIZE) return false;
  const signature = bytesToString(header, 0, GIF_HEADER_SIZE);
  return signature === 'GIF87a' || signature === 'GIF89a';
}

function toDisposalMethod(value: number): DisposalMethod {
  switch (value) {
    case 1:
      return DisposalMethod.DoNotDispose;
    case 2:
      return DisposalMethod.RestoreToBackground;
    case 3:
      return DisposalMethod.RestoreToPrevious;
    default:
      return DisposalMethod.None;
  }
}

export function readLogicalScreenDescriptor(reader: ByteReader, options: DecodeOptions): LogicalScreenDescriptor {
  const width = reader.readUInt16LE();
  const height = reader.readUInt16LE();
  const packed = reader.readByte();
  const descriptor: LogicalScreenDescriptor = {
    width,
    height,
    globalColorTableFlag: (packed & 0x80) !== 0,
    globalColorTableSize: 2 << (packed & 0x07),
    backgroundColorIndex: reader.readByte(),
    pixelAspectRatio: reader.readByte()
  };

  if (width === 0 || height === 0) {
    throw new FormatError(`Invalid GIF canvas size ${width}x${height}`);
  }
  if (width > options.maxWidth || height > options.maxHeight) {
    throw new FormatError(
      `GIF canvas ${width}x${height} exceeds the maximum of ${options.maxWidth}x${options.maxHeight}`
    );
  }
  return descriptor;
}

export function readGraphicControlExtension(reader: ByteReader): GraphicControlExtension {
  const block = reader.readBytes(6);
  const packed = block[1];
  return {
    transparencyFlag: (packed & 0x01) !== 0,
    disposalMethod: toDisposalMethod((packed & 0x1c) >> 2),
    delayTime: block[2] | (block[3] << 8),
    transparencyIndex: block[4]
  };
}

export function readImageDescriptor(reader: ByteReader): ImageDescriptor {
  const block = reader.readBytes(9);
  const packed = block[8];
  return {
    left: block[0] | (block[1] << 8),
    top: block[2] | (block[3] << 8),
    width: block[4] | (block[5] << 8),
    height: block[6] | (block[7] << 8),
    localColorTableFlag: (packed & 0x80) !== 0,
    interlaceFlag: (packed & 0x40) !== 0,
    localColorTableSize: 2 << (packed & 0x07)
  };
}

/**
 * Destination row for each decoded row. Interlaced data arrives in four passes
 * starting at rows 0, 4, 2, 1 with strides 8, 8, 4, 2.
 */
export function rowOrder(height: number, interlaced: boolean): Uint32Array {
  const order = new Uint32Array(height);
  if (!interlaced) {
    for (let i = 0; i < height; i++) order[i] = i;
    return order;
  }
  const starts = [0, 4, 2, 1];
  const strides = [8, 8, 4, 2];
  let n = 0;
  for (let pass = 0; pass < 4; pass++) {
    for (let y = starts[pass]; y < height; y += strides[pass]) {
      order[n++] = y;
    }
  }
  return order;
}

function readComment(reader: ByteReader): string {
  const bytes = reader.readSubBlocks(MAX_COMMENT_LENGTH);
  return new TextDecoder('utf-8').decode(bytes);
}

function readApplicationExtension(reader: ByteReader, state: DecodeState): void {
  const size = reader.readByte();
  const identifier = bytesToString(reader.readBytes(size));
  if (!LOOP_APPLICATIONS.includes(identifier)) {
    reader.skipSubBlocks();
    return;
  }
  const data = reader.readSubBlocks();
  if (data.length >= 3 && data[0] === 1) {
    state.repeatCount = data[1] | (data[2] << 8);
  }
}

function skipExtension(reader: ByteReader): void {
  const size = reader.readByte();
  reader.skip(size);
  reader.skipSubBlocks();
}

function drawFrame(
  state: DecodeState,
  descriptor: ImageDescriptor,
  colorTable: Uint8Array,
  indices: Uint8Array
): void {
  const canvas = state.canvas;
  const control = state.graphicControl;
  const transparentIndex = control?.transparencyFlag ? control.transparencyIndex : -1;
  const rows = rowOrder(descriptor.height, descriptor.interlaceFlag);
  const data = canvas.data;

  for (let row = 0; row < descriptor.height; row++) {
    const y = descriptor.top + rows[row];
    if (y >= canvas.height) continue;
    const source = row * descriptor.width;
    for (let x = 0; x < descriptor.width; x++) {
      const cx = descriptor.left + x;
      if (cx >= canvas.width) break;
      const index = indices[source + x];
      if (index === transparentIndex) continue;
      const target = canvas.offset(cx, y);
      const entry = index * 3;
      if (entry + 2 < colorTable.length) {
        data[target] = colorTable[entry] / 255;
        data[target + 1] = colorTable[entry + 1] / 255;
        data[target + 2] = colorTable[entry + 2] / 255;
      } else {
        data[target] = 0;
        data[target + 1] = 0;
        data[target + 2] = 0;
      }
      data[target + 3] = 1;
    }
  }
}

function clearRectangle(canvas: PixelBuffer, descriptor: ImageDescriptor): void {
  const right = Math.min(canvas.width, descriptor.left + descriptor.width);
  const bottom = Math.min(canvas.height, descriptor.top + descriptor.height);
  for (let y = descriptor.top; y < bottom; y++) {
    for (let x = descriptor.left; x < right; x++) {
      canvas.data.fill(0, canvas.offset(x, y), canvas.offset(x, y) + 4);
    }
  }
}

function readFrame(reader: ByteReader, state: DecodeState): void {
  const descriptor = readImageDescriptor(reader);
  const colorTable = descriptor.localColorTableFlag
    ? reader.readBytes(descriptor.localColorTableSize * 3)
    : state.globalColorTable;
  if (!colorTable) {
    throw new FormatError('GIF frame has neither a local nor a global color table');
  }

  const minCodeSize = reader.readByte();
  const compressed = reader.readSubBlocks();
  const indices = decompressLzw(compressed, minCodeSize, descriptor.width * descriptor.height);

  const control = state.graphicControl;
  const disposal = control?.disposalMethod ?? DisposalMethod.None;
  const previous = disposal === DisposalMethod.RestoreToPrevious ? state.canvas.clone() : null;

  drawFrame(state, descriptor, colorTable, indices);

  const snapshot = state.canvas.clone();
  const delay = (control?.delayTime ?? 0) * 10;
  if (!state.image) {
    state.image = new Image(snapshot);
    state.image.frameDelay = delay;
    state.image.disposal = disposal;
  } else {
    state.image.addFrame(new ImageFrame(snapshot, delay, disposal));
  }

  if (disposal === DisposalMethod.RestoreToBackground) {
    clearRectangle(state.canvas, descriptor);
  } else if (previous) {
    state.canvas = previous;
  }
  state.graphicControl = null;
}

function readBlocks(reader: ByteReader, state: DecodeState): void {
  while (!reader.atEnd) {
    const flag = reader.readByte();
    if (flag === IMAGE_SEPARATOR) {
      readFrame(reader, state);
    } else if (flag === EXTENSION_INTRODUCER) {
      const label = reader.readByte();
      switch (label) {
        case GRAPHIC_CONTROL_LABEL:
          state.graphicControl = readGraphicControlExtension(reader);
          break;
        case COMMENT_LABEL:
          state.comments.push(readComment(reader));
          break;
        case APPLICATION_LABEL:
          readApplicationExtension(reader, state);
          break;
        default:
          skipExtension(reader);
      }
    } else if (flag === TRAILER) {
      return;
    } else {
      log.warn({ flag, offset: reader.offset - 1 }, 'Unexpected block, treating as end of GIF data');
      return;
    }
  }
}

function finish(state: DecodeState, image: Image): Image {
  image.repeatCount = state.repeatCount;
  for (const comment of state.comments) {
    image.properties.push({ name: COMMENTS_PROPERTY, value: comment });
  }
  return image;
}

/**
 * Decode a GIF87a/GIF89a stream, compositing every frame onto a canvas the size
 * of the logical screen.
 *
 * When a structural error interrupts the stream the frames composited so far
 * are not discarded: the thrown FormatError carries them as `partialImage`.
 */
export function decodeGif(data: Uint8Array, options: DecodeOptions): Image {
  const reader = new ByteReader(data);
  if (!isGifHeader(reader.readBytes(GIF_HEADER_SIZE))) {
    throw new FormatError('Invalid GIF signature');
  }

  const screen = readLogicalScreenDescriptor(reader, options);
  const globalColorTable = screen.globalColorTableFlag
    ? reader.readBytes(screen.globalColorTableSize * 3)
    : null;

  const state: DecodeState = {
    globalColorTable,
    canvas: new PixelBuffer(screen.width, screen.height),
    graphicControl: null,
    image: null,
    comments: [],
    repeatCount: null
  };

  try {
    readBlocks(reader, state);
  } catch (error) {
    if (error instanceof FormatError && state.image && !error.partialImage) {
      throw new FormatError(error.message, { cause: error, partialImage: finish(state, state.image) });
    }
    throw error;
  }

  if (!state.image) {
    throw new FormatError('GIF contains no image data');
  }

  log.debug(
    { width: screen.width, height: screen.height, frames: state.image.frames.length + 1 },
    'Decoded GIF'
  );
  return finish(state, state.image);
}
