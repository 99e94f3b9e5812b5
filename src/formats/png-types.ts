/**
 * A chunk as read from the file; the parser has already checked its CRC
 */
export interface PngChunk {
  /** Data length in bytes */
  length: number;
  /** Four ASCII letters; letter case carries the ancillary and safe-to-copy bits */
  type: string;
  data: Uint8Array;
  crc: number;
}

/**
 * IHDR fields. Compression and filter method 0 are the only ones defined.
 */
export interface PngHeader {
  width: number;
  height: number;
  /** Bits per sample, not per pixel */
  bitDepth: number;
  colorType: number;
  compressionMethod: number;
  filterMethod: number;
  /** 0 = sequential, 1 = Adam7 */
  interlaceMethod: number;
}

export enum ColorType {
  GRAYSCALE = 0,
  RGB = 2,
  PALETTE = 3,
  GRAYSCALE_ALPHA = 4,
  RGBA = 6
}

export const SAMPLES_PER_PIXEL: Readonly<Record<ColorType, number>> = {
  [ColorType.GRAYSCALE]: 1,
  [ColorType.RGB]: 3,
  [ColorType.PALETTE]: 1,
  [ColorType.GRAYSCALE_ALPHA]: 2,
  [ColorType.RGBA]: 4
};

export const VALID_BIT_DEPTHS: Readonly<Record<ColorType, readonly number[]>> = {
  [ColorType.GRAYSCALE]: [1, 2, 4, 8, 16],
  [ColorType.RGB]: [8, 16],
  [ColorType.PALETTE]: [1, 2, 4, 8],
  [ColorType.GRAYSCALE_ALPHA]: [8, 16],
  [ColorType.RGBA]: [8, 16]
};

export function isColorType(value: number): value is ColorType {
  return Object.hasOwn(SAMPLES_PER_PIXEL, value);
}
