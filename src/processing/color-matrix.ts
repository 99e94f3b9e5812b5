import { compandChannel, expandChannel } from '../color.js';
import { clamp } from '../utils.js';
import { PixelProcessor } from './row-processor.js';

/**
 * 5x4 color matrix, row-major. Rows 0-3 weight the input r, g, b, a; row 4 is
 * the offset. Column j produces output channel j.
 */
export type ColorMatrix = readonly [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number
];

function greyscale(r: number, g: number, b: number): ColorMatrix {
  return [
    r, r, r, 0,
    g, g, g, 0,
    b, b, b, 0,
    0, 0, 0, 1,
    0, 0, 0, 0
  ];
}

export const GREYSCALE_BT709 = greyscale(0.2126, 0.7152, 0.0722);
export const GREYSCALE_BT601 = greyscale(0.299, 0.587, 0.114);

export const SEPIA: ColorMatrix = [
  0.393, 0.349, 0.272, 0,
  0.769, 0.686, 0.534, 0,
  0.189, 0.168, 0.131, 0,
  0, 0, 0, 1,
  0, 0, 0, 0
];

export const BLACK_WHITE: ColorMatrix = [
  1.5, 1.5, 1.5, 0,
  1.5, 1.5, 1.5, 0,
  1.5, 1.5, 1.5, 0,
  0, 0, 0, 1,
  -1, -1, -1, 0
];

export const POLAROID: ColorMatrix = [
  1.538, -0.062, -0.262, 0,
  -0.022, 1.578, -0.022, 0,
  0.216, -0.16, 1.5831, 0,
  0, 0, 0, 1,
  0.02, -0.05, -0.05, 0
];

export const LOMOGRAPH: ColorMatrix = [
  1.5, 0, 0, 0,
  0, 1.45, 0, 0,
  0, 0, 1.09, 0,
  0, 0, 0, 1,
  -0.1, 0.05, -0.08, 0
];

export const KODACHROME: ColorMatrix = [
  0.7297023, 0, 0, 0,
  0, 0.6109577, 0, 0,
  0, 0, 0.597218, 0,
  0, 0, 0, 1,
  0.105, 0.145, 0.155, 0
];

/**
 * Multiply each pixel by a color matrix. With `linear` set the color is
 * expanded from sRGB first and companded again afterwards.
 */
export class ColorMatrixProcessor extends PixelProcessor {
  constructor(
    readonly name: string,
    readonly matrix: ColorMatrix,
    readonly linear = true
  ) {
    super();
  }

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, o: number): void {
    const m = this.matrix;
    const sr = this.linear ? expandChannel(r) : r;
    const sg = this.linear ? expandChannel(g) : g;
    const sb = this.linear ? expandChannel(b) : b;

    for (let c = 0; c < 4; c++) {
      let value = sr * m[c] + sg * m[4 + c] + sb * m[8 + c] + a * m[12 + c] + m[16 + c];
      value = clamp(value, 0, 1);
      out[o + c] = c < 3 && this.linear ? clamp(compandChannel(value), 0, 1) : value;
    }
  }
}

export const createGreyscale = (mode: 'bt709' | 'bt601' = 'bt709'): ColorMatrixProcessor =>
  new ColorMatrixProcessor('greyscale', mode === 'bt601' ? GREYSCALE_BT601 : GREYSCALE_BT709);
export const createSepia = (): ColorMatrixProcessor => new ColorMatrixProcessor('sepia', SEPIA);
export const createBlackWhite = (): ColorMatrixProcessor => new ColorMatrixProcessor('blackWhite', BLACK_WHITE);
export const createPolaroid = (): ColorMatrixProcessor => new ColorMatrixProcessor('polaroid', POLAROID);
export const createLomograph = (): ColorMatrixProcessor => new ColorMatrixProcessor('lomograph', LOMOGRAPH, false);
export const createKodachrome = (): ColorMatrixProcessor => new ColorMatrixProcessor('kodachrome', KODACHROME);
