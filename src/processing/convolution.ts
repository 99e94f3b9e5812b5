/**
 * Convolution filters. Edges are handled by clamping sample coordinates to the
 * nearest pixel inside the source rectangle.
 */

import { ArgumentError } from '../errors.js';
import { PixelBuffer } from '../pixel-buffer.js';
import { clamp } from '../utils.js';
import { GREYSCALE_BT709 } from './color-matrix.js';
import type { PrepareContext, Rectangle, RowProcessor } from './row-processor.js';

/**
 * Normalized 1D gaussian of size 2 * ceil(3 * sigma) + 1
 */
export function gaussianKernel(sigma: number): Float32Array {
  if (!(sigma > 0)) {
    throw new ArgumentError(`Sigma must be positive, got ${sigma}`);
  }
  const radius = Math.ceil(sigma * 3);
  const kernel = new Float32Array(radius * 2 + 1);
  let sum = 0;
  for (let i = -radius; i <= radius; i++) {
    const value = Math.exp(-(i * i) / (2 * sigma * sigma));
    kernel[i + radius] = value;
    sum += value;
  }
  for (let i = 0; i < kernel.length; i++) {
    kernel[i] /= sum;
  }
  return kernel;
}

/**
 * Sharpening counterpart of the gaussian: negated, with 2 added at the centre,
 * so it still sums to one
 */
export function sharpenKernel(sigma: number): Float32Array {
  const kernel = gaussianKernel(sigma).map((value) => -value);
  kernel[(kernel.length - 1) / 2] += 2;
  return kernel;
}

export function boxKernel(radius: number): Float32Array {
  if (!Number.isInteger(radius) || radius < 1) {
    throw new ArgumentError(`Box blur radius must be a positive integer, got ${radius}`);
  }
  return new Float32Array(radius * 2 + 1).fill(1 / (radius * 2 + 1));
}

/**
 * Horizontal kernel as the source pass, vertical kernel per target row. Color
 * is convolved with alpha premultiplied. The state is the horizontal pass.
 */
export class SeparableConvolutionProcessor implements RowProcessor<Float32Array> {
  constructor(
    readonly name: string,
    readonly kernelX: Float32Array,
    readonly kernelY: Float32Array = kernelX
  ) {
    if (kernelX.length % 2 === 0 || kernelY.length % 2 === 0) {
      throw new ArgumentError('Convolution kernels must have odd length');
    }
  }

  prepare({ sourceRectangle }: PrepareContext): Float32Array {
    return new Float32Array(sourceRectangle.width * sourceRectangle.height * 4);
  }

  sourcePassRows(sourceRectangle: Rectangle): number {
    return sourceRectangle.height;
  }

  applySourceRows(pass: Float32Array, source: PixelBuffer, sourceRectangle: Rectangle, startY: number, endY: number): void {
    const { x: left, y: top, width } = sourceRectangle;
    const radius = (this.kernelX.length - 1) / 2;
    const data = source.data;

    for (let y = startY; y < endY; y++) {
      for (let x = 0; x < width; x++) {
        let r = 0, g = 0, b = 0, a = 0;
        for (let k = 0; k < this.kernelX.length; k++) {
          const sx = clamp(x + k - radius, 0, width - 1);
          const i = source.offset(left + sx, top + y);
          const w = this.kernelX[k];
          const alpha = data[i + 3];
          r += data[i] * alpha * w;
          g += data[i + 1] * alpha * w;
          b += data[i + 2] * alpha * w;
          a += alpha * w;
        }
        const o = (y * width + x) * 4;
        pass[o] = r;
        pass[o + 1] = g;
        pass[o + 2] = b;
        pass[o + 3] = a;
      }
    }
  }

  applyRows(
    target: PixelBuffer,
    _source: PixelBuffer,
    _targetRectangle: Rectangle,
    sourceRectangle: Rectangle,
    startY: number,
    endY: number,
    pass: Float32Array
  ): void {
    const { x: left, y: top, width, height } = sourceRectangle;
    const radius = (this.kernelY.length - 1) / 2;
    const out = target.data;

    for (let y = Math.max(startY, top); y < Math.min(endY, top + height); y++) {
      const localY = y - top;
      for (let x = 0; x < width; x++) {
        let r = 0, g = 0, b = 0, a = 0;
        for (let k = 0; k < this.kernelY.length; k++) {
          const sy = clamp(localY + k - radius, 0, height - 1);
          const i = (sy * width + x) * 4;
          const w = this.kernelY[k];
          r += pass[i] * w;
          g += pass[i + 1] * w;
          b += pass[i + 2] * w;
          a += pass[i + 3] * w;
        }
        const o = target.offset(left + x, y);
        const alpha = clamp(a, 0, 1);
        if (a <= 0) {
          out[o] = out[o + 1] = out[o + 2] = out[o + 3] = 0;
          continue;
        }
        out[o] = clamp(r / a, 0, 1);
        out[o + 1] = clamp(g / a, 0, 1);
        out[o + 2] = clamp(b / a, 0, 1);
        out[o + 3] = alpha;
      }
    }
  }
}

export const createGaussianBlur = (sigma: number): SeparableConvolutionProcessor =>
  new SeparableConvolutionProcessor('gaussianBlur', gaussianKernel(sigma));
export const createGaussianSharpen = (sigma: number): SeparableConvolutionProcessor =>
  new SeparableConvolutionProcessor('gaussianSharpen', sharpenKernel(sigma));
export const createBoxBlur = (radius: number): SeparableConvolutionProcessor =>
  new SeparableConvolutionProcessor('boxBlur', boxKernel(radius));

/** Square kernel, row-major */
export type Kernel2D = readonly (readonly number[])[];

export interface EdgeOperator {
  x: Kernel2D;
  /** Absent for single-kernel operators such as the Laplacians */
  y?: Kernel2D;
}

export const EDGE_OPERATOR_NAMES = [
  'prewitt',
  'scharr',
  'sobel',
  'kayyali',
  'laplacian3x3',
  'laplacian5x5',
  'laplacianOfGaussian'
] as const;

export type EdgeOperatorName = typeof EDGE_OPERATOR_NAMES[number];

export const EDGE_OPERATORS: Readonly<Record<EdgeOperatorName, EdgeOperator>> = {
  prewitt: {
    x: [[-1, 0, 1], [-1, 0, 1], [-1, 0, 1]],
    y: [[1, 1, 1], [0, 0, 0], [-1, -1, -1]]
  },
  scharr: {
    x: [[-3, 0, 3], [-10, 0, 10], [-3, 0, 3]],
    y: [[3, 10, 3], [0, 0, 0], [-3, -10, -3]]
  },
  sobel: {
    x: [[-1, 0, 1], [-2, 0, 2], [-1, 0, 1]],
    y: [[-1, -2, -1], [0, 0, 0], [1, 2, 1]]
  },
  kayyali: {
    x: [[6, 0, -6], [0, 0, 0], [-6, 0, 6]],
    y: [[-6, 0, 6], [0, 0, 0], [6, 0, -6]]
  },
  laplacian3x3: {
    x: [[-1, -1, -1], [-1, 8, -1], [-1, -1, -1]]
  },
  laplacian5x5: {
    x: [
      [-1, -1, -1, -1, -1],
      [-1, -1, -1, -1, -1],
      [-1, -1, 24, -1, -1],
      [-1, -1, -1, -1, -1],
      [-1, -1, -1, -1, -1]
    ]
  },
  laplacianOfGaussian: {
    x: [
      [0, 0, -1, 0, 0],
      [0, -1, -2, -1, 0],
      [-1, -2, 16, -2, -1],
      [0, -1, -2, -1, 0],
      [0, 0, -1, 0, 0]
    ]
  }
};

function writeGreyscaleRows(source: PixelBuffer, grey: PixelBuffer, rect: Rectangle, startY: number, endY: number): void {
  const m = GREYSCALE_BT709;
  for (let y = rect.y + startY; y < rect.y + endY; y++) {
    for (let x = rect.x; x < rect.x + rect.width; x++) {
      const i = source.offset(x, y);
      const luma = source.data[i] * m[0] + source.data[i + 1] * m[4] + source.data[i + 2] * m[8];
      grey.data[i] = grey.data[i + 1] = grey.data[i + 2] = luma;
      grey.data[i + 3] = source.data[i + 3];
    }
  }
}

/**
 * 2D edge detection. Kernel pairs report the gradient magnitude per channel;
 * single kernels report the clamped response. Alpha is kept.
 *
 * The state is the buffer the kernels read: a greyscale copy filled by the
 * source pass, or the source itself.
 */
export class EdgeDetectionProcessor implements RowProcessor<PixelBuffer> {
  readonly name = 'edgeDetection';

  constructor(readonly operator: EdgeOperator, readonly greyscale = true) {}

  prepare({ source }: PrepareContext): PixelBuffer {
    return this.greyscale ? new PixelBuffer(source.width, source.height) : source;
  }

  sourcePassRows(sourceRectangle: Rectangle): number {
    return this.greyscale ? sourceRectangle.height : 0;
  }

  applySourceRows(input: PixelBuffer, source: PixelBuffer, sourceRectangle: Rectangle, startY: number, endY: number): void {
    writeGreyscaleRows(source, input, sourceRectangle, startY, endY);
  }

  private convolve(kernel: Kernel2D, x: number, y: number, rect: Rectangle, input: PixelBuffer, sums: number[]): void {
    const radius = (kernel.length - 1) / 2;
    sums[0] = sums[1] = sums[2] = 0;
    for (let ky = 0; ky < kernel.length; ky++) {
      const sy = clamp(y + ky - radius, rect.y, rect.y + rect.height - 1);
      const row = kernel[ky];
      for (let kx = 0; kx < row.length; kx++) {
        const w = row[kx];
        if (w === 0) continue;
        const sx = clamp(x + kx - radius, rect.x, rect.x + rect.width - 1);
        const i = input.offset(sx, sy);
        sums[0] += input.data[i] * w;
        sums[1] += input.data[i + 1] * w;
        sums[2] += input.data[i + 2] * w;
      }
    }
  }

  applyRows(
    target: PixelBuffer,
    source: PixelBuffer,
    _targetRectangle: Rectangle,
    sourceRectangle: Rectangle,
    startY: number,
    endY: number,
    input: PixelBuffer
  ): void {
    const { x: left, y: top, width, height } = sourceRectangle;
    const gx = [0, 0, 0];
    const gy = [0, 0, 0];
    const out = target.data;

    for (let y = Math.max(startY, top); y < Math.min(endY, top + height); y++) {
      for (let x = left; x < left + width; x++) {
        const o = target.offset(x, y);
        this.convolve(this.operator.x, x, y, sourceRectangle, input, gx);
        if (this.operator.y) {
          this.convolve(this.operator.y, x, y, sourceRectangle, input, gy);
          for (let c = 0; c < 3; c++) {
            out[o + c] = clamp(Math.sqrt(gx[c] * gx[c] + gy[c] * gy[c]), 0, 1);
          }
        } else {
          for (let c = 0; c < 3; c++) {
            out[o + c] = clamp(gx[c], 0, 1);
          }
        }
        out[o + 3] = source.data[source.offset(x, y) + 3];
      }
    }
  }
}
