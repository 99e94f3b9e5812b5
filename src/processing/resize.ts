import { compandChannel, expandChannel } from '../color.js';
import { ArgumentError } from '../errors.js';
import type { PixelBuffer } from '../pixel-buffer.js';
import { clamp } from '../utils.js';
import type { Resampler } from './resamplers.js';
import type { PrepareContext, Rectangle, RowProcessor, Size } from './row-processor.js';

export const WEIGHT_EPSILON = 1e-4;

/**
 * Source samples contributing to one destination coordinate
 */
export interface WeightSet {
  indices: number[];
  weights: number[];
  sum: number;
}

/**
 * Per-axis weights. When shrinking, the kernel is stretched by the scale factor
 * so every source sample contributes; windows are clamped to the source edges.
 */
export function computeWeights(
  sourceSize: number,
  destinationSize: number,
  resampler: Resampler,
  epsilon = WEIGHT_EPSILON
): WeightSet[] {
  const du = sourceSize / destinationSize;
  const scale = Math.max(du, 1);
  const ru = Math.ceil(scale * resampler.radius);
  const sets: WeightSet[] = [];

  for (let i = 0; i < destinationSize; i++) {
    const fu = (i + 0.5) * du - 0.5;
    const start = Math.max(Math.ceil(fu - ru), 0);
    const end = Math.min(Math.floor(fu + ru), sourceSize - 1);
    const set: WeightSet = { indices: [], weights: [], sum: 0 };

    for (let a = start; a <= end; a++) {
      const w = resampler.weight((a - fu) / scale);
      if (Math.abs(w) > epsilon) {
        set.indices.push(a);
        set.weights.push(w);
        set.sum += w;
      }
    }

    if (set.indices.length === 0 || set.sum === 0) {
      set.indices = [clamp(Math.round(fu), 0, sourceSize - 1)];
      set.weights = [1];
      set.sum = 1;
    }
    sets.push(set);
  }
  return sets;
}

export interface ResizeState {
  horizontal: WeightSet[];
  vertical: WeightSet[];
  /** Horizontally resampled rows: premultiplied linear RGBA, source height x target width; null when sizes match */
  pass: Float32Array | null;
}

/**
 * Resample to a new size. Colors are averaged in linear light with alpha
 * premultiplied; fully transparent samples carry no color.
 *
 * The horizontal weighted sums run as the source pass, the vertical ones as
 * target rows.
 */
export class ResizeProcessor implements RowProcessor<ResizeState> {
  readonly name = 'resize';

  constructor(
    readonly width: number,
    readonly height: number,
    readonly resampler: Resampler,
    readonly epsilon = WEIGHT_EPSILON
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 1 || height < 1) {
      throw new ArgumentError(`Invalid resize target ${width}x${height}`);
    }
  }

  targetSize(): Size {
    return { width: this.width, height: this.height };
  }

  private isIdentity(source: Rectangle): boolean {
    return source.width === this.width && source.height === this.height;
  }

  prepare({ sourceRectangle }: PrepareContext): ResizeState {
    if (this.isIdentity(sourceRectangle)) {
      return { horizontal: [], vertical: [], pass: null };
    }
    return {
      horizontal: computeWeights(sourceRectangle.width, this.width, this.resampler, this.epsilon),
      vertical: computeWeights(sourceRectangle.height, this.height, this.resampler, this.epsilon),
      pass: new Float32Array(sourceRectangle.height * this.width * 4)
    };
  }

  sourcePassRows(sourceRectangle: Rectangle): number {
    return this.isIdentity(sourceRectangle) ? 0 : sourceRectangle.height;
  }

  applySourceRows(state: ResizeState, source: PixelBuffer, sourceRectangle: Rectangle, startY: number, endY: number): void {
    const pass = state.pass;
    if (!pass) return;
    const data = source.data;
    // current source row in linear light
    const linear = new Float32Array(sourceRectangle.width * 4);

    for (let sy = startY; sy < endY; sy++) {
      const rowStart = source.offset(sourceRectangle.x, sourceRectangle.y + sy);
      for (let i = 0; i < linear.length; i += 4) {
        linear[i] = expandChannel(data[rowStart + i]);
        linear[i + 1] = expandChannel(data[rowStart + i + 1]);
        linear[i + 2] = expandChannel(data[rowStart + i + 2]);
        linear[i + 3] = data[rowStart + i + 3];
      }

      for (let x = 0; x < this.width; x++) {
        const set = state.horizontal[x];
        let r = 0, g = 0, b = 0, a = 0;
        for (let k = 0; k < set.indices.length; k++) {
          const i = set.indices[k] * 4;
          const alpha = linear[i + 3];
          if (alpha < this.epsilon) continue;
          const w = (set.weights[k] / set.sum) * alpha;
          r += linear[i] * w;
          g += linear[i + 1] * w;
          b += linear[i + 2] * w;
          a += w;
        }
        const o = (sy * this.width + x) * 4;
        pass[o] = r;
        pass[o + 1] = g;
        pass[o + 2] = b;
        pass[o + 3] = a;
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
    state: ResizeState
  ): void {
    const out = target.data;
    const pass = state.pass;

    if (!pass) {
      for (let y = startY; y < endY; y++) {
        const from = source.offset(sourceRectangle.x, sourceRectangle.y + y);
        out.set(source.data.subarray(from, from + this.width * 4), target.offset(0, y));
      }
      return;
    }

    for (let y = startY; y < endY; y++) {
      const set = state.vertical[y];
      for (let x = 0; x < this.width; x++) {
        let r = 0, g = 0, b = 0, a = 0;
        for (let k = 0; k < set.indices.length; k++) {
          const i = (set.indices[k] * this.width + x) * 4;
          if (Math.abs(pass[i + 3]) < this.epsilon) continue;
          const w = set.weights[k] / set.sum;
          r += pass[i] * w;
          g += pass[i + 1] * w;
          b += pass[i + 2] * w;
          a += pass[i + 3] * w;
        }

        const o = target.offset(x, y);
        const alpha = clamp(Math.round(a * 100) / 100, 0, 1);
        if (alpha <= 0) {
          out[o] = out[o + 1] = out[o + 2] = out[o + 3] = 0;
          continue;
        }
        out[o] = clamp(compandChannel(clamp(r / a, 0, 1)), 0, 1);
        out[o + 1] = clamp(compandChannel(clamp(g / a, 0, 1)), 0, 1);
        out[o + 2] = clamp(compandChannel(clamp(b / a, 0, 1)), 0, 1);
        out[o + 3] = alpha;
      }
    }
  }
}

/**
 * Fill in a zero dimension from the source aspect ratio
 */
export function resolveResizeTarget(source: Size, width: number, height: number): Size {
  if (width === 0 && height === 0) {
    throw new ArgumentError('Resize needs a non-zero width or height');
  }
  return {
    width: width === 0 ? Math.max(1, Math.round((source.width * height) / source.height)) : width,
    height: height === 0 ? Math.max(1, Math.round((source.height * width) / source.width)) : height
  };
}
