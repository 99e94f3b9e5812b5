import { ArgumentError } from '../errors.js';
import type { PixelBuffer } from '../pixel-buffer.js';
import type { PrepareContext, Rectangle, RowProcessor } from './row-processor.js';

export interface PixelateState {
  /** Average RGBA per block, row-major */
  blocks: Float32Array;
  columns: number;
}

/**
 * Replace each size x size block with its alpha-weighted average color.
 * Blocks on the right and bottom edges may be smaller. The source pass
 * averages one row of blocks per row.
 */
export class PixelateProcessor implements RowProcessor<PixelateState> {
  readonly name = 'pixelate';

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ArgumentError(`Pixelate size must be a positive integer, got ${size}`);
    }
  }

  prepare({ sourceRectangle }: PrepareContext): PixelateState {
    const columns = Math.ceil(sourceRectangle.width / this.size);
    return { blocks: new Float32Array(columns * this.sourcePassRows(sourceRectangle) * 4), columns };
  }

  sourcePassRows(sourceRectangle: Rectangle): number {
    return Math.ceil(sourceRectangle.height / this.size);
  }

  applySourceRows(state: PixelateState, source: PixelBuffer, sourceRectangle: Rectangle, startY: number, endY: number): void {
    const { x: left, y: top, width, height } = sourceRectangle;
    const { blocks, columns } = state;

    for (let by = startY; by < endY; by++) {
      for (let bx = 0; bx < columns; bx++) {
        let r = 0, g = 0, b = 0, a = 0, count = 0;
        const yEnd = Math.min(top + (by + 1) * this.size, top + height);
        const xEnd = Math.min(left + (bx + 1) * this.size, left + width);
        for (let y = top + by * this.size; y < yEnd; y++) {
          for (let x = left + bx * this.size; x < xEnd; x++) {
            const i = source.offset(x, y);
            const alpha = source.data[i + 3];
            r += source.data[i] * alpha;
            g += source.data[i + 1] * alpha;
            b += source.data[i + 2] * alpha;
            a += alpha;
            count++;
          }
        }
        const o = (by * columns + bx) * 4;
        if (a > 0) {
          blocks[o] = r / a;
          blocks[o + 1] = g / a;
          blocks[o + 2] = b / a;
        }
        blocks[o + 3] = a / count;
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
    state: PixelateState
  ): void {
    const { x: left, y: top, width, height } = sourceRectangle;
    for (let y = Math.max(startY, top); y < Math.min(endY, top + height); y++) {
      const blockRow = Math.floor((y - top) / this.size);
      for (let x = left; x < left + width; x++) {
        const b = (blockRow * state.columns + Math.floor((x - left) / this.size)) * 4;
        target.data.set(state.blocks.subarray(b, b + 4), target.offset(x, y));
      }
    }
  }
}
