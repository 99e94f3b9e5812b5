import { ArgumentError } from '../errors.js';
import type { PixelBuffer } from '../pixel-buffer.js';
import type { Rectangle, RowProcessor, Size } from './row-processor.js';

/**
 * Cut a rectangle out of every frame. The rectangle must lie inside the image.
 */
export class CropProcessor implements RowProcessor<void> {
  readonly name = 'crop';

  constructor(readonly rectangle: Rectangle) {
    const { x, y, width, height } = rectangle;
    if (![x, y, width, height].every(Number.isInteger) || x < 0 || y < 0 || width < 1 || height < 1) {
      throw new ArgumentError(`Invalid crop rectangle ${width}x${height}+${x}+${y}`);
    }
  }

  targetSize(source: Size): Size {
    const { x, y, width, height } = this.rectangle;
    if (x + width > source.width || y + height > source.height) {
      throw new ArgumentError(
        `Crop rectangle ${width}x${height}+${x}+${y} exceeds image bounds ${source.width}x${source.height}`
      );
    }
    return { width, height };
  }

  sourceRectangle(): Rectangle {
    return { ...this.rectangle };
  }

  prepare(): void {}

  applyRows(
    target: PixelBuffer,
    source: PixelBuffer,
    _targetRectangle: Rectangle,
    sourceRectangle: Rectangle,
    startY: number,
    endY: number
  ): void {
    const rowLength = sourceRectangle.width * 4;
    for (let y = startY; y < endY; y++) {
      const from = source.offset(sourceRectangle.x, sourceRectangle.y + y);
      target.data.set(source.data.subarray(from, from + rowLength), target.offset(0, y));
    }
  }
}
