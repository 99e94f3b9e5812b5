import { describe, test } from 'node:test';
import assert from 'node:assert';
import {
  applyProcessor,
  fullRectangle,
  PixelProcessor,
  type PrepareContext,
  type Rectangle,
  type RowProcessor,
  type Size
} from '../../src/processing/row-processor.js';
import { ArgumentError } from '../../src/errors.js';
import { ImageFrame } from '../../src/image.js';
import { PixelBuffer } from '../../src/pixel-buffer.js';
import { gradientImage, imageFromBytes } from '../utils/fixtures.js';

/** Writes the source row index into every red channel of a half-width target */
class RecordingProcessor implements RowProcessor {
  readonly name = 'recording';
  prepared: PrepareContext[] = [];

  targetSize(source: Size): Size {
    return { width: Math.max(1, source.width >> 1), height: source.height };
  }

  prepare(context: PrepareContext): void {
    this.prepared.push(context);
  }

  applyRows(target: PixelBuffer, _source: PixelBuffer, targetRectangle: Rectangle, _sourceRectangle: Rectangle, startY: number, endY: number): void {
    for (let y = startY; y < endY; y++) {
      for (let x = 0; x < targetRectangle.width; x++) {
        target.data[target.offset(x, y)] = y / 10;
      }
    }
  }
}

/** Collects the source rows it visited, then writes their count into every red channel */
class TwoPassProcessor implements RowProcessor<number[]> {
  readonly name = 'twoPass';

  prepare(): number[] {
    return [];
  }

  sourcePassRows(sourceRectangle: Rectangle): number {
    return sourceRectangle.height;
  }

  applySourceRows(rows: number[], _source: PixelBuffer, _sourceRectangle: Rectangle, startY: number, endY: number): void {
    for (let y = startY; y < endY; y++) {
      rows.push(y);
    }
  }

  applyRows(target: PixelBuffer, _source: PixelBuffer, targetRectangle: Rectangle, _sourceRectangle: Rectangle, startY: number, endY: number, rows: number[]): void {
    for (let y = startY; y < endY; y++) {
      for (let x = 0; x < targetRectangle.width; x++) {
        target.data[target.offset(x, y)] = rows.length / 10;
      }
    }
  }
}

class HalveAlpha extends PixelProcessor {
  readonly name = 'halveAlpha';

  sourceRectangle(): Rectangle {
    return { x: 1, y: 0, width: 1, height: 1 };
  }

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, offset: number): void {
    out[offset] = r;
    out[offset + 1] = g;
    out[offset + 2] = b;
    out[offset + 3] = a / 2;
  }
}

test('fullRectangle covers the size from the origin', () => {
  assert.deepStrictEqual(fullRectangle({ width: 3, height: 2 }), { x: 0, y: 0, width: 3, height: 2 });
});

describe('applyProcessor', () => {
  test('resizes every frame and prepares once per buffer', async () => {
    const image = gradientImage(4, 3);
    image.addFrame(new ImageFrame(new PixelBuffer(4, 3)));
    const processor = new RecordingProcessor();

    await applyProcessor(image, processor, { concurrency: 2 });

    assert.strictEqual(image.width, 2);
    assert.strictEqual(image.frames[0].pixels.width, 2);
    assert.strictEqual(processor.prepared.length, 2);
    assert.deepStrictEqual(processor.prepared[0].targetRectangle, { x: 0, y: 0, width: 2, height: 3 });
    assert.deepStrictEqual(processor.prepared[0].sourceRectangle, { x: 0, y: 0, width: 4, height: 3 });
    assert.ok(Math.abs(image.pixels.getPixel(1, 2).r - 0.2) < 1e-6);
  });

  test('reports cumulative progress across frames', async () => {
    const image = gradientImage(2, 4);
    image.addFrame(new ImageFrame(new PixelBuffer(2, 4)));
    const progress: [number, number][] = [];

    await applyProcessor(image, new RecordingProcessor(), {
      concurrency: 1,
      rowsPerRange: 2,
      onRowsProcessed: (done, total) => progress.push([done, total])
    });

    assert.deepStrictEqual(progress, [[2, 8], [4, 8], [6, 8], [8, 8]]);
  });

  test('rejects a processor reporting an empty target', async () => {
    const processor: RowProcessor = {
      name: 'empty',
      targetSize: () => ({ width: 0, height: 1 }),
      prepare: () => undefined,
      applyRows: () => undefined
    };

    await assert.rejects(applyProcessor(gradientImage(2, 2), processor), ArgumentError);
  });

  test('finishes the source pass before any target row and counts it in progress', async () => {
    const image = gradientImage(2, 4);
    const progress: [number, number][] = [];

    await applyProcessor(image, new TwoPassProcessor(), {
      concurrency: 1,
      rowsPerRange: 2,
      onRowsProcessed: (done, total) => progress.push([done, total])
    });

    assert.deepStrictEqual(progress, [[2, 8], [4, 8], [6, 8], [8, 8]]);
    assert.ok(Math.abs(image.pixels.getPixel(1, 3).r - 0.4) < 1e-6);
  });

  test('gives every frame its own state', async () => {
    const image = gradientImage(2, 3);
    image.addFrame(new ImageFrame(new PixelBuffer(2, 3)));

    await applyProcessor(image, new TwoPassProcessor(), { concurrency: 2, rowsPerRange: 1 });

    assert.ok(Math.abs(image.pixels.getPixel(0, 0).r - 0.3) < 1e-6);
    assert.ok(Math.abs(image.frames[0].pixels.getPixel(0, 0).r - 0.3) < 1e-6);
  });

  test('stops inside the source pass when aborted there', async () => {
    const image = gradientImage(2, 4);
    const before = Array.from(image.pixels.toRgba8());
    const controller = new AbortController();
    const progress: number[] = [];

    await assert.rejects(
      applyProcessor(image, new TwoPassProcessor(), {
        concurrency: 1,
        rowsPerRange: 2,
        signal: controller.signal,
        onRowsProcessed: (done) => {
          progress.push(done);
          controller.abort();
        }
      }),
      { name: 'AbortError' }
    );
    assert.deepStrictEqual(progress, [2]);
    assert.deepStrictEqual(Array.from(image.pixels.toRgba8()), before);
  });

  test('leaves the image untouched when aborted', async () => {
    const image = gradientImage(2, 2);
    const before = Array.from(image.pixels.toRgba8());
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(applyProcessor(image, new RecordingProcessor(), { signal: controller.signal }), {
      name: 'AbortError'
    });
    assert.strictEqual(image.width, 2);
    assert.deepStrictEqual(Array.from(image.pixels.toRgba8()), before);
  });
});

describe('PixelProcessor', () => {
  test('transforms only the source rectangle', async () => {
    const image = imageFromBytes(2, 1, [10, 20, 30, 255, 40, 50, 60, 255]);

    await applyProcessor(image, new HalveAlpha());

    assert.deepStrictEqual(Array.from(image.pixels.toRgba8()), [0, 0, 0, 0, 40, 50, 60, 128]);
  });
});
