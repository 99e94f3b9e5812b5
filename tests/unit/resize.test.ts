import { describe, test } from 'node:test';
import assert from 'node:assert';
import { computeWeights, resolveResizeTarget, ResizeProcessor } from '../../src/processing/resize.js';
import { RESAMPLERS, RESAMPLER_NAMES, triangleResampler } from '../../src/processing/resamplers.js';
import { applyProcessor } from '../../src/processing/row-processor.js';
import { ArgumentError } from '../../src/errors.js';
import { gradientImage, imageFromBytes, pixelBytes } from '../utils/fixtures.js';

function near(actual: number, expected: number, tolerance = 1e-4): void {
  assert.ok(Math.abs(actual - expected) <= tolerance, `expected ${expected}, got ${actual}`);
}

describe('computeWeights', () => {
  test('stretches the kernel when shrinking', () => {
    const [first] = computeWeights(4, 2, triangleResampler);
    assert.deepStrictEqual(first.indices, [0, 1, 2]);
    assert.deepStrictEqual(first.weights, [0.75, 0.75, 0.25]);
    assert.strictEqual(first.sum, 1.75);
  });

  test('clamps the window to the source when enlarging', () => {
    const [first] = computeWeights(2, 4, triangleResampler);
    assert.deepStrictEqual(first.indices, [0]);
    assert.deepStrictEqual(first.weights, [0.75]);
  });
});

describe('resolveResizeTarget', () => {
  test('keeps the aspect ratio for a zero dimension', () => {
    assert.deepStrictEqual(resolveResizeTarget({ width: 200, height: 100 }, 50, 0), { width: 50, height: 25 });
    assert.deepStrictEqual(resolveResizeTarget({ width: 200, height: 100 }, 0, 30), { width: 60, height: 30 });
  });

  test('rejects two zero dimensions', () => {
    assert.throws(() => resolveResizeTarget({ width: 2, height: 2 }, 0, 0), ArgumentError);
  });
});

describe('ResizeProcessor', () => {
  test('rejects non-positive targets', () => {
    assert.throws(() => new ResizeProcessor(0, 5, triangleResampler), ArgumentError);
  });

  test('returns an exact copy at the same size for every kernel', async () => {
    for (const name of RESAMPLER_NAMES) {
      const image = gradientImage(5, 4);
      const before = Float32Array.from(image.pixels.data);
      await applyProcessor(image, new ResizeProcessor(5, 4, RESAMPLERS[name]));
      assert.deepStrictEqual(image.pixels.data, before, name);
    }
  });

  test('averages in linear light when shrinking to one pixel', async () => {
    const image = imageFromBytes(2, 1, [0, 0, 0, 255, 255, 255, 255, 255]);
    await applyProcessor(image, new ResizeProcessor(1, 1, triangleResampler));

    const pixel = image.pixels.getPixel(0, 0);
    near(pixel.r, 0.735357);
    near(pixel.g, 0.735357);
    near(pixel.b, 0.735357);
    assert.strictEqual(pixel.a, 1);
  });

  test('ignores the color of transparent samples', async () => {
    const image = imageFromBytes(2, 1, [255, 0, 0, 255, 0, 255, 0, 0]);
    await applyProcessor(image, new ResizeProcessor(1, 1, triangleResampler));

    const pixel = image.pixels.getPixel(0, 0);
    near(pixel.r, 1);
    near(pixel.g, 0);
    assert.strictEqual(pixel.a, 0.5);
  });

  test('produces identical output for one lane and several', async () => {
    const single = gradientImage(17, 13);
    const multi = single.clone();

    await applyProcessor(single, new ResizeProcessor(7, 5, RESAMPLERS.lanczos3), { concurrency: 1, rowsPerRange: 1 });
    await applyProcessor(multi, new ResizeProcessor(7, 5, RESAMPLERS.lanczos3), { concurrency: 4, rowsPerRange: 2 });

    assert.strictEqual(single.width, 7);
    assert.deepStrictEqual(single.pixels.data, multi.pixels.data);
  });

  test('reports progress over the horizontal pass and the target rows', async () => {
    const image = gradientImage(8, 8);
    const seen: number[] = [];
    await applyProcessor(image, new ResizeProcessor(4, 3, RESAMPLERS.bicubic), {
      concurrency: 2,
      rowsPerRange: 1,
      onRowsProcessed: (done, total) => {
        assert.strictEqual(total, 11);
        seen.push(done);
      }
    });
    assert.deepStrictEqual(seen, [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
  });

  test('can be cancelled during the horizontal pass', async () => {
    const image = gradientImage(8, 8);
    const controller = new AbortController();
    const seen: number[] = [];

    await assert.rejects(
      applyProcessor(image, new ResizeProcessor(4, 4, RESAMPLERS.lanczos3), {
        concurrency: 1,
        rowsPerRange: 2,
        signal: controller.signal,
        onRowsProcessed: (done) => {
          seen.push(done);
          controller.abort();
        }
      }),
      { name: 'AbortError' }
    );
    assert.deepStrictEqual(seen, [2]);
    assert.strictEqual(image.width, 8);
  });

  test('keeps concurrent runs of one instance apart', async () => {
    const solid = (pixel: number[]) => imageFromBytes(8, 8, Array.from({ length: 64 }, () => pixel).flat());
    const red = solid([255, 0, 0, 255]);
    const blue = solid([0, 0, 255, 255]);
    const processor = new ResizeProcessor(4, 4, RESAMPLERS.bilinear);

    await Promise.all([
      applyProcessor(red, processor, { concurrency: 2, rowsPerRange: 1 }),
      applyProcessor(blue, processor, { concurrency: 2, rowsPerRange: 1 })
    ]);

    assert.deepStrictEqual(pixelBytes(red), Array.from({ length: 16 }, () => [255, 0, 0, 255]).flat());
    assert.deepStrictEqual(pixelBytes(blue), Array.from({ length: 16 }, () => [0, 0, 255, 255]).flat());
  });
});
