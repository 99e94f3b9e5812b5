import { describe, test } from 'node:test';
import assert from 'node:assert';
import { COMMENTS_PROPERTY, decodeGif, isGifHeader, rowOrder } from '../../src/formats/gif-decoder.js';
import { FormatError } from '../../src/errors.js';
import { DisposalMethod } from '../../src/image.js';
import { stringToBytes } from '../../src/utils.js';
import { buildGif } from '../utils/fixtures.js';

const limits = { maxWidth: 100, maxHeight: 100 };

// black, red, green, blue
const PALETTE = [0, 0, 0, 255, 0, 0, 0, 255, 0, 0, 0, 255];

describe('isGifHeader', () => {
  test('accepts both versions', () => {
    assert.strictEqual(isGifHeader(stringToBytes('GIF87a')), true);
    assert.strictEqual(isGifHeader(stringToBytes('GIF89a')), true);
  });

  test('rejects other signatures and short input', () => {
    assert.strictEqual(isGifHeader(stringToBytes('GIF90a')), false);
    assert.strictEqual(isGifHeader(stringToBytes('GIF8')), false);
  });
});

describe('rowOrder', () => {
  test('is the identity without interlacing', () => {
    assert.deepStrictEqual(Array.from(rowOrder(4, false)), [0, 1, 2, 3]);
  });

  test('follows the four interlace passes', () => {
    assert.deepStrictEqual(Array.from(rowOrder(10, true)), [0, 8, 4, 2, 6, 1, 3, 5, 7, 9]);
  });
});

describe('decodeGif', () => {
  test('decodes a single frame into the primary buffer', () => {
    const gif = buildGif({
      width: 2,
      height: 2,
      palette: PALETTE,
      frames: [{ width: 2, height: 2, indices: [0, 1, 2, 3] }]
    });
    const image = decodeGif(gif, limits);

    assert.strictEqual(image.width, 2);
    assert.strictEqual(image.height, 2);
    assert.strictEqual(image.frames.length, 0);
    assert.deepStrictEqual(Array.from(image.pixels.toRgba8()), [
      0, 0, 0, 255, 255, 0, 0, 255,
      0, 255, 0, 255, 0, 0, 255, 255
    ]);
  });

  test('decodes a hand-packed frame whose codes grow from three to four bits', () => {
    const gif = buildGif({
      width: 4,
      height: 2,
      palette: PALETTE,
      frames: [{ width: 4, height: 2, indices: [], lzwData: [0x44, 0x34, 0x86, 0x05] }]
    });
    const image = decodeGif(gif, limits);

    assert.deepStrictEqual(Array.from(image.pixels.toRgba8()), [
      0, 0, 0, 255, 255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255,
      0, 0, 0, 255, 255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255
    ]);
  });

  test('places interlaced rows at their display positions', () => {
    const gif = buildGif({
      width: 1,
      height: 5,
      palette: PALETTE,
      frames: [{ width: 1, height: 5, indices: [0, 1, 2, 3, 1], interlaced: true }]
    });
    const bytes = decodeGif(gif, limits).pixels.toRgba8();
    const rows = [0, 1, 2, 3, 4].map((y) => Array.from(bytes.subarray(y * 4, y * 4 + 3)));

    assert.deepStrictEqual(rows, [[0, 0, 0], [255, 0, 0], [0, 255, 0], [0, 0, 255], [255, 0, 0]]);
  });

  test('clears the previous frame rectangle for restore-to-background', () => {
    const gif = buildGif({
      width: 2,
      height: 1,
      palette: PALETTE,
      frames: [
        { width: 2, height: 1, indices: [1, 1] },
        { width: 1, height: 1, indices: [2], disposal: DisposalMethod.RestoreToBackground },
        { left: 1, width: 1, height: 1, indices: [3] }
      ]
    });
    const image = decodeGif(gif, limits);

    assert.strictEqual(image.frames.length, 2);
    assert.strictEqual(image.frames[0].disposal, DisposalMethod.RestoreToBackground);
    assert.deepStrictEqual(Array.from(image.frames[0].pixels.toRgba8()), [0, 255, 0, 255, 255, 0, 0, 255]);
    assert.deepStrictEqual(Array.from(image.frames[1].pixels.toRgba8()), [0, 0, 0, 0, 0, 0, 255, 255]);
  });

  test('restores the canvas for restore-to-previous', () => {
    const gif = buildGif({
      width: 2,
      height: 1,
      palette: PALETTE,
      frames: [
        { width: 2, height: 1, indices: [1, 1] },
        { width: 2, height: 1, indices: [2, 2], disposal: DisposalMethod.RestoreToPrevious },
        { left: 1, width: 1, height: 1, indices: [3] }
      ]
    });
    const image = decodeGif(gif, limits);

    assert.deepStrictEqual(Array.from(image.frames[0].pixels.toRgba8()), [0, 255, 0, 255, 0, 255, 0, 255]);
    assert.deepStrictEqual(Array.from(image.frames[1].pixels.toRgba8()), [255, 0, 0, 255, 0, 0, 255, 255]);
  });

  test('skips the transparent index when compositing', () => {
    const gif = buildGif({
      width: 2,
      height: 1,
      palette: PALETTE,
      frames: [
        { width: 2, height: 1, indices: [1, 1] },
        { width: 2, height: 1, indices: [0, 2], transparentIndex: 0 }
      ]
    });
    const image = decodeGif(gif, limits);

    assert.deepStrictEqual(Array.from(image.frames[0].pixels.toRgba8()), [255, 0, 0, 255, 0, 255, 0, 255]);
  });

  test('converts delays from hundredths to milliseconds', () => {
    const gif = buildGif({
      width: 1,
      height: 1,
      palette: PALETTE,
      frames: [
        { width: 1, height: 1, indices: [1], delay: 5 },
        { width: 1, height: 1, indices: [2], delay: 10 }
      ]
    });
    const image = decodeGif(gif, limits);

    assert.strictEqual(image.frameDelay, 50);
    assert.strictEqual(image.frames[0].delay, 100);
  });

  test('reads the loop count and comments', () => {
    const gif = buildGif({
      width: 1,
      height: 1,
      palette: PALETTE,
      loop: 3,
      comments: ['first', 'second'],
      frames: [{ width: 1, height: 1, indices: [1] }]
    });
    const image = decodeGif(gif, limits);

    assert.strictEqual(image.repeatCount, 3);
    assert.deepStrictEqual(
      image.properties.filter((property) => property.name === COMMENTS_PROPERTY).map((property) => property.value),
      ['first', 'second']
    );
  });

  test('accepts a comment of exactly 8192 bytes', () => {
    const gif = buildGif({
      width: 1,
      height: 1,
      palette: PALETTE,
      comments: ['c'.repeat(8192)],
      frames: [{ width: 1, height: 1, indices: [1] }]
    });
    assert.strictEqual(decodeGif(gif, limits).getProperty(COMMENTS_PROPERTY)?.length, 8192);
  });

  test('rejects an oversized comment', () => {
    const gif = buildGif({
      width: 1,
      height: 1,
      palette: PALETTE,
      comments: ['c'.repeat(8193)],
      frames: [{ width: 1, height: 1, indices: [1] }]
    });
    assert.throws(
      () => decodeGif(gif, limits),
      (error: unknown) => error instanceof FormatError && error.message === 'Block data exceeds 8192 bytes'
    );
  });

  test('draws indices beyond the color table as opaque black', () => {
    const gif = buildGif({
      width: 1,
      height: 1,
      palette: [255, 255, 255, 255, 0, 0],
      frames: [{ width: 1, height: 1, indices: [3] }]
    });
    assert.deepStrictEqual(Array.from(decodeGif(gif, limits).pixels.toRgba8()), [0, 0, 0, 255]);
  });

  test('clips frames to the logical screen', () => {
    const gif = buildGif({
      width: 2,
      height: 2,
      palette: [0, 0, 0, 255, 255, 255],
      frames: [{ left: 1, top: 1, width: 2, height: 2, indices: [1, 1, 1, 1] }]
    });
    assert.deepStrictEqual(Array.from(decodeGif(gif, limits).pixels.toRgba8()), [
      0, 0, 0, 0, 0, 0, 0, 0,
      0, 0, 0, 0, 255, 255, 255, 255
    ]);
  });

  test('prefers the local color table', () => {
    const gif = buildGif({
      width: 1,
      height: 1,
      palette: PALETTE,
      frames: [{ width: 1, height: 1, indices: [1], localPalette: [9, 9, 9, 10, 20, 30] }]
    });
    assert.deepStrictEqual(Array.from(decodeGif(gif, limits).pixels.toRgba8()), [10, 20, 30, 255]);
  });

  test('ends at an unknown block or at end of data', () => {
    const withGarbage = buildGif({
      width: 1,
      height: 1,
      palette: PALETTE,
      frames: [{ width: 1, height: 1, indices: [1] }],
      trailing: [0x99, 0x00]
    });
    const truncated = buildGif({
      width: 1,
      height: 1,
      palette: PALETTE,
      frames: [{ width: 1, height: 1, indices: [2] }],
      omitTrailer: true
    });

    assert.deepStrictEqual(Array.from(decodeGif(withGarbage, limits).pixels.toRgba8()), [255, 0, 0, 255]);
    assert.deepStrictEqual(Array.from(decodeGif(truncated, limits).pixels.toRgba8()), [0, 255, 0, 255]);
  });

  test('rejects a frame without any color table', () => {
    const gif = buildGif({ width: 1, height: 1, frames: [{ width: 1, height: 1, indices: [0] }] });
    assert.throws(() => decodeGif(gif, limits), /neither a local nor a global color table/);
  });

  test('rejects a file without frames', () => {
    const gif = buildGif({ width: 1, height: 1, palette: PALETTE, frames: [] });
    assert.throws(
      () => decodeGif(gif, limits),
      (error: unknown) => error instanceof FormatError && error.message === 'GIF contains no image data'
    );
  });

  test('rejects a canvas larger than the configured maximum', () => {
    const gif = buildGif({ width: 101, height: 1, palette: PALETTE, frames: [{ width: 1, height: 1, indices: [0] }] });
    assert.throws(() => decodeGif(gif, limits), /exceeds the maximum of 100x100/);
  });

  test('rejects a bad signature', () => {
    assert.throws(() => decodeGif(stringToBytes('GIF00a\0\0\0\0\0\0\0'), limits), /Invalid GIF signature/);
  });

  test('attaches the frames decoded before a mid-stream error', () => {
    const gif = buildGif({
      width: 2,
      height: 1,
      palette: PALETTE,
      frames: [
        { width: 2, height: 1, indices: [1, 2] },
        { width: 2, height: 1, indices: [3, 3], minCodeSize: 9 }
      ]
    });

    assert.throws(
      () => decodeGif(gif, limits),
      (error: unknown) => {
        assert.ok(error instanceof FormatError);
        assert.strictEqual(error.message, 'Invalid LZW minimum code size: 9');
        assert.ok(error.partialImage);
        assert.strictEqual(error.partialImage.frames.length, 0);
        assert.deepStrictEqual(Array.from(error.partialImage.pixels.toRgba8()), [255, 0, 0, 255, 0, 255, 0, 255]);
        return true;
      }
    );
  });
});
