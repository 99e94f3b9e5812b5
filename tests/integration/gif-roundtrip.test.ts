import { test } from 'node:test';
import assert from 'node:assert';
import { decodeImage, encodeImage } from '../../src/formats/image-io.js';
import { COMMENTS_PROPERTY } from '../../src/formats/gif-decoder.js';
import { DisposalMethod, ImageFrame } from '../../src/image.js';
import { PixelBuffer } from '../../src/pixel-buffer.js';
import { bytesToString } from '../../src/utils.js';
import { buildGif, imageFromBytes, pixelBytes } from '../utils/fixtures.js';

const RED = [255, 0, 0, 255];
const BLUE = [0, 0, 255, 255];
const CLEAR = [0, 0, 0, 0];

test('an animation survives encode and decode', () => {
  const image = imageFromBytes(2, 2, [...RED, ...BLUE, ...CLEAR, ...RED]);
  image.frameDelay = 100;
  image.repeatCount = 3;
  image.setProperty(COMMENTS_PROPERTY, 'made in a test');
  image.addFrame(
    new ImageFrame(PixelBuffer.fromRgba8(2, 2, Uint8Array.from([...BLUE, ...BLUE, ...RED, ...CLEAR])), 250)
  );

  const decoded = decodeImage(encodeImage(image, 'gif'));

  assert.strictEqual(decoded.currentFormat?.name, 'gif');
  assert.strictEqual(decoded.frames.length, 1);
  assert.deepStrictEqual(pixelBytes(decoded), [...RED, ...BLUE, ...CLEAR, ...RED]);
  assert.deepStrictEqual(Array.from(decoded.frames[0].pixels.toRgba8()), [...BLUE, ...BLUE, ...RED, ...CLEAR]);
  assert.strictEqual(decoded.frameDelay, 100);
  assert.strictEqual(decoded.frames[0].delay, 250);
  assert.strictEqual(decoded.frames[0].disposal, DisposalMethod.RestoreToBackground);
  assert.strictEqual(decoded.repeatCount, 3);
  assert.strictEqual(decoded.getProperty(COMMENTS_PROPERTY), 'made in a test');
});

test('a composited animation re-encodes to the same frames', () => {
  // second frame only patches the top-right pixel and keeps the rest
  const source = buildGif({
    width: 2,
    height: 2,
    palette: [0, 0, 0, 255, 0, 0, 0, 255, 0, 0, 0, 255],
    loop: 0,
    frames: [
      { width: 2, height: 2, indices: [1, 1, 1, 1], delay: 5, disposal: DisposalMethod.DoNotDispose },
      { left: 1, top: 0, width: 1, height: 1, indices: [3], delay: 7 }
    ]
  });

  const first = decodeImage(source);
  const second = decodeImage(encodeImage(first));

  assert.deepStrictEqual(pixelBytes(second), [...RED, ...RED, ...RED, ...RED]);
  assert.deepStrictEqual(Array.from(second.frames[0].pixels.toRgba8()), [...RED, ...BLUE, ...RED, ...RED]);
  assert.strictEqual(second.frameDelay, 50);
  assert.strictEqual(second.frames[0].delay, 70);
  assert.strictEqual(second.repeatCount, 0);
});

test('an animation without a loop block still plays once after re-encoding', () => {
  const source = buildGif({
    width: 1,
    height: 1,
    palette: [0, 0, 0, 255, 0, 0, 0, 255, 0, 0, 0, 255],
    frames: [
      { width: 1, height: 1, indices: [1], delay: 5 },
      { width: 1, height: 1, indices: [3], delay: 5 }
    ]
  });

  const first = decodeImage(source);
  const bytes = encodeImage(first);
  const second = decodeImage(bytes);

  assert.strictEqual(first.repeatCount, null);
  assert.strictEqual(bytesToString(bytes).indexOf('NETSCAPE2.0'), -1);
  assert.strictEqual(second.repeatCount, null);
  assert.strictEqual(second.frames.length, 1);
});
