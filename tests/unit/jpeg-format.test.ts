import { describe, test } from 'node:test';
import assert from 'node:assert';
import { decodeJpeg, encodeJpeg, isJpegHeader, jpegFormat, readJfifDensity } from '../../src/formats/jpeg-format.js';
import { FormatError } from '../../src/errors.js';
import { stringToBytes } from '../../src/utils.js';
import { imageFromBytes, pixelBytes } from '../utils/fixtures.js';

const limits = { maxWidth: 64, maxHeight: 64 };

function jfifHeader(units: number, x: number, y: number): Uint8Array {
  return Uint8Array.from([
    0xff, 0xd8, 0xff, 0xe0, 0, 16,
    ...stringToBytes('JFIF\0'),
    1, 1, units,
    x >> 8, x & 0xff, y >> 8, y & 0xff
  ]);
}

function solidImage(width: number, height: number, rgba: [number, number, number, number]) {
  const bytes: number[] = [];
  for (let i = 0; i < width * height; i++) bytes.push(...rgba);
  return imageFromBytes(width, height, bytes);
}

describe('JPEG header', () => {
  test('recognises the SOI marker', () => {
    assert.strictEqual(isJpegHeader(Uint8Array.from([0xff, 0xd8, 0xff])), true);
    assert.strictEqual(isJpegHeader(Uint8Array.from([0xff, 0xd8])), false);
    assert.strictEqual(isJpegHeader(Uint8Array.from([0x89, 0x50, 0x4e])), false);
    assert.strictEqual(jpegFormat.decoder.headerSize, 3);
  });

  test('reads JFIF density in dots per inch', () => {
    assert.deepStrictEqual(readJfifDensity(jfifHeader(1, 300, 150)), { x: 300, y: 150 });
    const perCm = readJfifDensity(jfifHeader(2, 100, 100));
    assert.ok(perCm);
    assert.ok(Math.abs(perCm.x - 254) < 1e-9);
    assert.ok(Math.abs(perCm.y - 254) < 1e-9);
  });

  test('ignores aspect-only or missing density', () => {
    assert.strictEqual(readJfifDensity(jfifHeader(0, 1, 1)), null);
    assert.strictEqual(readJfifDensity(jfifHeader(1, 0, 72)), null);
    const exif = jfifHeader(1, 72, 72);
    exif[3] = 0xe1;
    assert.strictEqual(readJfifDensity(exif), null);
  });
});

describe('JPEG codec', () => {
  test('round-trips a flat color within tolerance', () => {
    const image = solidImage(8, 8, [200, 100, 50, 255]);
    const data = encodeJpeg(image, { quality: 90 });
    assert.ok(isJpegHeader(data));

    const decoded = decodeJpeg(data, limits);
    assert.strictEqual(decoded.width, 8);
    assert.strictEqual(decoded.height, 8);
    const bytes = pixelBytes(decoded);
    for (let i = 0; i < bytes.length; i += 4) {
      assert.ok(Math.abs(bytes[i] - 200) <= 3);
      assert.ok(Math.abs(bytes[i + 1] - 100) <= 3);
      assert.ok(Math.abs(bytes[i + 2] - 50) <= 3);
      assert.strictEqual(bytes[i + 3], 255);
    }
    assert.strictEqual(decoded.horizontalResolution, 96);
  });

  test('drops alpha when encoding', () => {
    const decoded = decodeJpeg(encodeJpeg(solidImage(8, 8, [0, 0, 0, 128]), { quality: 85 }), limits);
    assert.strictEqual(pixelBytes(decoded)[3], 255);
  });

  test('wraps codec failures in FormatError', () => {
    assert.throws(
      () => decodeJpeg(Uint8Array.from([0xff, 0xd8, 0xff, 0xd9]), limits),
      (error: unknown) => error instanceof FormatError && error.message.startsWith('Failed to decode JPEG')
    );
  });

  test('enforces the size limit', () => {
    const data = encodeJpeg(solidImage(16, 8, [255, 255, 255, 255]), { quality: 85 });
    assert.throws(() => decodeJpeg(data, { maxWidth: 8, maxHeight: 64 }), FormatError);
  });
});
