import { test } from 'node:test';
import assert from 'node:assert';
import { isPngSignature, parsePngChunks, PngParser, PNG_SIGNATURE } from '../../src/formats/png-parser.js';
import { buildPng, createChunk, createIEND, createIHDR } from '../../src/formats/png-writer.js';
import { ColorType } from '../../src/formats/png-types.js';
import { FormatError } from '../../src/errors.js';
import { concatBytes } from '../../src/utils.js';

const header = {
  width: 3,
  height: 2,
  bitDepth: 8,
  colorType: ColorType.RGB,
  compressionMethod: 0,
  filterMethod: 0,
  interlaceMethod: 0
};

test('isPngSignature checks all eight bytes', () => {
  assert.strictEqual(isPngSignature(PNG_SIGNATURE), true);
  assert.strictEqual(isPngSignature(PNG_SIGNATURE.subarray(0, 7)), false);
  assert.strictEqual(isPngSignature(new Uint8Array([137, 80, 78, 71, 13, 10, 26, 0])), false);
});

test('rejects data without the signature', () => {
  assert.throws(() => new PngParser(new Uint8Array(16)), /Invalid PNG signature/);
});

test('parseHeader reads IHDR fields', () => {
  const [ihdr] = parsePngChunks(buildPng([createIHDR(header), createIEND()]));
  assert.deepStrictEqual(PngParser.parseHeader(ihdr), header);
});

test('parseHeader requires IHDR first', () => {
  assert.throws(() => PngParser.parseHeader(createIEND()), /First PNG chunk must be IHDR/);
});

test('stops at IEND and ignores trailing bytes', () => {
  const png = concatBytes([buildPng([createIHDR(header), createIEND()]), new Uint8Array([1, 2, 3])]);
  assert.deepStrictEqual(parsePngChunks(png).map((chunk) => chunk.type), ['IHDR', 'IEND']);
});

test('detects CRC mismatches', () => {
  const png = buildPng([createIHDR(header), createChunk('tEXt', new Uint8Array([65, 0, 66])), createIEND()]);
  // flip a data byte inside tEXt: 8 signature + 25 IHDR + 8 length/type
  png[8 + 25 + 8] ^= 0xff;
  assert.throws(
    () => parsePngChunks(png),
    (error: unknown) => error instanceof FormatError && error.message === 'CRC mismatch for chunk tEXt'
  );
});

test('detects truncated chunks', () => {
  const png = buildPng([createIHDR(header), createIEND()]);
  assert.throws(() => parsePngChunks(png.subarray(0, 15)), (error: unknown) => error instanceof FormatError && error.message === 'Incomplete PNG chunk');
  assert.throws(() => parsePngChunks(png.subarray(0, 30)), /Incomplete PNG chunk data for IHDR/);
});
