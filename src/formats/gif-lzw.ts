/**
 * Variable-width LZW as used by GIF image data.
 *
 * Codes are packed least-significant bit first. The code width starts at
 * `minCodeSize + 1` bits and grows by one whenever the next free dictionary slot
 * reaches the current width's capacity, up to 12 bits.
 */

import { FormatError } from '../errors.js';
import { ByteWriter } from '../utils.js';

export const MAX_CODE_SIZE = 12;
const MAX_CODES = 1 << MAX_CODE_SIZE;

/**
 * Decompress `data` into exactly `pixelCount` palette indices
 */
export function decompressLzw(data: Uint8Array, minCodeSize: number, pixelCount: number): Uint8Array {
  if (minCodeSize < 1 || minCodeSize > 8) {
    throw new FormatError(`Invalid LZW minimum code size: ${minCodeSize}`);
  }

  const output = new Uint8Array(pixelCount);
  if (pixelCount === 0) {
    return output;
  }

  const clearCode = 1 << minCodeSize;
  const endCode = clearCode + 1;
  const prefix = new Uint16Array(MAX_CODES);
  const suffix = new Uint8Array(MAX_CODES);
  const stack = new Uint8Array(MAX_CODES + 1);
  for (let i = 0; i < clearCode; i++) {
    suffix[i] = i;
  }

  let codeSize = minCodeSize + 1;
  let codeMask = (1 << codeSize) - 1;
  let nextCode = clearCode + 2;
  let oldCode = -1;
  let first = 0;

  let datum = 0;
  let bits = 0;
  let position = 0;
  let written = 0;

  while (written < pixelCount) {
    while (bits < codeSize) {
      if (position >= data.length) {
        throw new FormatError(`LZW data ended after ${written} of ${pixelCount} pixels`);
      }
      datum |= data[position++] << bits;
      bits += 8;
    }
    const code = datum & codeMask;
    datum >>>= codeSize;
    bits -= codeSize;

    if (code === clearCode) {
      codeSize = minCodeSize + 1;
      codeMask = (1 << codeSize) - 1;
      nextCode = clearCode + 2;
      oldCode = -1;
      continue;
    }
    if (code === endCode) {
      throw new FormatError(`LZW end code after ${written} of ${pixelCount} pixels`);
    }

    if (oldCode === -1) {
      if (code > clearCode) {
        throw new FormatError(`Invalid LZW code ${code} after clear`);
      }
      output[written++] = code;
      oldCode = code;
      first = code;
      continue;
    }

    if (code > nextCode) {
      throw new FormatError(`Invalid LZW code ${code} (next free slot ${nextCode})`);
    }

    let top = 0;
    let current = code;
    if (code === nextCode) {
      stack[top++] = first;
      current = oldCode;
    }
    while (current > endCode) {
      stack[top++] = suffix[current];
      current = prefix[current];
    }
    first = suffix[current];
    stack[top++] = first;

    if (nextCode < MAX_CODES) {
      prefix[nextCode] = oldCode;
      suffix[nextCode] = first;
      nextCode++;
      if (nextCode >= (1 << codeSize) && codeSize < MAX_CODE_SIZE) {
        codeSize++;
        codeMask = (1 << codeSize) - 1;
      }
    }
    oldCode = code;

    while (top > 0 && written < pixelCount) {
      output[written++] = stack[--top];
    }
  }

  return output;
}

/**
 * Compress palette indices. The stream opens with a clear code and ends with
 * the end-of-information code; the dictionary is reset when it fills.
 */
export function compressLzw(indices: Uint8Array, minCodeSize: number): Uint8Array {
  const clearCode = 1 << minCodeSize;
  const endCode = clearCode + 1;
  const out = new ByteWriter(Math.max(64, indices.length >> 1));
  const table = new Map<number, number>();

  let codeSize = minCodeSize + 1;
  let nextCode = clearCode + 2;
  let datum = 0;
  let bits = 0;

  const emit = (code: number): void => {
    datum |= code << bits;
    bits += codeSize;
    while (bits >= 8) {
      out.writeByte(datum & 0xff);
      datum >>>= 8;
      bits -= 8;
    }
  };

  emit(clearCode);

  if (indices.length > 0) {
    let current = indices[0];
    for (let i = 1; i < indices.length; i++) {
      const k = indices[i];
      const key = (current << 8) | k;
      const found = table.get(key);
      if (found !== undefined) {
        current = found;
        continue;
      }

      emit(current);
      if (nextCode === MAX_CODES) {
        emit(clearCode);
        table.clear();
        codeSize = minCodeSize + 1;
        nextCode = clearCode + 2;
      } else {
        if (nextCode >= (1 << codeSize)) {
          codeSize++;
        }
        table.set(key, nextCode++);
      }
      current = k;
    }

    emit(current);
    if (nextCode >= (1 << codeSize) && codeSize < MAX_CODE_SIZE) {
      codeSize++;
    }
  }

  emit(endCode);
  if (bits > 0) {
    out.writeByte(datum & 0xff);
  }
  return out.toUint8Array();
}
