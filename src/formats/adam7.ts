/**
 * Adam7 deinterlacing.
 *
 * The image is split into 7 passes, each a sub-image of every Nth pixel,
 * filtered and stored one after the other.
 */

import { FormatError } from '../errors.js';
import { getBytesPerPixel, getScanlineLength, unfilterScanline } from './png-filter.js';
import type { PngHeader } from './png-types.js';

interface Adam7Pass {
  xStart: number;
  yStart: number;
  xStep: number;
  yStep: number;
}

export const ADAM7_PASSES: readonly Adam7Pass[] = [
  { xStart: 0, yStart: 0, xStep: 8, yStep: 8 },
  { xStart: 4, yStart: 0, xStep: 8, yStep: 8 },
  { xStart: 0, yStart: 4, xStep: 4, yStep: 8 },
  { xStart: 2, yStart: 0, xStep: 4, yStep: 4 },
  { xStart: 0, yStart: 2, xStep: 2, yStep: 4 },
  { xStart: 1, yStart: 0, xStep: 2, yStep: 2 },
  { xStart: 0, yStart: 1, xStep: 1, yStep: 2 }
];

export function getPassDimensions(width: number, height: number, pass: Adam7Pass): { width: number; height: number } {
  return {
    width: Math.max(0, Math.ceil((width - pass.xStart) / pass.xStep)),
    height: Math.max(0, Math.ceil((height - pass.yStart) / pass.yStep))
  };
}

/**
 * Turn inflated Adam7 data into unfiltered scanlines in row-major order
 */
export function deinterlaceAdam7(decompressed: Uint8Array, header: PngHeader): Uint8Array {
  const bytesPerPixel = getBytesPerPixel(header.bitDepth, header.colorType);
  const finalScanlineLength = getScanlineLength(header.width, header.bitDepth, header.colorType);
  const output = new Uint8Array(header.height * finalScanlineLength);

  let srcOffset = 0;

  ADAM7_PASSES.forEach((pass, passIndex) => {
    const passDims = getPassDimensions(header.width, header.height, pass);
    // Small images leave some passes empty
    if (passDims.width === 0 || passDims.height === 0) {
      return;
    }

    const passScanlineLength = getScanlineLength(passDims.width, header.bitDepth, header.colorType);
    let previousLine: Uint8Array | null = null;

    for (let passY = 0; passY < passDims.height; passY++) {
      if (srcOffset + 1 + passScanlineLength > decompressed.length) {
        throw new FormatError(`Unexpected end of image data at pass ${passIndex + 1}, line ${passY}`);
      }

      const filterType = decompressed[srcOffset++];
      const filteredLine = decompressed.subarray(srcOffset, srcOffset + passScanlineLength);
      srcOffset += passScanlineLength;

      const line = unfilterScanline(filterType, filteredLine, previousLine, bytesPerPixel);
      previousLine = line;

      const y = pass.yStart + passY * pass.yStep;
      const lineStart = y * finalScanlineLength;
      if (header.bitDepth < 8) {
        distributeSubBytePixels(line, output, lineStart, pass, passDims.width, header.bitDepth);
      } else {
        for (let passX = 0; passX < passDims.width; passX++) {
          const x = pass.xStart + passX * pass.xStep;
          output.set(
            line.subarray(passX * bytesPerPixel, (passX + 1) * bytesPerPixel),
            lineStart + x * bytesPerPixel
          );
        }
      }
    }
  });

  return output;
}

/**
 * Place 1, 2 or 4 bit pixels from a pass scanline into the final image
 */
function distributeSubBytePixels(
  passScanline: Uint8Array,
  output: Uint8Array,
  outputLineStart: number,
  pass: Adam7Pass,
  passWidth: number,
  bitDepth: number
): void {
  const pixelsPerByte = 8 / bitDepth;
  const mask = (1 << bitDepth) - 1;

  for (let passX = 0; passX < passWidth; passX++) {
    const finalX = pass.xStart + passX * pass.xStep;

    const passByteIndex = Math.floor(passX / pixelsPerByte);
    const passBitOffset = (pixelsPerByte - 1 - (passX % pixelsPerByte)) * bitDepth;
    const pixelValue = (passScanline[passByteIndex] >> passBitOffset) & mask;

    const finalByteIndex = outputLineStart + Math.floor(finalX / pixelsPerByte);
    const finalBitOffset = (pixelsPerByte - 1 - (finalX % pixelsPerByte)) * bitDepth;

    output[finalByteIndex] = (output[finalByteIndex] & ~(mask << finalBitOffset)) | (pixelValue << finalBitOffset);
  }
}
