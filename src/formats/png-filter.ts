import { FormatError } from '../errors.js';
import { SAMPLES_PER_PIXEL, isColorType } from './png-types.js';

/**
 * Filter type byte that precedes each PNG scanline
 */
export enum FilterType {
  None = 0,
  Sub = 1,
  Up = 2,
  Average = 3,
  Paeth = 4
}

function paethPredictor(a: number, b: number, c: number): number {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);

  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
}

function predict(filterType: FilterType, left: number, up: number, upLeft: number): number {
  switch (filterType) {
    case FilterType.Sub:
      return left;
    case FilterType.Up:
      return up;
    case FilterType.Average:
      return (left + up) >> 1;
    case FilterType.Paeth:
      return paethPredictor(left, up, upLeft);
    default:
      return 0;
  }
}

function isFilterType(value: number): value is FilterType {
  return Number.isInteger(value) && value >= FilterType.None && value <= FilterType.Paeth;
}

/**
 * Reverse the filter on one scanline
 * @param scanline Filtered bytes, without the filter type byte
 * @param previousLine Previous unfiltered scanline, null for the first
 */
export function unfilterScanline(
  filterType: number,
  scanline: Uint8Array,
  previousLine: Uint8Array | null,
  bytesPerPixel: number
): Uint8Array {
  if (!isFilterType(filterType)) {
    throw new FormatError(`Unknown PNG filter type: ${filterType}`);
  }
  const result = new Uint8Array(scanline.length);
  if (filterType === FilterType.None) {
    result.set(scanline);
    return result;
  }
  // left neighbours come from the reconstructed bytes
  for (let i = 0; i < scanline.length; i++) {
    const left = i >= bytesPerPixel ? result[i - bytesPerPixel] : 0;
    const up = previousLine ? previousLine[i] : 0;
    const upLeft = previousLine && i >= bytesPerPixel ? previousLine[i - bytesPerPixel] : 0;
    result[i] = (scanline[i] + predict(filterType, left, up, upLeft)) & 0xff;
  }
  return result;
}

/**
 * Apply one filter to a scanline
 */
export function applyFilter(
  filterType: FilterType,
  scanline: Uint8Array,
  previousLine: Uint8Array | null,
  bytesPerPixel: number
): Uint8Array {
  const result = new Uint8Array(scanline.length);
  for (let i = 0; i < scanline.length; i++) {
    const left = i >= bytesPerPixel ? scanline[i - bytesPerPixel] : 0;
    const up = previousLine ? previousLine[i] : 0;
    const upLeft = previousLine && i >= bytesPerPixel ? previousLine[i - bytesPerPixel] : 0;
    result[i] = (scanline[i] - predict(filterType, left, up, upLeft)) & 0xff;
  }
  return result;
}

/** Sum of bytes read as signed values */
function signedMagnitude(bytes: Uint8Array): number {
  let sum = 0;
  for (const value of bytes) {
    sum += value > 127 ? 256 - value : value;
  }
  return sum;
}

/**
 * Choose the filter giving the smallest sum of absolute (signed) values
 */
export function filterScanline(
  scanline: Uint8Array,
  previousLine: Uint8Array | null,
  bytesPerPixel: number
): { filterType: FilterType; filtered: Uint8Array } {
  let best = { filterType: FilterType.None, filtered: scanline };
  let bestCost = signedMagnitude(scanline);

  for (const filterType of [FilterType.Sub, FilterType.Up, FilterType.Average, FilterType.Paeth]) {
    const filtered = applyFilter(filterType, scanline, previousLine, bytesPerPixel);
    const cost = signedMagnitude(filtered);
    if (cost < bestCost) {
      bestCost = cost;
      best = { filterType, filtered };
    }
  }
  return best;
}

export function getSamplesPerPixel(colorType: number): number {
  if (!isColorType(colorType)) {
    throw new FormatError(`Unknown PNG color type: ${colorType}`);
  }
  return SAMPLES_PER_PIXEL[colorType];
}

/**
 * Filter unit in bytes (at least one)
 */
export function getBytesPerPixel(bitDepth: number, colorType: number): number {
  return Math.max(1, Math.ceil((getSamplesPerPixel(colorType) * bitDepth) / 8));
}

export function getScanlineLength(width: number, bitDepth: number, colorType: number): number {
  return Math.ceil((width * bitDepth * getSamplesPerPixel(colorType)) / 8);
}
