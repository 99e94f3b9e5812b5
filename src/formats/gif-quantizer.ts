/**
 * Palette construction for indexed output.
 *
 * Up to 256 distinct opaque colors (255 when a transparent slot is needed) are
 * kept exactly; beyond that the color set is reduced with median cut.
 */

import type { PixelBuffer } from '../pixel-buffer.js';
import { channelToByte } from '../color.js';

export const ALPHA_THRESHOLD = 0.5;

export interface Palette {
  /** Packed RGB triplets, `colorCount * 3` bytes */
  colors: Uint8Array;
  /** Entries in use, including the transparent slot */
  colorCount: number;
  /** -1 when no pixel is transparent */
  transparentIndex: number;
}

interface ColorBox {
  entries: HistogramEntry[];
}

interface HistogramEntry {
  key: number;
  count: number;
}

function keyOf(r: number, g: number, b: number): number {
  return (r << 16) | (g << 8) | b;
}

function channel(key: number, index: number): number {
  return (key >> (16 - index * 8)) & 0xff;
}

function buildHistogram(buffers: readonly PixelBuffer[]): { histogram: Map<number, number>; hasTransparent: boolean } {
  const histogram = new Map<number, number>();
  let hasTransparent = false;
  for (const buffer of buffers) {
    const data = buffer.data;
    for (let i = 0; i < data.length; i += 4) {
      if (data[i + 3] < ALPHA_THRESHOLD) {
        hasTransparent = true;
        continue;
      }
      const key = keyOf(channelToByte(data[i]), channelToByte(data[i + 1]), channelToByte(data[i + 2]));
      histogram.set(key, (histogram.get(key) ?? 0) + 1);
    }
  }
  return { histogram, hasTransparent };
}

function channelRange(box: ColorBox, index: number): number {
  let min = 255;
  let max = 0;
  for (const entry of box.entries) {
    const value = channel(entry.key, index);
    if (value < min) min = value;
    if (value > max) max = value;
  }
  return max - min;
}

function widestChannel(box: ColorBox): { index: number; range: number } {
  let best = { index: 0, range: -1 };
  for (let index = 0; index < 3; index++) {
    const range = channelRange(box, index);
    if (range > best.range) best = { index, range };
  }
  return best;
}

function splitBox(box: ColorBox, index: number): [ColorBox, ColorBox] {
  const sorted = [...box.entries].sort((a, b) => channel(a.key, index) - channel(b.key, index));
  const total = sorted.reduce((sum, entry) => sum + entry.count, 0);
  let running = 0;
  let cut = 1;
  for (let i = 0; i < sorted.length - 1; i++) {
    running += sorted[i].count;
    cut = i + 1;
    if (running * 2 >= total) break;
  }
  return [{ entries: sorted.slice(0, cut) }, { entries: sorted.slice(cut) }];
}

function averageColor(box: ColorBox): number {
  let r = 0, g = 0, b = 0, total = 0;
  for (const entry of box.entries) {
    r += channel(entry.key, 0) * entry.count;
    g += channel(entry.key, 1) * entry.count;
    b += channel(entry.key, 2) * entry.count;
    total += entry.count;
  }
  return keyOf(Math.round(r / total), Math.round(g / total), Math.round(b / total));
}

function medianCut(histogram: Map<number, number>, maxColors: number): number[] {
  let boxes: ColorBox[] = [{
    entries: [...histogram].map(([key, count]) => ({ key, count }))
  }];

  while (boxes.length < maxColors) {
    let target = -1;
    let targetChannel = 0;
    let widest = 0;
    boxes.forEach((box, i) => {
      if (box.entries.length < 2) return;
      const { index, range } = widestChannel(box);
      if (range > widest) {
        widest = range;
        target = i;
        targetChannel = index;
      }
    });
    if (target === -1) break;
    const [low, high] = splitBox(boxes[target], targetChannel);
    boxes = [...boxes.slice(0, target), low, high, ...boxes.slice(target + 1)];
  }

  return boxes.map(averageColor);
}

/**
 * Build one palette covering every buffer (GIF uses a single global table)
 */
export function buildPalette(buffers: readonly PixelBuffer[], maxColors = 256): Palette {
  const { histogram, hasTransparent } = buildHistogram(buffers);
  const opaqueSlots = hasTransparent ? maxColors - 1 : maxColors;
  const keys = histogram.size <= opaqueSlots
    ? [...histogram.keys()].sort((a, b) => a - b)
    : medianCut(histogram, opaqueSlots);

  const colorCount = keys.length + (hasTransparent ? 1 : 0);
  const colors = new Uint8Array(colorCount * 3);
  keys.forEach((key, i) => {
    colors[i * 3] = channel(key, 0);
    colors[i * 3 + 1] = channel(key, 1);
    colors[i * 3 + 2] = channel(key, 2);
  });

  return {
    colors,
    colorCount,
    transparentIndex: hasTransparent ? keys.length : -1
  };
}

/**
 * Map every pixel to its nearest palette entry
 */
export function applyPalette(buffer: PixelBuffer, palette: Palette): Uint8Array {
  const indices = new Uint8Array(buffer.width * buffer.height);
  const opaqueCount = palette.transparentIndex === -1 ? palette.colorCount : palette.transparentIndex;
  const cache = new Map<number, number>();
  const data = buffer.data;

  for (let p = 0; p < indices.length; p++) {
    const i = p * 4;
    if (data[i + 3] < ALPHA_THRESHOLD && palette.transparentIndex !== -1) {
      indices[p] = palette.transparentIndex;
      continue;
    }
    const r = channelToByte(data[i]);
    const g = channelToByte(data[i + 1]);
    const b = channelToByte(data[i + 2]);
    const key = keyOf(r, g, b);
    const cached = cache.get(key);
    if (cached !== undefined) {
      indices[p] = cached;
      continue;
    }

    let best = 0;
    let bestDistance = Infinity;
    for (let c = 0; c < opaqueCount; c++) {
      const dr = palette.colors[c * 3] - r;
      const dg = palette.colors[c * 3 + 1] - g;
      const db = palette.colors[c * 3 + 2] - b;
      const distance = dr * dr + dg * dg + db * db;
      if (distance < bestDistance) {
        bestDistance = distance;
        best = c;
        if (distance === 0) break;
      }
    }
    cache.set(key, best);
    indices[p] = best;
  }

  return indices;
}
