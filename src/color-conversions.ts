/**
 * Conversions between RGB and the other color spaces.
 *
 * RGB channels are 0-1 and sRGB companded. Results are clamped to each space's
 * valid range. Hue is reported as 0 whenever saturation is 0.
 */

import { type Color, compandChannel, expandChannel } from './color.js';
import { clamp } from './utils.js';

export interface Hsv {
  /** Degrees, [0, 360) */
  h: number;
  s: number;
  v: number;
}

export interface Hsl {
  h: number;
  s: number;
  l: number;
}

export interface Cmyk {
  c: number;
  m: number;
  y: number;
  k: number;
}

export interface CieXyz {
  x: number;
  y: number;
  z: number;
}

/** BT.601 full range, channels 0-255 */
export interface YCbCr {
  y: number;
  cb: number;
  cr: number;
}

function normalizeHue(h: number): number {
  const wrapped = h % 360;
  return wrapped < 0 ? wrapped + 360 : wrapped;
}

function hueOf(r: number, g: number, b: number, max: number, delta: number): number {
  if (delta === 0) return 0;
  let h: number;
  if (max === r) {
    h = 60 * (((g - b) / delta) % 6);
  } else if (max === g) {
    h = 60 * ((b - r) / delta + 2);
  } else {
    h = 60 * ((r - g) / delta + 4);
  }
  return normalizeHue(h);
}

/**
 * Shared sector mapping for HSV and HSL back to RGB
 */
function fromChroma(h: number, chroma: number, match: number, alpha: number): Color {
  const sector = normalizeHue(h) / 60;
  const x = chroma * (1 - Math.abs((sector % 2) - 1));
  let r = 0, g = 0, b = 0;
  if (sector < 1) { r = chroma; g = x; }
  else if (sector < 2) { r = x; g = chroma; }
  else if (sector < 3) { g = chroma; b = x; }
  else if (sector < 4) { g = x; b = chroma; }
  else if (sector < 5) { r = x; b = chroma; }
  else { r = chroma; b = x; }
  return {
    r: clamp(r + match, 0, 1),
    g: clamp(g + match, 0, 1),
    b: clamp(b + match, 0, 1),
    a: clamp(alpha, 0, 1)
  };
}

export function rgbToHsv(color: Color): Hsv {
  const r = clamp(color.r, 0, 1);
  const g = clamp(color.g, 0, 1);
  const b = clamp(color.b, 0, 1);
  const max = Math.max(r, g, b);
  const delta = max - Math.min(r, g, b);
  const s = max === 0 ? 0 : delta / max;
  return { h: s === 0 ? 0 : hueOf(r, g, b, max, delta), s, v: max };
}

export function hsvToRgb(hsv: Hsv, alpha = 1): Color {
  const s = clamp(hsv.s, 0, 1);
  const v = clamp(hsv.v, 0, 1);
  const chroma = v * s;
  return fromChroma(hsv.h, chroma, v - chroma, alpha);
}

export function rgbToHsl(color: Color): Hsl {
  const r = clamp(color.r, 0, 1);
  const g = clamp(color.g, 0, 1);
  const b = clamp(color.b, 0, 1);
  const max = Math.max(r, g, b);
  const min = Math.min(r, g, b);
  const delta = max - min;
  const l = (max + min) / 2;
  const s = delta === 0 ? 0 : clamp(delta / (1 - Math.abs(2 * l - 1)), 0, 1);
  return { h: s === 0 ? 0 : hueOf(r, g, b, max, delta), s, l };
}

export function hslToRgb(hsl: Hsl, alpha = 1): Color {
  const s = clamp(hsl.s, 0, 1);
  const l = clamp(hsl.l, 0, 1);
  const chroma = (1 - Math.abs(2 * l - 1)) * s;
  return fromChroma(hsl.h, chroma, l - chroma / 2, alpha);
}

export function rgbToCmyk(color: Color): Cmyk {
  const r = clamp(color.r, 0, 1);
  const g = clamp(color.g, 0, 1);
  const b = clamp(color.b, 0, 1);
  const k = 1 - Math.max(r, g, b);
  if (k >= 1) {
    return { c: 0, m: 0, y: 0, k: 1 };
  }
  return {
    c: (1 - r - k) / (1 - k),
    m: (1 - g - k) / (1 - k),
    y: (1 - b - k) / (1 - k),
    k
  };
}

export function cmykToRgb(cmyk: Cmyk, alpha = 1): Color {
  const k = clamp(cmyk.k, 0, 1);
  return {
    r: (1 - clamp(cmyk.c, 0, 1)) * (1 - k),
    g: (1 - clamp(cmyk.m, 0, 1)) * (1 - k),
    b: (1 - clamp(cmyk.y, 0, 1)) * (1 - k),
    a: clamp(alpha, 0, 1)
  };
}

/**
 * sRGB to CIE 1931 XYZ (D65 white point)
 */
export function rgbToXyz(color: Color): CieXyz {
  const r = expandChannel(clamp(color.r, 0, 1));
  const g = expandChannel(clamp(color.g, 0, 1));
  const b = expandChannel(clamp(color.b, 0, 1));
  return {
    x: 0.4124564 * r + 0.3575761 * g + 0.1804375 * b,
    y: 0.2126729 * r + 0.7151522 * g + 0.072175 * b,
    z: 0.0193339 * r + 0.119192 * g + 0.9503041 * b
  };
}

export function xyzToRgb(xyz: CieXyz, alpha = 1): Color {
  const r = 3.2404542 * xyz.x - 1.5371385 * xyz.y - 0.4985314 * xyz.z;
  const g = -0.969266 * xyz.x + 1.8760108 * xyz.y + 0.041556 * xyz.z;
  const b = 0.0556434 * xyz.x - 0.2040259 * xyz.y + 1.0572252 * xyz.z;
  return {
    r: clamp(compandChannel(clamp(r, 0, 1)), 0, 1),
    g: clamp(compandChannel(clamp(g, 0, 1)), 0, 1),
    b: clamp(compandChannel(clamp(b, 0, 1)), 0, 1),
    a: clamp(alpha, 0, 1)
  };
}

/**
 * BT.601 full-range YCbCr on a 0-255 scale. Components are not rounded, so
 * they can sit up to 0.5 away from the whole-number values of 8-bit tables:
 * mid grey gives y = 127.5 against the tabulated 128.
 */
export function rgbToYCbCr(color: Color): YCbCr {
  const r = clamp(color.r, 0, 1) * 255;
  const g = clamp(color.g, 0, 1) * 255;
  const b = clamp(color.b, 0, 1) * 255;
  return {
    y: clamp(0.299 * r + 0.587 * g + 0.114 * b, 0, 255),
    cb: clamp(128 - 0.168736 * r - 0.331264 * g + 0.5 * b, 0, 255),
    cr: clamp(128 + 0.5 * r - 0.418688 * g - 0.081312 * b, 0, 255)
  };
}

export function yCbCrToRgb(ycc: YCbCr, alpha = 1): Color {
  const y = ycc.y;
  const cb = ycc.cb - 128;
  const cr = ycc.cr - 128;
  return {
    r: clamp((y + 1.402 * cr) / 255, 0, 1),
    g: clamp((y - 0.34414 * cb - 0.71414 * cr) / 255, 0, 1),
    b: clamp((y + 1.772 * cb) / 255, 0, 1),
    a: clamp(alpha, 0, 1)
  };
}
