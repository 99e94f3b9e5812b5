import { ArgumentError } from './errors.js';
import { clamp } from './utils.js';

/**
 * RGBA color with channels normalized to 0-1
 */
export interface Color {
  r: number;
  g: number;
  b: number;
  a: number;
}

export function createColor(r: number, g: number, b: number, a = 1): Color {
  return { r, g, b, a };
}

export const TRANSPARENT: Readonly<Color> = Object.freeze(createColor(0, 0, 0, 0));
export const BLACK: Readonly<Color> = Object.freeze(createColor(0, 0, 0, 1));
export const WHITE: Readonly<Color> = Object.freeze(createColor(1, 1, 1, 1));

/**
 * sRGB companded channel to linear light
 */
export function expandChannel(c: number): number {
  return c <= 0.04045 ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4);
}

/**
 * Linear light channel to sRGB companded
 */
export function compandChannel(l: number): number {
  return l <= 0.0031308 ? l * 12.92 : 1.055 * Math.pow(l, 1 / 2.4) - 0.055;
}

export function toLinear(color: Color): Color {
  return {
    r: expandChannel(color.r),
    g: expandChannel(color.g),
    b: expandChannel(color.b),
    a: color.a
  };
}

export function toCompanded(color: Color): Color {
  return {
    r: compandChannel(color.r),
    g: compandChannel(color.g),
    b: compandChannel(color.b),
    a: color.a
  };
}

export function clampColor(color: Color): Color {
  return {
    r: clamp(color.r, 0, 1),
    g: clamp(color.g, 0, 1),
    b: clamp(color.b, 0, 1),
    a: clamp(color.a, 0, 1)
  };
}

export function colorFromBytes(r: number, g: number, b: number, a = 255): Color {
  return { r: r / 255, g: g / 255, b: b / 255, a: a / 255 };
}

export function channelToByte(value: number): number {
  return Math.round(clamp(value, 0, 1) * 255);
}

export function colorToBytes(color: Color): [number, number, number, number] {
  return [channelToByte(color.r), channelToByte(color.g), channelToByte(color.b), channelToByte(color.a)];
}

/**
 * Linear interpolation between two colors, channel by channel
 */
export function lerpColor(from: Color, to: Color, amount: number): Color {
  const t = clamp(amount, 0, 1);
  return {
    r: from.r + (to.r - from.r) * t,
    g: from.g + (to.g - from.g) * t,
    b: from.b + (to.b - from.b) * t,
    a: from.a + (to.a - from.a) * t
  };
}

export function premultiply(color: Color): Color {
  return { r: color.r * color.a, g: color.g * color.a, b: color.b * color.a, a: color.a };
}

export function unpremultiply(color: Color): Color {
  if (color.a === 0) {
    return { r: 0, g: 0, b: 0, a: 0 };
  }
  return { r: color.r / color.a, g: color.g / color.a, b: color.b / color.a, a: color.a };
}

export function colorsEqual(a: Color, b: Color, tolerance = 0): boolean {
  return (
    Math.abs(a.r - b.r) <= tolerance &&
    Math.abs(a.g - b.g) <= tolerance &&
    Math.abs(a.b - b.b) <= tolerance &&
    Math.abs(a.a - b.a) <= tolerance
  );
}

/** Rec. 709 luma */
export function luminanceBt709(color: Color): number {
  return 0.2126 * color.r + 0.7152 * color.g + 0.0722 * color.b;
}

/** Rec. 601 luma */
export function luminanceBt601(color: Color): number {
  return 0.299 * color.r + 0.587 * color.g + 0.114 * color.b;
}

const NAMED_COLORS: Record<string, [number, number, number, number]> = {
  transparent: [0, 0, 0, 0],
  black: [0, 0, 0, 255],
  white: [255, 255, 255, 255],
  red: [255, 0, 0, 255],
  green: [0, 255, 0, 255],
  blue: [0, 0, 255, 255],
  yellow: [255, 255, 0, 255],
  cyan: [0, 255, 255, 255],
  magenta: [255, 0, 255, 255],
  gray: [128, 128, 128, 255],
  grey: [128, 128, 128, 255]
};

/**
 * Parse `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa` (leading `#` optional) or a basic color name
 */
export function parseHexColor(value: string): Color {
  const name = value.trim().toLowerCase();
  if (Object.hasOwn(NAMED_COLORS, name)) {
    const [r, g, b, a] = NAMED_COLORS[name];
    return colorFromBytes(r, g, b, a);
  }

  const hex = value.trim().replace(/^#/, '');
  if (!/^[0-9a-fA-F]+$/.test(hex)) {
    throw new ArgumentError(`Invalid color: ${value}`);
  }

  let r: number, g: number, b: number, a = 255;
  if (hex.length === 3 || hex.length === 4) {
    r = parseInt(hex[0] + hex[0], 16);
    g = parseInt(hex[1] + hex[1], 16);
    b = parseInt(hex[2] + hex[2], 16);
    if (hex.length === 4) {
      a = parseInt(hex[3] + hex[3], 16);
    }
  } else if (hex.length === 6 || hex.length === 8) {
    r = parseInt(hex.slice(0, 2), 16);
    g = parseInt(hex.slice(2, 4), 16);
    b = parseInt(hex.slice(4, 6), 16);
    if (hex.length === 8) {
      a = parseInt(hex.slice(6, 8), 16);
    }
  } else {
    throw new ArgumentError(`Invalid hex color format: ${value}. Expected #RGB, #RGBA, #RRGGBB, or #RRGGBBAA`);
  }

  return colorFromBytes(r, g, b, a);
}

export function formatHexColor(color: Color): string {
  return '#' + colorToBytes(color).map((value) => value.toString(16).padStart(2, '0')).join('');
}
