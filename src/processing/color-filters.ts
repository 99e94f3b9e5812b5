/**
 * Per-pixel color adjustments.
 */

import { type Color, compandChannel, expandChannel } from '../color.js';
import { hslToRgb, hsvToRgb, rgbToHsl, rgbToHsv } from '../color-conversions.js';
import { ArgumentError } from '../errors.js';
import { clamp } from '../utils.js';
import { PixelProcessor } from './row-processor.js';

function assertRange(name: string, value: number, min: number, max: number): void {
  if (!Number.isFinite(value) || value < min || value > max) {
    throw new ArgumentError(`${name} must be between ${min} and ${max}, got ${value}`);
  }
}

function writeLinear(out: Float32Array, o: number, r: number, g: number, b: number, a: number): void {
  out[o] = clamp(compandChannel(clamp(r, 0, 1)), 0, 1);
  out[o + 1] = clamp(compandChannel(clamp(g, 0, 1)), 0, 1);
  out[o + 2] = clamp(compandChannel(clamp(b, 0, 1)), 0, 1);
  out[o + 3] = clamp(a, 0, 1);
}

function writeColor(out: Float32Array, o: number, color: Color): void {
  out[o] = clamp(color.r, 0, 1);
  out[o + 1] = clamp(color.g, 0, 1);
  out[o + 2] = clamp(color.b, 0, 1);
  out[o + 3] = clamp(color.a, 0, 1);
}

/**
 * Adds value/100 to each channel in linear light
 */
export class BrightnessProcessor extends PixelProcessor {
  readonly name = 'brightness';
  private readonly amount: number;

  constructor(readonly value: number) {
    super();
    assertRange('Brightness', value, -100, 100);
    this.amount = value / 100;
  }

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, o: number): void {
    writeLinear(
      out, o,
      expandChannel(r) + this.amount,
      expandChannel(g) + this.amount,
      expandChannel(b) + this.amount,
      a
    );
  }
}

/**
 * Scales each channel's distance from mid grey by (100 + value) / 100, in linear light
 */
export class ContrastProcessor extends PixelProcessor {
  readonly name = 'contrast';
  private readonly factor: number;

  constructor(readonly value: number) {
    super();
    assertRange('Contrast', value, -100, 100);
    this.factor = (100 + value) / 100;
  }

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, o: number): void {
    const f = this.factor;
    writeLinear(
      out, o,
      (expandChannel(r) - 0.5) * f + 0.5,
      (expandChannel(g) - 0.5) * f + 0.5,
      (expandChannel(b) - 0.5) * f + 0.5,
      a
    );
  }
}

export class SaturationProcessor extends PixelProcessor {
  readonly name = 'saturation';
  private readonly factor: number;

  constructor(readonly value: number) {
    super();
    assertRange('Saturation', value, -100, 100);
    this.factor = (100 + value) / 100;
  }

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, o: number): void {
    const hsl = rgbToHsl({ r, g, b, a });
    writeColor(out, o, hslToRgb({ h: hsl.h, s: clamp(hsl.s * this.factor, 0, 1), l: hsl.l }, a));
  }
}

/**
 * Rotates hue by the given degrees
 */
export class HueProcessor extends PixelProcessor {
  readonly name = 'hue';

  constructor(readonly degrees: number) {
    super();
    assertRange('Hue', degrees, -360, 360);
  }

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, o: number): void {
    const hsv = rgbToHsv({ r, g, b, a });
    if (hsv.s === 0) {
      writeColor(out, o, { r, g, b, a });
      return;
    }
    writeColor(out, o, hsvToRgb({ h: hsv.h + this.degrees, s: hsv.s, v: hsv.v }, a));
  }
}

/**
 * Multiplies alpha by percent / 100
 */
export class AlphaProcessor extends PixelProcessor {
  readonly name = 'alpha';
  private readonly factor: number;

  constructor(readonly percent: number) {
    super();
    assertRange('Alpha', percent, 0, 100);
    this.factor = percent / 100;
  }

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, o: number): void {
    writeColor(out, o, { r, g, b, a: a * this.factor });
  }
}

export class InvertProcessor extends PixelProcessor {
  readonly name = 'invert';

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, o: number): void {
    writeColor(out, o, { r: 1 - r, g: 1 - g, b: 1 - b, a });
  }
}

/**
 * Composites the image over a solid background color
 */
export class BackgroundColorProcessor extends PixelProcessor {
  readonly name = 'backgroundColor';

  constructor(readonly color: Color) {
    super();
  }

  protected transform(r: number, g: number, b: number, a: number, out: Float32Array, o: number): void {
    const background = this.color;
    const outAlpha = a + background.a * (1 - a);
    if (outAlpha <= 0) {
      writeColor(out, o, { r: 0, g: 0, b: 0, a: 0 });
      return;
    }
    const blend = (front: number, back: number): number =>
      (front * a + back * background.a * (1 - a)) / outAlpha;
    writeColor(out, o, {
      r: blend(r, background.r),
      g: blend(g, background.g),
      b: blend(b, background.b),
      a: outAlpha
    });
  }
}
