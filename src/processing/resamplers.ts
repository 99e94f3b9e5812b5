/**
 * Interpolation kernels. A kernel is its support radius plus a weight function.
 */

export interface Resampler {
  readonly radius: number;
  weight(x: number): number;
}

/** Normalized sinc with tiny results flushed to zero */
export function sinc(x: number): number {
  if (x === 0) return 1;
  const px = Math.PI * x;
  const result = Math.sin(px) / px;
  return Math.abs(result) < 1e-5 ? 0 : result;
}

/**
 * Mitchell-Netravali two-parameter cubic family
 */
export function bicubicFamily(b: number, c: number): Resampler {
  return {
    radius: 2,
    weight(x: number): number {
      const t = Math.abs(x);
      const t2 = t * t;
      const t3 = t2 * t;
      if (t < 1) {
        return ((12 - 9 * b - 6 * c) * t3 + (-18 + 12 * b + 6 * c) * t2 + (6 - 2 * b)) / 6;
      }
      if (t < 2) {
        return ((-b - 6 * c) * t3 + (6 * b + 30 * c) * t2 + (-12 * b - 48 * c) * t + (8 * b + 24 * c)) / 6;
      }
      return 0;
    }
  };
}

export function lanczos(radius: number): Resampler {
  return {
    radius,
    weight: (x) => (Math.abs(x) < radius ? sinc(x) * sinc(x / radius) : 0)
  };
}

export const boxResampler: Resampler = {
  radius: 0.5,
  weight: (x) => (x > -0.5 && x <= 0.5 ? 1 : 0)
};

export const triangleResampler: Resampler = {
  radius: 1,
  weight: (x) => {
    const t = Math.abs(x);
    return t < 1 ? 1 - t : 0;
  }
};

export const hermiteResampler: Resampler = {
  radius: 1,
  weight: (x) => {
    const t = Math.abs(x);
    return t < 1 ? (2 * t - 3) * t * t + 1 : 0;
  }
};

export const welchResampler: Resampler = {
  radius: 3,
  weight: (x) => (Math.abs(x) < 3 ? sinc(x) * (1 - (x * x) / 9) : 0)
};

export const RESAMPLER_NAMES = [
  'box',
  'nearest',
  'triangle',
  'bilinear',
  'hermite',
  'bicubic',
  'catmullRom',
  'mitchell',
  'bspline',
  'spline',
  'robidoux',
  'robidouxSharp',
  'lanczos2',
  'lanczos3',
  'lanczos5',
  'lanczos8',
  'welch'
] as const;

export type ResamplerName = typeof RESAMPLER_NAMES[number];

export const RESAMPLERS: Readonly<Record<ResamplerName, Resampler>> = {
  box: boxResampler,
  nearest: boxResampler,
  triangle: triangleResampler,
  bilinear: triangleResampler,
  hermite: hermiteResampler,
  bicubic: bicubicFamily(0, 0.5),
  catmullRom: bicubicFamily(0, 0.5),
  mitchell: bicubicFamily(1 / 3, 1 / 3),
  bspline: bicubicFamily(1, 0),
  spline: bicubicFamily(1, 0),
  robidoux: bicubicFamily(0.37821575509399867, 0.31089212245300067),
  robidouxSharp: bicubicFamily(0.2620145123990142, 0.3689927438004929),
  lanczos2: lanczos(2),
  lanczos3: lanczos(3),
  lanczos5: lanczos(5),
  lanczos8: lanczos(8),
  welch: welchResampler
};
