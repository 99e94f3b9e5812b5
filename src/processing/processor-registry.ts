/**
 * Processors addressable by name, each with a zod schema for its parameters.
 */

import { z } from 'zod';
import { parseHexColor } from '../color.js';
import { getDefaultConfig, type RasterConfig } from '../config.js';
import { ArgumentError } from '../errors.js';
import type { Image } from '../image.js';
import {
  AlphaProcessor,
  BackgroundColorProcessor,
  BrightnessProcessor,
  ContrastProcessor,
  HueProcessor,
  InvertProcessor,
  SaturationProcessor
} from './color-filters.js';
import {
  createBlackWhite,
  createGreyscale,
  createKodachrome,
  createLomograph,
  createPolaroid,
  createSepia
} from './color-matrix.js';
import {
  EDGE_OPERATORS,
  EDGE_OPERATOR_NAMES,
  EdgeDetectionProcessor,
  createBoxBlur,
  createGaussianBlur,
  createGaussianSharpen
} from './convolution.js';
import { CropProcessor } from './crop.js';
import { PixelateProcessor } from './pixelate.js';
import { RESAMPLERS, RESAMPLER_NAMES } from './resamplers.js';
import { ResizeProcessor, resolveResizeTarget } from './resize.js';
import { applyProcessor, type ProcessOptions, type RowProcessor } from './row-processor.js';

export interface ProcessorContext {
  image: Image;
  config: RasterConfig;
}

export interface ProcessorDefinition {
  readonly schema: z.ZodTypeAny;
  /** Validate raw parameters and build the processor */
  create(parameters: unknown, context: ProcessorContext): RowProcessor;
}

function defineProcessor<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  build: (parameters: z.output<S>, context: ProcessorContext) => RowProcessor
): ProcessorDefinition {
  return {
    schema,
    create(parameters, context) {
      const parsed = schema.safeParse(parameters ?? {});
      if (!parsed.success) {
        throw new ArgumentError(`Invalid parameters for ${name}`, {
          metadata: { processor: name, issues: parsed.error.issues }
        });
      }
      return build(parsed.data, context);
    }
  };
}

const noParameters = z.object({}).strict();
const percentage = z.number().min(-100).max(100);
const sigma = z.object({ sigma: z.number().positive() }).strict();

const resizeSchema = z
  .object({
    width: z.number().int().min(0).default(0),
    height: z.number().int().min(0).default(0),
    sampler: z.enum(RESAMPLER_NAMES).default('bicubic')
  })
  .strict()
  .refine((value) => value.width > 0 || value.height > 0, {
    message: 'width or height must be non-zero'
  });

const PROCESSORS: Readonly<Record<string, ProcessorDefinition>> = {
  resize: defineProcessor('resize', resizeSchema, ({ width, height, sampler }, { image, config }) => {
    const target = resolveResizeTarget(image, width, height);
    if (target.width > config.maxWidth || target.height > config.maxHeight) {
      throw new ArgumentError(
        `Resize target ${target.width}x${target.height} exceeds the maximum ${config.maxWidth}x${config.maxHeight}`
      );
    }
    return new ResizeProcessor(target.width, target.height, RESAMPLERS[sampler]);
  }),
  crop: defineProcessor(
    'crop',
    z
      .object({
        x: z.number().int().min(0),
        y: z.number().int().min(0),
        width: z.number().int().positive(),
        height: z.number().int().positive()
      })
      .strict(),
    (rectangle) => new CropProcessor(rectangle)
  ),
  brightness: defineProcessor('brightness', z.object({ value: percentage }).strict(), ({ value }) => new BrightnessProcessor(value)),
  contrast: defineProcessor('contrast', z.object({ value: percentage }).strict(), ({ value }) => new ContrastProcessor(value)),
  saturation: defineProcessor('saturation', z.object({ value: percentage }).strict(), ({ value }) => new SaturationProcessor(value)),
  hue: defineProcessor(
    'hue',
    z.object({ degrees: z.number().min(-360).max(360) }).strict(),
    ({ degrees }) => new HueProcessor(degrees)
  ),
  alpha: defineProcessor(
    'alpha',
    z.object({ percent: z.number().min(0).max(100) }).strict(),
    ({ percent }) => new AlphaProcessor(percent)
  ),
  invert: defineProcessor('invert', noParameters, () => new InvertProcessor()),
  greyscale: defineProcessor(
    'greyscale',
    z.object({ mode: z.enum(['bt709', 'bt601']).default('bt709') }).strict(),
    ({ mode }) => createGreyscale(mode)
  ),
  sepia: defineProcessor('sepia', noParameters, () => createSepia()),
  blackWhite: defineProcessor('blackWhite', noParameters, () => createBlackWhite()),
  polaroid: defineProcessor('polaroid', noParameters, () => createPolaroid()),
  lomograph: defineProcessor('lomograph', noParameters, () => createLomograph()),
  kodachrome: defineProcessor('kodachrome', noParameters, () => createKodachrome()),
  backgroundColor: defineProcessor(
    'backgroundColor',
    z.object({ color: z.string().min(1) }).strict(),
    ({ color }) => new BackgroundColorProcessor(parseHexColor(color))
  ),
  gaussianBlur: defineProcessor('gaussianBlur', sigma, (p) => createGaussianBlur(p.sigma)),
  gaussianSharpen: defineProcessor('gaussianSharpen', sigma, (p) => createGaussianSharpen(p.sigma)),
  boxBlur: defineProcessor(
    'boxBlur',
    z.object({ radius: z.number().int().min(1) }).strict(),
    ({ radius }) => createBoxBlur(radius)
  ),
  edgeDetection: defineProcessor(
    'edgeDetection',
    z
      .object({
        operator: z.enum(EDGE_OPERATOR_NAMES).default('sobel'),
        greyscale: z.boolean().default(true)
      })
      .strict(),
    ({ operator, greyscale }) => new EdgeDetectionProcessor(EDGE_OPERATORS[operator], greyscale)
  ),
  pixelate: defineProcessor(
    'pixelate',
    z.object({ size: z.number().int().min(1).default(4) }).strict(),
    ({ size }) => new PixelateProcessor(size)
  )
};

export function processorNames(): string[] {
  return Object.keys(PROCESSORS);
}

export function getProcessorDefinition(name: string): ProcessorDefinition | undefined {
  return Object.hasOwn(PROCESSORS, name) ? PROCESSORS[name] : undefined;
}

/**
 * Build the named processor from raw parameters without running it
 */
export function createProcessor(
  image: Image,
  name: string,
  parameters: unknown = {},
  config: RasterConfig = getDefaultConfig()
): RowProcessor {
  const definition = getProcessorDefinition(name);
  if (!definition) {
    throw new ArgumentError(`Unknown processor "${name}". Available processors: ${processorNames().join(', ')}`, {
      metadata: { processor: name }
    });
  }
  return definition.create(parameters, { image, config });
}

/**
 * Validate parameters, build the named processor and apply it to every frame
 */
export async function processImage(
  image: Image,
  name: string,
  parameters: unknown = {},
  options: ProcessOptions = {}
): Promise<Image> {
  const config = options.config ?? getDefaultConfig();
  const processor = createProcessor(image, name, parameters, config);
  return applyProcessor(image, processor, { ...options, config });
}
