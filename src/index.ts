/**
 * rasterkit
 *
 * Decode, process and encode raster images in Node.js. Pixels are held as
 * floating point RGBA; GIF, PNG, JPEG and BMP are detected from their headers.
 *
 * @example
 * import { loadImage, processImage, saveImage } from 'rasterkit';
 *
 * const image = await loadImage('input.gif');
 * await processImage(image, 'resize', { width: 120, sampler: 'lanczos3' });
 * await saveImage(image, 'thumbnail.gif');
 */

// Loading and saving
export { decodeImage, loadImage, encodeImage, saveImage } from './formats/image-io.js';
export type { ImageIoOptions, EncodeImageOptions, ImageSource } from './formats/image-io.js';

// Processing
export { processImage, createProcessor, processorNames } from './processing/processor-registry.js';
export { applyProcessor, PixelProcessor, fullRectangle } from './processing/row-processor.js';
export type {
  RowProcessor,
  ProcessOptions,
  PrepareContext,
  Rectangle,
  Size
} from './processing/row-processor.js';
export { ResizeProcessor, computeWeights, resolveResizeTarget } from './processing/resize.js';
export type { ResizeState, WeightSet } from './processing/resize.js';
export { RESAMPLERS, RESAMPLER_NAMES } from './processing/resamplers.js';
export type { Resampler, ResamplerName } from './processing/resamplers.js';
export {
  BrightnessProcessor,
  ContrastProcessor,
  SaturationProcessor,
  HueProcessor,
  AlphaProcessor,
  InvertProcessor,
  BackgroundColorProcessor
} from './processing/color-filters.js';
export { ColorMatrixProcessor } from './processing/color-matrix.js';
export type { ColorMatrix } from './processing/color-matrix.js';
export {
  SeparableConvolutionProcessor,
  EdgeDetectionProcessor,
  EDGE_OPERATORS,
  EDGE_OPERATOR_NAMES
} from './processing/convolution.js';
export type { EdgeOperatorName } from './processing/convolution.js';
export { CropProcessor } from './processing/crop.js';
export { PixelateProcessor } from './processing/pixelate.js';

// Image model
export { Image, ImageFrame, DisposalMethod, DEFAULT_RESOLUTION } from './image.js';
export type { ImageProperty } from './image.js';
export { PixelBuffer } from './pixel-buffer.js';
export * from './color.js';
export * from './color-conversions.js';

// Formats
export {
  FormatRegistry,
  createDefaultRegistry,
  getDefaultRegistry,
  setDefaultRegistry,
  resetDefaultRegistry
} from './formats/format-registry.js';
export type { ImageFormat, ImageDecoder, ImageEncoder, DecodeOptions, EncodeOptions } from './formats/types.js';
export { gifFormat } from './formats/gif-format.js';
export { pngFormat } from './formats/png-format.js';
export { jpegFormat } from './formats/jpeg-format.js';
export { bmpFormat } from './formats/bmp-format.js';

// Configuration, errors, logging
export { resolveConfig, getDefaultConfig, setDefaultConfig, resetDefaultConfig } from './config.js';
export type { RasterConfig, RasterConfigInput } from './config.js';
export { RasterError, ArgumentError, FormatError, DecodeError, IndexError } from './errors.js';
export type { RasterErrorCode } from './errors.js';
export { logger } from './logger.js';
