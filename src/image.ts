import { ArgumentError } from './errors.js';
import { PixelBuffer } from './pixel-buffer.js';
import type { ImageFormat } from './formats/types.js';

export const DEFAULT_RESOLUTION = 96;

/**
 * What happens to a frame's area before the next frame is drawn.
 * Values match the GIF graphic control disposal field.
 */
export enum DisposalMethod {
  None = 0,
  DoNotDispose = 1,
  RestoreToBackground = 2,
  RestoreToPrevious = 3
}

export interface ImageProperty {
  name: string;
  value: string;
}

/**
 * An animation frame beyond the first
 */
export class ImageFrame {
  pixels: PixelBuffer;
  /** Milliseconds */
  delay: number;
  disposal: DisposalMethod;

  constructor(pixels: PixelBuffer, delay = 0, disposal = DisposalMethod.None) {
    this.pixels = pixels;
    this.delay = delay;
    this.disposal = disposal;
  }

  clone(): ImageFrame {
    return new ImageFrame(this.pixels.clone(), this.delay, this.disposal);
  }
}

/**
 * A decoded image: the primary frame plus optional animation frames and metadata.
 * Every frame has the primary frame's dimensions.
 */
export class Image {
  private primary: PixelBuffer;
  private extraFrames: ImageFrame[] = [];

  /** Delay of the primary frame in milliseconds */
  frameDelay = 0;
  disposal = DisposalMethod.None;
  horizontalResolution = DEFAULT_RESOLUTION;
  verticalResolution = DEFAULT_RESOLUTION;
  /** Animation loop count; 0 loops forever, null when the file carries no loop block and plays once */
  repeatCount: number | null = null;
  properties: ImageProperty[] = [];
  currentFormat: ImageFormat | null = null;

  constructor(width: number, height: number);
  constructor(pixels: PixelBuffer);
  constructor(widthOrPixels: number | PixelBuffer, height?: number) {
    this.primary = typeof widthOrPixels === 'number'
      ? new PixelBuffer(widthOrPixels, height ?? 0)
      : widthOrPixels;
  }

  get width(): number {
    return this.primary.width;
  }

  get height(): number {
    return this.primary.height;
  }

  get pixels(): PixelBuffer {
    return this.primary;
  }

  get frames(): readonly ImageFrame[] {
    return this.extraFrames;
  }

  get isAnimated(): boolean {
    return this.extraFrames.length > 0;
  }

  /** Physical width in inches; a non-positive resolution falls back to 96 DPI */
  get inchWidth(): number {
    const dpi = this.horizontalResolution > 0 ? this.horizontalResolution : DEFAULT_RESOLUTION;
    return this.width / dpi;
  }

  get inchHeight(): number {
    const dpi = this.verticalResolution > 0 ? this.verticalResolution : DEFAULT_RESOLUTION;
    return this.height / dpi;
  }

  addFrame(frame: ImageFrame): void {
    if (!frame.pixels.sameSize(this.primary)) {
      throw new ArgumentError(
        `Frame is ${frame.pixels.width}x${frame.pixels.height}, image is ${this.width}x${this.height}`
      );
    }
    this.extraFrames.push(frame);
  }

  /**
   * Swap in new buffers for the primary frame and every extra frame at once
   */
  replacePixels(primary: PixelBuffer, frames: readonly PixelBuffer[] = []): void {
    if (frames.length !== this.extraFrames.length) {
      throw new ArgumentError(`Expected ${this.extraFrames.length} frame buffers, got ${frames.length}`);
    }
    for (const buffer of frames) {
      if (!buffer.sameSize(primary)) {
        throw new ArgumentError('All frames must share the primary frame dimensions');
      }
    }
    this.primary = primary;
    frames.forEach((buffer, index) => {
      this.extraFrames[index].pixels = buffer;
    });
  }

  getProperty(name: string): string | undefined {
    return this.properties.find((property) => property.name === name)?.value;
  }

  setProperty(name: string, value: string): void {
    const existing = this.properties.find((property) => property.name === name);
    if (existing) {
      existing.value = value;
    } else {
      this.properties.push({ name, value });
    }
  }

  /** Deep copy of pixels, frames and metadata */
  clone(): Image {
    const copy = new Image(this.primary.clone());
    copy.extraFrames = this.extraFrames.map((frame) => frame.clone());
    copy.frameDelay = this.frameDelay;
    copy.disposal = this.disposal;
    copy.horizontalResolution = this.horizontalResolution;
    copy.verticalResolution = this.verticalResolution;
    copy.repeatCount = this.repeatCount;
    copy.properties = this.properties.map((property) => ({ ...property }));
    copy.currentFormat = this.currentFormat;
    return copy;
  }
}
