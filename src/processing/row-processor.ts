/**
 * Processor contract and the driver that runs it over every frame.
 *
 * For each frame the driver allocates a target buffer and asks the processor
 * for fresh per-frame state. An optional source pass then fills that state row
 * range by row range before the target rows are handed to `applyRows`. The
 * finished targets are swapped in only after every frame is done.
 */

import { getDefaultConfig, type RasterConfig } from '../config.js';
import { ArgumentError } from '../errors.js';
import type { Image } from '../image.js';
import { createChildLogger } from '../logger.js';
import { PixelBuffer } from '../pixel-buffer.js';
import { defaultRowsPerRange, partitionRows, runRowRanges } from './row-scheduler.js';

const log = createChildLogger({ module: 'row-processor' });

export interface Size {
  width: number;
  height: number;
}

export interface Rectangle {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PrepareContext {
  source: PixelBuffer;
  sourceRectangle: Rectangle;
  targetRectangle: Rectangle;
}

export interface RowProcessor<State = unknown> {
  readonly name: string;
  /** Size of the buffer written; the source size when absent */
  targetSize?(source: Size): Size;
  /** Region of the source read; the whole source when absent */
  sourceRectangle?(source: Size): Rectangle;
  /**
   * Build the state shared by the rows of one frame. Called once per frame of
   * every run, so state never outlives the run that created it.
   */
  prepare(context: PrepareContext): State;
  /** Rows of the source pass run before any target rows; none when absent or zero */
  sourcePassRows?(sourceRectangle: Rectangle, targetRectangle: Rectangle): number;
  /** Fill source pass rows [startY, endY) of the state */
  applySourceRows?(state: State, source: PixelBuffer, sourceRectangle: Rectangle, startY: number, endY: number): void;
  /** Fill target rows [startY, endY) */
  applyRows(
    target: PixelBuffer,
    source: PixelBuffer,
    targetRectangle: Rectangle,
    sourceRectangle: Rectangle,
    startY: number,
    endY: number,
    state: State
  ): void;
}

export interface ProcessOptions {
  /** Lanes used for row dispatch; the configured concurrency when absent */
  concurrency?: number;
  /** Rows handed to a lane at a time */
  rowsPerRange?: number;
  signal?: AbortSignal;
  /**
   * Rows finished across both passes of all frames; never decreases and ends
   * at `rowsTotal`
   */
  onRowsProcessed?: (rowsDone: number, rowsTotal: number) => void;
  config?: RasterConfig;
}

export function fullRectangle(size: Size): Rectangle {
  return { x: 0, y: 0, width: size.width, height: size.height };
}

function validateSize<State>(size: Size, processor: RowProcessor<State>): void {
  if (!Number.isInteger(size.width) || !Number.isInteger(size.height) || size.width < 1 || size.height < 1) {
    throw new ArgumentError(`Processor ${processor.name} produced an invalid size ${size.width}x${size.height}`);
  }
}

/**
 * Run a processor over the primary frame and every animation frame.
 * The image is updated in place and returned.
 */
export async function applyProcessor<State>(
  image: Image,
  processor: RowProcessor<State>,
  options: ProcessOptions = {}
): Promise<Image> {
  const config = options.config ?? getDefaultConfig();
  const lanes = Math.max(1, Math.floor(options.concurrency ?? config.concurrency));
  const sources = [image.pixels, ...image.frames.map((frame) => frame.pixels)];
  const sourceSize: Size = { width: image.width, height: image.height };
  const targetSize = processor.targetSize?.(sourceSize) ?? sourceSize;
  validateSize(targetSize, processor);

  const sourceRectangle = processor.sourceRectangle?.(sourceSize) ?? fullRectangle(sourceSize);
  const targetRectangle = fullRectangle(targetSize);
  const passRows = Math.max(0, processor.sourcePassRows?.(sourceRectangle, targetRectangle) ?? 0);
  const rowsTotal = (passRows + targetSize.height) * sources.length;
  const rangesFor = (rows: number) => partitionRows(rows, options.rowsPerRange ?? defaultRowsPerRange(rows, lanes));
  const passRanges = rangesFor(passRows);
  const targetRanges = rangesFor(targetSize.height);
  const started = Date.now();

  const targets: PixelBuffer[] = [];
  let rowsBefore = 0;
  const onRangeDone = (rowsDone: number) => options.onRowsProcessed?.(rowsBefore + rowsDone, rowsTotal);
  for (const source of sources) {
    const target = new PixelBuffer(targetSize.width, targetSize.height);
    const state = processor.prepare({ source, sourceRectangle, targetRectangle });
    if (passRows > 0) {
      await runRowRanges(
        passRanges,
        (range) => processor.applySourceRows?.(state, source, sourceRectangle, range.start, range.end),
        { lanes, signal: options.signal, onRangeDone }
      );
      rowsBefore += passRows;
    }
    await runRowRanges(
      targetRanges,
      (range) => processor.applyRows(target, source, targetRectangle, sourceRectangle, range.start, range.end, state),
      { lanes, signal: options.signal, onRangeDone }
    );
    rowsBefore += targetSize.height;
    targets.push(target);
  }

  const [primary, ...frames] = targets;
  image.replacePixels(primary, frames);
  log.debug(
    {
      processor: processor.name,
      frames: targets.length,
      passRows,
      width: targetSize.width,
      height: targetSize.height,
      lanes,
      ms: Date.now() - started
    },
    'Applied processor'
  );
  return image;
}

/**
 * Base for processors that map each pixel independently of its neighbours.
 * Rows outside the source rectangle are left transparent.
 */
export abstract class PixelProcessor implements RowProcessor<void> {
  abstract readonly name: string;

  prepare(): void {}

  protected abstract transform(r: number, g: number, b: number, a: number, out: Float32Array, offset: number): void;

  applyRows(
    target: PixelBuffer,
    source: PixelBuffer,
    _targetRectangle: Rectangle,
    sourceRectangle: Rectangle,
    startY: number,
    endY: number
  ): void {
    const input = source.data;
    const right = sourceRectangle.x + sourceRectangle.width;
    const bottom = sourceRectangle.y + sourceRectangle.height;
    for (let y = Math.max(startY, sourceRectangle.y); y < Math.min(endY, bottom); y++) {
      for (let x = sourceRectangle.x; x < right; x++) {
        const i = source.offset(x, y);
        this.transform(input[i], input[i + 1], input[i + 2], input[i + 3], target.data, target.offset(x, y));
      }
    }
  }
}
