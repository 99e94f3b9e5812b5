import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

export interface RowRange {
  /** Inclusive */
  start: number;
  /** Exclusive */
  end: number;
}

export interface RunRowsOptions {
  /** Number of lanes pulling ranges */
  lanes: number;
  signal?: AbortSignal;
  /** Called after each range with the rows finished so far in this run */
  onRangeDone?: (rowsDone: number) => void;
}

/**
 * Split [0, total) into consecutive ranges of at most `rowsPerRange` rows
 */
export function partitionRows(total: number, rowsPerRange: number): RowRange[] {
  const size = Math.max(1, Math.floor(rowsPerRange));
  const ranges: RowRange[] = [];
  for (let start = 0; start < total; start += size) {
    ranges.push({ start, end: Math.min(total, start + size) });
  }
  return ranges;
}

/**
 * Default range size: about four ranges per lane
 */
export function defaultRowsPerRange(total: number, lanes: number): number {
  return Math.max(1, Math.ceil(total / (Math.max(1, lanes) * 4)));
}

/**
 * Run `work` over every range using cooperative lanes. Each lane yields to the
 * event loop before taking its next range and checks for cancellation.
 * Resolves once every range has completed.
 */
export async function runRowRanges(
  ranges: readonly RowRange[],
  work: (range: RowRange) => void,
  options: RunRowsOptions
): Promise<void> {
  let next = 0;
  let rowsDone = 0;

  const lane = async (): Promise<void> => {
    while (next < ranges.length) {
      options.signal?.throwIfAborted();
      const range = ranges[next++];
      await yieldToEventLoop();
      options.signal?.throwIfAborted();
      work(range);
      rowsDone += range.end - range.start;
      options.onRangeDone?.(rowsDone);
    }
  };

  const laneCount = Math.max(1, Math.min(options.lanes, ranges.length));
  await Promise.all(Array.from({ length: laneCount }, () => lane()));
}
