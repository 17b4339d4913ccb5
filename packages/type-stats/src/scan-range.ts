import type { CancelFlag } from './cancel-flag.js';
import { readRangeWindows, type ByteSource } from './chunk-reader.js';
import { TypeStatsCancelledError } from './errors.js';
import { scanLines } from './line-scanner.js';
import { PartialAggregator } from './partial-aggregator.js';
import { extractType } from './type-extractor.js';
import type { ByteRange, PartialResult } from './types.js';

export const DEFAULT_WINDOW_BYTES = 8 * 1024 * 1024;
const CANCEL_CHECK_INTERVAL_LINES = 4096;

export type ScanRangeOptions = Readonly<{
  windowBytes?: number;
  cancel?: CancelFlag;
}>;

/**
 * ChunkReader -> LineScanner -> TypeExtractor -> PartialAggregator for one
 * range. Per-line problems are tallied, only I/O failures and cancellation
 * reject.
 */
export async function scanRange(
  source: ByteSource,
  range: ByteRange,
  options: ScanRangeOptions = {}
): Promise<PartialResult> {
  const aggregator = new PartialAggregator();
  const cancel = options.cancel;
  let sinceCheck = 0;

  for await (const window of readRangeWindows(
    source,
    range,
    options.windowBytes ?? DEFAULT_WINDOW_BYTES
  )) {
    if (cancel?.cancelled) throw new TypeStatsCancelledError(window.offset);

    const bytes = window.bytes;
    for (const line of scanLines(bytes)) {
      const extraction = extractType(bytes, line.start, line.end);
      if (extraction.kind === 'found') {
        aggregator.record(extraction.key, line.length);
      } else {
        aggregator.skip(
          extraction.kind === 'missing' ? 'missing' : extraction.reason,
          line.length
        );
      }

      sinceCheck += 1;
      if (sinceCheck === CANCEL_CHECK_INTERVAL_LINES) {
        sinceCheck = 0;
        if (cancel?.cancelled) throw new TypeStatsCancelledError(window.offset + line.start);
      }
    }
  }

  return aggregator.toPartialResult();
}
