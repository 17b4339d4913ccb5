import { Worker } from 'node:worker_threads';

import {
  createSilentLogger,
  OTEL_ATTR,
  setSpanAttributes,
  withSpan,
  type Logger,
  type SpanAttributes,
} from '@app/logger';

import { CancelFlag } from './cancel-flag.js';
import { openFileSource, planRanges, type ByteSource } from './chunk-reader.js';
import {
  deserializeScanError,
  TypeStatsCancelledError,
  TypeStatsIoError,
} from './errors.js';
import { mergePartials } from './merger.js';
import { runTasks } from './run-tasks.js';
import { DEFAULT_WINDOW_BYTES, scanRange } from './scan-range.js';
import { isScanWorkerMessage, type ScanWorkerData } from './worker-protocol.js';
import type { ByteRange, GlobalResult, PartialResult } from './types.js';

export type Executor = 'threads' | 'inline';

export type RunTypeStatsOptions = Readonly<{
  filePath: string;
  /** Number of ranges scanned in parallel (>= 1). */
  workerCount: number;
  /** Read window per worker; bounds memory together with the longest line. */
  windowBytes?: number;
  /**
   * `threads` runs each range in its own worker thread; `inline` scans all
   * ranges as concurrent tasks on the calling thread.
   */
  executor?: Executor;
  logger?: Logger;
  signal?: AbortSignal;
}>;

export type TypeStatsRunResult = GlobalResult &
  Readonly<{
    fileBytes: number;
    workers: number;
    executor: Executor;
    durationMs: number;
  }>;

const BYTES_PER_MB = 1_048_576;

/**
 * After `tsc` the worker entry is plain .js. Run from sources under tsx, a
 * worker thread does not inherit the loader, so it starts from a small ESM
 * module that registers tsx before importing the .ts entry.
 */
function workerEntryUrl(): URL {
  if (!import.meta.url.endsWith('.ts')) {
    return new URL('./scan-worker.js', import.meta.url);
  }
  const entry = new URL('./scan-worker.ts', import.meta.url);
  const tsxApi = import.meta.resolve('tsx/esm/api');
  const bootstrap = [
    `import { register } from ${JSON.stringify(tsxApi)};`,
    'register();',
    `await import(${JSON.stringify(entry.href)});`,
  ].join('\n');
  return new URL(`data:text/javascript,${encodeURIComponent(bootstrap)}`);
}

function scanInWorker(data: ScanWorkerData): Promise<PartialResult> {
  return new Promise<PartialResult>((resolve, reject) => {
    let outcome: { partial: PartialResult } | { error: Error } | null = null;
    const worker = new Worker(workerEntryUrl(), { workerData: data });

    worker.on('message', (message: unknown) => {
      if (!isScanWorkerMessage(message)) {
        outcome = { error: new Error('scan worker sent an unexpected message') };
        return;
      }
      outcome =
        message.type === 'result'
          ? { partial: message.partial }
          : { error: deserializeScanError(message.error) };
    });
    worker.once('error', (err) => {
      outcome = { error: err };
    });
    // Settle on exit so the caller's join also waits for thread teardown.
    worker.once('exit', (code) => {
      if (outcome === null) {
        reject(new Error(`scan worker exited with code ${code} before reporting`));
      } else if ('partial' in outcome) {
        resolve(outcome.partial);
      } else {
        reject(outcome.error);
      }
    });
  });
}

export function rangeSpanAttributes(
  index: number,
  range: ByteRange,
  executor: Executor
): SpanAttributes {
  return {
    [OTEL_ATTR.WORKER_INDEX]: index,
    [OTEL_ATTR.RANGE_START]: range.start,
    [OTEL_ATTR.RANGE_END]: range.end,
    [OTEL_ATTR.EXECUTOR]: executor,
  };
}

/**
 * Scans `filePath` with `workerCount` parallel range scans and merges their
 * partial results once all of them have finished. Rejects with
 * TypeStatsIoError when any read fails; never returns a partial answer.
 */
export async function runTypeStats(options: RunTypeStatsOptions): Promise<TypeStatsRunResult> {
  if (!Number.isInteger(options.workerCount) || options.workerCount < 1) {
    throw new RangeError(`workerCount must be an integer >= 1, got ${options.workerCount}`);
  }

  const logger = (options.logger ?? createSilentLogger()).child({ filePath: options.filePath });
  const executor = options.executor ?? 'threads';
  const windowBytes = options.windowBytes ?? DEFAULT_WINDOW_BYTES;

  return await withSpan(
    'type_stats.run',
    {
      [OTEL_ATTR.FILE_PATH]: options.filePath,
      [OTEL_ATTR.WORKER_COUNT]: options.workerCount,
      [OTEL_ATTR.EXECUTOR]: executor,
    },
    async (span) => {
      const startedAt = performance.now();
      const source: ByteSource = await openFileSource(options.filePath);

      const cancel = new CancelFlag();
      const onAbort = (): void => cancel.cancel();
      options.signal?.addEventListener('abort', onAbort, { once: true });

      let ranges: ByteRange[];
      let partials: PartialResult[];
      let failed = false;
      try {
        if (options.signal?.aborted) throw new TypeStatsCancelledError(0);

        ranges = await planRanges(source, options.workerCount);
        logger.debug(
          { fileBytes: source.size, ranges: ranges.map((r) => [r.start, r.end]) },
          'type_stats_ranges_planned'
        );

        const tasks = ranges.map(
          (range, index) => () =>
            withSpan(
              'type_stats.scan_range',
              rangeSpanAttributes(index, range, executor),
              () =>
                executor === 'threads'
                  ? scanInWorker({
                      filePath: options.filePath,
                      range,
                      windowBytes,
                      cancelBuffer: cancel.buffer,
                    })
                  : scanRange(source, range, { windowBytes, cancel })
            )
        );
        partials = await runTasks(tasks, cancel, logger);

        if (options.signal?.aborted) throw new TypeStatsCancelledError(0);
      } catch (err) {
        failed = true;
        logger.error({ err, executor }, 'type_stats_failed');
        throw err;
      } finally {
        options.signal?.removeEventListener('abort', onAbort);
        await closeSource(source, failed ? logger : null);
      }

      const merged = mergePartials(partials);
      const durationMs = performance.now() - startedAt;
      const fileSizeMb = source.size / BYTES_PER_MB;
      const seconds = durationMs / 1000;

      setSpanAttributes(span, {
        [OTEL_ATTR.FILE_BYTES]: source.size,
        [OTEL_ATTR.TOTAL_LINES]: merged.totalLines,
        [OTEL_ATTR.SKIPPED_LINES]: merged.skippedLines,
        [OTEL_ATTR.UNIQUE_TYPES]: merged.types.size,
      });
      logger.info(
        {
          durationMs: Math.round(durationMs),
          fileSizeMb: Math.round(fileSizeMb * 100) / 100,
          throughputMbPerSec: seconds > 0 ? Math.round((fileSizeMb / seconds) * 100) / 100 : 0,
          lines: merged.totalLines,
          uniqueTypes: merged.types.size,
          skippedLines: merged.skippedLines,
          workers: ranges.length,
          executor,
        },
        'type_stats_completed'
      );

      return {
        ...merged,
        fileBytes: source.size,
        workers: ranges.length,
        executor,
        durationMs,
      };
    }
  );
}

/**
 * Closes the input. While another error is already propagating the close
 * failure is only logged, so it does not replace the original error.
 */
async function closeSource(source: ByteSource, failureLogger: Logger | null): Promise<void> {
  try {
    await source.close();
  } catch (err) {
    if (failureLogger) {
      failureLogger.warn({ err }, 'type_stats_close_failed');
      return;
    }
    throw new TypeStatsIoError({
      operation: 'close',
      offset: source.size,
      ...(source.path !== undefined ? { path: source.path } : {}),
      cause: err,
    });
  }
}
