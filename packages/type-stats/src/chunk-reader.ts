import { open, type FileHandle } from 'node:fs/promises';

import { TypeStatsIoError } from './errors.js';
import type { ByteRange } from './types.js';

const NEWLINE = 0x0a;
const BOUNDARY_SCAN_BYTES = 64 * 1024;

/**
 * Random-access byte input. Positional reads let every worker read its own
 * range independently of the others.
 */
export interface ByteSource {
  readonly size: number;
  readonly path?: string;
  read(target: Uint8Array, targetOffset: number, length: number, position: number): Promise<number>;
  close(): Promise<void>;
}

export type ByteWindow = Readonly<{
  /** Starts at a line start and ends right after a `\n` (or at end of file). */
  bytes: Buffer;
  /** File offset of `bytes[0]`. */
  offset: number;
}>;

class FileByteSource implements ByteSource {
  constructor(
    private readonly handle: FileHandle,
    public readonly size: number,
    public readonly path: string
  ) {}

  async read(
    target: Uint8Array,
    targetOffset: number,
    length: number,
    position: number
  ): Promise<number> {
    const { bytesRead } = await this.handle.read(target, targetOffset, length, position);
    return bytesRead;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

export async function openFileSource(path: string): Promise<ByteSource> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    throw new TypeStatsIoError({ operation: 'open', offset: 0, path, cause: err });
  }

  try {
    const stats = await handle.stat();
    return new FileByteSource(handle, stats.size, path);
  } catch (err) {
    await handle.close().catch(() => undefined);
    throw new TypeStatsIoError({ operation: 'stat', offset: 0, path, cause: err });
  }
}

async function readAt(
  source: ByteSource,
  target: Uint8Array,
  targetOffset: number,
  length: number,
  position: number
): Promise<number> {
  let bytesRead: number;
  try {
    bytesRead = await source.read(target, targetOffset, length, position);
  } catch (err) {
    throw new TypeStatsIoError({
      operation: 'read',
      offset: position,
      ...(source.path !== undefined ? { path: source.path } : {}),
      cause: err,
    });
  }
  if (bytesRead === 0 && length > 0) {
    throw new TypeStatsIoError({
      operation: 'read',
      offset: position,
      ...(source.path !== undefined ? { path: source.path } : {}),
      message: `Unexpected end of input at byte ${position} (expected ${source.size} bytes)`,
    });
  }
  return bytesRead;
}

/**
 * Offset right after the first `\n` at or after `from`, or the source size
 * when no terminator follows.
 */
export async function findLineEnd(source: ByteSource, from: number): Promise<number> {
  const block = Buffer.allocUnsafe(BOUNDARY_SCAN_BYTES);
  let position = from;
  while (position < source.size) {
    const length = Math.min(block.length, source.size - position);
    const bytesRead = await readAt(source, block, 0, length, position);
    const idx = block.subarray(0, bytesRead).indexOf(NEWLINE);
    if (idx !== -1) return position + idx + 1;
    position += bytesRead;
  }
  return source.size;
}

/**
 * Splits the source into at most `workerCount` line-aligned ranges that
 * partition `[0, size)`. Imbalance is bounded by the longest line.
 */
export async function planRanges(source: ByteSource, workerCount: number): Promise<ByteRange[]> {
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new RangeError(`workerCount must be an integer >= 1, got ${workerCount}`);
  }

  const size = source.size;
  const ranges: ByteRange[] = [];
  if (size === 0) return ranges;

  const step = size / workerCount;
  let start = 0;
  for (let i = 1; i < workerCount && start < size; i += 1) {
    const candidate = Math.floor(step * i);
    if (candidate <= start) continue;

    // Scanning from candidate - 1 keeps a candidate that already sits on a
    // line start from skipping that whole line.
    const boundary = await findLineEnd(source, candidate - 1);
    ranges.push({ start, end: boundary });
    start = boundary;
  }
  if (start < size) {
    ranges.push({ start, end: size });
  }
  return ranges;
}

/**
 * Reads a range as a series of windows that never split a line. The yielded
 * buffer is reused: consume it before pulling the next window.
 */
export async function* readRangeWindows(
  source: ByteSource,
  range: ByteRange,
  windowBytes: number
): AsyncGenerator<ByteWindow, void, undefined> {
  const rangeLength = range.end - range.start;
  if (rangeLength <= 0) return;

  let buffer = Buffer.allocUnsafe(Math.max(1, Math.min(windowBytes, rangeLength)));
  let carry = 0;
  let position = range.start;

  while (position < range.end) {
    if (carry === buffer.length) {
      // A single line is longer than the window.
      const grown = Buffer.allocUnsafe(Math.min(buffer.length * 2, rangeLength));
      buffer.copy(grown, 0, 0, carry);
      buffer = grown;
    }

    const length = Math.min(buffer.length - carry, range.end - position);
    const bytesRead = await readAt(source, buffer, carry, length, position);
    position += bytesRead;

    const filled = carry + bytesRead;
    const lastNewline = buffer.lastIndexOf(NEWLINE, filled - 1);
    if (lastNewline === -1) {
      carry = filled;
      continue;
    }

    const usable = lastNewline + 1;
    yield { bytes: buffer.subarray(0, usable), offset: position - filled };

    buffer.copy(buffer, 0, usable, filled);
    carry = filled - usable;
  }

  if (carry > 0) {
    // Final line of the file without a trailing terminator.
    yield { bytes: buffer.subarray(0, carry), offset: range.end - carry };
  }
}
