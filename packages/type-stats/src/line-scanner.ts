import type { LineSpan } from './types.js';

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

function asBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Lazily yields every line in `bytes[start, end)`. The last line may lack a
 * terminator; an empty trailing segment after the final `\n` is not a line.
 */
export function* scanLines(
  bytes: Uint8Array,
  start = 0,
  end = bytes.length
): Generator<LineSpan, void, undefined> {
  const buf = asBuffer(bytes);
  let lineStart = start;

  while (lineStart < end) {
    const newline = buf.indexOf(NEWLINE, lineStart);
    const terminated = newline !== -1 && newline < end;
    const lineEnd = terminated ? newline : end;

    let contentEnd = lineEnd;
    if (contentEnd > lineStart && buf[contentEnd - 1] === CARRIAGE_RETURN) {
      contentEnd -= 1;
    }

    const next = terminated ? newline + 1 : end;
    yield { start: lineStart, end: contentEnd, length: next - lineStart };
    lineStart = next;
  }
}
