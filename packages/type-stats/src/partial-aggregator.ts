import type { TypeKey } from './type-extractor.js';
import {
  emptySkipTally,
  type PartialResult,
  type SkipReason,
  type SkipTally,
  type TypeStats,
} from './types.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const INITIAL_CAPACITY = 64;

interface Entry extends TypeStats {
  readonly hash: number;
  readonly keyBytes: Uint8Array;
  readonly type: string;
}

export function fnv1a(bytes: Uint8Array, start: number, end: number): number {
  let hash = FNV_OFFSET;
  for (let i = start; i < end; i += 1) {
    hash ^= bytes[i];
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

function bytesEqual(a: Uint8Array, b: Uint8Array, bStart: number, bEnd: number): boolean {
  if (a.length !== bEnd - bStart) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[bStart + i]) return false;
  }
  return true;
}

/**
 * Worker-local `type -> {count, totalBytes}` table. Keys are matched on their
 * UTF-8 bytes so a borrowed key is looked up without decoding or copying; the
 * table keeps its own copy of a key the first time it sees it.
 *
 * Not shared between threads.
 */
export class PartialAggregator {
  private slots: (Entry | undefined)[] = new Array<Entry | undefined>(INITIAL_CAPACITY);
  private mask = INITIAL_CAPACITY - 1;
  private size = 0;
  private readonly encoder = new TextEncoder();
  private readonly decoder = new TextDecoder('utf-8', { ignoreBOM: true });
  private readonly skipped: SkipTally = emptySkipTally();
  private totalLines = 0;
  private totalBytes = 0;

  get distinctTypes(): number {
    return this.size;
  }

  record(key: TypeKey, lineByteLength: number): void {
    this.totalLines += 1;
    this.totalBytes += lineByteLength;

    if (key.kind === 'borrowed') {
      this.upsert(key.bytes, key.start, key.end, null, lineByteLength);
      return;
    }
    // Escaped values are re-encoded so they share an entry with the same text
    // written without escapes.
    const encoded = this.encoder.encode(key.value);
    this.upsert(encoded, 0, encoded.length, key.value, lineByteLength);
  }

  skip(reason: SkipReason, lineByteLength: number): void {
    this.totalLines += 1;
    this.totalBytes += lineByteLength;
    if (reason === 'missing') {
      this.skipped.missing += 1;
    } else {
      this.skipped.malformed[reason] += 1;
    }
  }

  toPartialResult(): PartialResult {
    const types = new Map<string, TypeStats>();
    for (const entry of this.slots) {
      if (entry) types.set(entry.type, { count: entry.count, totalBytes: entry.totalBytes });
    }
    return {
      types,
      skipped: { missing: this.skipped.missing, malformed: { ...this.skipped.malformed } },
      totalLines: this.totalLines,
      totalBytes: this.totalBytes,
    };
  }

  private upsert(
    bytes: Uint8Array,
    start: number,
    end: number,
    decoded: string | null,
    lineByteLength: number
  ): void {
    const hash = fnv1a(bytes, start, end);
    let idx = hash & this.mask;

    for (;;) {
      const entry = this.slots[idx];
      if (entry === undefined) break;
      if (entry.hash === hash && bytesEqual(entry.keyBytes, bytes, start, end)) {
        entry.count += 1;
        entry.totalBytes += lineByteLength;
        return;
      }
      idx = (idx + 1) & this.mask;
    }

    const keyBytes = bytes.slice(start, end);
    this.slots[idx] = {
      hash,
      keyBytes,
      type: decoded ?? this.decoder.decode(keyBytes),
      count: 1,
      totalBytes: lineByteLength,
    };
    this.size += 1;
    if (this.size * 4 >= this.slots.length * 3) this.grow();
  }

  private grow(): void {
    const previous = this.slots;
    this.slots = new Array<Entry | undefined>(previous.length * 2);
    this.mask = this.slots.length - 1;
    for (const entry of previous) {
      if (!entry) continue;
      let idx = entry.hash & this.mask;
      while (this.slots[idx] !== undefined) idx = (idx + 1) & this.mask;
      this.slots[idx] = entry;
    }
  }
}
