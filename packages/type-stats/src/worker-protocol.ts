import type { SerializedScanError } from './errors.js';
import type { ByteRange, PartialResult } from './types.js';

/**
 * Main -> Worker (workerData): { filePath, range, windowBytes, cancelBuffer }
 * Worker -> Main:
 *   { type: "result", partial }   range scanned
 *   { type: "error", error }      serialized TypeStatsIoError / cancellation
 */
export type ScanWorkerData = Readonly<{
  filePath: string;
  range: ByteRange;
  windowBytes: number;
  cancelBuffer: SharedArrayBuffer;
}>;

export type ScanWorkerMessage =
  | Readonly<{ type: 'result'; partial: PartialResult }>
  | Readonly<{ type: 'error'; error: SerializedScanError }>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function isScanWorkerData(value: unknown): value is ScanWorkerData {
  if (!isRecord(value)) return false;
  const range = value['range'];
  return (
    typeof value['filePath'] === 'string' &&
    typeof value['windowBytes'] === 'number' &&
    value['cancelBuffer'] instanceof SharedArrayBuffer &&
    isRecord(range) &&
    typeof range['start'] === 'number' &&
    typeof range['end'] === 'number'
  );
}

export function isScanWorkerMessage(value: unknown): value is ScanWorkerMessage {
  if (!isRecord(value)) return false;
  if (value['type'] === 'result') {
    const partial = value['partial'];
    return isRecord(partial) && partial['types'] instanceof Map;
  }
  return value['type'] === 'error' && isRecord(value['error']);
}
