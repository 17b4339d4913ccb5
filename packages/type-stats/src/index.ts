export { CancelFlag } from './cancel-flag.js';
export {
  findLineEnd,
  openFileSource,
  planRanges,
  readRangeWindows,
  type ByteSource,
  type ByteWindow,
} from './chunk-reader.js';
export {
  deserializeScanError,
  serializeScanError,
  TypeStatsCancelledError,
  TypeStatsIoError,
  type IoOperation,
  type SerializedScanError,
} from './errors.js';
export { scanLines } from './line-scanner.js';
export { mergePartials } from './merger.js';
export { fnv1a, PartialAggregator } from './partial-aggregator.js';
export {
  runTypeStats,
  type Executor,
  type RunTypeStatsOptions,
  type TypeStatsRunResult,
} from './run-type-stats.js';
export { DEFAULT_WINDOW_BYTES, scanRange, type ScanRangeOptions } from './scan-range.js';
export {
  decodeJsonString,
  extractType,
  typeKeyEquals,
  typeKeyToString,
  utf8SequenceLength,
  type Extraction,
  type TypeKey,
} from './type-extractor.js';
export {
  countSkipped,
  emptySkipTally,
  MALFORMED_REASONS,
  type ByteRange,
  type GlobalResult,
  type LineSpan,
  type MalformedReason,
  type PartialResult,
  type SkipReason,
  type SkipTally,
  type TypeStats,
} from './types.js';
export {
  isScanWorkerData,
  isScanWorkerMessage,
  type ScanWorkerData,
  type ScanWorkerMessage,
} from './worker-protocol.js';
