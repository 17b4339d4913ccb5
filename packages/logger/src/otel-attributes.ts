export const OTEL_ATTR = {
  FILE_PATH: 'type_stats.file.path',
  FILE_BYTES: 'type_stats.file.bytes',

  WORKER_COUNT: 'type_stats.worker.count',
  WORKER_INDEX: 'type_stats.worker.index',
  EXECUTOR: 'type_stats.executor',

  RANGE_START: 'type_stats.range.start',
  RANGE_END: 'type_stats.range.end',

  TOTAL_LINES: 'type_stats.lines.total',
  SKIPPED_LINES: 'type_stats.lines.skipped',
  UNIQUE_TYPES: 'type_stats.types.unique',
} as const;
