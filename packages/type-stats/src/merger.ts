import {
  countSkipped,
  emptySkipTally,
  MALFORMED_REASONS,
  type GlobalResult,
  type PartialResult,
  type TypeStats,
} from './types.js';

/**
 * Union-with-sum of worker partials. Inputs are left untouched, and since the
 * sum is commutative the order of `partials` does not affect the result.
 */
export function mergePartials(partials: readonly PartialResult[]): GlobalResult {
  const types = new Map<string, TypeStats>();
  const skipped = emptySkipTally();
  let totalLines = 0;
  let totalBytes = 0;

  for (const partial of partials) {
    for (const [type, stats] of partial.types) {
      const acc = types.get(type);
      if (acc) {
        acc.count += stats.count;
        acc.totalBytes += stats.totalBytes;
      } else {
        types.set(type, { count: stats.count, totalBytes: stats.totalBytes });
      }
    }

    skipped.missing += partial.skipped.missing;
    for (const reason of MALFORMED_REASONS) {
      skipped.malformed[reason] += partial.skipped.malformed[reason];
    }
    totalLines += partial.totalLines;
    totalBytes += partial.totalBytes;
  }

  return {
    types,
    skipped,
    skippedLines: countSkipped(skipped),
    totalLines,
    totalBytes,
  };
}
