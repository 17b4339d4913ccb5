import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { mergePartials } from './merger.js';
import { emptySkipTally, type PartialResult, type TypeStats } from './types.js';

function partial(
  types: Record<string, TypeStats>,
  extra: { missing?: number; notAnObject?: number } = {}
): PartialResult {
  const skipped = emptySkipTally();
  skipped.missing = extra.missing ?? 0;
  skipped.malformed.not_an_object = extra.notAnObject ?? 0;
  let totalLines = skipped.missing + skipped.malformed.not_an_object;
  let totalBytes = 0;
  for (const stats of Object.values(types)) {
    totalLines += stats.count;
    totalBytes += stats.totalBytes;
  }
  return { types: new Map(Object.entries(types)), skipped, totalLines, totalBytes };
}

void describe('mergePartials', () => {
  const partials = [
    partial({ nulla: { count: 1, totalBytes: 23 } }, { missing: 1 }),
    partial({ dolore: { count: 1, totalBytes: 25 }, nulla: { count: 1, totalBytes: 25 } }),
    partial({}, { notAnObject: 2 }),
  ];

  void it('sums stats per key and skipped tallies', () => {
    const merged = mergePartials(partials);

    assert.deepEqual(merged.types.get('nulla'), { count: 2, totalBytes: 48 });
    assert.deepEqual(merged.types.get('dolore'), { count: 1, totalBytes: 25 });
    assert.equal(merged.types.size, 2);
    assert.equal(merged.skipped.missing, 1);
    assert.equal(merged.skipped.malformed.not_an_object, 2);
    assert.equal(merged.skippedLines, 3);
    assert.equal(merged.totalLines, 6);
    assert.equal(merged.totalBytes, 73);
  });

  void it('does not mutate its inputs and is repeatable', () => {
    const first = mergePartials(partials);
    const second = mergePartials(partials);

    assert.deepEqual(second, first);
    assert.deepEqual(partials[0]?.types.get('nulla'), { count: 1, totalBytes: 23 });
    assert.deepEqual(partials[1]?.types.get('nulla'), { count: 1, totalBytes: 25 });
  });

  void it('is independent of partial order', () => {
    const forward = mergePartials(partials);
    const reversed = mergePartials([...partials].reverse());
    assert.deepEqual(
      new Map([...reversed.types].sort(([a], [b]) => a.localeCompare(b))),
      new Map([...forward.types].sort(([a], [b]) => a.localeCompare(b)))
    );
    assert.equal(reversed.skippedLines, forward.skippedLines);
  });

  void it('returns an empty result for no partials', () => {
    const merged = mergePartials([]);
    assert.equal(merged.types.size, 0);
    assert.equal(merged.skippedLines, 0);
    assert.equal(merged.totalLines, 0);
  });
});
