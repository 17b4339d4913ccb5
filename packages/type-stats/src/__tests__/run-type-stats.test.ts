import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { truncateSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { Writable } from 'node:stream';

import { createLogger, type Logger } from '@app/logger';

import { TypeStatsCancelledError, TypeStatsIoError } from '../errors.js';
import { rangeSpanAttributes, runTypeStats } from '../run-type-stats.js';
import { fixturePath, writeJsonl } from './helpers/jsonl-fixture.js';

function record(value: unknown): Record<string, unknown> {
  assert.ok(typeof value === 'object' && value !== null && !Array.isArray(value));
  return Object.fromEntries(Object.entries(value));
}

const SCENARIO = [
  '{"type":"nulla","x":1}',
  '{"type":"dolore","x":22}',
  '{"type":"nulla","x":333}',
];

/**
 * Debug logger that calls `onPlanned` with the planned ranges as soon as the
 * driver logs them, before any range is scanned.
 */
function plannedRangesHook(onPlanned: (ranges: [number, number][]) => void): {
  logger: Logger;
  messages: () => string[];
} {
  const messages: string[] = [];
  const logger = createLogger({
    service: 'test',
    env: 'test',
    level: 'debug',
    destination: {
      write(chunk: string) {
        const line = record(JSON.parse(chunk));
        messages.push(String(line['message']));
        if (line['message'] !== 'type_stats_ranges_planned') return;
        const ranges = line['ranges'];
        assert.ok(Array.isArray(ranges));
        onPlanned(
          ranges.map((pair: unknown): [number, number] => {
            assert.ok(Array.isArray(pair));
            return [Number(pair[0]), Number(pair[1])];
          })
        );
      },
    },
  });
  return { logger, messages: () => messages };
}

void describe('runTypeStats', () => {
  void it('reports the scenario counts and byte totals', async () => {
    const filePath = await fixturePath('scenario.jsonl');
    await writeJsonl(filePath, SCENARIO);

    const result = await runTypeStats({ filePath, workerCount: 2, executor: 'inline' });

    assert.deepEqual(result.types.get('nulla'), { count: 2, totalBytes: 48 });
    assert.deepEqual(result.types.get('dolore'), { count: 1, totalBytes: 25 });
    assert.equal(result.types.size, 2);
    assert.equal(result.skippedLines, 0);
    assert.equal(result.totalLines, 3);
    assert.equal(result.fileBytes, 73);
    assert.equal(result.workers, 2);
    assert.equal(result.executor, 'inline');
  });

  void it('returns an empty result for an empty file', async () => {
    const filePath = await fixturePath('empty.jsonl');
    await writeFile(filePath, '', 'utf8');

    const result = await runTypeStats({ filePath, workerCount: 4, executor: 'inline' });
    assert.equal(result.types.size, 0);
    assert.equal(result.skippedLines, 0);
    assert.equal(result.totalLines, 0);
    assert.equal(result.workers, 0);
  });

  void it('counts the final line when the file has no trailing newline', async () => {
    const filePath = await fixturePath('no-eol.jsonl');
    await writeJsonl(filePath, ['{"type":"a"}', '{"type":"b"}'], false);

    const result = await runTypeStats({ filePath, workerCount: 1, executor: 'inline' });
    assert.deepEqual(result.types.get('a'), { count: 1, totalBytes: 13 });
    assert.deepEqual(result.types.get('b'), { count: 1, totalBytes: 12 });
  });

  void it('tallies skipped lines separately from types', async () => {
    const filePath = await fixturePath('mixed.jsonl');
    await writeJsonl(filePath, [
      '{"type":"a"}',
      'not a json object at all',
      '{"other":1}',
      '{"type":7}',
    ]);

    const result = await runTypeStats({ filePath, workerCount: 3, executor: 'inline' });
    assert.deepEqual([...result.types.keys()], ['a']);
    assert.equal(result.skippedLines, 3);
    assert.equal(result.skipped.missing, 1);
    assert.equal(result.skipped.malformed.not_an_object, 1);
    assert.equal(result.skipped.malformed.non_string_type, 1);
  });

  void it('scans ranges in worker threads', async () => {
    const filePath = await fixturePath('threads.jsonl');
    await writeJsonl(filePath, [...SCENARIO, ...SCENARIO]);

    const result = await runTypeStats({ filePath, workerCount: 3, executor: 'threads' });
    assert.deepEqual(result.types.get('nulla'), { count: 4, totalBytes: 96 });
    assert.deepEqual(result.types.get('dolore'), { count: 2, totalBytes: 50 });
    assert.equal(result.executor, 'threads');
  });

  void it('uses worker threads by default', async () => {
    const filePath = await fixturePath('default.jsonl');
    await writeJsonl(filePath, SCENARIO);

    const result = await runTypeStats({ filePath, workerCount: 2 });
    assert.equal(result.executor, 'threads');
    assert.deepEqual(result.types.get('nulla'), { count: 2, totalBytes: 48 });
    assert.deepEqual(result.types.get('dolore'), { count: 1, totalBytes: 25 });
  });

  void it('rejects with the read failure of one worker thread', async () => {
    const filePath = await fixturePath('truncated.jsonl');
    const lines = Array.from({ length: 3000 }, (_, i) => `{"type":"t${i % 5}","n":${i}}`);
    await writeJsonl(filePath, lines);

    let keptBytes = 0;
    const hook = plannedRangesHook((ranges) => {
      // Keep the first range; later ranges read past the new end of file.
      keptBytes = ranges[0]?.[1] ?? 0;
      truncateSync(filePath, keptBytes);
    });

    await assert.rejects(
      runTypeStats({
        filePath,
        workerCount: 3,
        executor: 'threads',
        windowBytes: 256,
        logger: hook.logger,
      }),
      (err) =>
        err instanceof TypeStatsIoError && err.operation === 'read' && err.offset >= keptBytes
    );
    assert.ok(keptBytes > 0);
    assert.ok(hook.messages().includes('type_stats_failed'));
    assert.ok(!hook.messages().includes('type_stats_completed'));
  });

  void it('cancels worker threads through the shared flag', async () => {
    const filePath = await fixturePath('abort.jsonl');
    await writeJsonl(filePath, [...SCENARIO, ...SCENARIO, ...SCENARIO]);

    const controller = new AbortController();
    const hook = plannedRangesHook(() => controller.abort());

    await assert.rejects(
      runTypeStats({
        filePath,
        workerCount: 3,
        executor: 'threads',
        logger: hook.logger,
        signal: controller.signal,
      }),
      TypeStatsCancelledError
    );
  });

  void it('fails with TypeStatsIoError when the file cannot be opened', async () => {
    const filePath = await fixturePath('missing.jsonl');

    await assert.rejects(
      runTypeStats({ filePath, workerCount: 2, executor: 'inline' }),
      (err) => err instanceof TypeStatsIoError && err.operation === 'open'
    );
  });

  void it('rejects a run cancelled through its signal', async () => {
    const filePath = await fixturePath('cancel.jsonl');
    await writeJsonl(filePath, SCENARIO);

    await assert.rejects(
      runTypeStats({
        filePath,
        workerCount: 2,
        executor: 'inline',
        signal: AbortSignal.abort(),
      }),
      TypeStatsCancelledError
    );
  });

  void it('rejects a worker count below one', async () => {
    await assert.rejects(runTypeStats({ filePath: 'unused', workerCount: 0 }), RangeError);
  });

  void it('logs the completion line', async () => {
    const filePath = await fixturePath('logged.jsonl');
    await writeJsonl(filePath, SCENARIO);

    const chunks: string[] = [];
    const destination = new Writable({
      write(chunk: Buffer | string, _enc, cb) {
        chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
        cb();
      },
    });
    const logger = createLogger({ service: 'test', env: 'test', level: 'info', destination });

    await runTypeStats({ filePath, workerCount: 1, executor: 'inline', logger });

    const lines = chunks
      .join('')
      .split('\n')
      .filter(Boolean)
      .map((l) => record(JSON.parse(l)));
    const completed = lines.find((l) => l['message'] === 'type_stats_completed');
    assert.ok(completed);
    assert.equal(completed['lines'], 3);
    assert.equal(completed['unique_types'], 2);
    assert.equal(completed['skipped_lines'], 0);
    assert.equal(completed['file_path'], filePath);
  });
});

void describe('rangeSpanAttributes', () => {
  void it('labels a range span with its worker index and byte bounds', () => {
    assert.deepEqual(rangeSpanAttributes(2, { start: 48, end: 97 }, 'threads'), {
      'type_stats.worker.index': 2,
      'type_stats.range.start': 48,
      'type_stats.range.end': 97,
      'type_stats.executor': 'threads',
    });
  });
});
