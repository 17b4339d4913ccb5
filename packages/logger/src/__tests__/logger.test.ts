import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Writable } from 'node:stream';

import { createLogger, toSnakeKey, withSpan } from '../index.js';

function record(value: unknown): Record<string, unknown> {
  assert.ok(typeof value === 'object' && value !== null && !Array.isArray(value));
  return Object.fromEntries(Object.entries(value));
}

function captureStream(): { stream: Writable; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _enc, cb) {
      chunks.push(typeof chunk === 'string' ? chunk : chunk.toString('utf8'));
      cb();
    },
  });
  return {
    stream,
    lines: () =>
      chunks
        .join('')
        .split('\n')
        .filter(Boolean)
        .map((l): Record<string, unknown> => record(JSON.parse(l))),
  };
}

void describe('createLogger', () => {
  void it('writes JSON lines with message, level and snake_case context', () => {
    const capture = captureStream();
    const logger = createLogger({
      service: 'type-stats-test',
      env: 'test',
      level: 'debug',
      version: '9.9.9',
      destination: capture.stream,
    });

    logger.info({ uniqueTypes: 3, filePath: '/tmp/a.jsonl' }, 'type_stats_completed');

    const [line] = capture.lines();
    assert.ok(line);
    assert.equal(line['message'], 'type_stats_completed');
    assert.equal(line['level'], 'info');
    assert.equal(line['service'], 'type-stats-test');
    assert.equal(line['version'], '9.9.9');
    assert.equal(line['unique_types'], 3);
    assert.equal(line['file_path'], '/tmp/a.jsonl');
    assert.equal(typeof line['timestamp'], 'string');
  });

  void it('respects the level threshold', () => {
    const capture = captureStream();
    const logger = createLogger({
      service: 'svc',
      env: 'test',
      level: 'warn',
      destination: capture.stream,
    });

    logger.debug({}, 'hidden');
    logger.info({}, 'hidden');
    logger.warn({}, 'shown');

    assert.deepEqual(
      capture.lines().map((l) => l['message']),
      ['shown']
    );
  });

  void it('merges child context and serializes errors with their cause', () => {
    const capture = captureStream();
    const logger = createLogger({
      service: 'svc',
      env: 'test',
      level: 'info',
      destination: capture.stream,
    }).child({ workerIndex: 2 });

    const cause = new Error('EACCES');
    logger.error({ err: new Error('read failed', { cause }) }, 'type_stats_failed');

    const [line] = capture.lines();
    assert.ok(line);
    assert.equal(line['worker_index'], 2);
    const err = record(line['err']);
    assert.equal(err['type'], 'Error');
    assert.equal(err['message'], 'read failed: EACCES');
    assert.equal(typeof err['stack'], 'string');
  });
});

void describe('toSnakeKey', () => {
  void it('converts camelCase and keeps snake_case', () => {
    assert.equal(toSnakeKey('totalBytes'), 'total_bytes');
    assert.equal(toSnakeKey('throughputMBps'), 'throughput_m_bps');
    assert.equal(toSnakeKey('already_snake'), 'already_snake');
  });
});

void describe('withSpan', () => {
  void it('returns the callback result and rethrows failures', async () => {
    const value = await withSpan('test.span', { attempt: 1 }, async () => 42);
    assert.equal(value, 42);

    await assert.rejects(
      withSpan('test.span', {}, async () => {
        throw new Error('boom');
      }),
      /boom/
    );
  });
});
