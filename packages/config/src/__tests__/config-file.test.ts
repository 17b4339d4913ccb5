import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, writeFile } from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { ConfigError, DEFAULT_CONFIG_FILE, loadConfigFile } from '../index.js';

async function tempDir(): Promise<string> {
  return await mkdtemp(path.join(os.tmpdir(), 'type-stats-config-'));
}

void describe('loadConfigFile', () => {
  void it('returns empty values when the default file is absent', async () => {
    const cwd = await tempDir();
    const loaded = await loadConfigFile({ cwd });
    assert.equal(loaded.path, null);
    assert.deepEqual(loaded.values, {});
  });

  void it('reads and validates the default file', async () => {
    const cwd = await tempDir();
    await writeFile(
      path.join(cwd, DEFAULT_CONFIG_FILE),
      JSON.stringify({ inputFile: 'big.log', workerCount: 8, logLevel: 'debug' }),
      'utf8'
    );

    const loaded = await loadConfigFile({ cwd });
    assert.equal(loaded.path, path.join(cwd, DEFAULT_CONFIG_FILE));
    assert.deepEqual(loaded.values, { inputFile: 'big.log', workerCount: 8, logLevel: 'debug' });
  });

  void it('fails when an explicit file is missing', async () => {
    const cwd = await tempDir();
    await assert.rejects(loadConfigFile({ cwd, explicitPath: 'nope.json' }), ConfigError);
  });

  void it('rejects invalid JSON and unknown or out-of-range fields', async () => {
    const cwd = await tempDir();
    await writeFile(path.join(cwd, 'broken.json'), '{ not json', 'utf8');
    await writeFile(path.join(cwd, 'unknown.json'), JSON.stringify({ colour: 'red' }), 'utf8');
    await writeFile(path.join(cwd, 'range.json'), JSON.stringify({ workerCount: 0 }), 'utf8');

    await assert.rejects(loadConfigFile({ cwd, explicitPath: 'broken.json' }), /not valid JSON/);
    await assert.rejects(loadConfigFile({ cwd, explicitPath: 'unknown.json' }), ConfigError);
    await assert.rejects(loadConfigFile({ cwd, explicitPath: 'range.json' }), /workerCount/);
  });
});
