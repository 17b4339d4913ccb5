/**
 * Worker thread entry: scans one range of the input file and posts a
 * ScanWorkerMessage back (see worker-protocol.ts).
 */

import { isMainThread, parentPort, workerData } from 'node:worker_threads';

import { CancelFlag } from './cancel-flag.js';
import { openFileSource } from './chunk-reader.js';
import { serializeScanError } from './errors.js';
import { scanRange } from './scan-range.js';
import { isScanWorkerData, type ScanWorkerData, type ScanWorkerMessage } from './worker-protocol.js';

async function runWorker(data: ScanWorkerData): Promise<ScanWorkerMessage> {
  try {
    const source = await openFileSource(data.filePath);
    try {
      const partial = await scanRange(source, data.range, {
        windowBytes: data.windowBytes,
        cancel: new CancelFlag(data.cancelBuffer),
      });
      return { type: 'result', partial };
    } finally {
      await source.close();
    }
  } catch (err) {
    return { type: 'error', error: serializeScanError(err) };
  }
}

if (!isMainThread && parentPort) {
  const port = parentPort;
  if (isScanWorkerData(workerData)) {
    void runWorker(workerData).then((message) => port.postMessage(message));
  } else {
    const message: ScanWorkerMessage = {
      type: 'error',
      error: serializeScanError(new TypeError('scan worker received invalid workerData')),
    };
    port.postMessage(message);
  }
}
