import type { Logger } from '@app/logger';

import type { CancelFlag } from './cancel-flag.js';
import { TypeStatsCancelledError } from './errors.js';
import type { PartialResult } from './types.js';

/**
 * Starts every scan task and waits for all of them to settle (the join
 * barrier before merge). The first real failure cancels the siblings and is
 * the error the run rejects with.
 */
export async function runTasks(
  tasks: readonly (() => Promise<PartialResult>)[],
  cancel: CancelFlag,
  logger: Logger
): Promise<PartialResult[]> {
  const state: { failure: Error | null } = { failure: null };

  const settled = await Promise.allSettled(
    tasks.map(async (task, index) => {
      try {
        const partial = await task();
        logger.debug(
          { workerIndex: index, lines: partial.totalLines, types: partial.types.size },
          'type_stats_worker_done'
        );
        return partial;
      } catch (err) {
        if (state.failure === null && !(err instanceof TypeStatsCancelledError)) {
          state.failure = err instanceof Error ? err : new Error(String(err));
          cancel.cancel();
        }
        throw err;
      }
    })
  );

  if (state.failure !== null) throw state.failure;

  const partials: PartialResult[] = [];
  for (const result of settled) {
    if (result.status === 'rejected') throw result.reason;
    partials.push(result.value);
  }
  return partials;
}
