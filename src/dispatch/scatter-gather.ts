/**
 * Fan-out/fan-in primitive: one unit per partition, each pinned to the worker
 * owning the partition, collected at the caller.
 */

import { WorkerComputationFailedError } from '../errors.js';
import type { TaskDispatcher, WorkUnit } from './dispatcher.js';

export interface ScatterUnit<T> {
  partition: number;
  worker: string;
  run: WorkUnit<T>;
}

/**
 * Submit every unit and wait for all of them.
 *
 * Results come back in unit order, but reductions over them must not depend on
 * it. The first failure aborts the round's signal and rejects with a single
 * {@link WorkerComputationFailedError}; outcomes of the other units are ignored.
 */
export async function scatterGather<T>(
  dispatcher: TaskDispatcher,
  units: readonly ScatterUnit<T>[],
  round: string,
): Promise<T[]> {
  const controller = new AbortController();
  let failure: WorkerComputationFailedError | undefined;

  const fail = (u: ScatterUnit<T>, e: unknown): WorkerComputationFailedError => {
    if (!failure) {
      failure = new WorkerComputationFailedError(round, u.partition, u.worker, e);
      controller.abort(failure);
    }
    return failure;
  };

  return await Promise.all(
    units.map(async (u) => {
      try {
        return await dispatcher.submit(
          u.worker,
          async (ctx) => {
            try {
              return await u.run(ctx);
            } catch (e) {
              // Abort before the worker picks up its next queued unit.
              throw fail(u, e);
            }
          },
          controller.signal,
        );
      } catch (e) {
        throw failure ?? fail(u, e);
      }
    }),
  );
}
