import pLimit, { type LimitFunction } from 'p-limit';
import { UnknownWorkerError } from '../errors.js';
import type { TaskDispatcher, WorkUnit } from './dispatcher.js';

export interface LocalDispatcherOptions {
  /** Names of the in-process workers. */
  workers: readonly string[];
  /** Maximum number of units running at once on each worker. */
  concurrencyPerWorker?: number;
}

/**
 * Runs units in this process, one p-limit queue per named worker.
 */
export class LocalDispatcher implements TaskDispatcher {
  readonly workers: readonly string[];
  private readonly queues: Map<string, LimitFunction>;

  constructor(opts: LocalDispatcherOptions) {
    const concurrency = opts.concurrencyPerWorker ?? Infinity;
    if (opts.workers.length === 0) {
      throw new Error('LocalDispatcher needs at least one worker');
    }
    this.workers = [...new Set(opts.workers)];
    this.queues = new Map(this.workers.map((w) => [w, pLimit(concurrency)]));
  }

  async submit<T>(worker: string, unit: WorkUnit<T>, signal: AbortSignal): Promise<T> {
    const queue = this.queues.get(worker);
    if (!queue) {
      throw new UnknownWorkerError(worker);
    }
    return queue(async () => {
      // Queued behind a failed round: never start.
      signal.throwIfAborted();
      return await unit({ worker, signal });
    });
  }

  /** Units currently running on `worker`. */
  activeCount(worker: string): number {
    return this.queues.get(worker)?.activeCount ?? 0;
  }
}
