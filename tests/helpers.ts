import { Coordinator } from '../src/coordinator.js';
import type { TaskDispatcher, WorkUnit } from '../src/dispatch/dispatcher.js';
import { LocalDispatcher } from '../src/dispatch/local.js';
import type { PartitionHandle, PartitionedSequence } from '../src/partition/handle.js';
import { InMemoryPartitionedSequence } from '../src/partition/in-memory.js';

export const WORKERS = ['w1', 'w2'];

export function setup(
  yTrue: number[],
  yPred: number[],
  opts?: { workers?: string[]; partitionsPerWorker?: number },
): {
  coordinator: Coordinator;
  yTrue: InMemoryPartitionedSequence<number>;
  yPred: InMemoryPartitionedSequence<number>;
} {
  const workers = opts?.workers ?? WORKERS;
  const partitionsPerWorker = opts?.partitionsPerWorker ?? 1;
  return {
    coordinator: new Coordinator({ dispatcher: new LocalDispatcher({ workers }) }),
    yTrue: InMemoryPartitionedSequence.fromArray(yTrue, workers, { partitionsPerWorker }),
    yPred: InMemoryPartitionedSequence.fromArray(yPred, workers, { partitionsPerWorker }),
  };
}

/** A sequence whose fetch fails for one partition. */
export class FailingSequence implements PartitionedSequence<number> {
  constructor(
    private readonly inner: InMemoryPartitionedSequence<number>,
    private readonly failAt: number,
  ) {}

  get id(): string {
    return this.inner.id;
  }

  get length(): number {
    return this.inner.length;
  }

  partitions(): readonly PartitionHandle[] {
    return this.inner.partitions();
  }

  fetch(handle: PartitionHandle): ArrayLike<number> {
    if (handle.index === this.failAt) {
      throw new Error(`partition ${handle.index} is unreadable`);
    }
    return this.inner.fetch(handle);
  }
}

/**
 * Runs units in-process, finishing them in the order given by `finishOrder`
 * (worker names) rather than submission order.
 */
export class ReorderingDispatcher implements TaskDispatcher {
  readonly workers: readonly string[];

  constructor(private readonly finishOrder: string[]) {
    this.workers = finishOrder;
  }

  async submit<T>(worker: string, unit: WorkUnit<T>, signal: AbortSignal): Promise<T> {
    const rank = this.finishOrder.indexOf(worker);
    await new Promise((r) => setTimeout(r, rank * 3));
    return await unit({ worker, signal });
  }
}
