import { randomUUID } from 'node:crypto';
import type { PartitionHandle, PartitionedSequence } from './handle.js';
import { totalLength } from './handle.js';

export interface Chunk<T> {
  worker: string;
  values: ArrayLike<T>;
}

/**
 * A partitioned sequence whose chunks live in this process.
 */
export class InMemoryPartitionedSequence<T = number> implements PartitionedSequence<T> {
  readonly id: string;
  readonly length: number;
  private readonly handles: PartitionHandle[];
  private readonly chunks: ArrayLike<T>[];

  constructor(chunks: Chunk<T>[], id?: string) {
    this.id = id ?? randomUUID();
    this.chunks = chunks.map((c) => c.values);
    this.handles = chunks.map((c, index) => ({
      sequenceId: this.id,
      index,
      worker: c.worker,
      length: c.values.length,
    }));
    this.length = totalLength(this.handles);
  }

  static fromChunks<T>(chunks: Chunk<T>[], id?: string): InMemoryPartitionedSequence<T> {
    return new InMemoryPartitionedSequence(chunks, id);
  }

  /**
   * Split `values` into `workers.length * partitionsPerWorker` contiguous
   * chunks of near-equal size, placed on workers round-robin.
   */
  static fromArray<T>(
    values: readonly T[],
    workers: readonly string[],
    opts?: { partitionsPerWorker?: number; id?: string },
  ): InMemoryPartitionedSequence<T> {
    if (workers.length === 0) {
      throw new Error('At least one worker is required');
    }
    const partitionsPerWorker = opts?.partitionsPerWorker ?? 1;
    if (!Number.isInteger(partitionsPerWorker) || partitionsPerWorker < 1) {
      throw new Error(`partitionsPerWorker must be a positive integer, got ${partitionsPerWorker}`);
    }

    const n = workers.length * partitionsPerWorker;
    const base = Math.floor(values.length / n);
    const extra = values.length % n;
    const chunks: Chunk<T>[] = [];
    let start = 0;
    for (let i = 0; i < n; i++) {
      const size = base + (i < extra ? 1 : 0);
      chunks.push({ worker: workers[i % workers.length] ?? '', values: values.slice(start, start + size) });
      start += size;
    }
    return new InMemoryPartitionedSequence(chunks, opts?.id);
  }

  partitions(): readonly PartitionHandle[] {
    return this.handles;
  }

  fetch(handle: PartitionHandle): ArrayLike<T> {
    const chunk = handle.sequenceId === this.id ? this.chunks[handle.index] : undefined;
    if (chunk === undefined) {
      throw new Error(`Partition ${handle.index} does not belong to sequence '${this.id}'`);
    }
    return chunk;
  }
}
