/**
 * Partition handles and the partitioned-sequence capability.
 *
 * A sequence is split into disjoint, contiguous partitions, each owned by
 * exactly one worker. The coordinator only ever sees handles; the raw slice is
 * fetched by a unit running on the owning worker.
 */

export interface PartitionHandle {
  /** Identifier of the sequence this partition belongs to. */
  readonly sequenceId: string;
  /** Position of the partition within its sequence, in row order. */
  readonly index: number;
  /** Name of the worker that owns the partition's data. */
  readonly worker: string;
  /** Number of rows in the partition. */
  readonly length: number;
}

export interface PartitionedSequence<T = number> {
  readonly id: string;
  /** Total number of rows across all partitions. */
  readonly length: number;
  /** Partitions in row order. */
  partitions(): readonly PartitionHandle[];
  /** Fetch the in-place slice of a partition. Called on the owning worker. */
  fetch(handle: PartitionHandle): ArrayLike<T> | Promise<ArrayLike<T>>;
}

export function totalLength(handles: readonly PartitionHandle[]): number {
  return handles.reduce((sum, h) => sum + h.length, 0);
}
