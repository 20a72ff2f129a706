import { PartitionMismatchError } from '../errors.js';
import type { PartitionHandle, PartitionedSequence } from './handle.js';

/** Partition *i* of each aligned sequence. */
export interface AlignedPartition {
  index: number;
  worker: string;
  length: number;
  yTrue: PartitionHandle;
  yPred: PartitionHandle;
  weights: PartitionHandle | null;
}

/**
 * Pair up partition *i* of each sequence.
 *
 * Row identity inside a partition is the caller's responsibility; only what the
 * handles show is checked: total length, partition count, per-partition length
 * and owning worker.
 */
export function alignPartitions(
  yTrue: PartitionedSequence<number>,
  yPred: PartitionedSequence<number>,
  weights?: PartitionedSequence<number> | null,
): AlignedPartition[] {
  checkTotals('y_pred', yTrue, yPred);
  if (weights) checkTotals('sample weights', yTrue, weights);

  const trueParts = yTrue.partitions();
  const predParts = yPred.partitions();
  const weightParts = weights?.partitions() ?? null;

  if (predParts.length !== trueParts.length || (weightParts && weightParts.length !== trueParts.length)) {
    throw new PartitionMismatchError(
      `Partition counts differ: y_true has ${trueParts.length}, y_pred has ${predParts.length}` +
        (weightParts ? `, sample weights have ${weightParts.length}` : ''),
    );
  }

  return trueParts.map((t, i) => ({
    index: i,
    worker: t.worker,
    length: t.length,
    yTrue: t,
    yPred: requireAligned(t, predParts[i], 'y_pred'),
    weights: weightParts ? requireAligned(t, weightParts[i], 'sample weights') : null,
  }));
}

function requireAligned(
  t: PartitionHandle,
  other: PartitionHandle | undefined,
  what: string,
): PartitionHandle {
  if (other === undefined || other.length !== t.length || other.worker !== t.worker) {
    throw new PartitionMismatchError(
      `Partition ${t.index} is not aligned: y_true has ${t.length} rows on '${t.worker}', ` +
        `${what} has ${other?.length ?? 0} rows on '${other?.worker ?? '?'}'`,
    );
  }
  return other;
}

function checkTotals(
  what: string,
  yTrue: PartitionedSequence<number>,
  other: PartitionedSequence<number>,
): void {
  if (other.length !== yTrue.length) {
    throw new PartitionMismatchError(
      `Length mismatch: y_true has ${yTrue.length} rows, ${what} has ${other.length}`,
    );
  }
}
