/**
 * Distributed classification metrics over partition-aligned label sequences.
 *
 * Each metric is one scatter/gather round (plus, where a label space is
 * needed and none is supplied, a label-space round before it). Partial
 * statistics are computed on the worker that owns each partition and summed
 * at the coordinator.
 */

import type { Coordinator, RoundOptions } from './coordinator.js';
import { EmptyInputError } from './errors.js';
import { type LabelSpace, resolveLabelSpace } from './label-space.js';
import { countCorrect, localConfusionMatrix, sumTpFp } from './local-stats.js';
import { type AlignedPartition, alignPartitions } from './partition/align.js';
import type { PartitionedSequence } from './partition/handle.js';
import {
  checkPrecisionLabelSpace,
  normalizeMatrix,
  precisionFromTable,
  sumMatrices,
  sumTables,
} from './reduce.js';
import type { AveragingMode, Matrix, NormalizeMode, TpFpTable } from './types.js';

export interface LabelSpaceOptions extends RoundOptions {
  /** A label space resolved earlier in the same run. Skips the resolution round. */
  labelSpace?: LabelSpace;
}

/**
 * Fraction of rows where the prediction equals the truth.
 */
export async function computeAccuracy(
  coordinator: Coordinator,
  yTrue: PartitionedSequence<number>,
  yPred: PartitionedSequence<number>,
  opts?: RoundOptions,
): Promise<number> {
  const parts = alignNonEmpty(yTrue, yPred);

  const counts = await coordinator.runRound(
    'accuracy',
    parts.map((part) => ({
      partition: part.index,
      worker: part.worker,
      run: async () => countCorrect(await yTrue.fetch(part.yTrue), await yPred.fetch(part.yPred)),
    })),
    opts,
  );

  return counts.reduce((a, b) => a + b, 0) / yTrue.length;
}

/**
 * Global TP/FP table, one `[tp, fp]` row per class of the label space.
 */
export async function computeTpFpTable(
  coordinator: Coordinator,
  yTrue: PartitionedSequence<number>,
  yPred: PartitionedSequence<number>,
  labelSpace: LabelSpace,
  opts?: RoundOptions,
): Promise<TpFpTable> {
  const parts = alignNonEmpty(yTrue, yPred);

  const partials = await coordinator.runRound(
    'precision',
    parts.map((part) => ({
      partition: part.index,
      worker: part.worker,
      run: async () =>
        sumTpFp(await yTrue.fetch(part.yTrue), await yPred.fetch(part.yPred), labelSpace),
    })),
    opts,
  );

  return sumTables(partials, labelSpace.size);
}

/**
 * Precision under the given averaging mode.
 */
export async function computePrecision(
  coordinator: Coordinator,
  yTrue: PartitionedSequence<number>,
  yPred: PartitionedSequence<number>,
  average: AveragingMode = 'binary',
  opts?: LabelSpaceOptions,
): Promise<number> {
  alignNonEmpty(yTrue, yPred);
  const labelSpace = opts?.labelSpace ?? (await resolveLabelSpace(coordinator, yTrue, opts));
  checkPrecisionLabelSpace(labelSpace.size, average);

  const table = await computeTpFpTable(coordinator, yTrue, yPred, labelSpace, opts);
  return precisionFromTable(table, average);
}

/**
 * Confusion matrix with true labels as rows and predictions as columns,
 * optionally weighted per row and normalized.
 */
export async function computeConfusionMatrix(
  coordinator: Coordinator,
  yTrue: PartitionedSequence<number>,
  yPred: PartitionedSequence<number>,
  normalize: NormalizeMode = null,
  weights?: PartitionedSequence<number> | null,
  opts?: LabelSpaceOptions,
): Promise<Matrix> {
  const parts = alignNonEmpty(yTrue, yPred, weights);
  const labelSpace = opts?.labelSpace ?? (await resolveLabelSpace(coordinator, yTrue, opts));

  const partials = await coordinator.runRound(
    'confusion-matrix',
    parts.map((part) => ({
      partition: part.index,
      worker: part.worker,
      run: async () =>
        localConfusionMatrix(
          await yTrue.fetch(part.yTrue),
          await yPred.fetch(part.yPred),
          labelSpace,
          weights && part.weights ? await weights.fetch(part.weights) : null,
        ),
    })),
    opts,
  );

  return normalizeMatrix(sumMatrices(partials, labelSpace.size), normalize);
}

/**
 * Align the inputs of a metric and reject zero rows, before anything is
 * dispatched.
 */
export function alignNonEmpty(
  yTrue: PartitionedSequence<number>,
  yPred: PartitionedSequence<number>,
  weights?: PartitionedSequence<number> | null,
): AlignedPartition[] {
  const parts = alignPartitions(yTrue, yPred, weights);
  if (yTrue.length === 0) {
    throw new EmptyInputError('Cannot compute metrics over zero rows');
  }
  return parts;
}
