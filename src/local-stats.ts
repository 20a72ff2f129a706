/**
 * Partition-local statistics. Pure functions over one partition's slice; each
 * result is safe to sum with the results of other partitions.
 */

import { PartitionMismatchError } from './errors.js';
import type { LabelSpace } from './label-space.js';
import { nanToNum } from './reduce.js';
import type { Matrix, TpFpTable } from './types.js';

/** Distinct values of one partition, in first-seen order. */
export function localDistinct(slice: ArrayLike<number>): number[] {
  const seen = new Set<number>();
  for (let i = 0; i < slice.length; i++) {
    const v = slice[i];
    if (v !== undefined) seen.add(v);
  }
  return [...seen];
}

/** Rows where the prediction equals the truth. */
export function countCorrect(yTrue: ArrayLike<number>, yPred: ArrayLike<number>): number {
  checkSliceLengths(yTrue, yPred);
  let correct = 0;
  for (let i = 0; i < yTrue.length; i++) {
    if (yTrue[i] === yPred[i]) correct++;
  }
  return correct;
}

/**
 * Per-class true/false positive counts, one `[tp, fp]` row per class of the
 * label space. Predictions outside the space count for no class.
 */
export function sumTpFp(
  yTrue: ArrayLike<number>,
  yPred: ArrayLike<number>,
  labelSpace: LabelSpace,
): TpFpTable {
  checkSliceLengths(yTrue, yPred);

  const predicted = new Float64Array(labelSpace.size);
  const hits = new Float64Array(labelSpace.size);
  for (let i = 0; i < yPred.length; i++) {
    const c = labelSpace.indexOf(yPred[i] ?? Number.NaN);
    if (c < 0) continue;
    predicted[c] = (predicted[c] ?? 0) + 1;
    if (yTrue[i] === yPred[i]) hits[c] = (hits[c] ?? 0) + 1;
  }

  const table: TpFpTable = [];
  for (let c = 0; c < labelSpace.size; c++) {
    const nPredicted = predicted[c] ?? 0;
    // Nothing predicted as this class in this partition.
    if (nPredicted === 0) {
      table.push([0, 0]);
      continue;
    }
    const tp = hits[c] ?? 0;
    table.push([tp, nPredicted - tp]);
  }
  return table;
}

/**
 * Weighted confusion-matrix contribution, `matrix[true][pred]`.
 *
 * Rows whose true or predicted label is outside the label space are dropped.
 * Each row weighs 1 unless `weights` is given. Non-finite cells go through
 * {@link nanToNum}.
 */
export function localConfusionMatrix(
  yTrue: ArrayLike<number>,
  yPred: ArrayLike<number>,
  labelSpace: LabelSpace,
  weights?: ArrayLike<number> | null,
): Matrix {
  checkSliceLengths(yTrue, yPred);
  if (weights) checkSliceLengths(yTrue, weights);

  const n = labelSpace.size;
  const cells = new Float64Array(n * n);
  for (let i = 0; i < yTrue.length; i++) {
    const t = labelSpace.indexOf(yTrue[i] ?? Number.NaN);
    const p = labelSpace.indexOf(yPred[i] ?? Number.NaN);
    if (t < 0 || p < 0) continue;
    const w = weights ? (weights[i] ?? Number.NaN) : 1;
    const k = t * n + p;
    cells[k] = (cells[k] ?? 0) + w;
  }

  return unflatten(cells, n);
}

function unflatten(cells: Float64Array, n: number): Matrix {
  return Array.from({ length: n }, (_, row) =>
    Array.from(cells.subarray(row * n, (row + 1) * n), nanToNum),
  );
}

function checkSliceLengths(a: ArrayLike<number>, b: ArrayLike<number>): void {
  if (a.length !== b.length) {
    throw new PartitionMismatchError(`Partition slices differ in length: ${a.length} vs ${b.length}`);
  }
}
