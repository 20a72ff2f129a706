/**
 * One full evaluation run: label space, accuracy, precision and confusion
 * matrix over the same aligned sequences.
 */

import { randomUUID } from 'node:crypto';
import type { Coordinator } from './coordinator.js';
import { resolveLabelSpace } from './label-space.js';
import {
  alignNonEmpty,
  computeAccuracy,
  computeConfusionMatrix,
  computeTpFpTable,
} from './metrics.js';
import type { PartitionedSequence } from './partition/handle.js';
import {
  checkPrecisionLabelSpace,
  perClassPrecision,
  precisionFromTable,
} from './reduce.js';
import { createMetricsReport, type MetricsReport } from './reporting/report.js';
import type { AveragingMode, NormalizeMode } from './types.js';

export interface EvaluateClassifierOptions {
  /** Report name. */
  name?: string;
  /** Precision averaging mode. Defaults to `'macro'`. */
  average?: AveragingMode;
  /** Confusion matrix normalization. Defaults to raw counts. */
  normalize?: NormalizeMode;
  /** Per-row weights for the confusion matrix, aligned with `yTrue`. */
  weights?: PartitionedSequence<number> | null;
  /** Display names keyed by label, e.g. `{ '0': 'NEG' }`. */
  classNames?: Record<string, string> | null;
}

/**
 * Evaluate predictions against ground truth.
 *
 * Inputs are aligned before anything is dispatched. The label space is
 * resolved first and reused by every metric; rounds run strictly one after
 * another. Any failure aborts the whole run.
 */
export async function evaluateClassifier(
  coordinator: Coordinator,
  yTrue: PartitionedSequence<number>,
  yPred: PartitionedSequence<number>,
  opts?: EvaluateClassifierOptions,
): Promise<MetricsReport> {
  const average = opts?.average ?? 'macro';
  const normalize = opts?.normalize ?? null;
  const weights = opts?.weights ?? null;
  const run = randomUUID();
  const log = coordinator.logger.child({ run, evaluation: opts?.name ?? 'classifier' });

  alignNonEmpty(yTrue, yPred, weights);
  const labelSpace = await resolveLabelSpace(coordinator, yTrue, { run });
  log.info({ nclasses: labelSpace.size, labels: labelSpace.labels }, 'label space resolved');

  checkPrecisionLabelSpace(labelSpace.size, average);

  const accuracy = await computeAccuracy(coordinator, yTrue, yPred, { run });
  const table = await computeTpFpTable(coordinator, yTrue, yPred, labelSpace, { run });

  const confusionMatrix = await computeConfusionMatrix(
    coordinator,
    yTrue,
    yPred,
    normalize,
    weights,
    { labelSpace, run },
  );

  const report = createMetricsReport({
    name: opts?.name ?? 'classifier',
    rows: yTrue.length,
    labelSpace,
    classNames: opts?.classNames ?? null,
    accuracy,
    average,
    precision: precisionFromTable(table, average),
    perClassPrecision: perClassPrecision(table),
    confusionMatrix,
    normalize,
    rounds: coordinator.roundsOf(run),
  });
  log.info({ accuracy, precision: report.precision.value }, 'evaluation completed');
  return report;
}
