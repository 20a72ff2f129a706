/**
 * shard-metrics: classification metrics over partitioned label sequences.
 *
 * Each partition's statistic is computed on the worker that owns it and the
 * partials are summed at a coordinator.
 *
 * @example
 * ```ts
 * import {
 *   Coordinator,
 *   InMemoryPartitionedSequence,
 *   LocalDispatcher,
 *   evaluateClassifier,
 * } from 'shard-metrics';
 *
 * const workers = ['w1', 'w2'];
 * const yTrue = InMemoryPartitionedSequence.fromArray([0, 0, 1, 1], workers);
 * const yPred = InMemoryPartitionedSequence.fromArray([0, 1, 1, 1], workers);
 *
 * const coordinator = new Coordinator({ dispatcher: new LocalDispatcher({ workers }) });
 * const report = await evaluateClassifier(coordinator, yTrue, yPred);
 * report.print();
 * ```
 */

export type { MetricsConfig } from './config.js';
export { defaultMetricsConfig, metricsConfigSchema } from './config.js';
export type { CoordinatorOptions, RoundOptions, RoundRecord } from './coordinator.js';
export { Coordinator } from './coordinator.js';
// Dispatch
export type {
  LocalDispatcherOptions,
  ScatterUnit,
  TaskDispatcher,
  UnitContext,
  WorkUnit,
} from './dispatch/index.js';
export { LocalDispatcher, scatterGather } from './dispatch/index.js';
// Errors
export type { MetricsErrorKind } from './errors.js';
export {
  DegenerateLabelSpaceError,
  EmptyInputError,
  InvalidAveragingModeError,
  InvalidLabelError,
  isMetricsError,
  MetricsError,
  PartitionMismatchError,
  UnknownWorkerError,
  WorkerComputationFailedError,
} from './errors.js';
export type { EvaluateClassifierOptions } from './evaluate.js';
export { evaluateClassifier } from './evaluate.js';
export { LabelSpace, resolveLabelSpace } from './label-space.js';
export { countCorrect, localConfusionMatrix, localDistinct, sumTpFp } from './local-stats.js';
export type { LogLevel } from './logger.js';
export { createLogger } from './logger.js';
// Metrics
export type { LabelSpaceOptions } from './metrics.js';
export {
  computeAccuracy,
  computeConfusionMatrix,
  computePrecision,
  computeTpFpTable,
} from './metrics.js';
// Partitions
export type { AlignedPartition, Chunk, PartitionHandle, PartitionedSequence } from './partition/index.js';
export { alignPartitions, InMemoryPartitionedSequence } from './partition/index.js';
export {
  nanToNum,
  normalizeMatrix,
  perClassPrecision,
  precisionFromTable,
  safeDivide,
  sumMatrices,
  sumTables,
} from './reduce.js';
// Reporting
export type {
  ConfusionMatrix,
  MetricsReport,
  PrecisionResult,
  RendererOptions,
  ReportAnalysis,
  ScalarResult,
} from './reporting/index.js';
export {
  classLabelsFor,
  createMetricsReport,
  renderCount,
  renderDuration,
  renderMetric,
  renderPercentage,
  renderConfusionMatrix,
  renderMetricsReport,
} from './reporting/index.js';
// Serialization
export type { JobFormat, MetricsJob } from './serialization/index.js';
export {
  jobSchema,
  loadJobFromFile,
  loadJobFromObject,
  loadJobFromText,
  runJob,
} from './serialization/index.js';
// Core types
export type { AveragingMode, Label, Matrix, NormalizeMode, TpFpRow, TpFpTable } from './types.js';
export { AVERAGING_MODES, NORMALIZE_MODES } from './types.js';
