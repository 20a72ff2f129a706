/**
 * Core type definitions shared across the metrics engine.
 */

/** An integer class label. */
export type Label = number;

/** Row-major dense matrix: `matrix[row][col]`. */
export type Matrix = number[][];

/** Policy for collapsing per-class precision into one scalar. */
export type AveragingMode = 'binary' | 'macro' | 'micro';

/**
 * Confusion matrix normalization: by row sums (`'true'`), by column sums
 * (`'pred'`), by the grand total (`'all'`), or raw counts (`null`).
 */
export type NormalizeMode = 'true' | 'pred' | 'all' | null;

export const AVERAGING_MODES = ['binary', 'macro', 'micro'] as const satisfies readonly AveragingMode[];

export const NORMALIZE_MODES = ['true', 'pred', 'all'] as const satisfies readonly NormalizeMode[];

/** One `[truePositives, falsePositives]` row per class. */
export type TpFpRow = [tp: number, fp: number];

/** Per-class TP/FP partial statistic, indexed by label-space position. */
export type TpFpTable = TpFpRow[];
