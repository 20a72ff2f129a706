/**
 * Report-level analysis types.
 */

import type { AveragingMode, Matrix, NormalizeMode } from '../types.js';

export interface ConfusionMatrix {
  type: 'confusion_matrix';
  title: string;
  /** Display labels, used for both axes. */
  classLabels: string[];
  /** matrix[trueIdx][predictedIdx] = (weighted, possibly normalized) count. */
  matrix: Matrix;
  normalize: NormalizeMode;
}

export interface PrecisionResult {
  type: 'precision';
  title: string;
  average: AveragingMode;
  value: number;
  /** Precision of each class, in label-space order. */
  perClass: number[];
}

export interface ScalarResult {
  type: 'scalar';
  title: string;
  value: number;
  /** Optional unit label (e.g., '%'). */
  unit?: string | null;
}

/** Discriminated union of all report-level analysis types. */
export type ReportAnalysis = ConfusionMatrix | PrecisionResult | ScalarResult;
