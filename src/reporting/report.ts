/**
 * MetricsReport: the result of evaluating one classifier run.
 */

import type { RoundRecord } from '../coordinator.js';
import type { LabelSpace } from '../label-space.js';
import type { AveragingMode, Matrix, NormalizeMode } from '../types.js';
import type { ConfusionMatrix, PrecisionResult, ReportAnalysis, ScalarResult } from './analyses.js';
import { type RendererOptions, renderMetricsReport } from './renderer.js';

export interface MetricsReport {
  name: string;
  /** Total rows evaluated. */
  rows: number;
  labelSpace: LabelSpace;
  /** Display label of each class, in label-space order. */
  classLabels: string[];
  accuracy: ScalarResult;
  precision: PrecisionResult;
  confusionMatrix: ConfusionMatrix;
  /** Scatter/gather rounds run to produce this report. */
  rounds: RoundRecord[];

  /** Accuracy, precision and confusion matrix, in that order. */
  analyses(): ReportAnalysis[];
  /** Render the report as a formatted string. */
  render(opts?: RendererOptions): string;
  /** Print the report to the console. */
  print(opts?: RendererOptions): void;
}

/**
 * Display labels for a label space. `classNames` is keyed by the label's
 * decimal form; labels without a name render as the number.
 */
export function classLabelsFor(
  labelSpace: LabelSpace,
  classNames?: Record<string, string> | null,
): string[] {
  return labelSpace.labels.map((label) => classNames?.[String(label)] ?? String(label));
}

export function createMetricsReport(opts: {
  name: string;
  rows: number;
  labelSpace: LabelSpace;
  classNames?: Record<string, string> | null;
  accuracy: number;
  average: AveragingMode;
  precision: number;
  perClassPrecision: number[];
  confusionMatrix: Matrix;
  normalize: NormalizeMode;
  rounds?: readonly RoundRecord[];
}): MetricsReport {
  const classLabels = classLabelsFor(opts.labelSpace, opts.classNames);

  const report: MetricsReport = {
    name: opts.name,
    rows: opts.rows,
    labelSpace: opts.labelSpace,
    classLabels,
    accuracy: { type: 'scalar', title: 'Accuracy', value: opts.accuracy, unit: '%' },
    precision: {
      type: 'precision',
      title: `Precision (${opts.average})`,
      average: opts.average,
      value: opts.precision,
      perClass: opts.perClassPrecision,
    },
    confusionMatrix: {
      type: 'confusion_matrix',
      title: opts.normalize === null ? 'Confusion Matrix' : `Confusion Matrix (normalize=${opts.normalize})`,
      classLabels,
      matrix: opts.confusionMatrix,
      normalize: opts.normalize,
    },
    rounds: [...(opts.rounds ?? [])],

    analyses() {
      return [report.accuracy, report.precision, report.confusionMatrix];
    },

    render(renderOpts) {
      return renderMetricsReport(report, renderOpts);
    },

    print(renderOpts) {
      // eslint-disable-next-line no-console
      console.log(report.render(renderOpts));
    },
  };

  return report;
}
