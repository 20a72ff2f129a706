/**
 * Terminal table rendering with chalk + cli-table3.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { ConfusionMatrix, PrecisionResult, ReportAnalysis, ScalarResult } from './analyses.js';
import {
  renderCount,
  renderDuration,
  renderMetric,
  renderPercentage,
} from './render-numbers.js';
import type { MetricsReport } from './report.js';

export interface RendererOptions {
  /** Add a table of per-class precision. Default true. */
  includePerClass?: boolean;
  /** Add a table of the scatter/gather rounds. Default false. */
  includeRounds?: boolean;
}

/**
 * Render a MetricsReport as formatted tables.
 */
export function renderMetricsReport(report: MetricsReport, opts?: RendererOptions): string {
  const includePerClass = opts?.includePerClass ?? true;
  const includeRounds = opts?.includeRounds ?? false;

  const summary = new Table({
    head: [chalk.bold('Metric'), chalk.bold('Value')],
    style: { head: [], border: [] },
  });
  summary.push(['Rows', renderCount(report.rows)]);
  summary.push(['Classes', report.classLabels.join(', ')]);
  for (const analysis of report.analyses()) {
    const row = summaryRow(analysis);
    if (row) summary.push(row);
  }

  const sections = [`Classification Metrics: ${report.name}`, summary.toString()];

  if (includePerClass) {
    sections.push(renderPerClass(report.precision, report.classLabels));
  }
  sections.push(renderConfusionMatrix(report.confusionMatrix));

  if (includeRounds && report.rounds.length > 0) {
    const rounds = new Table({
      head: [chalk.bold('Round'), 'Units', 'Duration', 'Status'],
      style: { head: [], border: [] },
    });
    for (const r of report.rounds) {
      const status = r.status === 'completed' ? chalk.green('✔') : chalk.red('✘');
      rounds.push([r.name, String(r.units), renderDuration(r.duration), status]);
    }
    sections.push(rounds.toString());
  }

  return sections.join('\n');
}

/**
 * Render a confusion matrix: true labels as rows, predictions as columns.
 */
export function renderConfusionMatrix(cm: ConfusionMatrix): string {
  const table = new Table({
    head: [chalk.bold('True \\ Pred'), ...cm.classLabels.map((l) => chalk.bold(l))],
    style: { head: [], border: [] },
  });
  cm.matrix.forEach((row, i) => {
    table.push([chalk.bold(cm.classLabels[i] ?? String(i)), ...row.map(renderMetric)]);
  });
  return `${cm.title}\n${table.toString()}`;
}

function renderPerClass(precision: PrecisionResult, classLabels: string[]): string {
  const table = new Table({
    head: [chalk.bold('Class'), 'Precision'],
    style: { head: [], border: [] },
  });
  precision.perClass.forEach((value, i) => {
    table.push([classLabels[i] ?? String(i), renderMetric(value)]);
  });
  return table.toString();
}

function summaryRow(analysis: ReportAnalysis): string[] | null {
  switch (analysis.type) {
    case 'scalar':
      return [analysis.title, renderScalar(analysis)];
    case 'precision':
      return [analysis.title, renderMetric(analysis.value)];
    case 'confusion_matrix':
      return null;
  }
}

function renderScalar(s: ScalarResult): string {
  return s.unit === '%' ? renderPercentage(s.value) : renderMetric(s.value);
}
