export type {
  ConfusionMatrix,
  PrecisionResult,
  ReportAnalysis,
  ScalarResult,
} from './analyses.js';
export {
  renderCount,
  renderDuration,
  renderMetric,
  renderPercentage,
} from './render-numbers.js';
export type { RendererOptions } from './renderer.js';
export { renderConfusionMatrix, renderMetricsReport } from './renderer.js';
export type { MetricsReport } from './report.js';
export { classLabelsFor, createMetricsReport } from './report.js';
