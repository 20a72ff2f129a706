/**
 * Run configuration shared by job files and programmatic callers.
 */

import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import { AVERAGING_MODES, NORMALIZE_MODES } from './types.js';

export const metricsConfigSchema = z.object({
  name: z.string().optional(),
  average: z.enum(AVERAGING_MODES).default('macro'),
  // YAML reads a bare `true` as a boolean.
  normalize: z
    .preprocess((v) => (v === true ? 'true' : v), z.enum(NORMALIZE_MODES).nullable())
    .default(null),
  /** Units running at once on each worker. Unbounded when absent. */
  max_concurrency: z.number().int().positive().optional(),
  log_level: z.enum(LOG_LEVELS).default('silent'),
  /** Display names keyed by label. */
  class_names: z.record(z.string(), z.string()).optional(),
});

export type MetricsConfig = z.infer<typeof metricsConfigSchema>;

export const defaultMetricsConfig: MetricsConfig = metricsConfigSchema.parse({});
