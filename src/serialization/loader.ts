/**
 * YAML/JSON loading of metrics jobs.
 */

import { readFileSync } from 'node:fs';
import { basename, extname } from 'node:path';
import type { Logger } from 'pino';
import YAML from 'yaml';
import type { MetricsConfig } from '../config.js';
import { Coordinator } from '../coordinator.js';
import { LocalDispatcher } from '../dispatch/local.js';
import { evaluateClassifier } from '../evaluate.js';
import { createLogger } from '../logger.js';
import { InMemoryPartitionedSequence } from '../partition/in-memory.js';
import type { MetricsReport } from '../reporting/report.js';
import { jobSchema } from './schema.js';

export type JobFormat = 'yaml' | 'json';

/**
 * A loaded job: the sequences live in this process and run on a local
 * dispatcher over the named workers.
 */
export interface MetricsJob {
  config: MetricsConfig;
  yTrue: InMemoryPartitionedSequence<number>;
  yPred: InMemoryPartitionedSequence<number>;
  weights: InMemoryPartitionedSequence<number> | null;
  dispatcher: LocalDispatcher;
}

export function loadJobFromFile(path: string, opts?: { fmt?: JobFormat }): MetricsJob {
  const fmt = opts?.fmt ?? inferFormat(path);
  const content = readFileSync(path, 'utf-8');
  return loadJobFromText(content, { fmt, defaultName: stemOf(path) });
}

export function loadJobFromText(
  content: string,
  opts?: { fmt?: JobFormat; defaultName?: string },
): MetricsJob {
  const fmt = opts?.fmt ?? 'yaml';
  const raw: unknown = fmt === 'yaml' ? YAML.parse(content) : JSON.parse(content);
  return loadJobFromObject(raw, opts);
}

export function loadJobFromObject(data: unknown, opts?: { defaultName?: string }): MetricsJob {
  const { workers, partitions, $schema: _schema, ...config } = jobSchema.parse(data);
  const name = config.name ?? opts?.defaultName;

  const yTrue = InMemoryPartitionedSequence.fromChunks(
    partitions.map((p) => ({ worker: p.worker, values: p.y_true })),
  );
  const yPred = InMemoryPartitionedSequence.fromChunks(
    partitions.map((p) => ({ worker: p.worker, values: p.y_pred })),
  );
  const weighted = partitions.length > 0 && partitions.every((p) => p.weights !== undefined);
  const weights = weighted
    ? InMemoryPartitionedSequence.fromChunks(
        partitions.map((p) => ({ worker: p.worker, values: p.weights ?? [] })),
      )
    : null;

  const workerNames = workers ?? [...new Set(partitions.map((p) => p.worker))];
  if (workerNames.length === 0) {
    throw new Error('A job needs at least one partition or worker');
  }

  return {
    config: { ...config, name },
    yTrue,
    yPred,
    weights,
    dispatcher: new LocalDispatcher({
      workers: workerNames,
      concurrencyPerWorker: config.max_concurrency,
    }),
  };
}

/**
 * Evaluate a loaded job. Logs through `logger`, or a pino logger at the
 * job's `log_level`.
 */
export async function runJob(job: MetricsJob, opts?: { logger?: Logger }): Promise<MetricsReport> {
  const coordinator = new Coordinator({
    dispatcher: job.dispatcher,
    logger: opts?.logger ?? createLogger(job.config.log_level),
  });
  return evaluateClassifier(coordinator, job.yTrue, job.yPred, {
    name: job.config.name,
    average: job.config.average,
    normalize: job.config.normalize,
    weights: job.weights,
    classNames: job.config.class_names ?? null,
  });
}

function inferFormat(path: string): JobFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.yaml' || ext === '.yml') return 'yaml';
  if (ext === '.json') return 'json';
  throw new Error(
    `Could not infer format for filename '${basename(path)}'. Use the fmt option to specify the format.`,
  );
}

function stemOf(path: string): string {
  const base = basename(path);
  const ext = extname(base);
  return base.slice(0, base.length - ext.length);
}
