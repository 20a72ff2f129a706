/**
 * Zod schemas for job files.
 */

import { z } from 'zod';
import { metricsConfigSchema } from '../config.js';

export const partitionSchema = z
  .object({
    worker: z.string().min(1),
    y_true: z.array(z.number().int()),
    y_pred: z.array(z.number().int()),
    weights: z.array(z.number().finite()).optional(),
  })
  .strict();

export type PartitionRaw = z.infer<typeof partitionSchema>;

export const jobSchema = metricsConfigSchema
  .extend({
    $schema: z.string().optional(),
    /** Workers of the local dispatcher. Defaults to the partitions' workers. */
    workers: z.array(z.string().min(1)).optional(),
    partitions: z.array(partitionSchema),
  })
  .strict()
  .refine(
    (job) => {
      const weighted = job.partitions.filter((p) => p.weights !== undefined).length;
      return weighted === 0 || weighted === job.partitions.length;
    },
    { message: 'Either every partition has weights or none does', path: ['partitions'] },
  );

export type JobRaw = z.infer<typeof jobSchema>;
