export type { JobFormat, MetricsJob } from './loader.js';
export { loadJobFromFile, loadJobFromObject, loadJobFromText, runJob } from './loader.js';
export type { JobRaw, PartitionRaw } from './schema.js';
export { jobSchema, partitionSchema } from './schema.js';
