export type { AlignedPartition } from './align.js';
export { alignPartitions } from './align.js';
export type { PartitionHandle, PartitionedSequence } from './handle.js';
export { totalLength } from './handle.js';
export type { Chunk } from './in-memory.js';
export { InMemoryPartitionedSequence } from './in-memory.js';
