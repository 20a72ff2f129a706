/**
 * LabelSpace and its distributed resolution.
 */

import type { Coordinator, RoundOptions } from './coordinator.js';
import { EmptyInputError, InvalidLabelError } from './errors.js';
import { localDistinct } from './local-stats.js';
import type { PartitionedSequence } from './partition/handle.js';
import type { Label } from './types.js';

/**
 * The ordered set of distinct labels observed in `y_true`.
 *
 * Labels need not be contiguous: each one maps to its position in the sorted
 * set, and that position indexes every per-class statistic.
 */
export class LabelSpace {
  readonly labels: readonly Label[];
  private readonly positions: Map<Label, number>;

  private constructor(labels: Label[]) {
    this.labels = labels;
    this.positions = new Map(labels.map((label, i) => [label, i]));
  }

  /**
   * Build a label space from observed values: deduplicated, sorted ascending.
   */
  static fromValues(values: Iterable<number>): LabelSpace {
    const distinct = new Set<number>();
    for (const v of values) {
      if (!Number.isSafeInteger(v)) {
        throw new InvalidLabelError(`Class labels must be integers, got ${v}`);
      }
      distinct.add(v);
    }
    if (distinct.size === 0) {
      throw new EmptyInputError('Cannot build a label space from zero labels');
    }
    return new LabelSpace([...distinct].sort((a, b) => a - b));
  }

  /** Number of classes. */
  get size(): number {
    return this.labels.length;
  }

  /** Position of `label`, or -1 when it is outside the space. */
  indexOf(label: Label): number {
    return this.positions.get(label) ?? -1;
  }

  has(label: Label): boolean {
    return this.positions.has(label);
  }

  toJSON(): Label[] {
    return [...this.labels];
  }
}

/**
 * Discover the label space of `trueLabels` in one scatter/gather round.
 */
export async function resolveLabelSpace(
  coordinator: Coordinator,
  trueLabels: PartitionedSequence<number>,
  opts?: RoundOptions,
): Promise<LabelSpace> {
  if (trueLabels.length === 0) {
    throw new EmptyInputError('Cannot resolve a label space from zero rows');
  }

  const locals = await coordinator.runRound(
    'label-space',
    trueLabels.partitions().map((handle) => ({
      partition: handle.index,
      worker: handle.worker,
      run: async () => localDistinct(await trueLabels.fetch(handle)),
    })),
    opts,
  );

  return LabelSpace.fromValues(locals.flat());
}
