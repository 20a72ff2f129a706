/**
 * Errors raised by the metrics engine.
 *
 * Every failure is fatal at the point of detection: nothing here is retried or
 * recovered locally. Numeric edge cases (0/0, all-zero rows) are not errors.
 */

export type MetricsErrorKind =
  | 'InvalidAveragingMode'
  | 'DegenerateLabelSpace'
  | 'PartitionMismatch'
  | 'WorkerComputationFailed'
  | 'EmptyInput'
  | 'InvalidLabel'
  | 'UnknownWorker';

export abstract class MetricsError extends Error {
  abstract readonly kind: MetricsErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidAveragingModeError extends MetricsError {
  readonly kind = 'InvalidAveragingMode';
}

export class DegenerateLabelSpaceError extends MetricsError {
  readonly kind = 'DegenerateLabelSpace';
}

export class PartitionMismatchError extends MetricsError {
  readonly kind = 'PartitionMismatch';
}

export class EmptyInputError extends MetricsError {
  readonly kind = 'EmptyInput';
}

export class InvalidLabelError extends MetricsError {
  readonly kind = 'InvalidLabel';
}

export class UnknownWorkerError extends MetricsError {
  readonly kind = 'UnknownWorker';

  constructor(readonly worker: string) {
    super(`Unknown worker: '${worker}'`);
  }
}

/**
 * A dispatched unit raised. Carries the first failing partition of the round;
 * the unit's own error is the `cause`.
 */
export class WorkerComputationFailedError extends MetricsError {
  readonly kind = 'WorkerComputationFailed';

  constructor(
    readonly round: string,
    readonly partition: number,
    readonly worker: string,
    cause: unknown,
  ) {
    super(
      `Round '${round}' failed on partition ${partition} (worker '${worker}'): ${describeError(cause)}`,
      { cause },
    );
  }
}

export function isMetricsError(e: unknown): e is MetricsError {
  return e instanceof MetricsError;
}

export function describeError(e: unknown): string {
  const error = e instanceof Error ? e : new Error(String(e));
  return `${error.name}: ${error.message}`;
}
