/**
 * The task-dispatch capability consumed by the coordinator.
 */

export interface UnitContext {
  /** Worker the unit is running on. */
  worker: string;
  /** Aborted when the round the unit belongs to has failed. */
  signal: AbortSignal;
}

/** A unit of work bound to one partition, executed on its owning worker. */
export type WorkUnit<T> = (ctx: UnitContext) => T | Promise<T>;

export interface TaskDispatcher {
  /** Names of the workers units can be submitted to. */
  readonly workers: readonly string[];
  /**
   * Run `unit` on `worker`. Rejects if the worker is unknown, if the unit
   * throws, or if `signal` is aborted before the unit starts.
   */
  submit<T>(worker: string, unit: WorkUnit<T>, signal: AbortSignal): Promise<T>;
}
