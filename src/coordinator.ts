/**
 * The coordinating side of a run: dispatches scatter/gather rounds and keeps
 * a log of them.
 */

import { randomUUID } from 'node:crypto';
import pLimit from 'p-limit';
import type { Logger } from 'pino';
import type { TaskDispatcher } from './dispatch/dispatcher.js';
import { type ScatterUnit, scatterGather } from './dispatch/scatter-gather.js';
import { describeError, WorkerComputationFailedError } from './errors.js';
import { createLogger } from './logger.js';

export interface CoordinatorOptions {
  /** Where units run. */
  dispatcher: TaskDispatcher;
  /** Defaults to a silent pino logger. */
  logger?: Logger;
}

export interface RoundOptions {
  /** Tags the round's record and log lines, so a caller can pick out its own rounds. */
  run?: string;
}

export interface RoundRecord {
  id: string;
  name: string;
  run?: string;
  units: number;
  /** Seconds from dispatch to the last result (or the failure). */
  duration: number;
  status: 'completed' | 'failed';
}

export class Coordinator {
  readonly dispatcher: TaskDispatcher;
  readonly logger: Logger;
  private readonly roundLog: RoundRecord[] = [];
  // Later rounds depend on earlier ones; never run two at once.
  private readonly serial = pLimit(1);

  constructor(opts: CoordinatorOptions) {
    this.dispatcher = opts.dispatcher;
    this.logger = opts.logger ?? createLogger();
  }

  /** Rounds run so far, oldest first. */
  get rounds(): readonly RoundRecord[] {
    return this.roundLog;
  }

  /**
   * Run one scatter/gather round. Waits for any round already in progress.
   */
  runRound<T>(
    name: string,
    units: readonly ScatterUnit<T>[],
    opts?: RoundOptions,
  ): Promise<T[]> {
    return this.serial(() => this.execute(name, units, opts?.run));
  }

  /** Rounds tagged with `run`, oldest first. */
  roundsOf(run: string): RoundRecord[] {
    return this.roundLog.filter((r) => r.run === run);
  }

  private async execute<T>(
    name: string,
    units: readonly ScatterUnit<T>[],
    run: string | undefined,
  ): Promise<T[]> {
    const id = randomUUID();
    const log = this.logger.child({ run, round: name, roundId: id });
    log.debug({ units: units.length }, 'dispatching round');

    const t0 = performance.now();
    try {
      const results = await scatterGather(this.dispatcher, units, name);
      const duration = (performance.now() - t0) / 1000;
      this.roundLog.push({ id, name, run, units: units.length, duration, status: 'completed' });
      log.debug({ duration }, 'round completed');
      return results;
    } catch (e) {
      const duration = (performance.now() - t0) / 1000;
      this.roundLog.push({ id, name, run, units: units.length, duration, status: 'failed' });
      if (e instanceof WorkerComputationFailedError) {
        log.error(
          { partition: e.partition, worker: e.worker, err: describeError(e.cause) },
          'round failed',
        );
      }
      throw e;
    }
  }
}
