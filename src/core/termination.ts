/**
 * Termination detection
 *
 * Fetch workers create work for index workers and vice versa, so a moment where
 * both queues are empty does not mean the crawl is over (e.g. right after the seed
 * page is indexed and before its first link is picked up). A monitor decides when
 * it really is, and aborts the shared termination signal exactly once.
 */

import { setMaxListeners } from 'node:events';
import type { TerminationStrategy, WorkerStatus } from '../types/crawl.types';
import type { Logger } from '../utils/logger';

export interface TerminationMonitor {
  /** One-shot broadcast observed by every worker before it exits */
  readonly signal: AbortSignal;
  start(): void;
  stop(): void;
  /** A worker changed between busy and idle */
  reportStatus(status: WorkerStatus): void;
  /** A URL was put on the request queue */
  workAdded(): void;
  /** A URL was dropped, or its page was indexed and its links were counted */
  workDone(): void;
}

/**
 * Controller whose signal every worker may wait on at once, one abort listener each
 */
function terminationController(workerCount: number): AbortController {
  const controller = new AbortController();
  setMaxListeners(workerCount + 1, controller.signal);
  return controller;
}

/**
 * Outstanding-work counter
 *
 * Incremented for every URL enqueued, decremented when that URL is fully handled.
 * Discoveries from a page are counted before the page itself is marked done, so the
 * counter can only reach zero when nothing is queued or in flight.
 */
export class WorkCounterMonitor implements TerminationMonitor {
  private readonly controller: AbortController;
  private outstanding = 0;

  constructor(
    workerCount: number,
    private readonly log: Logger
  ) {
    this.controller = terminationController(workerCount);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get pending(): number {
    return this.outstanding;
  }

  start(): void {
    if (this.outstanding === 0) {
      this.terminate();
    }
  }

  stop(): void {
    // Nothing scheduled
  }

  reportStatus(): void {
    // Worker status is not needed to count work
  }

  workAdded(): void {
    if (this.signal.aborted) {
      throw new Error('Work added after the crawl was terminated');
    }
    this.outstanding++;
  }

  workDone(): void {
    if (this.outstanding === 0) {
      throw new Error('Work counter underflow');
    }
    this.outstanding--;
    if (this.outstanding === 0) {
      this.terminate();
    }
  }

  private terminate(): void {
    this.log.debug('No outstanding work, terminating workers');
    this.controller.abort();
  }
}

export interface DebounceMonitorOptions {
  /** Number of spawned workers that must all report idle */
  workerCount: number;
  debounceMs: number;
  pollIntervalMs: number;
  /** Clock, replaceable in tests */
  now?: () => number;
}

/**
 * Quiescence monitor
 *
 * Keeps the latest status of every worker. Each cycle drains the pending reports into
 * the table; once every spawned worker has reported and all are idle, quiescence is
 * tentatively assumed and must hold for the debounce interval before the workers are
 * told to stop. Any busy worker resets the window.
 */
export class DebounceMonitor implements TerminationMonitor {
  private readonly controller: AbortController;
  private readonly inbox: WorkerStatus[] = [];
  private readonly statuses = new Map<number, boolean>();
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private quietSince: number | null = null;

  constructor(
    private readonly options: DebounceMonitorOptions,
    private readonly log: Logger
  ) {
    this.controller = terminationController(options.workerCount);
    this.now = options.now ?? Date.now;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  start(): void {
    if (this.timer || this.signal.aborted) {
      return;
    }
    this.timer = setInterval(() => this.cycle(), this.options.pollIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  reportStatus(status: WorkerStatus): void {
    this.inbox.push(status);
  }

  workAdded(): void {
    // Quiescence is inferred from worker status
  }

  workDone(): void {
    // Quiescence is inferred from worker status
  }

  /**
   * Run one monitor cycle
   *
   * @returns true once termination has been declared
   */
  cycle(): boolean {
    if (this.signal.aborted) {
      return true;
    }

    for (const status of this.inbox.splice(0)) {
      this.statuses.set(status.workerId, status.busy);
    }

    if (!this.allIdle()) {
      this.quietSince = null;
      return false;
    }

    const now = this.now();
    if (this.quietSince === null) {
      this.quietSince = now;
      return false;
    }

    if (now - this.quietSince >= this.options.debounceMs) {
      this.log.debug(
        { quietMs: now - this.quietSince, workers: this.statuses.size },
        'Workers quiescent, terminating'
      );
      this.stop();
      this.controller.abort();
      return true;
    }
    return false;
  }

  private allIdle(): boolean {
    if (this.statuses.size < this.options.workerCount) {
      return false;
    }
    for (const busy of this.statuses.values()) {
      if (busy) return false;
    }
    return true;
  }
}

export function createTerminationMonitor(
  strategy: TerminationStrategy,
  options: DebounceMonitorOptions,
  log: Logger
): TerminationMonitor {
  return strategy === 'debounce'
    ? new DebounceMonitor(options, log)
    : new WorkCounterMonitor(options.workerCount, log);
}
