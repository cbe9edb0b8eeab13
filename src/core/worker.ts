/**
 * Worker loop shared by fetch and index workers
 *
 * State machine: Idle ⇄ Busy → Terminated. Status is reported to the monitor only on
 * a transition (and on the very first report), never on every iteration.
 */

import type { TerminationMonitor } from './termination';
import type { WorkQueue } from './workQueue';
import { errorMessage } from '../utils/errors';
import type { Logger } from '../utils/logger';

export type WorkerState = 'idle' | 'busy' | 'terminated';

export abstract class CrawlWorker<T> {
  private state: WorkerState = 'idle';
  private reported = false;

  constructor(
    readonly id: number,
    protected readonly input: WorkQueue<T>,
    protected readonly monitor: TerminationMonitor,
    protected readonly log: Logger
  ) {}

  get currentState(): WorkerState {
    return this.state;
  }

  /**
   * Process items until the termination signal fires
   */
  async run(): Promise<void> {
    const { signal } = this.monitor;

    while (!signal.aborted) {
      let item = this.input.tryShift();
      if (item === undefined) {
        this.transition('idle');
        item = await this.input.shift(signal);
        if (item === undefined) {
          break;
        }
      }

      this.transition('busy');
      try {
        await this.process(item);
      } catch (error) {
        this.log.error({ error: errorMessage(error) }, 'Failed to process work item');
        this.onFailure(item, error);
      }
    }

    this.state = 'terminated';
    this.log.debug('Worker terminated');
  }

  protected abstract process(item: T): Promise<void>;

  /**
   * Called when process() throws. The item counts as handled.
   */
  protected abstract onFailure(item: T, error: unknown): void;

  private transition(next: 'idle' | 'busy'): void {
    if (this.reported && this.state === next) {
      return;
    }
    this.state = next;
    this.reported = true;
    this.monitor.reportStatus({ workerId: this.id, busy: next === 'busy' });
  }
}
