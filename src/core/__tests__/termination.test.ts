import { getMaxListeners } from 'node:events';
import { describe, expect, it } from 'vitest';
import {
  DebounceMonitor,
  WorkCounterMonitor,
  createTerminationMonitor,
} from '../termination';
import { silentLogger } from '../../__tests__/helpers/fakeSite';

describe('WorkCounterMonitor', () => {
  it('terminates when the last unit of work is done', () => {
    const monitor = new WorkCounterMonitor(1, silentLogger);
    monitor.workAdded();
    monitor.workAdded();
    monitor.start();

    monitor.workDone();
    expect(monitor.pending).toBe(1);
    expect(monitor.signal.aborted).toBe(false);

    monitor.workDone();
    expect(monitor.pending).toBe(0);
    expect(monitor.signal.aborted).toBe(true);
  });

  it('terminates on start when there is no work', () => {
    const monitor = new WorkCounterMonitor(1, silentLogger);
    monitor.start();
    expect(monitor.signal.aborted).toBe(true);
  });

  it('rejects more completions than additions', () => {
    const monitor = new WorkCounterMonitor(1, silentLogger);
    expect(() => monitor.workDone()).toThrow('Work counter underflow');
  });

  it('rejects work added after termination', () => {
    const monitor = new WorkCounterMonitor(1, silentLogger);
    monitor.workAdded();
    monitor.workDone();
    expect(() => monitor.workAdded()).toThrow('Work added after the crawl was terminated');
  });

  it('lets every worker listen on the termination signal', () => {
    const monitor = new WorkCounterMonitor(20, silentLogger);
    expect(getMaxListeners(monitor.signal)).toBe(21);
  });

  it('ignores worker status', () => {
    const monitor = new WorkCounterMonitor(1, silentLogger);
    monitor.workAdded();
    monitor.reportStatus();
    expect(monitor.signal.aborted).toBe(false);
  });
});

describe('DebounceMonitor', () => {
  const createMonitor = (clock: { now: number }) =>
    new DebounceMonitor(
      { workerCount: 2, debounceMs: 100, pollIntervalMs: 10, now: () => clock.now },
      silentLogger
    );

  it('lets every worker listen on the termination signal', () => {
    const monitor = createMonitor({ now: 0 });
    expect(getMaxListeners(monitor.signal)).toBe(3);
  });

  it('waits for a report from every worker', () => {
    const clock = { now: 0 };
    const monitor = createMonitor(clock);

    monitor.reportStatus({ workerId: 0, busy: false });
    expect(monitor.cycle()).toBe(false);
    clock.now = 500;
    expect(monitor.cycle()).toBe(false);
    expect(monitor.signal.aborted).toBe(false);
  });

  it('terminates once all workers stay idle for the debounce interval', () => {
    const clock = { now: 0 };
    const monitor = createMonitor(clock);
    monitor.reportStatus({ workerId: 0, busy: false });
    monitor.reportStatus({ workerId: 1, busy: false });

    expect(monitor.cycle()).toBe(false);
    clock.now = 50;
    expect(monitor.cycle()).toBe(false);
    clock.now = 100;
    expect(monitor.cycle()).toBe(true);
    expect(monitor.signal.aborted).toBe(true);
  });

  it('restarts the interval when a worker becomes busy', () => {
    const clock = { now: 0 };
    const monitor = createMonitor(clock);
    monitor.reportStatus({ workerId: 0, busy: false });
    monitor.reportStatus({ workerId: 1, busy: false });
    expect(monitor.cycle()).toBe(false);

    monitor.reportStatus({ workerId: 0, busy: true });
    clock.now = 150;
    expect(monitor.cycle()).toBe(false);

    monitor.reportStatus({ workerId: 0, busy: false });
    clock.now = 160;
    expect(monitor.cycle()).toBe(false);
    clock.now = 250;
    expect(monitor.cycle()).toBe(false);
    clock.now = 260;
    expect(monitor.cycle()).toBe(true);
  });

  it('keeps the latest status per worker', () => {
    const clock = { now: 0 };
    const monitor = createMonitor(clock);
    monitor.reportStatus({ workerId: 0, busy: true });
    monitor.reportStatus({ workerId: 0, busy: false });
    monitor.reportStatus({ workerId: 1, busy: false });

    expect(monitor.cycle()).toBe(false);
    clock.now = 100;
    expect(monitor.cycle()).toBe(true);
  });

  it('polls on its own once started', async () => {
    const monitor = new DebounceMonitor(
      { workerCount: 1, debounceMs: 20, pollIntervalMs: 5 },
      silentLogger
    );
    monitor.reportStatus({ workerId: 0, busy: false });

    const aborted = new Promise<void>((resolve) =>
      monitor.signal.addEventListener('abort', () => resolve(), { once: true })
    );
    monitor.start();
    await aborted;

    expect(monitor.signal.aborted).toBe(true);
    monitor.stop();
  });
});

describe('createTerminationMonitor', () => {
  const options = { workerCount: 2, debounceMs: 10, pollIntervalMs: 5 };

  it('creates the requested strategy', () => {
    expect(createTerminationMonitor('counter', options, silentLogger)).toBeInstanceOf(
      WorkCounterMonitor
    );
    expect(createTerminationMonitor('debounce', options, silentLogger)).toBeInstanceOf(
      DebounceMonitor
    );
  });
});
