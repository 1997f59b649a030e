import type { Logger } from 'pino';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

import { DiscoveryTask } from '../../src/discovery/discoveryTask.js';
import type { HostEntry } from '../../src/hosts/hostRegistry.js';

function makeLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
}

function makeTask(runCycle: (signal: AbortSignal) => Promise<HostEntry[]>) {
  const logger = makeLogger();
  const task = new DiscoveryTask({ intervalMs: 1000, logger: logger as unknown as Logger, runCycle });
  return { task, logger };
}

describe('DiscoveryTask', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('runs a cycle at start and then once per interval', async () => {
    const runCycle = vi.fn(async (): Promise<HostEntry[]> => [{ address: '10.0.0.2' }]);
    const { task } = makeTask(runCycle);

    task.start();
    expect(runCycle).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(1000);
    expect(runCycle).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(1000);
    expect(runCycle).toHaveBeenCalledTimes(3);

    await task.stop();
    expect(task.status()).toMatchObject({ running: false, cycles: 3, lastFound: 1 });
  });

  test('ignores a second start', async () => {
    const runCycle = vi.fn(async (): Promise<HostEntry[]> => []);
    const { task } = makeTask(runCycle);

    task.start();
    task.start();
    expect(runCycle).toHaveBeenCalledTimes(1);

    await task.stop();
  });

  test('never overlaps a slow cycle', async () => {
    let finish: (hosts: HostEntry[]) => void = () => {};
    const runCycle = vi.fn(
      () =>
        new Promise<HostEntry[]>((resolve) => {
          finish = resolve;
        })
    );
    const { task } = makeTask(runCycle);

    task.start();
    await vi.advanceTimersByTimeAsync(5000);
    expect(runCycle).toHaveBeenCalledTimes(1);

    finish([]);
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(1000);
    expect(runCycle).toHaveBeenCalledTimes(2);

    finish([]);
    await task.stop();
  });

  test('keeps its schedule after a failing cycle', async () => {
    const runCycle = vi
      .fn<() => Promise<HostEntry[]>>()
      .mockRejectedValueOnce(new Error('socket failure'))
      .mockResolvedValue([]);
    const { task, logger } = makeTask(runCycle);

    task.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(logger.error).toHaveBeenCalledWith({ error: 'socket failure' }, 'Redfish discovery cycle failed');

    await vi.advanceTimersByTimeAsync(1000);
    expect(runCycle).toHaveBeenCalledTimes(2);

    await task.stop();
  });

  test('stops scheduling once stopped', async () => {
    const runCycle = vi.fn(async (): Promise<HostEntry[]> => []);
    const { task } = makeTask(runCycle);

    task.start();
    await vi.advanceTimersByTimeAsync(0);
    await task.stop();
    await vi.advanceTimersByTimeAsync(10_000);

    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(task.status().running).toBe(false);
  });

  test('aborts the cycle in flight when stopped', async () => {
    const signals: AbortSignal[] = [];
    const { task } = makeTask(
      (signal) =>
        new Promise<HostEntry[]>((resolve) => {
          signals.push(signal);
          signal.addEventListener('abort', () => resolve([]));
        })
    );

    task.start();
    expect(signals[0]?.aborted).toBe(false);

    await task.stop();
    expect(signals[0]?.aborted).toBe(true);
    expect(task.status()).toMatchObject({ running: false, cycles: 1 });
  });

  test('gives a restarted task a fresh signal', async () => {
    const signals: AbortSignal[] = [];
    const { task } = makeTask(async (signal) => {
      signals.push(signal);
      return [];
    });

    task.start();
    await task.stop();
    task.start();

    expect(signals).toHaveLength(2);
    expect(signals[0]?.aborted).toBe(true);
    expect(signals[1]?.aborted).toBe(false);

    await task.stop();
  });

  test('reports the last run', async () => {
    const { task } = makeTask(async () => [{ address: 'a' }, { address: 'b' }]);

    expect(task.status()).toEqual({ running: false, cycles: 0, lastRunAt: null, lastFound: 0 });

    await expect(task.runOnce()).resolves.toHaveLength(2);
    expect(task.status()).toMatchObject({ running: false, cycles: 1, lastFound: 2 });
    expect(typeof task.status().lastRunAt).toBe('string');
  });
});
