/**
 * Loop Service Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createLoopService } from '../../src/services/loop-service.js';

describe('LoopService', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should sleep before each iteration', async () => {
    const iterate = vi.fn().mockResolvedValue(undefined);
    const service = createLoopService('test-loop', 1000, iterate);

    service.start();
    expect(iterate).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1000);
    expect(iterate).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(3000);
    expect(iterate).toHaveBeenCalledTimes(4);

    await service.stop();
  });

  it('should keep looping after a failed iteration', async () => {
    const iterate = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('transient'))
      .mockResolvedValue(undefined);
    const service = createLoopService('test-loop', 1000, iterate);
    const failures: unknown[] = [];
    const completions: number[] = [];
    service.on('iterationFailed', (_iteration: number, error: unknown) => failures.push(error));
    service.on('iterationCompleted', (iteration: number) => completions.push(iteration));

    service.start();
    await vi.advanceTimersByTimeAsync(2000);
    await service.stop();

    expect(iterate).toHaveBeenCalledTimes(2);
    expect(failures).toHaveLength(1);
    expect(completions).toEqual([2]);
    expect(service.getStats()).toMatchObject({ iterations: 2, failures: 1 });
  });

  it('should stop during the sleep without running another iteration', async () => {
    const iterate = vi.fn().mockResolvedValue(undefined);
    const service = createLoopService('test-loop', 60000, iterate);

    service.start();
    expect(service.isRunning()).toBe(true);
    await vi.advanceTimersByTimeAsync(1000);
    await service.stop();
    await vi.advanceTimersByTimeAsync(120000);

    expect(service.isRunning()).toBe(false);
    expect(iterate).not.toHaveBeenCalled();
  });

  it('should let the in-flight iteration finish on stop', async () => {
    let finishIteration: () => void = () => undefined;
    let finished = false;
    const iterate = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finishIteration = () => {
            finished = true;
            resolve();
          };
        })
    );
    const service = createLoopService('test-loop', 1000, iterate);

    service.start();
    await vi.advanceTimersByTimeAsync(1000);
    expect(iterate).toHaveBeenCalledTimes(1);

    let stopped = false;
    const stopping = service.stop().then(() => {
      stopped = true;
    });
    await vi.advanceTimersByTimeAsync(0);
    expect(stopped).toBe(false);

    finishIteration();
    await stopping;

    expect(finished).toBe(true);
    expect(stopped).toBe(true);
    expect(iterate).toHaveBeenCalledTimes(1);
  });

  it('should join an iteration already in flight', async () => {
    let finishIteration: () => void = () => undefined;
    const iterate = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finishIteration = resolve;
        })
    );
    const service = createLoopService('test-loop', 1000, iterate);

    const first = service.runOnce();
    const second = service.runOnce();
    finishIteration();
    await Promise.all([first, second]);

    expect(iterate).toHaveBeenCalledTimes(1);
  });

  it('should ignore a second start', async () => {
    const iterate = vi.fn().mockResolvedValue(undefined);
    const service = createLoopService('test-loop', 1000, iterate);

    service.start();
    service.start();
    await vi.advanceTimersByTimeAsync(1000);
    await service.stop();

    expect(iterate).toHaveBeenCalledTimes(1);
  });

  it('should refuse a non-positive interval', () => {
    expect(() => createLoopService('test-loop', 0, async () => undefined)).toThrow(
      'Loop interval must be positive, got 0'
    );
  });
});
