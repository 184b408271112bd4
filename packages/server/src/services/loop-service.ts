/**
 * Loop Service
 *
 * Base class for periodic background work. The loop sleeps for the
 * interval, checks for cancellation, then runs one iteration. Iteration
 * errors are logged and counted; the next iteration runs on schedule.
 * `stop()` interrupts the sleep but never an iteration in flight.
 */

import { EventEmitter } from 'node:events';
import { createLogger, type Logger } from '../utils/logger.js';

/**
 * Resolve after `ms`, or as soon as `signal` aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Events emitted by loop services.
 */
export interface LoopServiceEvents {
  iterationCompleted: (iteration: number, durationMs: number) => void;
  iterationFailed: (iteration: number, error: unknown) => void;
  stopped: () => void;
}

export interface LoopServiceStats {
  iterations: number;
  failures: number;
  lastIterationAt: Date | null;
}

export abstract class LoopService extends EventEmitter {
  protected readonly log: Logger;
  private abortController: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;
  private inFlight: Promise<void> | null = null;
  private readonly stats: LoopServiceStats = { iterations: 0, failures: 0, lastIterationAt: null };

  constructor(
    readonly name: string,
    readonly intervalMs: number
  ) {
    super();
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Loop interval must be positive, got ${intervalMs}`);
    }
    this.log = createLogger(name);
  }

  /**
   * One unit of work.
   */
  protected abstract iterate(): Promise<void>;

  /**
   * Start the loop. The first iteration runs after one interval.
   */
  start(): void {
    if (this.loopPromise) {
      this.log.warn('Loop service already started');
      return;
    }
    const controller = new AbortController();
    this.abortController = controller;
    this.log.info({ intervalMs: this.intervalMs }, 'Starting loop service');
    this.loopPromise = this.loop(controller.signal);
  }

  /**
   * Signal cancellation and wait for the in-flight iteration, if any.
   */
  async stop(): Promise<void> {
    const controller = this.abortController;
    const loop = this.loopPromise;
    if (!controller || !loop) {
      return;
    }
    controller.abort();
    await loop;
    this.abortController = null;
    this.loopPromise = null;
    this.log.info(
      { iterations: this.stats.iterations, failures: this.stats.failures },
      'Loop service stopped'
    );
    this.emit('stopped');
  }

  isRunning(): boolean {
    return this.loopPromise !== null;
  }

  getStats(): LoopServiceStats {
    return { ...this.stats };
  }

  /**
   * Run one iteration now. A call made while an iteration is in flight
   * waits for that iteration instead of starting another.
   */
  async runOnce(): Promise<void> {
    if (this.inFlight) {
      return this.inFlight;
    }
    const iteration = this.runIteration();
    this.inFlight = iteration;
    try {
      await iteration;
    } finally {
      this.inFlight = null;
    }
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await sleep(this.intervalMs, signal);
      if (signal.aborted) {
        break;
      }
      await this.runOnce();
    }
  }

  private async runIteration(): Promise<void> {
    const iteration = this.stats.iterations + 1;
    const startedAt = Date.now();
    this.stats.iterations = iteration;
    this.stats.lastIterationAt = new Date(startedAt);

    try {
      await this.iterate();
      const durationMs = Date.now() - startedAt;
      this.log.debug({ iteration, durationMs }, 'Iteration completed');
      this.emit('iterationCompleted', iteration, durationMs);
    } catch (error) {
      this.stats.failures++;
      this.log.error({ err: error, iteration }, 'Iteration failed');
      this.emit('iterationFailed', iteration, error);
    }
  }
}

/**
 * Loop service around a plain function.
 */
class FunctionLoopService extends LoopService {
  constructor(
    name: string,
    intervalMs: number,
    private readonly fn: () => Promise<void>
  ) {
    super(name, intervalMs);
  }

  protected iterate(): Promise<void> {
    return this.fn();
  }
}

export function createLoopService(
  name: string,
  intervalMs: number,
  fn: () => Promise<void>
): LoopService {
  return new FunctionLoopService(name, intervalMs, fn);
}
