/**
 * Wires the store, the engine and the background services together.
 */

import type { RunplaneConfig } from './config/index.js';
import { OrchestrationEngine } from './orchestration/engine.js';
import { TransitionNotifier } from './orchestration/notifier.js';
import { createAuxiliaryPolicy, createCorePolicy } from './orchestration/policy.js';
import { LateRunsService } from './services/late-runs.js';
import { SchedulerService } from './services/scheduler.js';
import { MemoryOrchestrationStore } from './storage/memory-store.js';
import type { OrchestrationStore } from './storage/store.js';
import type { Clock } from './utils/clock.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('runtime');

export interface RuntimeOptions {
  config: RunplaneConfig;
  /** Defaults to a fresh in-memory store */
  store?: OrchestrationStore;
  clock?: Clock;
}

export interface Runtime {
  readonly store: OrchestrationStore;
  readonly notifier: TransitionNotifier;
  readonly engine: OrchestrationEngine;
  readonly scheduler: SchedulerService;
  readonly lateRuns: LateRunsService;
  /** Start both background services */
  start(): void;
  /** Stop both background services, waiting for in-flight iterations */
  stop(): Promise<void>;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const { config, clock } = options;
  const store = options.store ?? new MemoryOrchestrationStore();
  const notifier = new TransitionNotifier();

  const engine = new OrchestrationEngine({
    store,
    corePolicy: createCorePolicy({ concurrencySlotWaitMs: config.engine.concurrencySlotWaitMs }),
    auxiliaryPolicy: createAuxiliaryPolicy({ notifier }),
    lockTimeoutMs: config.engine.lockTimeoutMs,
    clock,
  });
  const scheduler = new SchedulerService({ store, config: config.scheduler, clock });
  const lateRuns = new LateRunsService({ store, engine, config: config.lateRuns, clock });

  return {
    store,
    notifier,
    engine,
    scheduler,
    lateRuns,
    start(): void {
      log.info('Starting background services');
      scheduler.start();
      lateRuns.start();
    },
    async stop(): Promise<void> {
      await Promise.all([scheduler.stop(), lateRuns.stop()]);
      log.info('Background services stopped');
    },
  };
}
