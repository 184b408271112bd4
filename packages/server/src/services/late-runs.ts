/**
 * Late-Run Service
 *
 * Moves scheduled runs that missed their start time into the Late state.
 * Every change goes through the orchestration engine so the full rule
 * pipeline runs; runs that already left Scheduled are never queried.
 */

import { OutcomeKind } from '@runplane/shared';
import type { OrchestrationStore } from '../storage/store.js';
import type { LateRunsConfig } from '../config/index.js';
import type { OrchestrationEngine } from '../orchestration/engine.js';
import { late } from '../orchestration/states.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { LoopService } from './loop-service.js';

export interface LateRunsTickResult {
  runsFound: number;
  runsMarkedLate: number;
  /** Attempts the engine refused (the run changed state meanwhile) */
  runsSkipped: number;
  runsFailed: number;
}

export interface LateRunsServiceOptions {
  store: OrchestrationStore;
  engine: OrchestrationEngine;
  config: LateRunsConfig;
  clock?: Clock;
}

export class LateRunsService extends LoopService {
  private readonly store: OrchestrationStore;
  private readonly engine: OrchestrationEngine;
  private readonly config: LateRunsConfig;
  private readonly clock: Clock;

  constructor(options: LateRunsServiceOptions) {
    super('late-runs', options.config.loopIntervalMs);
    this.store = options.store;
    this.engine = options.engine;
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
  }

  protected async iterate(): Promise<void> {
    await this.markLateRuns();
  }

  /**
   * One late-run tick.
   */
  async markLateRuns(): Promise<LateRunsTickResult> {
    const now = this.clock.now();
    const runs = await this.store.queryLateScheduledRuns({
      before: new Date(now.getTime() - this.config.lateThresholdMs),
      limit: this.config.batchSize,
    });

    const result: LateRunsTickResult = {
      runsFound: runs.length,
      runsMarkedLate: 0,
      runsSkipped: 0,
      runsFailed: 0,
    };

    for (const run of runs) {
      try {
        const outcome = await this.engine.proposeTransition(
          run.id,
          late({
            timestamp: now,
            scheduledTime: run.state.details.scheduledTime ?? run.expectedStartTime,
          })
        );
        if (outcome.kind === OutcomeKind.ACCEPTED) {
          result.runsMarkedLate++;
        } else {
          result.runsSkipped++;
          this.log.debug({ runId: run.id, outcome: outcome.kind, ...outcome.details }, 'Late transition refused');
        }
      } catch (error) {
        result.runsFailed++;
        this.log.error({ err: error, runId: run.id }, 'Failed to mark run late');
      }
    }

    if (result.runsFound > 0) {
      this.log.info({ ...result }, 'Marked late runs');
    }
    return result;
  }
}
