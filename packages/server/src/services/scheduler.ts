/**
 * Scheduler Service
 *
 * Materializes upcoming runs for every deployment with an active schedule.
 * Runs are inserted through the store's idempotent insert keyed by
 * (deploymentId, expectedStartTime), so overlapping ticks never create the
 * same occurrence twice.
 */

import { nanoid } from 'nanoid';
import type { OrchestrationStore } from '../storage/store.js';
import type { SchedulerConfig } from '../config/index.js';
import type { ScheduledDeployment } from '../types/index.js';
import { scheduled } from '../orchestration/states.js';
import { getScheduleDates } from '../schedules/index.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { LoopService } from './loop-service.js';

export interface SchedulerTickResult {
  deploymentsScanned: number;
  runsCreated: number;
  /** Deployments skipped because their schedule could not be evaluated */
  deploymentsFailed: number;
}

export interface SchedulerServiceOptions {
  store: OrchestrationStore;
  config: SchedulerConfig;
  clock?: Clock;
}

export function scheduledRunIdempotencyKey(deploymentId: string, expectedStartTime: Date): string {
  return `scheduled ${deploymentId} ${expectedStartTime.toISOString()}`;
}

export class SchedulerService extends LoopService {
  private readonly store: OrchestrationStore;
  private readonly config: SchedulerConfig;
  private readonly clock: Clock;

  constructor(options: SchedulerServiceOptions) {
    super('scheduler', options.config.loopIntervalMs);
    this.store = options.store;
    this.config = options.config;
    this.clock = options.clock ?? systemClock;
  }

  protected async iterate(): Promise<void> {
    await this.scheduleRuns();
  }

  /**
   * One scheduler tick.
   */
  async scheduleRuns(): Promise<SchedulerTickResult> {
    const now = this.clock.now();
    const result: SchedulerTickResult = { deploymentsScanned: 0, runsCreated: 0, deploymentsFailed: 0 };
    const pageSize = this.config.deploymentBatchSize;

    for (let offset = 0; ; offset += pageSize) {
      const deployments = await this.store.queryActiveDeploymentSchedules({ limit: pageSize, offset });
      for (const deployment of deployments) {
        result.deploymentsScanned++;
        try {
          result.runsCreated += await this.scheduleDeployment(deployment, now);
        } catch (error) {
          result.deploymentsFailed++;
          this.log.error(
            { err: error, deploymentId: deployment.id, deployment: deployment.name },
            'Failed to schedule runs for deployment'
          );
        }
      }
      if (deployments.length < pageSize) {
        break;
      }
    }

    if (result.runsCreated > 0 || result.deploymentsFailed > 0) {
      this.log.info({ ...result }, 'Scheduled runs');
    }
    return result;
  }

  private async scheduleDeployment(deployment: ScheduledDeployment, now: Date): Promise<number> {
    const dates = getScheduleDates(deployment.schedule, {
      start: now,
      end: new Date(now.getTime() + this.config.maxScheduledTimeMs),
      limit: this.config.maxRuns,
    });

    let created = 0;
    for (const expectedStartTime of dates) {
      const outcome = await this.store.getOrCreateScheduledRun({
        deploymentId: deployment.id,
        expectedStartTime,
        state: scheduled({ timestamp: now, scheduledTime: expectedStartTime }),
        name: `${deployment.name}-${nanoid(8)}`,
        tags: deployment.tags,
        parameters: deployment.parameters,
        retryPolicy: deployment.retryPolicy,
        idempotencyKey: scheduledRunIdempotencyKey(deployment.id, expectedStartTime),
      });
      if (outcome.created) {
        created++;
      }
    }
    return created;
  }
}
