import type { RetryPolicy, Schedule } from '@runplane/shared';

/**
 * A deployment with an optional recurring schedule.
 */
export interface Deployment {
  id: string;
  name: string;
  flowName: string;
  schedule: Schedule | null;
  isScheduleActive: boolean;
  tags: string[];
  parameters: Record<string, unknown>;
  retryPolicy: RetryPolicy;
  createdAt: Date;
}

/**
 * Deployment with an active schedule, as consumed by the scheduler.
 */
export interface ScheduledDeployment extends Deployment {
  schedule: Schedule;
}

/**
 * Capacity constraint on runs holding a tag in the Running state.
 */
export interface ConcurrencyLimit {
  tag: string;
  limit: number;
  /** Ids of the runs currently holding a slot */
  activeSlots: string[];
}
