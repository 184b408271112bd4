import type { RetryPolicy } from '@runplane/shared';
import type { State } from './state.js';

// Run Type
export const RunType = {
  FLOW_RUN: 'flow-run',
  TASK_RUN: 'task-run',
} as const;

export type RunType = (typeof RunType)[keyof typeof RunType];

/**
 * A tracked unit of scheduled or ad-hoc work.
 */
export interface Run {
  id: string;
  name: string;
  runType: RunType;
  state: State;
  /** Originating deployment (scheduled flow-runs) */
  deploymentId: string | null;
  /** Parent flow-run (task-runs) */
  flowRunId: string | null;
  expectedStartTime: Date | null;
  nextScheduledStartTime: Date | null;
  startTime: Date | null;
  endTime: Date | null;
  /** Time accumulated in Running states, updated whenever Running is left */
  totalRunTimeMs: number;
  runCount: number;
  tags: string[];
  parameters: Record<string, unknown>;
  retryPolicy: RetryPolicy;
  autoScheduled: boolean;
  idempotencyKey: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Run fields that orchestration rules may change on commit.
 */
export type RunUpdates = Partial<
  Pick<
    Run,
    | 'runCount'
    | 'startTime'
    | 'endTime'
    | 'totalRunTimeMs'
    | 'expectedStartTime'
    | 'nextScheduledStartTime'
  >
>;

/**
 * Input for creating an ad-hoc run.
 */
export interface CreateRunInput {
  name?: string;
  runType?: RunType;
  state: State;
  deploymentId?: string | null;
  flowRunId?: string | null;
  expectedStartTime?: Date | null;
  tags?: string[];
  parameters?: Record<string, unknown>;
  retryPolicy?: Partial<RetryPolicy>;
  idempotencyKey?: string | null;
}

/**
 * Input for the idempotent insert used by the scheduler.
 */
export interface ScheduledRunInput {
  deploymentId: string;
  expectedStartTime: Date;
  state: State;
  name: string;
  tags: string[];
  parameters: Record<string, unknown>;
  retryPolicy: RetryPolicy;
  idempotencyKey: string;
}

/**
 * Result of an idempotent insert.
 */
export interface GetOrCreateResult {
  run: Run;
  created: boolean;
}
