/**
 * Storage layer interfaces.
 *
 * The orchestration engine and the scheduling services depend only on these
 * contracts. Every write to a run's current state goes through a
 * `StoreSession`, which belongs to exactly one transaction.
 */

import type { DeploymentDefinition } from '@runplane/shared';
import type {
  ConcurrencyLimit,
  CreateRunInput,
  Deployment,
  GetOrCreateResult,
  Run,
  RunUpdates,
  ScheduledDeployment,
  ScheduledRunInput,
  State,
} from '../types/index.js';

/**
 * Result of trying to take a concurrency slot.
 */
export type SlotResult = 'ok' | 'full';

/**
 * Generic list query options.
 */
export interface ListOptions {
  limit: number;
  offset: number;
}

/**
 * Query for scheduled runs that missed their start time.
 */
export interface LateRunQuery {
  /** Runs expected to start strictly before this instant */
  before: Date;
  limit: number;
}

/**
 * Filters for listing runs.
 */
export interface RunListFilters {
  deploymentId?: string;
}

/**
 * Operations available inside a transaction.
 */
export interface StoreSession {
  /**
   * Take the exclusive lock on a run until the transaction ends.
   * Re-locking a run already held by this session is a no-op.
   */
  lockRun(runId: string, timeoutMs: number): Promise<void>;

  getRun(runId: string): Promise<Run | null>;

  /**
   * Make `state` the run's current state, append it to the run's history and
   * apply the staged run updates. The run must be locked by this session.
   */
  appendState(runId: string, state: State, updates: RunUpdates): Promise<Run>;

  /**
   * Take a slot on a tag for a run. Tags without a limit always succeed;
   * a run already holding a slot keeps it without counting twice.
   */
  incrementConcurrency(tag: string, runId: string): Promise<SlotResult>;

  /**
   * Give back a run's slot on a tag once the transaction commits; no-op when
   * the run holds none. Until then the slot still counts against the limit.
   */
  decrementConcurrency(tag: string, runId: string): Promise<void>;

  /** Limits defined for any of the given tags */
  readConcurrencyLimits(tags: readonly string[]): Promise<ConcurrencyLimit[]>;

  /** Register a callback to run once the transaction has committed */
  afterCommit(callback: () => void | Promise<void>): void;
}

/**
 * Store interface for runs, deployments and concurrency limits.
 */
export interface OrchestrationStore {
  /**
   * Run `fn` in a transaction. Commits when `fn` resolves, rolls back every
   * session write when it throws; locks are released either way.
   */
  transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T>;

  getRun(runId: string): Promise<Run | null>;
  listRuns(filters?: RunListFilters): Promise<Run[]>;
  readStateHistory(runId: string): Promise<State[]>;
  createRun(input: CreateRunInput): Promise<Run>;

  /**
   * Insert a scheduled run unless one already exists for the same
   * (deploymentId, expectedStartTime) pair.
   */
  getOrCreateScheduledRun(input: ScheduledRunInput): Promise<GetOrCreateResult>;

  /** Runs still in the plain Scheduled state and due before `query.before` */
  queryLateScheduledRuns(query: LateRunQuery): Promise<Run[]>;

  /** Deployments that carry a schedule with `isScheduleActive` set */
  queryActiveDeploymentSchedules(options: ListOptions): Promise<ScheduledDeployment[]>;

  createDeployment(definition: DeploymentDefinition): Promise<Deployment>;
  getDeploymentByName(name: string): Promise<Deployment | null>;

  setConcurrencyLimit(tag: string, limit: number): Promise<ConcurrencyLimit>;
  readConcurrencyLimit(tag: string): Promise<ConcurrencyLimit | null>;
}
