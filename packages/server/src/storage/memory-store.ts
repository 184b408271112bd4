/**
 * In-memory storage implementation.
 *
 * Reference implementation for development, the CLI and tests. Transactions
 * write straight into the shared tables and keep an undo journal; rollback
 * replays the journal backwards. Runs are serialized by per-run locks.
 * Slots taken are visible at once, slots given back only on commit, so no
 * undo can push a tag over its limit.
 */

import { nanoid } from 'nanoid';
import { StateName, StateType, retryPolicySchema, type DeploymentDefinition } from '@runplane/shared';
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
import { RunType } from '../types/index.js';
import type {
  LateRunQuery,
  ListOptions,
  OrchestrationStore,
  RunListFilters,
  SlotResult,
  StoreSession,
} from './store.js';
import { DeploymentConflictError, RunNotFoundError } from './errors.js';
import { RunLockManager, type LockRelease } from './run-locks.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('memory-store');

interface LimitEntry {
  limit: number;
  active: Set<string>;
}

interface MemoryTables {
  runs: Map<string, Run>;
  histories: Map<string, State[]>;
  /** `${deploymentId}|${epoch ms}` -> run id */
  scheduledIndex: Map<string, string>;
  deployments: Map<string, Deployment>;
  limits: Map<string, LimitEntry>;
}

type UndoEntry = () => void;

/**
 * Copy a run so callers never alias the store's record. States are frozen
 * and shared as-is.
 */
function copyRun(run: Run): Run {
  return {
    ...run,
    tags: [...run.tags],
    parameters: structuredClone(run.parameters),
    retryPolicy: { ...run.retryPolicy },
  };
}

function copyDeployment<T extends Deployment>(deployment: T): T {
  return {
    ...deployment,
    tags: [...deployment.tags],
    parameters: structuredClone(deployment.parameters),
    retryPolicy: { ...deployment.retryPolicy },
  };
}

function toConcurrencyLimit(tag: string, entry: LimitEntry): ConcurrencyLimit {
  return { tag, limit: entry.limit, activeSlots: [...entry.active] };
}

function slotKey(tag: string, runId: string): string {
  return `${tag}|${runId}`;
}

function scheduledKey(deploymentId: string, expectedStartTime: Date): string {
  return `${deploymentId}|${expectedStartTime.getTime()}`;
}

function hasActiveSchedule(deployment: Deployment): deployment is ScheduledDeployment {
  return deployment.schedule !== null && deployment.isScheduleActive;
}

/**
 * Session bound to one in-memory transaction.
 */
class MemoryStoreSession implements StoreSession {
  private readonly journal: UndoEntry[] = [];
  private readonly releases = new Map<string, LockRelease>();
  private readonly commitCallbacks: Array<() => void | Promise<void>> = [];
  private readonly pendingReleases = new Map<string, () => void>();
  private closed = false;

  constructor(
    private readonly tables: MemoryTables,
    private readonly locks: RunLockManager
  ) {}

  async lockRun(runId: string, timeoutMs: number): Promise<void> {
    this.assertOpen();
    if (this.releases.has(runId)) {
      return;
    }
    const release = await this.locks.acquire(runId, timeoutMs);
    this.releases.set(runId, release);
  }

  async getRun(runId: string): Promise<Run | null> {
    this.assertOpen();
    const run = this.tables.runs.get(runId);
    return run ? copyRun(run) : null;
  }

  async appendState(runId: string, state: State, updates: RunUpdates): Promise<Run> {
    this.assertOpen();
    if (!this.releases.has(runId)) {
      throw new Error(`Run ${runId} must be locked before its state changes`);
    }
    const previous = this.tables.runs.get(runId);
    if (!previous) {
      throw new RunNotFoundError(runId);
    }
    const history = this.tables.histories.get(runId) ?? [];

    const next: Run = {
      ...copyRun(previous),
      ...updates,
      state,
      updatedAt: state.timestamp,
    };
    this.tables.runs.set(runId, next);
    history.push(state);
    this.tables.histories.set(runId, history);

    this.journal.push(() => {
      this.tables.runs.set(runId, previous);
      history.pop();
    });

    return copyRun(next);
  }

  async incrementConcurrency(tag: string, runId: string): Promise<SlotResult> {
    this.assertOpen();
    const entry = this.tables.limits.get(tag);
    if (!entry) {
      return 'ok';
    }
    if (entry.active.has(runId)) {
      // Taking back a slot released earlier in this transaction keeps it
      this.pendingReleases.delete(slotKey(tag, runId));
      return 'ok';
    }
    if (entry.active.size >= entry.limit) {
      return 'full';
    }
    entry.active.add(runId);
    this.journal.push(() => {
      entry.active.delete(runId);
    });
    return 'ok';
  }

  async decrementConcurrency(tag: string, runId: string): Promise<void> {
    this.assertOpen();
    const entry = this.tables.limits.get(tag);
    if (!entry || !entry.active.has(runId)) {
      return;
    }
    // The slot stays taken until commit so a rollback never has to re-add it
    this.pendingReleases.set(slotKey(tag, runId), () => {
      entry.active.delete(runId);
    });
  }

  async readConcurrencyLimits(tags: readonly string[]): Promise<ConcurrencyLimit[]> {
    this.assertOpen();
    const limits: ConcurrencyLimit[] = [];
    for (const tag of new Set(tags)) {
      const entry = this.tables.limits.get(tag);
      if (entry) {
        limits.push(toConcurrencyLimit(tag, entry));
      }
    }
    return limits;
  }

  afterCommit(callback: () => void | Promise<void>): void {
    this.assertOpen();
    this.commitCallbacks.push(callback);
  }

  commit(): Array<() => void | Promise<void>> {
    for (const release of this.pendingReleases.values()) {
      release();
    }
    this.pendingReleases.clear();
    this.journal.length = 0;
    this.close();
    return this.commitCallbacks.splice(0);
  }

  rollback(): void {
    for (let i = this.journal.length - 1; i >= 0; i--) {
      this.journal[i]?.();
    }
    this.journal.length = 0;
    this.pendingReleases.clear();
    this.commitCallbacks.length = 0;
    this.close();
  }

  private close(): void {
    this.closed = true;
    for (const release of this.releases.values()) {
      release();
    }
    this.releases.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Store session used after its transaction ended');
    }
  }
}

/**
 * In-memory OrchestrationStore.
 */
export class MemoryOrchestrationStore implements OrchestrationStore {
  private readonly tables: MemoryTables = {
    runs: new Map(),
    histories: new Map(),
    scheduledIndex: new Map(),
    deployments: new Map(),
    limits: new Map(),
  };
  private readonly locks = new RunLockManager();

  async transaction<T>(fn: (session: StoreSession) => Promise<T>): Promise<T> {
    const session = new MemoryStoreSession(this.tables, this.locks);
    let result: T;
    try {
      result = await fn(session);
    } catch (error) {
      session.rollback();
      throw error;
    }

    const callbacks = session.commit();
    for (const callback of callbacks) {
      try {
        await callback();
      } catch (error) {
        log.error({ err: error }, 'After-commit callback failed');
      }
    }
    return result;
  }

  async getRun(runId: string): Promise<Run | null> {
    const run = this.tables.runs.get(runId);
    return run ? copyRun(run) : null;
  }

  async listRuns(filters: RunListFilters = {}): Promise<Run[]> {
    return [...this.tables.runs.values()]
      .filter((run) => filters.deploymentId === undefined || run.deploymentId === filters.deploymentId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map(copyRun);
  }

  async readStateHistory(runId: string): Promise<State[]> {
    if (!this.tables.runs.has(runId)) {
      throw new RunNotFoundError(runId);
    }
    return [...(this.tables.histories.get(runId) ?? [])];
  }

  async createRun(input: CreateRunInput): Promise<Run> {
    const now = input.state.timestamp;
    const run: Run = {
      id: nanoid(),
      name: input.name ?? `run-${nanoid(8)}`,
      runType: input.runType ?? RunType.FLOW_RUN,
      state: input.state,
      deploymentId: input.deploymentId ?? null,
      flowRunId: input.flowRunId ?? null,
      expectedStartTime:
        input.expectedStartTime ?? input.state.details.scheduledTime ?? input.state.timestamp,
      nextScheduledStartTime:
        input.state.type === StateType.SCHEDULED ? input.state.details.scheduledTime : null,
      startTime: null,
      endTime: null,
      totalRunTimeMs: 0,
      runCount: 0,
      tags: [...new Set(input.tags ?? [])],
      parameters: structuredClone(input.parameters ?? {}),
      retryPolicy: retryPolicySchema.parse(input.retryPolicy ?? {}),
      autoScheduled: false,
      idempotencyKey: input.idempotencyKey ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.insertRun(run);
    return copyRun(run);
  }

  async getOrCreateScheduledRun(input: ScheduledRunInput): Promise<GetOrCreateResult> {
    const key = scheduledKey(input.deploymentId, input.expectedStartTime);
    const existingId = this.tables.scheduledIndex.get(key);
    const existing = existingId !== undefined ? this.tables.runs.get(existingId) : undefined;
    if (existing) {
      return { run: copyRun(existing), created: false };
    }

    const run: Run = {
      id: nanoid(),
      name: input.name,
      runType: RunType.FLOW_RUN,
      state: input.state,
      deploymentId: input.deploymentId,
      flowRunId: null,
      expectedStartTime: input.expectedStartTime,
      nextScheduledStartTime: input.expectedStartTime,
      startTime: null,
      endTime: null,
      totalRunTimeMs: 0,
      runCount: 0,
      tags: [...new Set(input.tags)],
      parameters: structuredClone(input.parameters),
      retryPolicy: { ...input.retryPolicy },
      autoScheduled: true,
      idempotencyKey: input.idempotencyKey,
      createdAt: input.state.timestamp,
      updatedAt: input.state.timestamp,
    };
    this.insertRun(run);
    this.tables.scheduledIndex.set(key, run.id);
    return { run: copyRun(run), created: true };
  }

  async queryLateScheduledRuns(query: LateRunQuery): Promise<Run[]> {
    const cutoff = query.before.getTime();
    return [...this.tables.runs.values()]
      .filter(
        (run) =>
          run.state.type === StateType.SCHEDULED &&
          run.state.name === StateName.SCHEDULED &&
          run.expectedStartTime !== null &&
          run.expectedStartTime.getTime() < cutoff
      )
      .sort((a, b) => (a.expectedStartTime?.getTime() ?? 0) - (b.expectedStartTime?.getTime() ?? 0))
      .slice(0, query.limit)
      .map(copyRun);
  }

  async queryActiveDeploymentSchedules(options: ListOptions): Promise<ScheduledDeployment[]> {
    return [...this.tables.deployments.values()]
      .filter(hasActiveSchedule)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || a.name.localeCompare(b.name))
      .slice(options.offset, options.offset + options.limit)
      .map((deployment) => copyDeployment(deployment));
  }

  async createDeployment(definition: DeploymentDefinition): Promise<Deployment> {
    for (const existing of this.tables.deployments.values()) {
      if (existing.name === definition.name) {
        throw new DeploymentConflictError(definition.name);
      }
    }

    const deployment: Deployment = {
      id: nanoid(),
      name: definition.name,
      flowName: definition.flowName,
      schedule: definition.schedule ?? null,
      isScheduleActive: definition.isScheduleActive,
      tags: [...new Set(definition.tags)],
      parameters: structuredClone(definition.parameters),
      retryPolicy: { ...definition.retryPolicy },
      createdAt: new Date(),
    };
    this.tables.deployments.set(deployment.id, deployment);
    log.debug({ deploymentId: deployment.id, name: deployment.name }, 'Deployment created');
    return copyDeployment(deployment);
  }

  async getDeploymentByName(name: string): Promise<Deployment | null> {
    for (const deployment of this.tables.deployments.values()) {
      if (deployment.name === name) {
        return copyDeployment(deployment);
      }
    }
    return null;
  }

  async setConcurrencyLimit(tag: string, limit: number): Promise<ConcurrencyLimit> {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new Error(`Concurrency limit must be a non-negative integer, got ${limit}`);
    }
    const entry = this.tables.limits.get(tag);
    if (entry) {
      entry.limit = limit;
      return toConcurrencyLimit(tag, entry);
    }
    const created: LimitEntry = { limit, active: new Set() };
    this.tables.limits.set(tag, created);
    return toConcurrencyLimit(tag, created);
  }

  async readConcurrencyLimit(tag: string): Promise<ConcurrencyLimit | null> {
    const entry = this.tables.limits.get(tag);
    return entry ? toConcurrencyLimit(tag, entry) : null;
  }

  private insertRun(run: Run): void {
    this.tables.runs.set(run.id, run);
    this.tables.histories.set(run.id, [run.state]);
  }
}
