/**
 * Orchestration context: the unit of work passed through a policy.
 */

import type { OutcomeKind, StateType } from '@runplane/shared';
import type { Run, RunUpdates, State } from '../types/index.js';
import type { StoreSession } from '../storage/store.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('orchestration-context');

export interface OrchestrationContextInit {
  run: Run;
  proposedState: State;
  session: StoreSession;
  now: Date;
}

export class OrchestrationContext {
  /** Snapshot of the locked run, owned by this attempt only */
  readonly run: Readonly<Run>;
  /** Current state when the attempt began; never changes */
  readonly initialState: State;
  /** Transaction every rule side effect goes through */
  readonly session: StoreSession;
  /** Clock reading taken once for the whole attempt */
  readonly now: Date;
  /** Free-form data passed between rules of one attempt */
  readonly scratch = new Map<string, unknown>();

  validatedState: State | null = null;
  outcome: OutcomeKind | null = null;

  private _proposedState: State;
  private readonly _runUpdates: RunUpdates = {};

  constructor(init: OrchestrationContextInit) {
    this.run = Object.freeze({ ...init.run });
    this.initialState = init.run.state;
    this._proposedState = init.proposedState;
    this.session = init.session;
    this.now = init.now;
  }

  get runId(): string {
    return this.run.id;
  }

  get proposedState(): State {
    return this._proposedState;
  }

  get initialType(): StateType {
    return this.initialState.type;
  }

  get proposedType(): StateType {
    return this._proposedState.type;
  }

  /**
   * Run field changes staged by rules, written together with the new state.
   */
  get runUpdates(): Readonly<RunUpdates> {
    return this._runUpdates;
  }

  /**
   * Replace the proposed state. Later rules see the replacement.
   */
  replaceProposedState(state: State, reason: string): void {
    log.debug(
      {
        runId: this.run.id,
        from: `${this._proposedState.type}/${this._proposedState.name}`,
        to: `${state.type}/${state.name}`,
        reason,
      },
      'Proposed state replaced'
    );
    this._proposedState = state;
  }

  stageRunUpdates(updates: RunUpdates): void {
    Object.assign(this._runUpdates, updates);
  }
}
