/**
 * Rules guarding the shape of a run's state history.
 */

import { StateType } from '@runplane/shared';
import type { OrchestrationContext } from '../context.js';
import { ANY_STATE, BaseRule, abort, approve, delay, reject, type Decision } from '../rule.js';
import { isLegalTransition } from '../transitions.js';

/**
 * Rejects every pair outside the legal transition graph. Runs first so no
 * side-effecting rule ever sees an illegal attempt.
 */
export class EnforceLegalTransitions extends BaseRule {
  readonly name = 'EnforceLegalTransitions';
  readonly fromTypes = ANY_STATE;
  readonly toTypes = ANY_STATE;

  async before(context: OrchestrationContext): Promise<Decision> {
    if (isLegalTransition(context.initialType, context.proposedType)) {
      return approve();
    }
    return reject(`Transition ${context.initialType} -> ${context.proposedType} is not allowed`);
  }
}

export class EnforceMonotonicHistory extends BaseRule {
  readonly name = 'EnforceMonotonicHistory';
  readonly fromTypes = ANY_STATE;
  readonly toTypes = ANY_STATE;

  async before(context: OrchestrationContext): Promise<Decision> {
    const proposedAt = context.proposedState.timestamp.getTime();
    const currentAt = context.initialState.timestamp.getTime();
    if (proposedAt < currentAt) {
      return abort(
        `Proposed state timestamp ${context.proposedState.timestamp.toISOString()} precedes ` +
          `current state timestamp ${context.initialState.timestamp.toISOString()}`
      );
    }
    return approve();
  }
}

/**
 * Holds a scheduled run back until its scheduled time.
 */
export class WaitForScheduledTime extends BaseRule {
  readonly name = 'WaitForScheduledTime';
  readonly fromTypes: readonly StateType[] = [StateType.SCHEDULED];
  readonly toTypes: readonly StateType[] = [StateType.PENDING, StateType.RUNNING];

  async before(context: OrchestrationContext): Promise<Decision> {
    const scheduledTime = context.initialState.details.scheduledTime;
    if (!scheduledTime) {
      return approve();
    }
    const waitMs = scheduledTime.getTime() - context.now.getTime();
    if (waitMs > 0) {
      return delay(waitMs, `Run is scheduled to start at ${scheduledTime.toISOString()}`);
    }
    return approve();
  }
}
