/**
 * Run bookkeeping. These rules never refuse a transition; they stage run
 * field changes that are written together with the new state.
 */

import { StateType, TERMINAL_STATE_TYPES } from '@runplane/shared';
import type { OrchestrationContext } from '../context.js';
import { ANY_STATE, BaseRule, allExcept, approve, type Decision } from '../rule.js';

/**
 * Counts entries into Running. Staying in Running is not an entry.
 */
export class IncrementRunCount extends BaseRule {
  readonly name = 'IncrementRunCount';
  readonly fromTypes = allExcept(StateType.RUNNING);
  readonly toTypes: readonly StateType[] = [StateType.RUNNING];

  async before(context: OrchestrationContext): Promise<Decision> {
    context.stageRunUpdates({ runCount: context.run.runCount + 1 });
    return approve();
  }
}

export class SetStartTime extends BaseRule {
  readonly name = 'SetStartTime';
  readonly fromTypes = allExcept(StateType.RUNNING);
  readonly toTypes: readonly StateType[] = [StateType.RUNNING];

  async before(context: OrchestrationContext): Promise<Decision> {
    if (context.run.startTime === null) {
      context.stageRunUpdates({ startTime: context.proposedState.timestamp });
    }
    return approve();
  }
}

export class IncrementRunTime extends BaseRule {
  readonly name = 'IncrementRunTime';
  readonly fromTypes: readonly StateType[] = [StateType.RUNNING];
  readonly toTypes = allExcept(StateType.RUNNING);

  async before(context: OrchestrationContext): Promise<Decision> {
    const elapsed =
      context.proposedState.timestamp.getTime() - context.initialState.timestamp.getTime();
    context.stageRunUpdates({ totalRunTimeMs: context.run.totalRunTimeMs + Math.max(0, elapsed) });
    return approve();
  }
}

export class SetEndTime extends BaseRule {
  readonly name = 'SetEndTime';
  readonly fromTypes = allExcept(...TERMINAL_STATE_TYPES);
  readonly toTypes = TERMINAL_STATE_TYPES;

  async before(context: OrchestrationContext): Promise<Decision> {
    context.stageRunUpdates({ endTime: context.proposedState.timestamp });
    return approve();
  }
}

/**
 * Mirrors the scheduled time of the run's current Scheduled state; cleared
 * once the run leaves Scheduled.
 */
export class SetNextScheduledStartTime extends BaseRule {
  readonly name = 'SetNextScheduledStartTime';
  readonly fromTypes = ANY_STATE;
  readonly toTypes = ANY_STATE;

  async before(context: OrchestrationContext): Promise<Decision> {
    if (context.proposedType === StateType.SCHEDULED) {
      context.stageRunUpdates({
        nextScheduledStartTime: context.proposedState.details.scheduledTime,
      });
    } else if (context.initialType === StateType.SCHEDULED) {
      context.stageRunUpdates({ nextScheduledStartTime: null });
    }
    return approve();
  }
}
