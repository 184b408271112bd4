/**
 * Auxiliary rules: observe committed transitions without shaping them.
 */

import { ANY_STATE, BaseRule, approve, type Decision } from '../rule.js';
import { RETRY_ATTEMPT_KEY } from './retries.js';
import type { OrchestrationContext } from '../context.js';
import type { TransitionNotifier } from '../notifier.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('transitions');

export class RecordTransitionLog extends BaseRule {
  readonly name = 'RecordTransitionLog';
  readonly fromTypes = ANY_STATE;
  readonly toTypes = ANY_STATE;

  async before(_context: OrchestrationContext): Promise<Decision> {
    return approve();
  }

  override async after(context: OrchestrationContext): Promise<void> {
    const validated = context.validatedState ?? context.proposedState;
    log.info(
      {
        runId: context.runId,
        runName: context.run.name,
        from: `${context.initialState.type}/${context.initialState.name}`,
        to: `${validated.type}/${validated.name}`,
        retryAttempt: context.scratch.get(RETRY_ATTEMPT_KEY),
      },
      'Run transitioned'
    );
  }
}

/**
 * Publishes the transition once its transaction has committed.
 */
export class NotifyTransitionListeners extends BaseRule {
  readonly name = 'NotifyTransitionListeners';
  readonly fromTypes = ANY_STATE;
  readonly toTypes = ANY_STATE;

  constructor(private readonly notifier: TransitionNotifier) {
    super();
  }

  async before(_context: OrchestrationContext): Promise<Decision> {
    return approve();
  }

  override async after(context: OrchestrationContext): Promise<void> {
    const event = {
      runId: context.runId,
      runName: context.run.name,
      fromState: context.initialState,
      toState: context.validatedState ?? context.proposedState,
    };
    context.session.afterCommit(() => {
      this.notifier.publish(event);
    });
  }
}
