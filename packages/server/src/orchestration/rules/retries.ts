/**
 * Automatic retries for failed runs.
 */

import { StateType, type RetryPolicy } from '@runplane/shared';
import type { OrchestrationContext } from '../context.js';
import { BaseRule, approve, type Decision } from '../rule.js';
import { awaitingRetry } from '../states.js';

export const RETRY_ATTEMPT_KEY = 'retry.attempt';

/**
 * Backoff before retry number `attempt` (1-based), in milliseconds.
 */
export function computeRetryDelayMs(policy: RetryPolicy, attempt: number): number {
  const seconds = policy.retryDelaySeconds * Math.pow(policy.backoffMultiplier, Math.max(0, attempt - 1));
  return Math.round(Math.min(seconds, policy.maxRetryDelaySeconds) * 1000);
}

/**
 * Turns Running -> Failed into an AwaitingRetry state while the run has
 * retries left. `runCount` counts entries into Running, so the first failure
 * happens at runCount 1.
 */
export class RetryFailedRuns extends BaseRule {
  readonly name = 'RetryFailedRuns';
  readonly fromTypes: readonly StateType[] = [StateType.RUNNING];
  readonly toTypes: readonly StateType[] = [StateType.FAILED];

  async before(context: OrchestrationContext): Promise<Decision> {
    const { retryPolicy } = context.run;
    // A run created directly in Running has not counted its first attempt
    const attempt = Math.max(context.run.runCount, 1);
    if (attempt > retryPolicy.maxRetries) {
      return approve();
    }

    const delayMs = computeRetryDelayMs(retryPolicy, attempt);
    const proposed = context.proposedState;
    const retryAt = new Date(context.now.getTime() + delayMs);

    context.replaceProposedState(
      awaitingRetry(retryAt, {
        timestamp: proposed.timestamp,
        message: proposed.message ?? `Retry ${attempt} of ${retryPolicy.maxRetries}`,
        data: proposed.data,
      }),
      'retries remaining'
    );
    context.scratch.set(RETRY_ATTEMPT_KEY, attempt);
    return approve();
  }
}
