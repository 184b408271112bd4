/**
 * Policies: named, ordered rule lists.
 *
 * Both policies are built once at startup and handed to the engine.
 */

import type { OrchestrationRule } from './rule.js';
import type { TransitionNotifier } from './notifier.js';
import { EnforceLegalTransitions, EnforceMonotonicHistory, WaitForScheduledTime } from './rules/state-graph.js';
import { RetryFailedRuns } from './rules/retries.js';
import { ReleaseConcurrencySlots, SecureConcurrencySlots } from './rules/concurrency.js';
import {
  IncrementRunCount,
  IncrementRunTime,
  SetEndTime,
  SetNextScheduledStartTime,
  SetStartTime,
} from './rules/bookkeeping.js';
import { NotifyTransitionListeners, RecordTransitionLog } from './rules/auxiliary.js';

export class Policy {
  readonly rules: readonly OrchestrationRule[];

  constructor(
    readonly name: string,
    rules: readonly OrchestrationRule[]
  ) {
    const seen = new Set<string>();
    for (const rule of rules) {
      if (seen.has(rule.name)) {
        throw new Error(`Policy '${name}' lists rule '${rule.name}' more than once`);
      }
      seen.add(rule.name);
    }
    this.rules = Object.freeze([...rules]);
  }

  get ruleNames(): string[] {
    return this.rules.map((rule) => rule.name);
  }
}

export interface CorePolicyOptions {
  /** Retry-after reported when a concurrency limit is full */
  concurrencySlotWaitMs: number;
}

/**
 * Core policy. Legality is checked first so no side-effecting rule ever
 * runs for an illegal transition.
 */
export function createCorePolicy(options: CorePolicyOptions): Policy {
  return new Policy('core', [
    new EnforceLegalTransitions(),
    new EnforceMonotonicHistory(),
    new WaitForScheduledTime(),
    new RetryFailedRuns(),
    new SecureConcurrencySlots(options.concurrencySlotWaitMs),
    new ReleaseConcurrencySlots(),
    new IncrementRunCount(),
    new SetStartTime(),
    new IncrementRunTime(),
    new SetEndTime(),
    new SetNextScheduledStartTime(),
  ]);
}

export interface AuxiliaryPolicyOptions {
  /** Listeners are only notified when a notifier is given */
  notifier?: TransitionNotifier;
}

export function createAuxiliaryPolicy(options: AuxiliaryPolicyOptions = {}): Policy {
  const rules: OrchestrationRule[] = [new RecordTransitionLog()];
  if (options.notifier) {
    rules.push(new NotifyTransitionListeners(options.notifier));
  }
  return new Policy('auxiliary', rules);
}
