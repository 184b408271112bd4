/**
 * Tag concurrency limits.
 *
 * A run takes one slot on every limited tag when it enters Running and gives
 * them back once it leaves Running or Cancelling for any other state.
 */

import { StateType } from '@runplane/shared';
import type { OrchestrationContext } from '../context.js';
import { BaseRule, abort, allExcept, approve, delay, type Decision } from '../rule.js';

export class SecureConcurrencySlots extends BaseRule {
  readonly name = 'SecureConcurrencySlots';
  readonly fromTypes = allExcept(StateType.RUNNING);
  readonly toTypes: readonly StateType[] = [StateType.RUNNING];

  /** Tags whose slot was taken by this rule, per attempt */
  private readonly acquired = new WeakMap<OrchestrationContext, string[]>();

  constructor(private readonly slotWaitMs: number) {
    super();
  }

  async before(context: OrchestrationContext): Promise<Decision> {
    const { session } = context;
    const limits = await session.readConcurrencyLimits(context.run.tags);
    if (limits.length === 0) {
      return approve();
    }

    const blocked = limits.find((limit) => limit.limit === 0);
    if (blocked) {
      return abort(`Tag '${blocked.tag}' has a concurrency limit of 0`);
    }

    const taken: string[] = [];
    this.acquired.set(context, taken);

    for (const limit of limits) {
      if (limit.activeSlots.includes(context.runId)) {
        continue;
      }
      const result = await session.incrementConcurrency(limit.tag, context.runId);
      if (result === 'full') {
        return delay(
          this.slotWaitMs,
          `Concurrency limit of ${limit.limit} reached for tag '${limit.tag}'`
        );
      }
      taken.push(limit.tag);
    }

    return approve();
  }

  override async cleanup(context: OrchestrationContext): Promise<void> {
    const taken = this.acquired.get(context) ?? [];
    for (const tag of [...taken].reverse()) {
      await context.session.decrementConcurrency(tag, context.runId);
    }
    this.acquired.delete(context);
  }
}

export class ReleaseConcurrencySlots extends BaseRule {
  readonly name = 'ReleaseConcurrencySlots';
  readonly fromTypes: readonly StateType[] = [StateType.RUNNING, StateType.CANCELLING];
  readonly toTypes = allExcept(StateType.RUNNING, StateType.CANCELLING);

  async before(_context: OrchestrationContext): Promise<Decision> {
    return approve();
  }

  override async after(context: OrchestrationContext): Promise<void> {
    for (const tag of context.run.tags) {
      await context.session.decrementConcurrency(tag, context.runId);
    }
  }
}
