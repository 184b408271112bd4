/**
 * Orchestration Engine
 *
 * The only writer of a run's current state. Every attempt runs inside one
 * store transaction holding the run's lock:
 *
 * 1. Build the context from the locked run and the proposed state
 * 2. Evaluate the core policy, then the auxiliary policy
 * 3. Commit: append the validated state, then run `after` hooks in order
 * 4. Refusal or failure: `cleanup` every executed rule in reverse order
 */

import { OutcomeKind, type OutcomeDetails, type OutcomeSummary } from '@runplane/shared';
import type { State } from '../types/index.js';
import type { OrchestrationStore } from '../storage/store.js';
import { LockTimeoutError, RunNotFoundError } from '../storage/errors.js';
import { systemClock, type Clock } from '../utils/clock.js';
import { createLogger } from '../utils/logger.js';
import { OrchestrationContext } from './context.js';
import { OrchestrationFailedError } from './errors.js';
import type { Policy } from './policy.js';
import { ruleApplies, type Decision, type OrchestrationRule } from './rule.js';
import { toStateSummary } from './states.js';

const log = createLogger('engine');

/**
 * Result of a transition attempt. Policy refusals are outcomes, not errors.
 */
export interface Outcome {
  runId: string;
  kind: OutcomeKind;
  /** The committed state; null unless accepted */
  validatedState: State | null;
  details: OutcomeDetails;
}

export interface OrchestrationEngineOptions {
  store: OrchestrationStore;
  corePolicy: Policy;
  auxiliaryPolicy?: Policy;
  clock?: Clock;
  /** Maximum wait for the run lock. Default: 30000 */
  lockTimeoutMs?: number;
}

type RefusingDecision = Exclude<Decision, { kind: 'approve' }>;

interface Refusal {
  rule: OrchestrationRule;
  decision: RefusingDecision;
}

const REFUSAL_KINDS: Record<RefusingDecision['kind'], OutcomeKind> = {
  reject: OutcomeKind.REJECTED,
  delay: OutcomeKind.DELAYED,
  abort: OutcomeKind.ABORTED,
};

export class OrchestrationEngine {
  private readonly store: OrchestrationStore;
  private readonly corePolicy: Policy;
  private readonly auxiliaryPolicy: Policy | null;
  private readonly clock: Clock;
  private readonly lockTimeoutMs: number;

  constructor(options: OrchestrationEngineOptions) {
    this.store = options.store;
    this.corePolicy = options.corePolicy;
    this.auxiliaryPolicy = options.auxiliaryPolicy ?? null;
    this.clock = options.clock ?? systemClock;
    this.lockTimeoutMs = options.lockTimeoutMs ?? 30000;
  }

  /**
   * Propose a new state for a run.
   *
   * @throws RunNotFoundError when the run does not exist
   * @throws LockTimeoutError when the run lock is not acquired in time
   * @throws OrchestrationFailedError when a rule or the store fails
   */
  async proposeTransition(runId: string, proposedState: State): Promise<Outcome> {
    try {
      return await this.store.transaction(async (session) => {
        await session.lockRun(runId, this.lockTimeoutMs);
        const run = await session.getRun(runId);
        if (!run) {
          throw new RunNotFoundError(runId);
        }

        const context = new OrchestrationContext({
          run,
          proposedState,
          session,
          now: this.clock.now(),
        });
        return this.orchestrate(context);
      });
    } catch (error) {
      if (error instanceof RunNotFoundError || error instanceof LockTimeoutError) {
        throw error;
      }
      log.error({ err: error, runId }, 'Transition attempt failed');
      throw new OrchestrationFailedError(runId, error);
    }
  }

  private async orchestrate(context: OrchestrationContext): Promise<Outcome> {
    const executed: OrchestrationRule[] = [];

    try {
      const coreRefusal = await this.evaluate(this.corePolicy, context, executed);
      if (coreRefusal) {
        await this.cleanupAll(executed, context);
        return this.refuse(context, coreRefusal);
      }

      if (this.auxiliaryPolicy) {
        const auxRefusal = await this.evaluate(this.auxiliaryPolicy, context, executed);
        if (auxRefusal?.decision.kind === 'delay') {
          await this.cleanupAll(executed, context);
          return this.refuse(context, auxRefusal);
        }
        if (auxRefusal) {
          // Auxiliary refusals never undo the core decision
          log.warn(
            {
              runId: context.runId,
              rule: auxRefusal.rule.name,
              decision: auxRefusal.decision.kind,
              reason: auxRefusal.decision.reason,
            },
            'Auxiliary rule refusal ignored'
          );
          executed.splice(executed.indexOf(auxRefusal.rule), 1);
          await auxRefusal.rule.cleanup(context);
        }
      }

      const validated = context.proposedState;
      context.validatedState = validated;
      await context.session.appendState(context.runId, validated, context.runUpdates);

      for (const rule of executed) {
        await rule.after(context);
      }
    } catch (error) {
      await this.cleanupAfterFailure(executed, context);
      throw error;
    }

    context.outcome = OutcomeKind.ACCEPTED;
    log.debug(
      { runId: context.runId, state: `${context.proposedType}/${context.proposedState.name}` },
      'Transition accepted'
    );
    return {
      runId: context.runId,
      kind: OutcomeKind.ACCEPTED,
      validatedState: context.validatedState,
      details: {},
    };
  }

  /**
   * Run a policy's applicable rules until one refuses. Rules are recorded
   * as executed before `before` runs, so the refusing rule is cleaned up too.
   */
  private async evaluate(
    policy: Policy,
    context: OrchestrationContext,
    executed: OrchestrationRule[]
  ): Promise<Refusal | null> {
    for (const rule of policy.rules) {
      if (!ruleApplies(rule, context)) {
        continue;
      }
      executed.push(rule);
      const decision = await rule.before(context);
      if (decision.kind !== 'approve') {
        return { rule, decision };
      }
    }
    return null;
  }

  private async cleanupAll(executed: OrchestrationRule[], context: OrchestrationContext): Promise<void> {
    for (const rule of [...executed].reverse()) {
      await rule.cleanup(context);
    }
  }

  private async cleanupAfterFailure(
    executed: OrchestrationRule[],
    context: OrchestrationContext
  ): Promise<void> {
    for (const rule of [...executed].reverse()) {
      try {
        await rule.cleanup(context);
      } catch (cleanupError) {
        log.error(
          { err: cleanupError, runId: context.runId, rule: rule.name },
          'Rule cleanup failed during rollback'
        );
      }
    }
  }

  private refuse(context: OrchestrationContext, refusal: Refusal): Outcome {
    const { rule, decision } = refusal;
    const kind = REFUSAL_KINDS[decision.kind];
    context.outcome = kind;

    const details: OutcomeDetails = { rule: rule.name, reason: decision.reason };
    if (decision.kind === 'delay') {
      details.retryAfterMs = decision.retryAfterMs;
    }

    log.info(
      {
        runId: context.runId,
        from: context.initialType,
        to: context.proposedType,
        outcome: kind,
        rule: rule.name,
        reason: decision.reason,
      },
      'Transition refused'
    );
    return { runId: context.runId, kind, validatedState: null, details };
  }
}

/**
 * Serializable view of an outcome.
 */
export function toOutcomeSummary(outcome: Outcome): OutcomeSummary {
  return {
    runId: outcome.runId,
    kind: outcome.kind,
    validatedState: outcome.validatedState ? toStateSummary(outcome.validatedState) : null,
    details: { ...outcome.details },
  };
}
