/**
 * Orchestration rule contract.
 *
 * A rule governs a set of (from, to) state type pairs. For a matching
 * transition attempt the engine calls `before` to obtain a decision, then
 * exactly one of `after` (the transition committed) or `cleanup` (a rule
 * further down the pipeline refused it, or the attempt failed).
 */

import { ALL_STATE_TYPES, type StateType } from '@runplane/shared';
import type { OrchestrationContext } from './context.js';

/**
 * Matches every state type.
 */
export const ANY_STATE: readonly StateType[] = ALL_STATE_TYPES;

export type Decision =
  | { readonly kind: 'approve' }
  | { readonly kind: 'reject'; readonly reason: string }
  | { readonly kind: 'delay'; readonly reason: string; readonly retryAfterMs: number }
  | { readonly kind: 'abort'; readonly reason: string };

export interface OrchestrationRule {
  readonly name: string;
  readonly fromTypes: readonly StateType[];
  readonly toTypes: readonly StateType[];

  /** Inspect the attempt; may replace the proposed state on the context */
  before(context: OrchestrationContext): Promise<Decision>;

  /** Side effects that must only happen once the transition is durable */
  after(context: OrchestrationContext): Promise<void>;

  /** Reverse every side effect `before` performed */
  cleanup(context: OrchestrationContext): Promise<void>;
}

const APPROVE: Decision = Object.freeze({ kind: 'approve' });

export function approve(): Decision {
  return APPROVE;
}

export function reject(reason: string): Decision {
  return { kind: 'reject', reason };
}

export function delay(retryAfterMs: number, reason: string): Decision {
  return { kind: 'delay', reason, retryAfterMs: Math.max(0, Math.ceil(retryAfterMs)) };
}

export function abort(reason: string): Decision {
  return { kind: 'abort', reason };
}

/**
 * Check whether a rule governs the attempt as it currently stands.
 */
export function ruleApplies(rule: OrchestrationRule, context: OrchestrationContext): boolean {
  return (
    rule.fromTypes.includes(context.initialState.type) &&
    rule.toTypes.includes(context.proposedState.type)
  );
}

/**
 * All state types except the given ones.
 */
export function allExcept(...types: StateType[]): readonly StateType[] {
  return ALL_STATE_TYPES.filter((type) => !types.includes(type));
}

/**
 * Base class for rules whose `after` and `cleanup` have nothing to do.
 */
export abstract class BaseRule implements OrchestrationRule {
  abstract readonly name: string;
  abstract readonly fromTypes: readonly StateType[];
  abstract readonly toTypes: readonly StateType[];

  abstract before(context: OrchestrationContext): Promise<Decision>;

  async after(_context: OrchestrationContext): Promise<void> {}

  async cleanup(_context: OrchestrationContext): Promise<void> {}
}
