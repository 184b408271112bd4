/**
 * Legal state graph.
 *
 * Every (from, to) pair of state types is either listed here or illegal.
 * Same-type pairs are always legal so a state can be renamed in place
 * (Scheduled -> Late) or re-proposed idempotently.
 */

import { StateType } from '@runplane/shared';

const {
  SCHEDULED,
  PENDING,
  RUNNING,
  COMPLETED,
  FAILED,
  CRASHED,
  CANCELLED,
  CANCELLING,
  PAUSED,
} = StateType;

export const LEGAL_TRANSITIONS: Record<StateType, readonly StateType[]> = {
  [SCHEDULED]: [SCHEDULED, PENDING, RUNNING, PAUSED, CANCELLING, CANCELLED, FAILED, CRASHED],
  [PENDING]: [PENDING, SCHEDULED, RUNNING, PAUSED, CANCELLING, CANCELLED, FAILED, CRASHED],
  [RUNNING]: [RUNNING, SCHEDULED, COMPLETED, FAILED, CRASHED, PAUSED, CANCELLING, CANCELLED],
  [PAUSED]: [PAUSED, SCHEDULED, PENDING, RUNNING, CANCELLING, CANCELLED, FAILED, CRASHED],
  [CANCELLING]: [CANCELLING, CANCELLED, FAILED, CRASHED],
  // Terminal states only accept themselves
  [COMPLETED]: [COMPLETED],
  [FAILED]: [FAILED],
  [CRASHED]: [CRASHED],
  [CANCELLED]: [CANCELLED],
};

/**
 * Check whether a transition between two state types is legal.
 */
export function isLegalTransition(from: StateType, to: StateType): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

/**
 * Get the legal target types for a state type.
 */
export function getLegalTargets(from: StateType): readonly StateType[] {
  return LEGAL_TRANSITIONS[from];
}
