import type { StateSummary } from './state.js';

// Outcome Kind
export const OutcomeKind = {
  ACCEPTED: 'accepted',
  REJECTED: 'rejected',
  DELAYED: 'delayed',
  ABORTED: 'aborted',
} as const;

export type OutcomeKind = (typeof OutcomeKind)[keyof typeof OutcomeKind];

// Details attached to a non-accepted outcome
export interface OutcomeDetails {
  /** Rule that produced the decision */
  rule?: string;
  reason?: string;
  /** Only set for delayed outcomes */
  retryAfterMs?: number;
}

// Serialized transition outcome
export interface OutcomeSummary {
  runId: string;
  kind: OutcomeKind;
  validatedState: StateSummary | null;
  details: OutcomeDetails;
}
