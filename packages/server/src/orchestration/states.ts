/**
 * State factories.
 *
 * States are frozen on creation; rules replace a proposed state instead of
 * editing it.
 */

import { nanoid } from 'nanoid';
import {
  StateType,
  StateName,
  DEFAULT_STATE_NAMES,
  type StateProposal,
  type StateSummary,
} from '@runplane/shared';
import type { State } from '../types/index.js';

export interface StateOptions {
  name?: string;
  message?: string | null;
  timestamp?: Date;
  scheduledTime?: Date | null;
  data?: unknown;
}

export function createState(type: StateType, options: StateOptions = {}): State {
  const timestamp = options.timestamp ?? new Date();
  return Object.freeze({
    id: nanoid(),
    type,
    name: options.name ?? DEFAULT_STATE_NAMES[type],
    timestamp,
    message: options.message ?? null,
    data: options.data ?? null,
    details: Object.freeze({ scheduledTime: options.scheduledTime ?? null }),
  });
}

/**
 * Scheduled state; due at `scheduledTime`, or immediately when omitted.
 */
export function scheduled(options: StateOptions = {}): State {
  const timestamp = options.timestamp ?? new Date();
  return createState(StateType.SCHEDULED, {
    ...options,
    timestamp,
    scheduledTime: options.scheduledTime ?? timestamp,
  });
}

/**
 * Scheduled run that missed its start time.
 */
export function late(options: StateOptions = {}): State {
  return scheduled({ ...options, name: StateName.LATE });
}

/**
 * Scheduled state entered by a failed run that will be retried.
 */
export function awaitingRetry(scheduledTime: Date, options: StateOptions = {}): State {
  return scheduled({ ...options, scheduledTime, name: StateName.AWAITING_RETRY });
}

export function pending(options: StateOptions = {}): State {
  return createState(StateType.PENDING, options);
}

export function running(options: StateOptions = {}): State {
  return createState(StateType.RUNNING, options);
}

export function completed(options: StateOptions = {}): State {
  return createState(StateType.COMPLETED, options);
}

export function failed(options: StateOptions = {}): State {
  return createState(StateType.FAILED, options);
}

export function crashed(options: StateOptions = {}): State {
  return createState(StateType.CRASHED, options);
}

export function cancelling(options: StateOptions = {}): State {
  return createState(StateType.CANCELLING, options);
}

export function cancelled(options: StateOptions = {}): State {
  return createState(StateType.CANCELLED, options);
}

export function paused(options: StateOptions = {}): State {
  return createState(StateType.PAUSED, options);
}

/**
 * Build a state from a validated caller proposal.
 */
export function stateFromProposal(proposal: StateProposal, now: Date): State {
  const options: StateOptions = {
    timestamp: proposal.timestamp ?? now,
    message: proposal.message ?? null,
    data: proposal.data,
  };
  if (proposal.name !== undefined) {
    options.name = proposal.name;
  }
  if (proposal.type === StateType.SCHEDULED) {
    return scheduled({ ...options, scheduledTime: proposal.scheduledTime ?? null });
  }
  return createState(proposal.type, options);
}

export function toStateSummary(state: State): StateSummary {
  return {
    id: state.id,
    type: state.type,
    name: state.name,
    timestamp: state.timestamp.toISOString(),
    message: state.message,
    scheduledTime: state.details.scheduledTime?.toISOString() ?? null,
  };
}
