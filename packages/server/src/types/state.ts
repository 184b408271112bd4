import type { StateType } from '@runplane/shared';

/**
 * Extra timing information attached to a state.
 */
export interface StateDetails {
  /** When a Scheduled state is due to start */
  readonly scheduledTime: Date | null;
}

/**
 * Immutable snapshot of a run's status at a point in time.
 */
export interface State {
  readonly id: string;
  readonly type: StateType;
  /** Display name; distinguishes sub-kinds such as Late or AwaitingRetry */
  readonly name: string;
  readonly timestamp: Date;
  readonly message: string | null;
  readonly data: unknown;
  readonly details: StateDetails;
}
