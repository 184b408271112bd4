import { z } from 'zod';

// State Type
export const StateType = {
  SCHEDULED: 'SCHEDULED',
  PENDING: 'PENDING',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CRASHED: 'CRASHED',
  CANCELLED: 'CANCELLED',
  CANCELLING: 'CANCELLING',
  PAUSED: 'PAUSED',
} as const;

export type StateType = (typeof StateType)[keyof typeof StateType];

export const ALL_STATE_TYPES: readonly StateType[] = Object.values(StateType);

export const TERMINAL_STATE_TYPES: readonly StateType[] = [
  StateType.COMPLETED,
  StateType.FAILED,
  StateType.CRASHED,
  StateType.CANCELLED,
];

export function isTerminalStateType(type: StateType): boolean {
  return TERMINAL_STATE_TYPES.includes(type);
}

// Display names used for the named sub-kinds of a state type
export const StateName = {
  SCHEDULED: 'Scheduled',
  LATE: 'Late',
  AWAITING_RETRY: 'AwaitingRetry',
  PENDING: 'Pending',
  RUNNING: 'Running',
  COMPLETED: 'Completed',
  FAILED: 'Failed',
  CRASHED: 'Crashed',
  CANCELLED: 'Cancelled',
  CANCELLING: 'Cancelling',
  PAUSED: 'Paused',
} as const;

export const DEFAULT_STATE_NAMES: Record<StateType, string> = {
  [StateType.SCHEDULED]: StateName.SCHEDULED,
  [StateType.PENDING]: StateName.PENDING,
  [StateType.RUNNING]: StateName.RUNNING,
  [StateType.COMPLETED]: StateName.COMPLETED,
  [StateType.FAILED]: StateName.FAILED,
  [StateType.CRASHED]: StateName.CRASHED,
  [StateType.CANCELLED]: StateName.CANCELLED,
  [StateType.CANCELLING]: StateName.CANCELLING,
  [StateType.PAUSED]: StateName.PAUSED,
};

export const stateTypeSchema = z.nativeEnum(StateType);

// State proposal submitted by callers of the orchestration engine
export const stateProposalSchema = z.object({
  type: stateTypeSchema,
  name: z.string().min(1).max(64).optional(),
  message: z.string().max(2000).optional(),
  timestamp: z.coerce.date().optional(),
  scheduledTime: z.coerce.date().optional(),
  data: z.unknown().optional(),
});

export type StateProposal = z.infer<typeof stateProposalSchema>;

// Serialized state (ISO timestamps)
export interface StateSummary {
  id: string;
  type: StateType;
  name: string;
  timestamp: string;
  message: string | null;
  scheduledTime: string | null;
}
