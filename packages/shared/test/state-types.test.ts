import { describe, it, expect } from 'vitest';
import {
  ALL_STATE_TYPES,
  DEFAULT_STATE_NAMES,
  StateType,
  isTerminalStateType,
  stateProposalSchema,
} from '../src/types/state.js';

describe('State Types', () => {
  it('should have nine state types', () => {
    expect(ALL_STATE_TYPES).toHaveLength(9);
  });

  it('should identify terminal state types', () => {
    const terminal = ALL_STATE_TYPES.filter(isTerminalStateType);
    expect(terminal).toEqual([StateType.COMPLETED, StateType.FAILED, StateType.CRASHED, StateType.CANCELLED]);
  });

  it('should name every state type', () => {
    expect(DEFAULT_STATE_NAMES[StateType.SCHEDULED]).toBe('Scheduled');
    expect(DEFAULT_STATE_NAMES[StateType.CANCELLING]).toBe('Cancelling');
  });

  describe('stateProposalSchema', () => {
    it('should accept a minimal proposal', () => {
      expect(stateProposalSchema.parse({ type: 'RUNNING' })).toEqual({ type: 'RUNNING' });
    });

    it('should coerce timestamps', () => {
      const proposal = stateProposalSchema.parse({
        type: 'SCHEDULED',
        name: 'Late',
        timestamp: '2024-06-01T12:00:00.000Z',
        scheduledTime: '2024-06-01T13:00:00.000Z',
      });

      expect(proposal.timestamp?.toISOString()).toBe('2024-06-01T12:00:00.000Z');
      expect(proposal.scheduledTime?.toISOString()).toBe('2024-06-01T13:00:00.000Z');
    });

    it('should reject unknown state types', () => {
      expect(stateProposalSchema.safeParse({ type: 'DONE' }).success).toBe(false);
    });

    it('should reject empty names', () => {
      expect(stateProposalSchema.safeParse({ type: 'FAILED', name: '' }).success).toBe(false);
    });
  });
});
