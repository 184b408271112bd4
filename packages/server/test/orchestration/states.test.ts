import { describe, it, expect } from 'vitest';
import { StateName, StateType, stateProposalSchema } from '@runplane/shared';
import {
  awaitingRetry,
  createState,
  late,
  scheduled,
  stateFromProposal,
  toStateSummary,
} from '../../src/orchestration/states.js';
import { at } from '../helpers/orchestration.js';

describe('state factories', () => {
  it('should freeze states', () => {
    const state = createState(StateType.RUNNING, { timestamp: at(0) });

    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state.details)).toBe(true);
    expect(state.name).toBe(StateName.RUNNING);
    expect(state.message).toBeNull();
  });

  it('should schedule immediately when no time is given', () => {
    const state = scheduled({ timestamp: at(0) });

    expect(state.details.scheduledTime).toEqual(at(0));
  });

  it('should build Late and AwaitingRetry as named scheduled states', () => {
    const lateState = late({ timestamp: at(1000), scheduledTime: at(0) });
    const retryState = awaitingRetry(at(5000), { timestamp: at(1000) });

    expect(lateState.type).toBe(StateType.SCHEDULED);
    expect(lateState.name).toBe(StateName.LATE);
    expect(lateState.details.scheduledTime).toEqual(at(0));
    expect(retryState.type).toBe(StateType.SCHEDULED);
    expect(retryState.name).toBe(StateName.AWAITING_RETRY);
    expect(retryState.details.scheduledTime).toEqual(at(5000));
  });

  it('should build states from validated proposals', () => {
    const proposal = stateProposalSchema.parse({
      type: 'SCHEDULED',
      name: 'Late',
      scheduledTime: '2024-06-01T12:30:00.000Z',
    });

    const state = stateFromProposal(proposal, at(0));

    expect(state.type).toBe(StateType.SCHEDULED);
    expect(state.name).toBe('Late');
    expect(state.timestamp).toEqual(at(0));
    expect(state.details.scheduledTime).toEqual(new Date('2024-06-01T12:30:00.000Z'));
  });

  it('should keep the proposal timestamp when one is given', () => {
    const proposal = stateProposalSchema.parse({
      type: 'COMPLETED',
      message: 'done',
      timestamp: '2024-06-01T13:00:00.000Z',
    });

    const state = stateFromProposal(proposal, at(0));

    expect(toStateSummary(state)).toEqual({
      id: state.id,
      type: StateType.COMPLETED,
      name: StateName.COMPLETED,
      timestamp: '2024-06-01T13:00:00.000Z',
      message: 'done',
      scheduledTime: null,
    });
  });
});
