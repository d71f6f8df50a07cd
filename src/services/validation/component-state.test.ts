// Tests for the component lifecycle state machine

import { describe, it, expect } from 'vitest';
import { ComponentStateMachine } from './component-state.js';
import { StateTransitionError } from '../../core/errors.js';

describe('ComponentStateMachine', () => {
  it('should start in NOT_STARTED', () => {
    const machine = new ComponentStateMachine();
    expect(machine.state).toBe('NOT_STARTED');
    expect(machine.shortCircuited).toBe(false);
  });

  it('should follow the content path', () => {
    const machine = new ComponentStateMachine();
    machine.transition('ARTIFACT_CHECKED');
    machine.transition('CONTENT_CHECKED');
    machine.transition('DONE');

    expect(machine.state).toBe('DONE');
    expect(machine.history).toEqual(['NOT_STARTED', 'ARTIFACT_CHECKED', 'CONTENT_CHECKED', 'DONE']);
    expect(machine.shortCircuited).toBe(false);
  });

  it('should follow the short-circuit path', () => {
    const machine = new ComponentStateMachine();
    machine.transition('ARTIFACT_CHECKED');
    machine.transition('SHORT_CIRCUITED');
    machine.transition('DONE');

    expect(machine.shortCircuited).toBe(true);
  });

  it('should allow moving on to the next target', () => {
    const machine = new ComponentStateMachine();
    machine.transition('ARTIFACT_CHECKED');
    machine.transition('CONTENT_CHECKED');
    machine.transition('ARTIFACT_CHECKED');
    machine.transition('ARTIFACT_CHECKED');
    machine.transition('DONE');

    expect(machine.state).toBe('DONE');
  });

  it('should reject finishing before any artifact is checked', () => {
    const machine = new ComponentStateMachine();
    expect(() => machine.transition('DONE')).toThrow(StateTransitionError);
  });

  it('should reject resuming after a short circuit', () => {
    const machine = new ComponentStateMachine();
    machine.transition('ARTIFACT_CHECKED');
    machine.transition('SHORT_CIRCUITED');

    expect(machine.canTransition('ARTIFACT_CHECKED')).toBe(false);
    expect(() => machine.transition('CONTENT_CHECKED')).toThrow('Illegal component state transition: SHORT_CIRCUITED -> CONTENT_CHECKED');
  });

  it('should reject every transition out of DONE', () => {
    const machine = new ComponentStateMachine();
    machine.transition('ARTIFACT_CHECKED');
    machine.transition('DONE');

    for (const next of ['NOT_STARTED', 'ARTIFACT_CHECKED', 'SHORT_CIRCUITED', 'CONTENT_CHECKED', 'DONE'] as const) {
      expect(machine.canTransition(next)).toBe(false);
    }
  });
});
