/**
 * Run State Machine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { RunPhase, RunStateMachine, type RunTransitionEvent } from '../src/services/orchestration/run-state-machine.js';

describe('RunStateMachine', () => {
  it('starts in INITIALIZING', () => {
    const machine = new RunStateMachine('R1');

    expect(machine.currentPhase).toBe(RunPhase.INITIALIZING);
    expect(machine.isTerminal()).toBe(false);
  });

  it('walks the success path and emits each transition', () => {
    const machine = new RunStateMachine('R1');
    const transitions: RunTransitionEvent[] = [];
    const completed = vi.fn();
    machine.on('phase_transition', (event: RunTransitionEvent) => transitions.push(event));
    machine.on('completed', completed);

    machine.transition(RunPhase.STREAMING);
    machine.transition(RunPhase.COMPLETING);
    machine.transition(RunPhase.COMPLETE);

    expect(transitions.map((event) => [event.fromPhase, event.toPhase])).toEqual([
      [RunPhase.INITIALIZING, RunPhase.STREAMING],
      [RunPhase.STREAMING, RunPhase.COMPLETING],
      [RunPhase.COMPLETING, RunPhase.COMPLETE],
    ]);
    expect(completed).toHaveBeenCalledTimes(1);
    expect(completed.mock.calls[0][0]).toBe('R1');
    expect(machine.isTerminal()).toBe(true);
  });

  it('rejects skipping straight to COMPLETE', () => {
    const machine = new RunStateMachine('R1');

    expect(() => machine.transition(RunPhase.COMPLETE)).toThrow(
      'Invalid transition from initializing to complete'
    );
    expect(machine.currentPhase).toBe(RunPhase.INITIALIZING);
  });

  it('allows failing from every non-terminal phase', () => {
    const paths: RunPhase[][] = [[], [RunPhase.STREAMING], [RunPhase.STREAMING, RunPhase.COMPLETING]];
    for (const path of paths) {
      const machine = new RunStateMachine('R1');
      path.forEach((phase) => machine.transition(phase));

      machine.fail('boom');

      expect(machine.currentPhase).toBe(RunPhase.FAILED);
      expect(machine.reason).toBe('boom');
    }
  });

  it('keeps the first failure reason and never leaves a terminal phase', () => {
    const machine = new RunStateMachine('R1');
    const failed = vi.fn();
    machine.on('failed', failed);

    machine.fail('first');
    machine.fail('second');

    expect(machine.reason).toBe('first');
    expect(failed).toHaveBeenCalledTimes(1);
    expect(failed).toHaveBeenCalledWith('R1', 'first');
    expect(() => machine.transition(RunPhase.STREAMING)).toThrow();
  });

  it('does not fail a completed run', () => {
    const machine = new RunStateMachine('R1');
    machine.transition(RunPhase.STREAMING);
    machine.transition(RunPhase.COMPLETING);
    machine.transition(RunPhase.COMPLETE);

    machine.fail('late');

    expect(machine.currentPhase).toBe(RunPhase.COMPLETE);
    expect(machine.reason).toBeNull();
  });
});
