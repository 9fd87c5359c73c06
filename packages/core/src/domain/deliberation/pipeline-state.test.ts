import { describe, it, expect } from 'vitest';
import { PipelineStateMachine, canTransition, isTerminalState, type PipelineTransition } from './pipeline-state.js';
import { PipelineError } from '../../shared/errors.js';

describe('canTransition', () => {
  it('follows the stage order', () => {
    expect(canTransition('idle', 'stage1_running')).toBe(true);
    expect(canTransition('stage1_done', 'stage2_running')).toBe(true);
    expect(canTransition('stage3_done', 'completed')).toBe(true);
  });

  it('never skips a stage', () => {
    expect(canTransition('idle', 'stage2_running')).toBe(false);
    expect(canTransition('stage1_done', 'stage3_running')).toBe(false);
    expect(canTransition('stage2_running', 'completed')).toBe(false);
  });

  it('only fails from stage one', () => {
    expect(canTransition('stage1_running', 'failed')).toBe(true);
    expect(canTransition('stage2_running', 'failed')).toBe(false);
    expect(canTransition('stage3_running', 'failed')).toBe(false);
  });

  it('cancels from any running state', () => {
    expect(canTransition('stage1_running', 'cancelled')).toBe(true);
    expect(canTransition('stage2_running', 'cancelled')).toBe(true);
    expect(canTransition('stage3_running', 'cancelled')).toBe(true);
    expect(canTransition('stage1_done', 'cancelled')).toBe(false);
  });
});

describe('isTerminalState', () => {
  it('marks completed, failed and cancelled as terminal', () => {
    expect(isTerminalState('completed')).toBe(true);
    expect(isTerminalState('failed')).toBe(true);
    expect(isTerminalState('cancelled')).toBe(true);
    expect(isTerminalState('stage2_done')).toBe(false);
  });
});

describe('PipelineStateMachine', () => {
  it('emits each transition with the run id', () => {
    const events: PipelineTransition[] = [];
    const machine = new PipelineStateMachine('run-1', (e) => events.push(e));
    machine.transition({ state: 'stage1_running' });
    machine.transition({ state: 'stage1_done', stage1: [{ model: 'm1', response: 'hi' }] });
    expect(events).toEqual([
      { state: 'stage1_running', runId: 'run-1' },
      { state: 'stage1_done', stage1: [{ model: 'm1', response: 'hi' }], runId: 'run-1' },
    ]);
    expect(machine.state).toBe('stage1_done');
    expect(machine.visited).toEqual(['idle', 'stage1_running', 'stage1_done']);
  });

  it('rejects an illegal transition without emitting', () => {
    const events: PipelineTransition[] = [];
    const machine = new PipelineStateMachine('run-2', (e) => events.push(e));
    expect(() => machine.transition({ state: 'stage2_running' })).toThrow(
      new PipelineError('Illegal pipeline transition: idle -> stage2_running'),
    );
    expect(events).toEqual([]);
    expect(machine.state).toBe('idle');
  });

  it('stays put after a terminal state', () => {
    const machine = new PipelineStateMachine('run-3', () => {});
    machine.transition({ state: 'stage1_running' });
    machine.transition({ state: 'failed', error: new Error('boom') });
    expect(() => machine.transition({ state: 'stage1_running' })).toThrow(PipelineError);
  });
});
