import { describe, expect, it } from 'vitest';
import { FileStateMachine, isValidTransition } from './stateMachine.js';
import { StateTransitionError } from './errors/index.js';

describe('FileStateMachine', () => {
  it('walks the happy path with cleanup', () => {
    const machine = new FileStateMachine('/media/movie.mkv');
    for (const state of ['CLASSIFYING', 'PROCESSING', 'ASSEMBLING', 'CLEANUP', 'DONE'] as const) {
      machine.transitionTo(state);
    }
    expect(machine.getState()).toBe('DONE');
    expect(machine.getHistory().map(t => t.to)).toEqual([
      'CLASSIFYING',
      'PROCESSING',
      'ASSEMBLING',
      'CLEANUP',
      'DONE',
    ]);
  });

  it('fails only from probing', () => {
    const machine = new FileStateMachine('/media/movie.mkv');
    const transition = machine.fail('ffprobe returned no JSON');
    expect(transition).toMatchObject({ from: 'PROBING', to: 'FAILED', reason: 'ffprobe returned no JSON' });

    const processing = new FileStateMachine('/media/other.mkv');
    processing.transitionTo('CLASSIFYING');
    processing.transitionTo('PROCESSING');
    expect(() => processing.fail('encoder crashed')).toThrow(StateTransitionError);
    expect(processing.getState()).toBe('PROCESSING');
  });

  it('allows skipping cleanup but nothing else', () => {
    expect(isValidTransition('ASSEMBLING', 'CLEANUP')).toBe(true);
    expect(isValidTransition('ASSEMBLING', 'DONE')).toBe(true);
    expect(isValidTransition('PROCESSING', 'DONE')).toBe(false);
    expect(isValidTransition('CLASSIFYING', 'FAILED')).toBe(false);
    expect(isValidTransition('DONE', 'PROBING')).toBe(false);
  });
});
