/**
 * Invocation Frame Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidTransitionError, StateMachineError } from '@errata/shared';
import { GraphRegistry } from '../graph/graph-registry.js';
import { FRAME_STATES } from '../state-machine/index.js';
import type { InvocationFrame } from './invocation-frame.js';

describe('InvocationFrame', () => {
  let graph: GraphRegistry;
  let frame: InvocationFrame;

  beforeEach(() => {
    graph = new GraphRegistry();
    const character = graph.leaf('Character', 'Rarity');
    const context = graph.leaf('Context', 'greeting scene');
    frame = graph.openFrame({
      moduleType: 'PoseModule',
      operation: 'generatePose',
      inputs: [character, context],
      inputNames: ['character_info', 'context'],
    });
  });

  it('should start in the forward phase', () => {
    expect(frame.getState()).toBe(FRAME_STATES.FORWARD);
    expect(frame.getOutput()).toBeNull();
  });

  it('should look inputs up by name', () => {
    expect(frame.getInput('context')?.value).toBe('greeting scene');
    expect(frame.getInput('missing')).toBeUndefined();
  });

  it('should suspend when a backward phase is given', () => {
    frame.suspend(async () => undefined);

    expect(frame.getState()).toBe(FRAME_STATES.SUSPENDED);
    expect(frame.hasBackward()).toBe(true);
  });

  it('should become forward-only without a backward phase', () => {
    frame.suspend();

    expect(frame.getState()).toBe(FRAME_STATES.FORWARD_ONLY);
    expect(frame.isTerminal()).toBe(true);
  });

  it('should resume once and then be exhausted', () => {
    const handler = async (): Promise<void> => undefined;
    frame.suspend(handler);

    expect(frame.beginResume()).toBe(handler);
    expect(frame.getState()).toBe(FRAME_STATES.RESUMED);

    frame.exhaust();
    expect(frame.getState()).toBe(FRAME_STATES.EXHAUSTED);
    expect(() => frame.beginResume()).toThrow(StateMachineError);
  });

  it('should close a suspended frame without revision', () => {
    frame.suspend(async () => undefined);

    frame.close();

    expect(frame.getState()).toBe(FRAME_STATES.EXHAUSTED);
    expect(frame.hasBackward()).toBe(false);
  });

  it('should refuse to close a frame that is not suspended', () => {
    frame.suspend();

    expect(() => frame.close()).toThrow(InvalidTransitionError);
  });

  it('should refuse to fail after suspension', () => {
    frame.suspend(async () => undefined);

    expect(() => frame.fail()).toThrow(InvalidTransitionError);
  });

  it('should accept only one output', () => {
    graph.create('first', { datatype: 'Pose', producer: frame });

    expect(() => frame.attachOutput(graph.leaf('Pose', 'second'))).toThrow(StateMachineError);
  });
});
