/**
 * Invocation frame lifecycle
 *
 * forward → suspended → resumed → exhausted
 *         ↘ forward-only (no backward phase declared)
 *         ↘ failed (forward phase threw, no output)
 */

import { TransitionValidator, type StateTransition } from './transitions.js';

export const FRAME_STATES = {
  FORWARD: 'forward',
  SUSPENDED: 'suspended',
  RESUMED: 'resumed',
  EXHAUSTED: 'exhausted',
  FORWARD_ONLY: 'forward-only',
  FAILED: 'failed',
} as const;

export type FrameState = (typeof FRAME_STATES)[keyof typeof FRAME_STATES];

const FRAME_TRANSITIONS: StateTransition<FrameState>[] = [
  { from: FRAME_STATES.FORWARD, to: FRAME_STATES.SUSPENDED, condition: 'output_produced' },
  { from: FRAME_STATES.FORWARD, to: FRAME_STATES.FORWARD_ONLY, condition: 'output_produced_without_backward' },
  { from: FRAME_STATES.FORWARD, to: FRAME_STATES.FAILED, condition: 'forward_failed' },

  { from: FRAME_STATES.SUSPENDED, to: FRAME_STATES.RESUMED, condition: 'correction_delivered' },
  { from: FRAME_STATES.SUSPENDED, to: FRAME_STATES.EXHAUSTED, condition: 'closed_without_correction' },

  { from: FRAME_STATES.RESUMED, to: FRAME_STATES.EXHAUSTED, condition: 'backward_finished' },
];

export const frameTransitions = new TransitionValidator<FrameState>(FRAME_TRANSITIONS, [
  FRAME_STATES.EXHAUSTED,
  FRAME_STATES.FORWARD_ONLY,
  FRAME_STATES.FAILED,
]);
