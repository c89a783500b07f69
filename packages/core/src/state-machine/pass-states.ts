/**
 * Per-node states during one propagation pass
 *
 * untouched → queued → delivered → frame-resumed → done
 * A queued node that is discarded (leaf, exhausted frame) goes straight to done.
 */

import { TransitionValidator, type StateTransition } from './transitions.js';

export const NODE_PASS_STATES = {
  UNTOUCHED: 'untouched',
  QUEUED: 'queued',
  DELIVERED: 'delivered',
  FRAME_RESUMED: 'frame-resumed',
  DONE: 'done',
} as const;

export type NodePassState = (typeof NODE_PASS_STATES)[keyof typeof NODE_PASS_STATES];

const NODE_PASS_TRANSITIONS: StateTransition<NodePassState>[] = [
  { from: NODE_PASS_STATES.UNTOUCHED, to: NODE_PASS_STATES.QUEUED, condition: 'correction_recorded' },
  { from: NODE_PASS_STATES.QUEUED, to: NODE_PASS_STATES.DELIVERED, condition: 'pending_merged' },
  { from: NODE_PASS_STATES.QUEUED, to: NODE_PASS_STATES.DONE, condition: 'discarded' },
  { from: NODE_PASS_STATES.DELIVERED, to: NODE_PASS_STATES.FRAME_RESUMED, condition: 'backward_started' },
  { from: NODE_PASS_STATES.DELIVERED, to: NODE_PASS_STATES.DONE, condition: 'nothing_to_deliver' },
  { from: NODE_PASS_STATES.FRAME_RESUMED, to: NODE_PASS_STATES.DONE, condition: 'backward_finished' },
];

export const nodePassTransitions = new TransitionValidator<NodePassState>(NODE_PASS_TRANSITIONS, [
  NODE_PASS_STATES.DONE,
]);
