/**
 * Lifecycle state machines
 *
 * Frames:  forward → suspended → resumed → exhausted (or forward-only / failed)
 * Nodes in a pass: untouched → queued → delivered → frame-resumed → done
 */

export { TransitionValidator } from './transitions.js';
export type { StateTransition } from './transitions.js';
export { FRAME_STATES, frameTransitions } from './frame-states.js';
export type { FrameState } from './frame-states.js';
export { NODE_PASS_STATES, nodePassTransitions } from './pass-states.js';
export type { NodePassState } from './pass-states.js';
