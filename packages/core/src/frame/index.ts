export { InvocationFrame } from './invocation-frame.js';
export type { InvocationFrameInit } from './invocation-frame.js';
export type { Revision, BackwardHandler } from './types.js';
