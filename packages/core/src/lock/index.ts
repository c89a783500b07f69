export { FrameLock } from './frame-lock.js';
export type { ReleaseFn } from './frame-lock.js';
