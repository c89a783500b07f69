export { SlidingWindowLimit } from './sliding-window.js';
export { CallLimit } from './call-limit.js';
export { TokenLimit } from './token-limit.js';
