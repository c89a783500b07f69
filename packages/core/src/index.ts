/**
 * @errata/core
 * Reasoning-graph engine: value nodes, invocation frames, corrections and
 * backward propagation
 */

// State machines
export * from './state-machine/index.js';

// Graph
export * from './graph/index.js';

// Corrections
export * from './correction/index.js';

// Frames
export * from './frame/index.js';
export * from './lock/index.js';

// Modules
export * from './module/index.js';

// Propagation
export * from './propagation/index.js';

// ============================================
// Built-in modules
// ============================================

export * from './functions/index.js';
export * from './character/index.js';
export * from './memory/index.js';
