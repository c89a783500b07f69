export { ValueNode } from './value-node.js';
export type { PendingCorrection, ValueNodeInit } from './value-node.js';
export { GraphRegistry, getDefaultGraph, resetDefaultGraph } from './graph-registry.js';
export type {
  GraphEvents,
  GraphRegistryOptions,
  CreateNodeOptions,
  OpenFrameOptions,
  MutateOptions,
  GraphSnapshot,
} from './graph-registry.js';
