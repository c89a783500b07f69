export { PropagationDriver, propagate } from './propagation-driver.js';
export type { PropagationDriverOptions } from './propagation-driver.js';
export { StagedRevision } from './staged-revision.js';
export type {
  PassStatus,
  SkipReason,
  SkippedNode,
  PropagationOutcome,
  PropagateOptions,
  NodeStateChange,
  PropagationEvents,
} from './types.js';
