/**
 * Propagation pass types
 */

import type { BackwardFailureError } from '@errata/shared';
import type { InvocationFrame } from '../frame/invocation-frame.js';
import type { ValueNode } from '../graph/value-node.js';
import type { NodePassState } from '../state-machine/index.js';

export type PassStatus = 'completed' | 'cancelled';

export type SkipReason =
  | 'leaf'
  | 'already-resumed'
  | 'frame-exhausted'
  | 'frame-forward-only'
  | 'frame-failed'
  | 'no-corrections';

export interface SkippedNode {
  nodeId: string;
  reason: SkipReason;
}

export interface PropagationOutcome {
  passId: string;
  status: PassStatus;
  /** Frame ids in resumption order */
  resumed: string[];
  skipped: SkippedNode[];
  /** Nodes whose late corrections wait for a future pass */
  deferred: string[];
  failures: BackwardFailureError[];
  /** Final per-node pass state; nodes never touched are absent */
  nodeStates: Record<string, NodePassState>;
}

export interface PropagateOptions {
  signal?: AbortSignal;
  passId?: string;
}

export interface NodeStateChange {
  passId: string;
  nodeId: string;
  from: NodePassState;
  to: NodePassState;
}

export interface PropagationEvents {
  'pass:started': (passId: string, targetIds: string[]) => void;
  'node:state': (change: NodeStateChange) => void;
  'frame:resumed': (passId: string, frame: InvocationFrame, node: ValueNode) => void;
  'frame:failed': (passId: string, failure: BackwardFailureError) => void;
  'pass:completed': (outcome: PropagationOutcome) => void;
  'pass:cancelled': (outcome: PropagationOutcome) => void;
}
