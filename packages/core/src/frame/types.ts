/**
 * Contract between a suspended frame and the propagation driver
 */

import type { CorrectionEntry } from '../correction/correction.js';
import type { PendingCorrection, ValueNode } from '../graph/value-node.js';
import type { InvocationFrame } from './invocation-frame.js';

/**
 * What a resumed frame sees. Effects are staged and only committed once the
 * backward phase resolves.
 */
export interface Revision {
  readonly frame: InvocationFrame;
  /** Merged by the output node's merge policy */
  readonly correction: unknown;
  readonly entries: readonly CorrectionEntry[];
  readonly signal: AbortSignal;
  pending(node: ValueNode): readonly PendingCorrection[];
  mutate<T>(node: ValueNode<T>, payload: T): void;
  recordCorrection(node: ValueNode, payload: unknown): void;
}

export type BackwardHandler = (revision: Revision) => Promise<void>;
