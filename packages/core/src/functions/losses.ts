import { Correction } from '../correction/correction.js';
import type { ValueNode } from '../graph/value-node.js';

/**
 * Caller feedback on a node, ready for propagate()
 */
export function applyLoss(node: ValueNode, feedback: unknown): Correction {
  return Correction.for(node, feedback);
}
