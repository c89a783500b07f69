/**
 * Staged effects of one backward phase. Nothing reaches the graph until
 * commit(); a failed phase is simply dropped.
 */

import { ValidationError } from '@errata/shared';
import type { CorrectionEntry } from '../correction/correction.js';
import type { InvocationFrame } from '../frame/invocation-frame.js';
import type { Revision } from '../frame/types.js';
import type { GraphRegistry } from '../graph/graph-registry.js';
import type { PendingCorrection, ValueNode } from '../graph/value-node.js';

type StagedEffect =
  | { kind: 'mutate'; node: ValueNode; apply: () => void }
  | { kind: 'record'; node: ValueNode; payload: unknown };

export class StagedRevision implements Revision {
  readonly correction: unknown;
  readonly entries: readonly CorrectionEntry[];
  private effects: StagedEffect[] = [];
  private sealed = false;

  constructor(
    private readonly graph: GraphRegistry,
    readonly frame: InvocationFrame,
    output: ValueNode,
    delivered: readonly PendingCorrection[],
    readonly signal: AbortSignal
  ) {
    this.entries = delivered.map(({ payload, provenance }) => ({ payload, provenance }));
    this.correction = output.mergePolicy(this.entries.map((entry) => entry.payload));
  }

  pending(node: ValueNode): readonly PendingCorrection[] {
    this.assertInput(node);
    return node.getPending();
  }

  mutate<T>(node: ValueNode<T>, payload: T): void {
    this.assertInput(node);
    // Only what this phase could see is resolved by its mutation
    const observed = node.getPending();
    this.effects.push({
      kind: 'mutate',
      node,
      apply: () => this.graph.mutate(node, payload, { resolves: observed }),
    });
  }

  recordCorrection(node: ValueNode, payload: unknown): void {
    this.assertInput(node);
    this.effects.push({ kind: 'record', node, payload });
  }

  get stagedCount(): number {
    return this.effects.length;
  }

  /**
   * Apply staged effects in call order. Must run inside a revision scope.
   * Returns the nodes that received a correction.
   */
  commit(): ValueNode[] {
    this.seal();
    const recorded = new Map<string, ValueNode>();
    for (const effect of this.effects) {
      if (effect.kind === 'mutate') {
        effect.apply();
      } else {
        this.graph.recordCorrection(effect.node, effect.payload, this.frame.id);
        recorded.set(effect.node.id, effect.node);
      }
    }
    return [...recorded.values()];
  }

  discard(): void {
    this.seal();
    this.effects = [];
  }

  private seal(): void {
    if (this.sealed) {
      throw new ValidationError(`Revision of frame ${this.frame.id} was already committed or discarded`, {
        frameId: this.frame.id,
      });
    }
    this.sealed = true;
  }

  private assertInput(node: ValueNode): void {
    if (this.sealed) {
      throw new ValidationError(`Revision of frame ${this.frame.id} is closed`, {
        frameId: this.frame.id,
        nodeId: node.id,
      });
    }
    if (!this.frame.hasInput(node)) {
      throw new ValidationError(`Node ${node.id} is not an input of frame ${this.frame.id}`, {
        frameId: this.frame.id,
        nodeId: node.id,
      });
    }
  }
}
