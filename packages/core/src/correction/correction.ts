/**
 * Correction: an immutable map from target node to the entries directed at it
 */

import type { ValueNode } from '../graph/value-node.js';

export interface CorrectionEntry {
  readonly payload: unknown;
  /** Frame whose backward phase produced the entry; null when caller-supplied */
  readonly provenance: string | null;
}

interface TargetEntries {
  readonly node: ValueNode;
  readonly entries: readonly CorrectionEntry[];
}

export class Correction {
  private constructor(private readonly byTarget: ReadonlyMap<string, TargetEntries>) {}

  static empty(): Correction {
    return new Correction(new Map());
  }

  static for(node: ValueNode, payload: unknown, provenance: string | null = null): Correction {
    return new Correction(new Map([[node.id, { node, entries: [{ payload, provenance }] }]]));
  }

  /**
   * Union of targets; per-target entries keep arrival order, this correction's first
   */
  combine(other: Correction): Correction {
    const merged = new Map<string, TargetEntries>(this.byTarget);
    for (const [id, target] of other.byTarget) {
      const existing = merged.get(id);
      merged.set(id, existing ? { node: existing.node, entries: [...existing.entries, ...target.entries] } : target);
    }
    return new Correction(merged);
  }

  targets(): ValueNode[] {
    return [...this.byTarget.values()].map((t) => t.node);
  }

  entriesFor(node: ValueNode): readonly CorrectionEntry[] {
    return this.byTarget.get(node.id)?.entries ?? [];
  }

  /**
   * The payload directed at node, folded by the node's merge policy
   */
  forNode(node: ValueNode): unknown {
    const target = this.byTarget.get(node.id);
    if (!target) return undefined;
    return node.mergePolicy(target.entries.map((e) => e.payload));
  }

  has(node: ValueNode): boolean {
    return this.byTarget.has(node.id);
  }

  get size(): number {
    return this.byTarget.size;
  }

  isEmpty(): boolean {
    return this.byTarget.size === 0;
  }
}

export function combine(a: Correction, b: Correction): Correction {
  return a.combine(b);
}

export function combineAll(...corrections: Correction[]): Correction {
  return corrections.reduce((acc, c) => acc.combine(c), Correction.empty());
}
