/**
 * ValueNode: a payload in the reasoning graph plus the corrections waiting on it
 */

import { v4 as uuidv4 } from 'uuid';
import type { MergePolicy } from '../correction/merge-policies.js';
import type { InvocationFrame } from '../frame/invocation-frame.js';
import type { GraphRegistry } from './graph-registry.js';

// Creation order is a topological order: a frame's inputs always exist
// before its output.
let nodeSequence = 0;
let correctionSequence = 0;

export interface PendingCorrection {
  readonly payload: unknown;
  readonly provenance: string | null;
  readonly sequence: number;
  readonly recordedAt: Date;
}

export interface ValueNodeInit<T> {
  id?: string;
  datatype: string;
  payload: T;
  producer: InvocationFrame | null;
  mergePolicy: MergePolicy;
  graph: GraphRegistry;
}

export class ValueNode<T = unknown> {
  readonly id: string;
  readonly sequence: number;
  readonly datatype: string;
  readonly producer: InvocationFrame | null;
  readonly mergePolicy: MergePolicy;
  readonly graph: GraphRegistry;
  readonly createdAt: Date;

  private payload: T;
  private pendingEntries: PendingCorrection[] = [];

  constructor(init: ValueNodeInit<T>) {
    this.id = init.id ?? uuidv4();
    this.sequence = ++nodeSequence;
    this.datatype = init.datatype;
    this.payload = init.payload;
    this.producer = init.producer;
    this.mergePolicy = init.mergePolicy;
    this.graph = init.graph;
    this.createdAt = new Date();
  }

  get value(): T {
    return this.payload;
  }

  get isLeaf(): boolean {
    return this.producer === null;
  }

  getPending(): readonly PendingCorrection[] {
    return [...this.pendingEntries];
  }

  hasPending(): boolean {
    return this.pendingEntries.length > 0;
  }

  // The methods below are driven by GraphRegistry, which owns mutation rules
  // and event emission.

  /** @internal */
  applyPayload(payload: T): T {
    const previous = this.payload;
    this.payload = payload;
    return previous;
  }

  /** @internal */
  appendPending(payload: unknown, provenance: string | null): PendingCorrection {
    const entry: PendingCorrection = {
      payload,
      provenance,
      sequence: ++correctionSequence,
      recordedAt: new Date(),
    };
    this.pendingEntries.push(entry);
    return entry;
  }

  /** @internal */
  drainPending(): PendingCorrection[] {
    const drained = this.pendingEntries;
    this.pendingEntries = [];
    return drained;
  }

  /** @internal Remove entries a mutating party had observed */
  resolvePending(observed: readonly PendingCorrection[]): number {
    const resolved = new Set(observed);
    const before = this.pendingEntries.length;
    this.pendingEntries = this.pendingEntries.filter((entry) => !resolved.has(entry));
    return before - this.pendingEntries.length;
  }
}
