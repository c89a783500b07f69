/**
 * Operation contract for reasoning modules
 */

import type { JsonObject, LLMCapability } from '@errata/shared';
import type { CorrectionEntry } from '../correction/correction.js';
import type { MergePolicy } from '../correction/merge-policies.js';
import type { InvocationFrame } from '../frame/invocation-frame.js';
import type { GraphRegistry } from '../graph/graph-registry.js';
import type { PendingCorrection, ValueNode } from '../graph/value-node.js';

export type NodeInputs = Record<string, ValueNode>;

export interface ForwardContext<I extends NodeInputs> {
  readonly inputs: I;
  readonly frame: InvocationFrame;
}

export interface BackwardContext<I extends NodeInputs, O> {
  readonly inputs: I;
  readonly output: ValueNode<O>;
  readonly frame: InvocationFrame;
  /** Correction for the output, merged by its merge policy */
  readonly correction: unknown;
  readonly entries: readonly CorrectionEntry[];
  readonly signal: AbortSignal;
  /** Corrections already waiting on an input */
  pending(input: ValueNode): readonly PendingCorrection[];
  mutate<T>(input: ValueNode<T>, payload: T): void;
  recordCorrection(input: ValueNode, payload: unknown): void;
}

export interface OperationSpec<I extends NodeInputs, O> {
  name: string;
  /** Datatype label of the output node */
  datatype: string;
  forward: (ctx: ForwardContext<I>) => Promise<O>;
  /** Without a backward phase the frame is forward-only */
  backward?: (ctx: BackwardContext<I, O>) => Promise<void>;
  mergePolicy?: MergePolicy;
}

export interface InvokeOptions {
  /** Graph for operations without inputs; defaults to the shared graph */
  graph?: GraphRegistry;
}

// ===========================================
// Serialized form
// ===========================================

export type SerializedModule = {
  type: string;
  fields: JsonObject;
};

export interface CapabilityResolver {
  get(name: string): LLMCapability | undefined;
}
