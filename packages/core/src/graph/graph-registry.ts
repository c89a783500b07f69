/**
 * Graph Registry
 * Owns the value nodes and invocation frames of one reasoning graph:
 * - Node creation with an immutable producer reference
 * - In-place mutation, only inside a revision scope
 * - Pending correction bookkeeping
 * - Snapshot and restore of the graph structure
 */

import { EventEmitter } from 'eventemitter3';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import {
  CycleDetectedError,
  GraphError,
  ValidationError,
  createChildLogger,
  getConfig,
} from '@errata/shared';
import { mergePolicyByName, type MergePolicy } from '../correction/merge-policies.js';
import { InvocationFrame } from '../frame/invocation-frame.js';
import { FRAME_STATES, type FrameState } from '../state-machine/index.js';
import { ValueNode, type PendingCorrection } from './value-node.js';

export interface GraphEvents {
  'node:created': (node: ValueNode) => void;
  'node:mutated': (node: ValueNode, previous: unknown) => void;
  'correction:recorded': (node: ValueNode, entry: PendingCorrection) => void;
  'frame:opened': (frame: InvocationFrame) => void;
}

export interface GraphRegistryOptions {
  id?: string;
  /** Merge policy for nodes that do not name their own */
  mergePolicy?: MergePolicy;
}

export interface CreateNodeOptions {
  datatype: string;
  producer?: InvocationFrame | null;
  mergePolicy?: MergePolicy;
}

export interface OpenFrameOptions {
  moduleType: string;
  operation: string;
  inputs: readonly ValueNode[];
  inputNames: readonly string[];
}

export interface MutateOptions {
  /** Pending corrections the mutating party observed; they are cleared */
  resolves?: readonly PendingCorrection[];
}

const pendingSnapshotSchema = z.object({
  payload: z.unknown(),
  provenance: z.string().nullable(),
});

const graphSnapshotSchema = z.object({
  version: z.literal(1),
  nodes: z.array(
    z.object({
      id: z.string().min(1),
      datatype: z.string(),
      value: z.unknown(),
      producerId: z.string().nullable(),
      pending: z.array(pendingSnapshotSchema).default([]),
    })
  ),
  frames: z.array(
    z.object({
      id: z.string().min(1),
      moduleType: z.string(),
      operation: z.string(),
      inputIds: z.array(z.string()),
      inputNames: z.array(z.string()),
      outputId: z.string().nullable(),
      state: z.nativeEnum(FRAME_STATES),
    })
  ),
});

export type GraphSnapshot = z.infer<typeof graphSnapshotSchema>;

type NodeSnapshot = GraphSnapshot['nodes'][number];
type FrameSnapshot = GraphSnapshot['frames'][number];

export class GraphRegistry extends EventEmitter<GraphEvents> {
  readonly id: string;
  private readonly defaultMergePolicy: MergePolicy;
  private readonly nodeIndex = new Map<string, ValueNode>();
  private readonly frameIndex = new Map<string, InvocationFrame>();
  private revisionDepth = 0;
  private logger = createChildLogger({ component: 'GraphRegistry' });

  constructor(options: GraphRegistryOptions = {}) {
    super();
    this.id = options.id ?? uuidv4();
    this.defaultMergePolicy =
      options.mergePolicy ?? mergePolicyByName(getConfig().propagation.defaultMergePolicy);
  }

  // ===========================================
  // Nodes
  // ===========================================

  leaf<T>(datatype: string, payload: T, options: { mergePolicy?: MergePolicy } = {}): ValueNode<T> {
    return this.create(payload, { datatype, mergePolicy: options.mergePolicy });
  }

  create<T>(payload: T, options: CreateNodeOptions): ValueNode<T> {
    const producer = options.producer ?? null;

    if (producer) {
      this.assertOwnsFrame(producer);
      if (producer.getState() !== FRAME_STATES.FORWARD) {
        throw new GraphError(
          `Frame ${producer.id} is ${producer.getState()} and cannot produce a node`,
          'E4004',
          { frameId: producer.id }
        );
      }
    }

    const node = new ValueNode<T>({
      datatype: options.datatype,
      payload,
      producer,
      mergePolicy: options.mergePolicy ?? this.defaultMergePolicy,
      graph: this,
    });

    producer?.attachOutput(node);
    this.nodeIndex.set(node.id, node);
    this.emit('node:created', node);

    return node;
  }

  /**
   * Replace a node's payload. Only legal inside withinRevision().
   */
  mutate<T>(node: ValueNode<T>, payload: T, options: MutateOptions = {}): void {
    this.assertOwnsNode(node);

    if (this.revisionDepth === 0) {
      throw new GraphError('Nodes can only be mutated inside a revision scope', 'E4002', {
        nodeId: node.id,
      });
    }

    const previous = node.applyPayload(payload);
    const resolved = options.resolves ? node.resolvePending(options.resolves) : 0;

    this.logger.debug({ nodeId: node.id, datatype: node.datatype, resolved }, 'Node mutated');
    this.emit('node:mutated', node, previous);
  }

  recordCorrection(node: ValueNode, payload: unknown, provenance: string | null = null): PendingCorrection {
    this.assertOwnsNode(node);
    const entry = node.appendPending(payload, provenance);
    this.emit('correction:recorded', node, entry);
    return entry;
  }

  drainPending(node: ValueNode): PendingCorrection[] {
    this.assertOwnsNode(node);
    return node.drainPending();
  }

  /**
   * Run fn with mutation allowed. The scope is synchronous so an awaiting
   * caller cannot carry the permission across an await.
   */
  withinRevision<T>(fn: () => T): T {
    this.revisionDepth++;
    try {
      return fn();
    } finally {
      this.revisionDepth--;
    }
  }

  isRevising(): boolean {
    return this.revisionDepth > 0;
  }

  // ===========================================
  // Frames
  // ===========================================

  openFrame(options: OpenFrameOptions): InvocationFrame {
    for (const input of options.inputs) {
      this.assertOwnsNode(input);
    }

    const frame = new InvocationFrame({ ...options, graphId: this.id });
    this.frameIndex.set(frame.id, frame);
    this.emit('frame:opened', frame);
    return frame;
  }

  // ===========================================
  // Lookup
  // ===========================================

  get(id: string): ValueNode | undefined {
    return this.nodeIndex.get(id);
  }

  getFrame(id: string): InvocationFrame | undefined {
    return this.frameIndex.get(id);
  }

  nodes(): ValueNode[] {
    return [...this.nodeIndex.values()].sort((a, b) => a.sequence - b.sequence);
  }

  frames(): InvocationFrame[] {
    return [...this.frameIndex.values()];
  }

  owns(node: ValueNode): boolean {
    return node.graph === this && this.nodeIndex.get(node.id) === node;
  }

  // ===========================================
  // Snapshot
  // ===========================================

  snapshot(): GraphSnapshot {
    return {
      version: 1,
      nodes: this.nodes().map((node) => ({
        id: node.id,
        datatype: node.datatype,
        value: node.value,
        producerId: node.producer?.id ?? null,
        pending: node.getPending().map((entry) => ({
          payload: entry.payload,
          provenance: entry.provenance,
        })),
      })),
      frames: this.frames().map((frame) => ({
        id: frame.id,
        moduleType: frame.moduleType,
        operation: frame.operation,
        inputIds: frame.inputs.map((input) => input.id),
        inputNames: [...frame.inputNames],
        outputId: frame.getOutput()?.id ?? null,
        state: frame.getState(),
      })),
    };
  }

  /**
   * Rebuild a snapshot into a new registry. Backward phases do not travel,
   * so every frame that could still resume comes back exhausted.
   */
  static restore(snapshot: unknown, options: GraphRegistryOptions = {}): GraphRegistry {
    const parsed = graphSnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new ValidationError('Invalid graph snapshot', { issues: parsed.error.issues });
    }

    const { nodes, frames } = parsed.data;
    const nodeById = new Map(nodes.map((n) => [n.id, n]));
    const frameById = new Map(frames.map((f) => [f.id, f]));
    validateReferences(nodes, frames, nodeById, frameById);

    const order = topologicalOrder(nodes, nodeById, frameById);
    const graph = new GraphRegistry(options);

    for (const snap of order) {
      let producer: InvocationFrame | null = null;
      const producerSnap = snap.producerId === null ? undefined : frameById.get(snap.producerId);
      if (producerSnap) {
        producer = graph.restoreFrame(producerSnap);
      }

      const node = new ValueNode<unknown>({
        id: snap.id,
        datatype: snap.datatype,
        payload: snap.value,
        producer,
        mergePolicy: graph.defaultMergePolicy,
        graph,
      });
      producer?.attachOutput(node);
      for (const entry of snap.pending) {
        node.appendPending(entry.payload, entry.provenance);
      }
      graph.nodeIndex.set(node.id, node);
    }

    // Frames without an output (failed forward phases)
    for (const frameSnap of frames) {
      if (!graph.frameIndex.has(frameSnap.id)) {
        graph.restoreFrame(frameSnap);
      }
    }

    graph.logger.info({ nodes: nodes.length, frames: frames.length }, 'Graph restored from snapshot');
    return graph;
  }

  private restoreFrame(snap: FrameSnapshot): InvocationFrame {
    const inputs = snap.inputIds.map((id) => {
      const input = this.nodeIndex.get(id);
      if (!input) {
        throw new ValidationError(`Snapshot frame ${snap.id} references unknown input ${id}`, {
          frameId: snap.id,
        });
      }
      return input;
    });

    const frame = new InvocationFrame({
      id: snap.id,
      moduleType: snap.moduleType,
      operation: snap.operation,
      inputs,
      inputNames: snap.inputNames,
      graphId: this.id,
      initialState: restoredState(snap.state),
    });
    this.frameIndex.set(frame.id, frame);
    return frame;
  }

  // ===========================================
  // Guards
  // ===========================================

  private assertOwnsNode(node: ValueNode): void {
    if (!this.owns(node)) {
      throw new ValidationError(`Node ${node.id} does not belong to graph ${this.id}`, {
        nodeId: node.id,
      });
    }
  }

  private assertOwnsFrame(frame: InvocationFrame): void {
    if (frame.graphId !== this.id || this.frameIndex.get(frame.id) !== frame) {
      throw new ValidationError(`Frame ${frame.id} does not belong to graph ${this.id}`, {
        frameId: frame.id,
      });
    }
  }
}

function restoredState(state: FrameState): FrameState {
  if (state === FRAME_STATES.FORWARD_ONLY || state === FRAME_STATES.FAILED) {
    return state;
  }
  return FRAME_STATES.EXHAUSTED;
}

function validateReferences(
  nodes: readonly NodeSnapshot[],
  frames: readonly FrameSnapshot[],
  nodeById: ReadonlyMap<string, NodeSnapshot>,
  frameById: ReadonlyMap<string, FrameSnapshot>
): void {
  for (const node of nodes) {
    if (node.producerId === null) continue;
    const frame = frameById.get(node.producerId);
    if (!frame) {
      throw new ValidationError(`Snapshot node ${node.id} references unknown frame ${node.producerId}`, {
        nodeId: node.id,
      });
    }
    if (frame.outputId !== node.id) {
      throw new ValidationError(`Snapshot frame ${frame.id} does not list node ${node.id} as its output`, {
        nodeId: node.id,
        frameId: frame.id,
      });
    }
  }

  for (const frame of frames) {
    if (frame.inputIds.length !== frame.inputNames.length) {
      throw new ValidationError(`Snapshot frame ${frame.id} has mismatched input names`, {
        frameId: frame.id,
      });
    }
    for (const id of [...frame.inputIds, ...(frame.outputId === null ? [] : [frame.outputId])]) {
      if (!nodeById.has(id)) {
        throw new ValidationError(`Snapshot frame ${frame.id} references unknown node ${id}`, {
          frameId: frame.id,
        });
      }
    }
  }
}

/**
 * Depth-first post-order over node → producer → inputs. A back edge means
 * the producer relation closes a cycle.
 */
function topologicalOrder(
  nodes: readonly NodeSnapshot[],
  nodeById: ReadonlyMap<string, NodeSnapshot>,
  frameById: ReadonlyMap<string, FrameSnapshot>
): NodeSnapshot[] {
  const order: NodeSnapshot[] = [];
  const done = new Set<string>();
  const onPath = new Set<string>();

  const visit = (node: NodeSnapshot, path: string[]): void => {
    if (done.has(node.id)) return;
    if (onPath.has(node.id)) {
      throw new CycleDetectedError([...path.slice(path.indexOf(node.id)), node.id], { nodeId: node.id });
    }

    onPath.add(node.id);
    const producer = node.producerId === null ? undefined : frameById.get(node.producerId);
    for (const inputId of producer?.inputIds ?? []) {
      const input = nodeById.get(inputId);
      if (input) visit(input, [...path, node.id]);
    }
    onPath.delete(node.id);

    done.add(node.id);
    order.push(node);
  };

  for (const node of nodes) {
    visit(node, []);
  }
  return order;
}

// ===========================================
// Default graph
// ===========================================

let defaultGraph: GraphRegistry | null = null;

export function getDefaultGraph(): GraphRegistry {
  if (!defaultGraph) {
    defaultGraph = new GraphRegistry();
  }
  return defaultGraph;
}

// Reset default graph (for testing)
export function resetDefaultGraph(): void {
  defaultGraph?.removeAllListeners();
  defaultGraph = null;
}
