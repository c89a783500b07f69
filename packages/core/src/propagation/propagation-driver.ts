/**
 * Propagation Driver
 * Runs backward passes over a reasoning graph:
 * - Reverse topological order (highest creation sequence first)
 * - Each frame resumes at most once per pass, with one merged correction
 * - Per-frame locks block concurrent passes instead of skipping
 * - Backward failures are isolated and reported in the outcome
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import { BackwardFailureError, ValidationError, createChildLogger, logPassCompleted } from '@errata/shared';
import type { Correction } from '../correction/correction.js';
import type { InvocationFrame } from '../frame/invocation-frame.js';
import { getDefaultGraph, type GraphRegistry } from '../graph/graph-registry.js';
import type { ValueNode } from '../graph/value-node.js';
import type { ReleaseFn } from '../lock/frame-lock.js';
import {
  FRAME_STATES,
  NODE_PASS_STATES,
  nodePassTransitions,
  type FrameState,
  type NodePassState,
} from '../state-machine/index.js';
import { StagedRevision } from './staged-revision.js';
import type {
  NodeStateChange,
  PassStatus,
  PropagateOptions,
  PropagationEvents,
  PropagationOutcome,
  SkipReason,
  SkippedNode,
} from './types.js';

export interface PropagationDriverOptions {
  graph?: GraphRegistry;
}

interface PassContext {
  passId: string;
  signal: AbortSignal;
  queue: Map<string, ValueNode>;
  nodeStates: Map<string, NodePassState>;
  resumedFrames: Set<string>;
  resumed: string[];
  skipped: SkippedNode[];
  deferred: string[];
  failures: BackwardFailureError[];
  cancelled: boolean;
}

export class PropagationDriver extends EventEmitter<PropagationEvents> {
  readonly graph: GraphRegistry;
  private logger = createChildLogger({ component: 'PropagationDriver' });

  constructor(options: PropagationDriverOptions = {}) {
    super();
    this.graph = options.graph ?? getDefaultGraph();
  }

  /**
   * Run one backward pass seeded by a caller correction
   */
  async propagate(correction: Correction, options: PropagateOptions = {}): Promise<PropagationOutcome> {
    const startTime = Date.now();
    const ctx: PassContext = {
      passId: options.passId ?? uuidv4(),
      signal: options.signal ?? new AbortController().signal,
      queue: new Map(),
      nodeStates: new Map(),
      resumedFrames: new Set(),
      resumed: [],
      skipped: [],
      deferred: [],
      failures: [],
      cancelled: false,
    };

    const targets = correction.targets();
    const foreign = targets.find((target) => !this.graph.owns(target));
    if (foreign) {
      throw new ValidationError(`Correction target ${foreign.id} does not belong to graph ${this.graph.id}`, {
        passId: ctx.passId,
        nodeId: foreign.id,
      });
    }

    this.logger.info({ passId: ctx.passId, targets: targets.length }, 'Propagation pass started');
    this.emit('pass:started', ctx.passId, targets.map((t) => t.id));

    // Seed: every caller entry lands in its target's pending set
    for (const target of targets) {
      for (const entry of correction.entriesFor(target)) {
        this.graph.recordCorrection(target, entry.payload, entry.provenance);
      }
      this.enqueue(ctx, target);
    }

    while (ctx.queue.size > 0) {
      if (ctx.signal.aborted) {
        ctx.cancelled = true;
        break;
      }

      const node = this.dequeue(ctx);
      await this.visit(ctx, node);

      if (ctx.cancelled) break;
    }

    const status: PassStatus = ctx.cancelled ? 'cancelled' : 'completed';
    const outcome: PropagationOutcome = {
      passId: ctx.passId,
      status,
      resumed: ctx.resumed,
      skipped: ctx.skipped,
      deferred: ctx.deferred,
      failures: ctx.failures,
      nodeStates: Object.fromEntries(ctx.nodeStates),
    };

    logPassCompleted(ctx.passId, status, ctx.resumed.length, ctx.failures.length, Date.now() - startTime);
    if (status === 'cancelled') {
      this.emit('pass:cancelled', outcome);
    } else {
      this.emit('pass:completed', outcome);
    }

    return outcome;
  }

  private async visit(ctx: PassContext, node: ValueNode): Promise<void> {
    const frame = node.producer;
    if (!frame) {
      this.discard(ctx, node, 'leaf');
      return;
    }
    if (ctx.resumedFrames.has(frame.id)) {
      this.discard(ctx, node, 'already-resumed');
      return;
    }

    const skip = skipReasonFor(frame.getState());
    if (skip) {
      this.discard(ctx, node, skip);
      return;
    }

    let release: ReleaseFn;
    try {
      release = await frame.lock.acquire(ctx.passId, ctx.signal);
    } catch (error) {
      if (ctx.signal.aborted) {
        // Node stays queued with its pending corrections intact
        ctx.cancelled = true;
        return;
      }
      throw error;
    }

    try {
      // Another pass may have resumed the frame while this one waited
      const lockedSkip = skipReasonFor(frame.getState());
      if (lockedSkip) {
        this.discard(ctx, node, lockedSkip);
        return;
      }
      await this.resume(ctx, node, frame);
    } finally {
      release();
    }
  }

  private async resume(ctx: PassContext, node: ValueNode, frame: InvocationFrame): Promise<void> {
    const delivered = this.graph.drainPending(node);
    this.setState(ctx, node, NODE_PASS_STATES.DELIVERED);

    if (delivered.length === 0) {
      frame.exhaust();
      ctx.skipped.push({ nodeId: node.id, reason: 'no-corrections' });
      this.setState(ctx, node, NODE_PASS_STATES.DONE);
      return;
    }

    const handler = frame.beginResume();
    ctx.resumedFrames.add(frame.id);
    ctx.resumed.push(frame.id);
    this.setState(ctx, node, NODE_PASS_STATES.FRAME_RESUMED);
    this.emit('frame:resumed', ctx.passId, frame, node);

    let revision: StagedRevision | null = null;
    try {
      revision = new StagedRevision(this.graph, frame, node, delivered, ctx.signal);
      await handler(revision);

      const committed = revision;
      const touched = this.graph.withinRevision(() => committed.commit());
      for (const target of touched) {
        this.enqueue(ctx, target);
      }
    } catch (error) {
      if (revision && revision.stagedCount > 0) {
        this.logger.debug({ frameId: frame.id, discarded: revision.stagedCount }, 'Staged effects discarded');
      }
      const failure = new BackwardFailureError(frame.id, node.id, error, { passId: ctx.passId });
      ctx.failures.push(failure);
      this.logger.warn(
        { passId: ctx.passId, frameId: frame.id, nodeId: node.id, error: failure.message },
        'Backward phase failed'
      );
      this.emit('frame:failed', ctx.passId, failure);
    } finally {
      frame.exhaust();
      this.setState(ctx, node, NODE_PASS_STATES.DONE);
    }
  }

  /**
   * A node that receives a correction joins the queue, unless it already had
   * its turn in this pass; then the correction waits for a future pass.
   */
  private enqueue(ctx: PassContext, node: ValueNode): void {
    const state = ctx.nodeStates.get(node.id) ?? NODE_PASS_STATES.UNTOUCHED;

    switch (state) {
      case NODE_PASS_STATES.UNTOUCHED:
        this.setState(ctx, node, NODE_PASS_STATES.QUEUED);
        ctx.queue.set(node.id, node);
        break;
      case NODE_PASS_STATES.QUEUED:
        break;
      default:
        if (!ctx.deferred.includes(node.id)) {
          ctx.deferred.push(node.id);
        }
    }
  }

  private dequeue(ctx: PassContext): ValueNode {
    let next: ValueNode | null = null;
    for (const node of ctx.queue.values()) {
      if (next === null || node.sequence > next.sequence) {
        next = node;
      }
    }
    if (next === null) {
      throw new Error('dequeue called on an empty queue');
    }
    ctx.queue.delete(next.id);
    return next;
  }

  private discard(ctx: PassContext, node: ValueNode, reason: SkipReason): void {
    ctx.skipped.push({ nodeId: node.id, reason });
    this.setState(ctx, node, NODE_PASS_STATES.DONE);
  }

  private setState(ctx: PassContext, node: ValueNode, to: NodePassState): void {
    const from = ctx.nodeStates.get(node.id) ?? NODE_PASS_STATES.UNTOUCHED;
    nodePassTransitions.validateTransition(from, to, { passId: ctx.passId, nodeId: node.id });
    ctx.nodeStates.set(node.id, to);

    const change: NodeStateChange = { passId: ctx.passId, nodeId: node.id, from, to };
    this.emit('node:state', change);
  }
}

function skipReasonFor(state: FrameState): SkipReason | null {
  switch (state) {
    case FRAME_STATES.EXHAUSTED:
      return 'frame-exhausted';
    case FRAME_STATES.FORWARD_ONLY:
      return 'frame-forward-only';
    case FRAME_STATES.FAILED:
      return 'frame-failed';
    default:
      return null;
  }
}

/**
 * One pass over the graph the correction's targets live in
 */
export async function propagate(correction: Correction, options: PropagateOptions = {}): Promise<PropagationOutcome> {
  const [first] = correction.targets();
  const driver = new PropagationDriver({ graph: first?.graph });
  return driver.propagate(correction, options);
}
