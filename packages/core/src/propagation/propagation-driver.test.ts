/**
 * Propagation Driver Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ValidationError } from '@errata/shared';
import { ScratchModule } from '../__tests__/scratch-module.js';
import { Correction } from '../correction/correction.js';
import { collectPayloads, shallowMerge } from '../correction/merge-policies.js';
import type { InvocationFrame } from '../frame/invocation-frame.js';
import { GraphRegistry } from '../graph/graph-registry.js';
import type { ValueNode } from '../graph/value-node.js';
import type { BackwardContext, NodeInputs } from '../module/types.js';
import { FRAME_STATES } from '../state-machine/index.js';
import { PropagationDriver, propagate } from './propagation-driver.js';
import type { NodeStateChange } from './types.js';

function producerOf(node: ValueNode): InvocationFrame {
  if (!node.producer) {
    throw new Error(`Node ${node.id} has no producer`);
  }
  return node.producer;
}

function payloads(node: ValueNode): unknown[] {
  return node.getPending().map((entry) => entry.payload);
}

describe('PropagationDriver', () => {
  let graph: GraphRegistry;
  let driver: PropagationDriver;
  let scratch: ScratchModule;

  /** Operation whose output is its input text with a suffix */
  function step<I extends NodeInputs>(
    name: string,
    inputs: I,
    backward?: (ctx: BackwardContext<I, string>) => Promise<void>
  ): Promise<ValueNode<string>> {
    return scratch.run(
      {
        name,
        datatype: 'Text',
        forward: async () => `${name}-out`,
        backward,
      },
      inputs
    );
  }

  beforeEach(() => {
    graph = new GraphRegistry({ mergePolicy: collectPayloads });
    driver = new PropagationDriver({ graph });
    scratch = new ScratchModule();
  });

  describe('chains', () => {
    it('should resume each frame from the target back to the leaves', async () => {
      const seen: unknown[] = [];
      const a = graph.leaf('Text', 'seed');
      const b = await step('first', { a }, async (ctx) => {
        seen.push(ctx.correction);
        ctx.recordCorrection(ctx.inputs.a, 'fix a');
      });
      const c = await step('second', { b }, async (ctx) => {
        seen.push(ctx.correction);
        ctx.recordCorrection(ctx.inputs.b, 'fix b');
      });

      const outcome = await driver.propagate(Correction.for(c, 'too long'));

      expect(outcome.status).toBe('completed');
      expect(outcome.resumed).toEqual([producerOf(c).id, producerOf(b).id]);
      expect(seen).toEqual([['too long'], ['fix b']]);
      expect(outcome.skipped).toEqual([{ nodeId: a.id, reason: 'leaf' }]);
      expect(outcome.failures).toEqual([]);
      expect(outcome.deferred).toEqual([]);
      expect(outcome.nodeStates).toEqual({ [c.id]: 'done', [b.id]: 'done', [a.id]: 'done' });
    });

    it('should keep corrections that reach a leaf pending', async () => {
      const a = graph.leaf('Text', 'seed');
      const b = await step('first', { a }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.a, 'fix a');
      });

      await driver.propagate(Correction.for(b, 'wrong'));

      expect(a.getPending().map(({ payload, provenance }) => ({ payload, provenance }))).toEqual([
        { payload: 'fix a', provenance: producerOf(b).id },
      ]);
    });

    it('should exhaust resumed frames so a later pass skips them', async () => {
      const a = graph.leaf('Text', 'seed');
      const backward = vi.fn(async () => undefined);
      const b = await step('first', { a }, backward);

      await driver.propagate(Correction.for(b, 'once'));
      const second = await driver.propagate(Correction.for(b, 'again'));

      expect(backward).toHaveBeenCalledTimes(1);
      expect(producerOf(b).getState()).toBe(FRAME_STATES.EXHAUSTED);
      expect(second.resumed).toEqual([]);
      expect(second.skipped).toEqual([{ nodeId: b.id, reason: 'frame-exhausted' }]);
      expect(payloads(b)).toEqual(['again']);
    });

    it('should skip forward-only frames and keep their corrections', async () => {
      const a = graph.leaf('Text', 'seed');
      const b = await step('plain', { a });
      const c = await step('second', { b }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.b, 'fix b');
      });

      const outcome = await driver.propagate(Correction.for(c, 'wrong'));

      expect(outcome.skipped).toEqual([{ nodeId: b.id, reason: 'frame-forward-only' }]);
      expect(payloads(b)).toEqual(['fix b']);
    });
  });

  describe('merging', () => {
    it('should deliver every correction for a node in one resumption', async () => {
      const mid = vi.fn(async (_ctx: BackwardContext<{ s: ValueNode<string> }, string>) => undefined);
      const s = graph.leaf('Text', 'seed');
      const m = await step('mid', { s }, mid);
      const x = await step('left', { m }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.m, 'from-x');
      });
      const y = await step('right', { m }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.m, 'from-y');
      });
      const w = await step('join', { x, y }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.x, 'x is off');
        ctx.recordCorrection(ctx.inputs.y, 'y is off');
      });

      const outcome = await driver.propagate(Correction.for(w, 'wrong'));

      expect(outcome.resumed).toEqual([producerOf(w).id, producerOf(y).id, producerOf(x).id, producerOf(m).id]);
      expect(mid).toHaveBeenCalledTimes(1);
      expect(mid.mock.calls[0]?.[0].correction).toEqual(['from-y', 'from-x']);
      expect(mid.mock.calls[0]?.[0].entries.map((entry) => entry.provenance)).toEqual([
        producerOf(y).id,
        producerOf(x).id,
      ]);
      expect(outcome.nodeStates).toEqual({
        [w.id]: 'done',
        [y.id]: 'done',
        [x.id]: 'done',
        [m.id]: 'done',
      });
    });

    it('should seed every target of a combined correction', async () => {
      const s = graph.leaf('Text', 'seed');
      const left = await step('left', { s }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.s, 'from-left');
      });
      const right = await step('right', { s }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.s, 'from-right');
      });

      const outcome = await driver.propagate(Correction.for(left, 'l').combine(Correction.for(right, 'r')));

      expect(outcome.resumed).toEqual([producerOf(right).id, producerOf(left).id]);
      expect(payloads(s)).toEqual(['from-right', 'from-left']);
    });
  });

  describe('failures', () => {
    it('should isolate a failing backward phase and drop its staged effects', async () => {
      const s = graph.leaf('Text', 'seed');
      const a = await step('ok', { s }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.s, 'from-a');
      });
      const b = await step('bad', { s }, async (ctx) => {
        ctx.mutate(ctx.inputs.s, 'changed');
        throw new Error('model refused');
      });
      const j = await step('join', { a, b }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.a, 'a is off');
        ctx.recordCorrection(ctx.inputs.b, 'b is off');
      });
      const failed = vi.fn();
      driver.on('frame:failed', failed);

      const outcome = await driver.propagate(Correction.for(j, 'wrong'), { passId: 'pass-1' });

      expect(outcome.status).toBe('completed');
      expect(outcome.resumed).toEqual([producerOf(j).id, producerOf(b).id, producerOf(a).id]);
      expect(outcome.failures).toHaveLength(1);
      expect(outcome.failures[0]?.frameId).toBe(producerOf(b).id);
      expect(outcome.failures[0]?.nodeId).toBe(b.id);
      expect(outcome.failures[0]?.message).toBe(`Backward phase of frame ${producerOf(b).id} failed: model refused`);
      expect(outcome.failures[0]?.context.passId).toBe('pass-1');
      expect(failed).toHaveBeenCalledWith('pass-1', outcome.failures[0]);
      expect(producerOf(b).getState()).toBe(FRAME_STATES.EXHAUSTED);
      expect(s.value).toBe('seed');
      expect(payloads(s)).toEqual(['from-a']);
    });

    it('should reject corrections aimed at nodes that are not inputs', async () => {
      const s = graph.leaf('Text', 'seed');
      const stranger = graph.leaf('Text', 'unrelated');
      const b = await step('first', { s }, async (ctx) => {
        ctx.recordCorrection(stranger, 'not mine');
      });

      const outcome = await driver.propagate(Correction.for(b, 'wrong'));

      expect(outcome.failures).toHaveLength(1);
      expect(outcome.failures[0]?.cause).toBeInstanceOf(ValidationError);
      expect(payloads(stranger)).toEqual([]);
    });

    it('should report a merge policy that rejects the delivered payloads', async () => {
      const objects = new GraphRegistry({ mergePolicy: shallowMerge });
      const s = objects.leaf('Text', 'seed');
      const backward = vi.fn(async () => undefined);
      const b = await step('first', { s }, backward);

      const outcome = await new PropagationDriver({ graph: objects }).propagate(Correction.for(b, 'not an object'));

      expect(backward).not.toHaveBeenCalled();
      expect(outcome.failures[0]?.cause).toBeInstanceOf(ValidationError);
      expect(producerOf(b).getState()).toBe(FRAME_STATES.EXHAUSTED);
    });
  });

  describe('seeding', () => {
    it('should refuse a correction that reaches into another graph before recording anything', async () => {
      const ours = graph.leaf('Text', 'ours');
      const theirs = new GraphRegistry().leaf('Text', 'theirs');
      const started = vi.fn();
      driver.on('pass:started', started);

      const correction = Correction.for(ours, 'fix ours').combine(Correction.for(theirs, 'fix theirs'));

      await expect(driver.propagate(correction)).rejects.toThrow(
        `Correction target ${theirs.id} does not belong to graph ${graph.id}`
      );
      expect(payloads(ours)).toEqual([]);
      expect(payloads(theirs)).toEqual([]);
      expect(started).not.toHaveBeenCalled();
    });
  });

  describe('events', () => {
    it('should report every node state change in order', async () => {
      const s = graph.leaf('Text', 'seed');
      const c = await step('first', { s }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.s, 'fix');
      });
      const changes: string[] = [];
      driver.on('node:state', (change: NodeStateChange) => {
        changes.push(`${change.nodeId === c.id ? 'c' : 's'}:${change.from}->${change.to}`);
      });

      await driver.propagate(Correction.for(c, 'wrong'));

      expect(changes).toEqual([
        'c:untouched->queued',
        'c:queued->delivered',
        'c:delivered->frame-resumed',
        's:untouched->queued',
        'c:frame-resumed->done',
        's:queued->done',
      ]);
    });

    it('should announce the pass and its outcome', async () => {
      const s = graph.leaf('Text', 'seed');
      const c = await step('first', { s }, async () => undefined);
      const started = vi.fn();
      const completed = vi.fn();
      driver.on('pass:started', started);
      driver.on('pass:completed', completed);

      const outcome = await driver.propagate(Correction.for(c, 'wrong'), { passId: 'pass-2' });

      expect(started).toHaveBeenCalledWith('pass-2', [c.id]);
      expect(completed).toHaveBeenCalledWith(outcome);
    });
  });

  describe('concurrency', () => {
    it('should block a second pass on a frame the first pass holds', async () => {
      const s = graph.leaf('Text', 'seed');
      let entered: () => void = () => undefined;
      const inside = new Promise<void>((resolve) => {
        entered = resolve;
      });
      let open: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        open = resolve;
      });
      const seen: unknown[] = [];
      const c = await step('slow', { s }, async (ctx) => {
        seen.push(ctx.correction);
        entered();
        await gate;
      });
      const frame = producerOf(c);

      const passA = driver.propagate(Correction.for(c, 'a'), { passId: 'pass-a' });
      await inside;
      const passB = driver.propagate(Correction.for(c, 'b'), { passId: 'pass-b' });

      expect(frame.lock.holder()).toBe('pass-a');
      expect(frame.lock.queueLength()).toBe(1);

      open();
      const [outcomeA, outcomeB] = await Promise.all([passA, passB]);

      expect(seen).toEqual([['a']]);
      expect(outcomeA.resumed).toEqual([frame.id]);
      expect(outcomeB.resumed).toEqual([]);
      expect(outcomeB.skipped).toEqual([{ nodeId: c.id, reason: 'frame-exhausted' }]);
      expect(payloads(c)).toEqual(['b']);
      expect(frame.lock.isLocked()).toBe(false);
    });
  });

  describe('cancellation', () => {
    it('should not resume anything when the signal is already aborted', async () => {
      const s = graph.leaf('Text', 'seed');
      const backward = vi.fn(async () => undefined);
      const c = await step('first', { s }, backward);
      const controller = new AbortController();
      controller.abort();
      const cancelled = vi.fn();
      driver.on('pass:cancelled', cancelled);

      const outcome = await driver.propagate(Correction.for(c, 'fix'), { signal: controller.signal });

      expect(outcome.status).toBe('cancelled');
      expect(outcome.resumed).toEqual([]);
      expect(outcome.nodeStates).toEqual({ [c.id]: 'queued' });
      expect(backward).not.toHaveBeenCalled();
      expect(producerOf(c).getState()).toBe(FRAME_STATES.SUSPENDED);
      expect(payloads(c)).toEqual(['fix']);
      expect(cancelled).toHaveBeenCalledWith(outcome);
    });

    it('should stop between frames and leave queued corrections for a later pass', async () => {
      const controller = new AbortController();
      const s = graph.leaf('Text', 'seed');
      const seen: unknown[] = [];
      const b = await step('first', { s }, async (ctx) => {
        seen.push(ctx.correction);
      });
      const c = await step('second', { b }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.b, 'b-fix');
        controller.abort();
      });

      const outcome = await driver.propagate(Correction.for(c, 'wrong'), { signal: controller.signal });

      expect(outcome.status).toBe('cancelled');
      expect(outcome.resumed).toEqual([producerOf(c).id]);
      expect(outcome.nodeStates).toEqual({ [c.id]: 'done', [b.id]: 'queued' });
      expect(payloads(b)).toEqual(['b-fix']);

      const resumed = await driver.propagate(Correction.for(b, 'more'));

      expect(resumed.resumed).toEqual([producerOf(b).id]);
      expect(seen).toEqual([['b-fix', 'more']]);
    });

    it('should abandon a lock wait when the signal aborts', async () => {
      const s = graph.leaf('Text', 'seed');
      const backward = vi.fn(async () => undefined);
      const c = await step('first', { s }, backward);
      const frame = producerOf(c);
      const release = await frame.lock.acquire('someone-else');
      const controller = new AbortController();

      const pass = driver.propagate(Correction.for(c, 'fix'), { signal: controller.signal });
      expect(frame.lock.queueLength()).toBe(1);
      controller.abort();
      const outcome = await pass;
      release();

      expect(outcome.status).toBe('cancelled');
      expect(outcome.nodeStates).toEqual({ [c.id]: 'queued' });
      expect(frame.lock.queueLength()).toBe(0);
      expect(backward).not.toHaveBeenCalled();
      expect(payloads(c)).toEqual(['fix']);
    });
  });

  describe('propagate()', () => {
    it('should run in the graph of the correction targets', async () => {
      const s = graph.leaf('Text', 'seed');
      const c = await step('first', { s }, async (ctx) => {
        ctx.recordCorrection(ctx.inputs.s, 'fix');
      });

      const outcome = await propagate(Correction.for(c, 'wrong'));

      expect(outcome.resumed).toEqual([producerOf(c).id]);
      expect(payloads(s)).toEqual(['fix']);
    });
  });
});
