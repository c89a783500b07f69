/**
 * Graph Registry Tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CycleDetectedError, GraphError, StateMachineError, ValidationError } from '@errata/shared';
import { concatText } from '../correction/merge-policies.js';
import { FRAME_STATES } from '../state-machine/index.js';
import { GraphRegistry } from './graph-registry.js';

describe('GraphRegistry', () => {
  let graph: GraphRegistry;

  beforeEach(() => {
    graph = new GraphRegistry();
  });

  describe('create()', () => {
    it('should create leaves without a producer', () => {
      const node = graph.leaf('Character', 'a unicorn named Rarity');

      expect(node.isLeaf).toBe(true);
      expect(node.producer).toBeNull();
      expect(node.value).toBe('a unicorn named Rarity');
      expect(node.datatype).toBe('Character');
      expect(graph.get(node.id)).toBe(node);
    });

    it('should number nodes in creation order', () => {
      const first = graph.leaf('Text', 'a');
      const second = graph.leaf('Text', 'b');

      expect(second.sequence).toBeGreaterThan(first.sequence);
      expect(graph.nodes()).toEqual([first, second]);
    });

    it('should bind a derived node to its producing frame', () => {
      const input = graph.leaf('Text', 'x');
      const frame = graph.openFrame({ moduleType: 'Test', operation: 'copy', inputs: [input], inputNames: ['text'] });

      const output = graph.create('y', { datatype: 'Text', producer: frame });

      expect(output.isLeaf).toBe(false);
      expect(output.producer).toBe(frame);
      expect(frame.getOutput()).toBe(output);
    });

    it('should refuse a producer that has left the forward phase', () => {
      const frame = graph.openFrame({ moduleType: 'Test', operation: 'noop', inputs: [], inputNames: [] });
      frame.fail();

      expect(() => graph.create('late', { datatype: 'Text', producer: frame })).toThrow(GraphError);
    });

    it('should give a frame exactly one output', () => {
      const input = graph.leaf('Text', 'x');
      const frame = graph.openFrame({ moduleType: 'Test', operation: 'copy', inputs: [input], inputNames: ['text'] });
      graph.create('y', { datatype: 'Text', producer: frame });

      expect(() => graph.create('z', { datatype: 'Text', producer: frame })).toThrow(StateMachineError);
      expect(graph.nodes()).toHaveLength(2);
    });

    it('should use the registry merge policy unless the node names one', () => {
      const textGraph = new GraphRegistry({ mergePolicy: concatText });
      const node = textGraph.leaf('Text', 'x');

      expect(node.mergePolicy).toBe(concatText);
    });

    it('should emit node:created', () => {
      const listener = vi.fn();
      graph.on('node:created', listener);

      const node = graph.leaf('Text', 'x');

      expect(listener).toHaveBeenCalledWith(node);
    });
  });

  describe('mutate()', () => {
    it('should reject mutation outside a revision scope', () => {
      const node = graph.leaf('Text', 'before');

      expect(() => graph.mutate(node, 'after')).toThrow(GraphError);
      expect(() => graph.mutate(node, 'after')).toThrow('Nodes can only be mutated inside a revision scope');
      expect(node.value).toBe('before');
    });

    it('should replace the payload inside a revision scope and emit node:mutated', () => {
      const node = graph.leaf('Text', 'before');
      const listener = vi.fn();
      graph.on('node:mutated', listener);

      graph.withinRevision(() => graph.mutate(node, 'after'));

      expect(node.value).toBe('after');
      expect(listener).toHaveBeenCalledWith(node, 'before');
      expect(graph.isRevising()).toBe(false);
    });

    it('should clear only the pending corrections the mutating party observed', () => {
      const node = graph.leaf('Text', 'draft');
      graph.recordCorrection(node, 'seen');
      const observed = node.getPending();
      graph.recordCorrection(node, 'arrived later');

      graph.withinRevision(() => graph.mutate(node, 'revised', { resolves: observed }));

      expect(node.getPending().map((entry) => entry.payload)).toEqual(['arrived later']);
    });

    it('should reject nodes owned by another graph', () => {
      const other = new GraphRegistry();
      const foreign = other.leaf('Text', 'x');

      expect(() => graph.withinRevision(() => graph.mutate(foreign, 'y'))).toThrow(ValidationError);
    });
  });

  describe('recordCorrection()', () => {
    it('should append to the pending set in arrival order', () => {
      const node = graph.leaf('Text', 'x');

      graph.recordCorrection(node, 'first');
      graph.recordCorrection(node, 'second', 'frame-7');

      expect(node.getPending().map(({ payload, provenance }) => ({ payload, provenance }))).toEqual([
        { payload: 'first', provenance: null },
        { payload: 'second', provenance: 'frame-7' },
      ]);
    });

    it('should empty the pending set on drain', () => {
      const node = graph.leaf('Text', 'x');
      graph.recordCorrection(node, 'fix');

      const drained = graph.drainPending(node);

      expect(drained.map((entry) => entry.payload)).toEqual(['fix']);
      expect(node.hasPending()).toBe(false);
    });
  });

  describe('snapshot() / restore()', () => {
    it('should restore structure, payloads and pending corrections', () => {
      const input = graph.leaf('Text', 'draft');
      const frame = graph.openFrame({ moduleType: 'Test', operation: 'copy', inputs: [input], inputNames: ['text'] });
      const output = graph.create('copy of draft', { datatype: 'Text', producer: frame });
      frame.suspend(async () => undefined);
      graph.recordCorrection(output, 'too long');

      const restored = GraphRegistry.restore(JSON.parse(JSON.stringify(graph.snapshot())));

      const restoredOutput = restored.get(output.id);
      expect(restoredOutput?.value).toBe('copy of draft');
      expect(restoredOutput?.getPending().map((entry) => entry.payload)).toEqual(['too long']);
      expect(restoredOutput?.producer?.id).toBe(frame.id);
      expect(restoredOutput?.producer?.inputs[0]).toBe(restored.get(input.id));
      expect(restoredOutput?.producer?.getState()).toBe(FRAME_STATES.EXHAUSTED);
      expect(restored.get(input.id)?.isLeaf).toBe(true);
    });

    it('should keep failed and forward-only frames as they were', () => {
      const failed = graph.openFrame({ moduleType: 'Test', operation: 'broken', inputs: [], inputNames: [] });
      failed.fail();

      const restored = GraphRegistry.restore(graph.snapshot());

      expect(restored.getFrame(failed.id)?.getState()).toBe(FRAME_STATES.FAILED);
      expect(restored.getFrame(failed.id)?.getOutput()).toBeNull();
    });

    it('should raise CycleDetectedError when the producer relation closes a cycle', () => {
      const snapshot = {
        version: 1,
        nodes: [
          { id: 'n1', datatype: 'Text', value: 'a', producerId: 'f1', pending: [] },
          { id: 'n2', datatype: 'Text', value: 'b', producerId: 'f2', pending: [] },
        ],
        frames: [
          { id: 'f1', moduleType: 'Test', operation: 'op', inputIds: ['n2'], inputNames: ['x'], outputId: 'n1', state: 'suspended' },
          { id: 'f2', moduleType: 'Test', operation: 'op', inputIds: ['n1'], inputNames: ['x'], outputId: 'n2', state: 'suspended' },
        ],
      };

      try {
        GraphRegistry.restore(snapshot);
        expect.fail('expected a CycleDetectedError');
      } catch (error) {
        expect(error).toBeInstanceOf(CycleDetectedError);
        if (error instanceof CycleDetectedError) {
          expect(error.code).toBe('E4001');
          expect(error.path).toEqual(['n1', 'n2', 'n1']);
        }
      }
    });

    it('should reject a malformed snapshot', () => {
      expect(() => GraphRegistry.restore({ version: 2, nodes: [], frames: [] })).toThrow(ValidationError);
    });

    it('should reject a snapshot that references a missing frame', () => {
      const snapshot = {
        version: 1,
        nodes: [{ id: 'n1', datatype: 'Text', value: 'a', producerId: 'missing', pending: [] }],
        frames: [],
      };

      expect(() => GraphRegistry.restore(snapshot)).toThrow(ValidationError);
    });
  });
});
