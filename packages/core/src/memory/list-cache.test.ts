/**
 * List Cache Tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { ValidationError } from '@errata/shared';
import { Correction } from '../correction/correction.js';
import { GraphRegistry } from '../graph/graph-registry.js';
import { createDefaultModuleRegistry } from '../module/builtins.js';
import { PropagationDriver } from '../propagation/propagation-driver.js';
import { FRAME_STATES } from '../state-machine/index.js';
import { LIST_CONTEXT_DATATYPE, ListCache } from './list-cache.js';

describe('ListCache', () => {
  let graph: GraphRegistry;

  beforeEach(() => {
    graph = new GraphRegistry();
  });

  it('should start empty', () => {
    const cache = new ListCache({ size: 2 });

    expect(cache.sync()).toBeNull();
    expect(cache.size).toBe(2);
    expect(cache.serialize()).toEqual({ type: 'ListCache', fields: { size: 2 } });
  });

  it('should reject a size below one', () => {
    expect(() => new ListCache({ size: 0 })).toThrow(ValidationError);
  });

  it('should keep the most recent items up to its size', async () => {
    const cache = new ListCache({ size: 2 });

    const first = await cache.load(graph.leaf('Note', 'a'));
    const second = await cache.load(graph.leaf('Note', 'b'));
    const third = await cache.load(graph.leaf('Note', 'c'));

    expect(first.value).toEqual(['a']);
    expect(second.value).toEqual(['a', 'b']);
    expect(third.value).toEqual(['b', 'c']);
    expect(third.datatype).toBe(LIST_CONTEXT_DATATYPE);
    expect(cache.sync()).toBe(third);
  });

  it('should create the first context in the graph of the item', async () => {
    const cache = new ListCache({ size: 3 });

    const context = await cache.load(graph.leaf('Note', 'a'));

    expect(graph.owns(context)).toBe(true);
    expect(context.producer?.inputNames).toEqual(['item']);
  });

  it('should stop a correction at the cached list', async () => {
    const cache = new ListCache({ size: 2 });
    const item = graph.leaf('Note', 'a');
    const context = await cache.load(item);

    expect(context.producer?.getState()).toBe(FRAME_STATES.FORWARD_ONLY);

    const outcome = await new PropagationDriver({ graph }).propagate(Correction.for(context, 'drop a'));

    expect(outcome.resumed).toEqual([]);
    expect(outcome.skipped).toEqual([{ nodeId: context.id, reason: 'frame-forward-only' }]);
    expect(item.hasPending()).toBe(false);
  });

  it('should serialize its context and carry on after reconstruction', async () => {
    const cache = new ListCache({ size: 2 });
    await cache.load(graph.leaf('Note', 'a'));
    await cache.load(graph.leaf('Note', 'b'));
    const serialized = cache.serialize();

    expect(serialized).toEqual({
      type: 'ListCache',
      fields: { size: 2, context: { $node: { datatype: LIST_CONTEXT_DATATYPE, value: ['a', 'b'] } } },
    });

    const other = new GraphRegistry();
    const rebuilt = createDefaultModuleRegistry().reconstruct(serialized, { graph: other });

    expect(rebuilt).toBeInstanceOf(ListCache);
    if (!(rebuilt instanceof ListCache)) return;
    const next = await rebuilt.load(other.leaf('Note', 'c'));
    expect(next.value).toEqual(['b', 'c']);
    expect(other.owns(next)).toBe(true);
  });
});
