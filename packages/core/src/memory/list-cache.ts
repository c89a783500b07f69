/**
 * List Cache: the most recent `size` items, oldest first
 */

import { z } from 'zod';
import type { ValueNode } from '../graph/value-node.js';
import { defineModule, nodeField } from '../module/fields.js';
import type { InvokeOptions, NodeInputs } from '../module/types.js';
import { BaseCache } from './base-cache.js';

export const LIST_CONTEXT_DATATYPE = 'Cached list';

export const LIST_CACHE = defineModule(
  'ListCache',
  z.object({
    size: z.number().int().positive(),
    context: nodeField(z.array(z.unknown())).optional(),
  })
);

export type ListCacheConfig = z.input<typeof LIST_CACHE.schema>;

export class ListCache extends BaseCache<typeof LIST_CACHE.schema, unknown[]> {
  constructor(config: ListCacheConfig) {
    super(LIST_CACHE, config);
    if (this.fields.context) {
      this.setContext(this.fields.context);
    }
  }

  get size(): number {
    return this.fields.size;
  }

  /**
   * Append the item to a new context, dropping the oldest entries beyond
   * `size`. The first load creates the context in the item's graph.
   *
   * Loads are forward-only: a correction on a cached list stops at the list.
   */
  async load(item: ValueNode, options: InvokeOptions = {}): Promise<ValueNode<unknown[]>> {
    const previous = this.sync();
    const size = this.fields.size;
    const inputs: NodeInputs = previous ? { previous, item } : { item };
    const context = await this.invoke(
      {
        name: 'load',
        datatype: LIST_CONTEXT_DATATYPE,
        forward: async () => [...(previous?.value ?? []), item.value].slice(-size),
      },
      inputs,
      options
    );

    this.logger.debug({ nodeId: context.id, entries: context.value.length }, 'List cache loaded');
    this.setContext(context);
    return context;
  }
}
