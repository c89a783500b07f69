/**
 * Value Cache: remembers the last value loaded into it
 */

import { z } from 'zod';
import type { ValueNode } from '../graph/value-node.js';
import { defineModule, nodeField } from '../module/fields.js';
import type { InvokeOptions } from '../module/types.js';
import { BaseCache } from './base-cache.js';

export const VALUE_CACHE = defineModule(
  'ValueCache',
  z.object({
    context: nodeField(z.unknown()),
  })
);

export type ValueCacheConfig = z.input<typeof VALUE_CACHE.schema>;

export class ValueCache extends BaseCache<typeof VALUE_CACHE.schema, unknown> {
  constructor(config: ValueCacheConfig) {
    super(VALUE_CACHE, config);
    this.setContext(this.fields.context);
  }

  /**
   * Replace the context with the item. A correction on the new context is
   * passed on to the item it came from.
   */
  async load(item: ValueNode, options: InvokeOptions = {}): Promise<ValueNode> {
    const previous = this.sync() ?? this.fields.context;
    const context = await this.invoke(
      {
        name: 'load',
        datatype: item.datatype,
        forward: async (ctx) => ctx.inputs.item.value,
        backward: async (ctx) => {
          ctx.recordCorrection(ctx.inputs.item, ctx.correction);
        },
      },
      { previous, item },
      options
    );

    this.setContext(context);
    return context;
  }
}
