/**
 * Short-term memory
 * A cache holds a context node and replaces it with a new node on every
 * load. Each load is an operation, so the frames record how a context was
 * built from the previous one.
 */

import type { z } from 'zod';
import type { ValueNode } from '../graph/value-node.js';
import { ReasoningModule } from '../module/reasoning-module.js';
import type { InvokeOptions } from '../module/types.js';

export abstract class BaseCache<S extends z.AnyZodObject, C> extends ReasoningModule<S> {
  private current: ValueNode<C> | null = null;

  abstract load(item: ValueNode, options?: InvokeOptions): Promise<ValueNode<C>>;

  /**
   * The latest context. Caches here have no backing store, so there is
   * nothing to refresh.
   */
  sync(): ValueNode<C> | null {
    return this.current;
  }

  protected setContext(node: ValueNode<C>): void {
    this.current = node;
  }

  protected override currentFieldValues(): ReadonlyMap<string, unknown> {
    const values = new Map(super.currentFieldValues());
    if (this.current) {
      values.set('context', this.current);
    }
    return values;
  }
}
