/**
 * Leaf Reviser
 * Applies the corrections waiting on nodes by asking the LLM for a revised
 * payload. The optimiser step over leaf parameters.
 */

import { z } from 'zod';
import { ValidationError, type Schema } from '@errata/shared';
import type { ValueNode } from '../graph/value-node.js';
import { capabilityField, defineModule } from '../module/fields.js';
import { ReasoningModule } from '../module/reasoning-module.js';

export const LEAF_REVISER = defineModule(
  'LeafReviser',
  z.object({
    llm: capabilityField(),
  })
);

export type LeafReviserConfig = z.input<typeof LEAF_REVISER.schema>;

export interface RevisionReport {
  nodeId: string;
  revised: boolean;
  resolved: number;
}

export class LeafReviser extends ReasoningModule<typeof LEAF_REVISER.schema> {
  constructor(config: LeafReviserConfig) {
    super(LEAF_REVISER, config);
  }

  /**
   * Revise every node that has pending corrections, one at a time. The whole
   * batch is refused if any node is derived.
   */
  async revise(nodes: readonly ValueNode[]): Promise<RevisionReport[]> {
    nodes.forEach(assertLeaf);
    const reports: RevisionReport[] = [];
    for (const node of nodes) {
      reports.push(await this.reviseNode(node, z.unknown()));
    }
    return reports;
  }

  /**
   * Revise one node; the LLM's answer must satisfy the payload schema
   */
  async reviseNode<T>(node: ValueNode<T>, schema: Schema<T>): Promise<RevisionReport> {
    assertLeaf(node);
    const observed = node.getPending();
    if (observed.length === 0) {
      return { nodeId: node.id, revised: false, resolved: 0 };
    }

    const update = await this.fields.llm.complete(
      {
        task:
          'You are maintaining the DATA, which is an instance of DATATYPE. ' +
          'The ERRATA applies to the DATA. ' +
          'Revise the DATA to resolve the ERRATA and return it as final_value. ' +
          'Make sure the revised DATA is an instance of the same DATATYPE.',
        sections: {
          DATA: node.value,
          DATATYPE: node.datatype,
          ERRATA: observed.map((entry) => entry.payload),
        },
      },
      z.object({ final_value: schema })
    );

    const parsed = schema.safeParse(update.final_value);
    if (!parsed.success) {
      throw new ValidationError(`Revised value for node ${node.id} does not match its type`, {
        nodeId: node.id,
        issues: parsed.error.issues,
      });
    }

    node.graph.withinRevision(() => node.graph.mutate(node, parsed.data, { resolves: observed }));
    this.logger.debug({ nodeId: node.id, resolved: observed.length }, 'Node revised');

    return { nodeId: node.id, revised: true, resolved: observed.length };
  }
}

// Corrections on a derived node belong to its producer's backward phase
function assertLeaf(node: ValueNode): void {
  if (!node.isLeaf) {
    throw new ValidationError(`Node ${node.id} is derived; only leaf nodes can be revised`, {
      nodeId: node.id,
      frameId: node.producer?.id,
    });
  }
}
