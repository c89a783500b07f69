/**
 * Reasoning Module
 * Base class for reusable reasoning components. A module declares its
 * configuration fields with a zod object schema; its operations run through
 * invoke(), which records an invocation frame per call.
 */

import type { z } from 'zod';
import {
  ForwardFailureError,
  ValidationError,
  createChildLogger,
  type JsonObject,
  type Logger,
} from '@errata/shared';
import { getDefaultGraph, type GraphRegistry } from '../graph/graph-registry.js';
import type { ValueNode } from '../graph/value-node.js';
import type { Revision } from '../frame/types.js';
import { fieldNames, optionalFieldNames, parseFields, type ModuleDefinition } from './fields.js';
import { encodeField } from './serialization.js';
import type {
  BackwardContext,
  InvokeOptions,
  NodeInputs,
  OperationSpec,
  SerializedModule,
} from './types.js';

export abstract class ReasoningModule<S extends z.AnyZodObject = z.AnyZodObject> {
  readonly type: string;
  protected readonly fields: z.output<S>;
  protected readonly logger: Logger;

  private readonly definition: ModuleDefinition<S>;
  private readonly fieldValues: ReadonlyMap<string, unknown>;

  protected constructor(definition: ModuleDefinition<S>, input: z.input<S>) {
    const parsed = parseFields(definition.schema, input);
    if (!parsed.success) {
      throw new ValidationError(`Invalid configuration for module ${definition.type}`, {
        moduleType: definition.type,
        issues: parsed.error.issues,
      });
    }

    this.type = definition.type;
    this.definition = definition;
    this.fields = parsed.fields;
    this.fieldValues = parsed.values;
    this.logger = createChildLogger({ component: definition.type });
  }

  /**
   * Flat mapping of every declared field to its JSON form. Unset optional
   * fields are left out.
   */
  serialize(): SerializedModule {
    const fields: JsonObject = {};
    const optional = optionalFieldNames(this.definition);
    const values = this.currentFieldValues();
    for (const name of fieldNames(this.definition)) {
      const value = values.get(name);
      if (value === undefined && optional.includes(name)) {
        continue;
      }
      if (value === undefined) {
        throw new ValidationError(`Field ${this.type}.${name} has no value to serialise`, {
          moduleType: this.type,
          field: name,
        });
      }
      fields[name] = encodeField(value, `${this.type}.${name}`);
    }
    return { type: this.type, fields };
  }

  /**
   * Field values as they stand now. Modules whose state moves on after
   * construction override this so serialize() sees the latest state.
   */
  protected currentFieldValues(): ReadonlyMap<string, unknown> {
    return this.fieldValues;
  }

  /**
   * Run one operation: open a frame, compute the output, create the output
   * node and suspend the frame until a correction reaches it.
   */
  protected async invoke<I extends NodeInputs, O>(
    operation: OperationSpec<I, O>,
    inputs: I,
    options: InvokeOptions = {}
  ): Promise<ValueNode<O>> {
    const inputNames = Object.keys(inputs);
    const inputNodes = Object.values(inputs);
    const graph = this.resolveGraph(inputNodes, options.graph);
    const label = `${this.type}.${operation.name}`;

    const frame = graph.openFrame({
      moduleType: this.type,
      operation: operation.name,
      inputs: inputNodes,
      inputNames,
    });

    let output: ValueNode<O>;
    try {
      const payload = await operation.forward({ inputs, frame });
      output = graph.create(payload, {
        datatype: operation.datatype,
        producer: frame,
        mergePolicy: operation.mergePolicy,
      });
    } catch (error) {
      frame.fail();
      this.logger.warn(
        { frameId: frame.id, operation: label, error: error instanceof Error ? error.message : String(error) },
        'Forward phase failed'
      );
      throw new ForwardFailureError(label, error, { frameId: frame.id });
    }

    const backward = operation.backward;
    if (backward) {
      frame.suspend((revision) => backward(toBackwardContext(revision, inputs, output)));
    } else {
      frame.suspend();
    }

    return output;
  }

  private resolveGraph(inputs: readonly ValueNode[], explicit: GraphRegistry | undefined): GraphRegistry {
    const graph = explicit ?? inputs[0]?.graph ?? getDefaultGraph();
    for (const input of inputs) {
      if (!graph.owns(input)) {
        throw new ValidationError('All inputs of an operation must belong to the same graph', {
          moduleType: this.type,
          nodeId: input.id,
        });
      }
    }
    return graph;
  }
}

function toBackwardContext<I extends NodeInputs, O>(
  revision: Revision,
  inputs: I,
  output: ValueNode<O>
): BackwardContext<I, O> {
  return {
    inputs,
    output,
    frame: revision.frame,
    correction: revision.correction,
    entries: revision.entries,
    signal: revision.signal,
    pending(input) {
      return revision.pending(input);
    },
    mutate<T>(input: ValueNode<T>, payload: T) {
      revision.mutate(input, payload);
    },
    recordCorrection(input, payload) {
      revision.recordCorrection(input, payload);
    },
  };
}
