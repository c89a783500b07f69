/**
 * Extractor: structured extraction from named inputs
 *
 * Backward phase asks the LLM which feedback items concern which input and
 * records each list as a correction on that input.
 */

import { z } from 'zod';
import type { Schema } from '@errata/shared';
import type { ValueNode } from '../graph/value-node.js';
import { capabilityField, defineModule } from '../module/fields.js';
import { ReasoningModule } from '../module/reasoning-module.js';
import type { BackwardContext, InvokeOptions, NodeInputs } from '../module/types.js';

export const EXTRACTOR = defineModule(
  'Extractor',
  z.object({
    llm: capabilityField(),
  })
);

export type ExtractorConfig = z.input<typeof EXTRACTOR.schema>;

export const feedbackAssignmentsSchema = z.object({
  assignments: z.array(
    z.object({
      input_name: z.string(),
      relevant_feedback: z.array(z.string()),
    })
  ),
});

export type FeedbackAssignments = z.infer<typeof feedbackAssignmentsSchema>;

export interface ExtractOptions extends InvokeOptions {
  datatype?: string;
}

export class Extractor extends ReasoningModule<typeof EXTRACTOR.schema> {
  constructor(config: ExtractorConfig) {
    super(EXTRACTOR, config);
  }

  async extract<T, I extends NodeInputs>(
    schema: Schema<T>,
    inputs: I,
    task: string,
    options: ExtractOptions = {}
  ): Promise<ValueNode<T>> {
    return this.invoke<I, T>(
      {
        name: 'extract',
        datatype: options.datatype ?? 'Extraction',
        forward: async (ctx) =>
          this.fields.llm.complete({ task, sections: sectionsOf(ctx.inputs) }, schema),
        backward: async (ctx) => this.assignFeedback(ctx, task),
      },
      inputs,
      options
    );
  }

  private async assignFeedback<I extends NodeInputs, T>(ctx: BackwardContext<I, T>, task: string): Promise<void> {
    const inputNames = ctx.frame.inputNames;
    const result = await this.fields.llm.complete(
      {
        task:
          'The FEEDBACK was given when extracting RESULT from INPUTS for the EXTRACTION_TASK. ' +
          `Based on the errors, determine which list of FEEDBACK items applies to each input ${JSON.stringify(inputNames)}.`,
        sections: {
          INPUTS: Object.fromEntries(inputNames.map((name) => [name, ctx.frame.getInput(name)?.value])),
          RESULT: ctx.output.value,
          FEEDBACK: ctx.correction,
          EXTRACTION_TASK: task,
        },
      },
      feedbackAssignmentsSchema
    );

    for (const assignment of result.assignments) {
      const input = ctx.frame.getInput(assignment.input_name);
      if (!input || assignment.relevant_feedback.length === 0) continue;
      ctx.recordCorrection(input, assignment.relevant_feedback);
    }
  }
}

/**
 * Input payloads as prompt sections, keyed by upper-cased input name
 */
export function sectionsOf(inputs: NodeInputs): Record<string, unknown> {
  return Object.fromEntries(Object.entries(inputs).map(([name, node]) => [name.toUpperCase(), node.value]));
}
