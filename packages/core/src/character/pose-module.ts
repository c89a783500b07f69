/**
 * Pose descriptions for a character in a context.
 *
 * On correction, leaf inputs are rewritten in place (folding in any feedback
 * already waiting on them); derived inputs receive an errata note for their
 * own producer instead.
 */

import { z } from 'zod';
import type { ValueNode } from '../graph/value-node.js';
import { capabilityField, defineModule } from '../module/fields.js';
import { ReasoningModule } from '../module/reasoning-module.js';
import type { BackwardContext, InvokeOptions } from '../module/types.js';

export const POSE_MODULE = defineModule(
  'PoseModule',
  z.object({
    llm: capabilityField(),
    style: z.string().default('concise'),
  })
);

export type PoseModuleConfig = z.input<typeof POSE_MODULE.schema>;

export const poseDescriptionSchema = z.object({
  pose: z.string(),
  facial_expression: z.string(),
  body_language: z.string(),
});

export type PoseDescription = z.infer<typeof poseDescriptionSchema>;

export const revisedTextSchema = z.object({
  changed: z.boolean(),
  text: z.string(),
});

export type PoseInputs = {
  character_info: ValueNode<string>;
  context: ValueNode<string>;
};

const INPUT_LABELS = {
  character_info: 'CHARACTER',
  context: 'CONTEXT',
} as const;

export class PoseModule extends ReasoningModule<typeof POSE_MODULE.schema> {
  constructor(config: PoseModuleConfig) {
    super(POSE_MODULE, config);
  }

  async generatePose(inputs: PoseInputs, options: InvokeOptions = {}): Promise<ValueNode<PoseDescription>> {
    return this.invoke<PoseInputs, PoseDescription>(
      {
        name: 'generatePose',
        datatype: 'Pose description',
        forward: async ({ inputs }) =>
          this.fields.llm.complete(
            {
              task:
                'Generate a pose description for the character based on their current emotion and context. ' +
                `Provide a ${this.fields.style} pose, facial expression, and body language that fits the character and situation.`,
              sections: {
                CHARACTER_INFO: inputs.character_info.value,
                CONTEXT: inputs.context.value,
              },
            },
            poseDescriptionSchema
          ),
        backward: async (ctx) => {
          for (const name of ['character_info', 'context'] as const) {
            const input = ctx.inputs[name];
            if (input.isLeaf) {
              await this.rewriteLeaf(ctx, input, INPUT_LABELS[name]);
            } else {
              await this.draftErrata(ctx, input, INPUT_LABELS[name]);
            }
          }
        },
      },
      inputs,
      options
    );
  }

  private async rewriteLeaf(
    ctx: BackwardContext<PoseInputs, PoseDescription>,
    input: ValueNode<string>,
    label: string
  ): Promise<void> {
    const revised = await this.fields.llm.complete(
      {
        task:
          `The ERRATA was identified when generating a pose description for the CHARACTER in the CONTEXT. ` +
          `Revise the ${label} so that it resolves the ERRATA and any PENDING_ERRATA. ` +
          `Don't change anything other than what's specified. ` +
          `Set changed to false and return the ${label} unmodified if nothing in it needs to change.`,
        sections: {
          CHARACTER: ctx.inputs.character_info.value,
          CONTEXT: ctx.inputs.context.value,
          POSE: ctx.output.value,
          ERRATA: ctx.correction,
          PENDING_ERRATA: ctx.pending(input).map((entry) => entry.payload),
        },
      },
      revisedTextSchema
    );

    if (revised.changed && revised.text !== input.value) {
      ctx.mutate(input, revised.text);
    }
  }

  private async draftErrata(
    ctx: BackwardContext<PoseInputs, PoseDescription>,
    input: ValueNode<string>,
    label: string
  ): Promise<void> {
    const errata = await this.fields.llm.complete({
      task:
        'The ERRATA was identified when generating a pose description for the CHARACTER in the CONTEXT. ' +
        `Identify possible causes of the ERRATA in the ${label} and suggest a correction. ` +
        `Don't change anything other than what's specified in the ERRATA. ` +
        `Only specify causes and suggestions for the ${label}. Reply with an empty text if the ${label} is not at fault.`,
      sections: {
        CHARACTER: ctx.inputs.character_info.value,
        CONTEXT: ctx.inputs.context.value,
        POSE: ctx.output.value,
        ERRATA: ctx.correction,
      },
    });

    const note = errata.trim();
    if (note) {
      ctx.recordCorrection(input, note);
    }
  }
}
