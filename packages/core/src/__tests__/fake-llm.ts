/**
 * In-process LLM capability for tests
 */

import { LLMResponseError, type LLMCapability, type Prompt, type Schema } from '@errata/shared';

export type Responder = (prompt: Prompt, call: number) => unknown;

export class FakeLLM implements LLMCapability {
  readonly prompts: Prompt[] = [];

  constructor(
    readonly name: string,
    private readonly respond: Responder
  ) {}

  complete(prompt: Prompt): Promise<string>;
  complete<T>(prompt: Prompt, schema: Schema<T>): Promise<T>;
  async complete<T>(prompt: Prompt, schema?: Schema<T>): Promise<T | string> {
    this.prompts.push(prompt);
    const raw = await this.respond(prompt, this.prompts.length);

    if (schema) {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        throw new LLMResponseError('Fake response does not match schema', { issues: parsed.error.issues });
      }
      return parsed.data;
    }

    if (typeof raw !== 'string') {
      throw new LLMResponseError('Fake text response must be a string');
    }
    return raw;
  }

  /**
   * Prompts whose task mentions the given text
   */
  promptsFor(taskFragment: string): Prompt[] {
    return this.prompts.filter((prompt) => prompt.task.includes(taskFragment));
  }
}
