/**
 * Base Engine
 * Implements the LLM capability on top of a single raw generate() call:
 * prompts are rendered to text, structured answers are pulled out of the
 * response and validated against the caller's zod schema.
 */

import {
  LLMResponseError,
  createChildLogger,
  type LLMCapability,
  type Logger,
  type Prompt,
  type Schema,
} from '@errata/shared';
import { renderPrompt } from '../prompts/render.js';
import type { GenerateRequest, GenerateResult } from '../types.js';

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)```/;

export abstract class BaseEngine implements LLMCapability {
  protected readonly logger: Logger;

  constructor(readonly name: string) {
    this.logger = createChildLogger({ component: 'LLMEngine', engine: name });
  }

  /**
   * One raw call to the provider
   */
  abstract generate(request: GenerateRequest): Promise<GenerateResult>;

  /**
   * Epoch ms at which this engine can take its next call
   */
  nextAllowed(): number {
    return Date.now();
  }

  complete(prompt: Prompt): Promise<string>;
  complete<T>(prompt: Prompt, schema: Schema<T>): Promise<T>;
  async complete<T>(prompt: Prompt, schema?: Schema<T>): Promise<T | string> {
    const result = await this.generate({
      text: renderPrompt(prompt, { json: schema !== undefined }),
      system: prompt.system,
      json: schema !== undefined,
    });

    if (!schema) {
      return result.text;
    }

    const parsed = schema.safeParse(extractJson(result.text));
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Structured response rejected');
      throw new LLMResponseError(`Response from ${this.name} does not match the requested schema`, {
        engine: this.name,
        issues: parsed.error.issues,
      });
    }
    return parsed.data;
  }
}

/**
 * The JSON value in a response: the whole body, a fenced block, or the
 * outermost object
 */
export function extractJson(text: string): unknown {
  const candidates = [text.trim()];

  const fenced = FENCED_BLOCK.exec(text);
  if (fenced?.[1]) {
    candidates.push(fenced[1].trim());
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start >= 0 && end > start) {
    candidates.push(text.slice(start, end + 1));
  }

  for (const candidate of candidates) {
    const parsed = parseJson(candidate);
    if (parsed.ok) return parsed.value;
  }

  throw new LLMResponseError('Response contains no JSON value', {
    preview: text.slice(0, 200),
  });
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}
