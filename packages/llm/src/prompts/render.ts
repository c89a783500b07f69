/**
 * Prompt rendering
 *
 * Sections become tagged blocks in declaration order, followed by the task.
 * Structured requests end with an instruction to answer in JSON only.
 */

import type { Prompt } from '@errata/shared';

export const JSON_INSTRUCTION = 'Respond with a single JSON object and nothing else.';

export interface RenderOptions {
  json?: boolean;
}

export function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  return JSON.stringify(value, null, 2);
}

export function renderSection(name: string, value: unknown): string {
  return `<${name}>\n${renderValue(value)}\n</${name}>`;
}

export function renderPrompt(prompt: Prompt, options: RenderOptions = {}): string {
  const parts = Object.entries(prompt.sections ?? {}).map(([name, value]) => renderSection(name, value));
  parts.push(prompt.task);
  if (options.json) {
    parts.push(JSON_INSTRUCTION);
  }
  return parts.join('\n\n');
}

/**
 * Rough token estimate: 4 chars per token
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
