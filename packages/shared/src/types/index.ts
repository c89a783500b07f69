/**
 * Boundary types shared by errata packages
 */

import type { z } from 'zod';

// ===========================================
// JSON
// ===========================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ===========================================
// LLM capability
// ===========================================

/**
 * A zod schema whose parsed output is T. The input side is left open so that
 * schemas with defaults and transforms are accepted.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * A request to the LLM capability. Sections are rendered as named blocks
 * (upper-case names by convention) followed by the task.
 */
export interface Prompt {
  task: string;
  sections?: Record<string, unknown>;
  system?: string;
}

/**
 * The asynchronous, fallible LLM call consumed by reasoning modules.
 * Retry, backoff and rate limiting live behind this interface.
 */
export interface LLMCapability {
  readonly name: string;
  complete(prompt: Prompt): Promise<string>;
  complete<T>(prompt: Prompt, schema: Schema<T>): Promise<T>;
}

export function isLLMCapability(value: unknown): value is LLMCapability {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'complete' in value &&
    typeof value.complete === 'function'
  );
}
