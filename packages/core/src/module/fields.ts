/**
 * Declared configuration fields for reasoning modules
 */

import { z } from 'zod';
import { isLLMCapability, type LLMCapability, type Schema } from '@errata/shared';
import { ValueNode } from '../graph/value-node.js';

export interface ModuleDefinition<S extends z.AnyZodObject = z.AnyZodObject> {
  readonly type: string;
  readonly schema: S;
}

export function defineModule<S extends z.AnyZodObject>(type: string, schema: S): ModuleDefinition<S> {
  return { type, schema };
}

/**
 * Field names in declaration order
 */
export function fieldNames(definition: ModuleDefinition): string[] {
  return Object.keys(definition.schema.shape);
}

/**
 * Fields that may stay unset: undefined parses to undefined. Fields with a
 * default always hold a value and are not listed.
 */
export function optionalFieldNames(definition: ModuleDefinition): string[] {
  return Object.entries<z.ZodTypeAny>(definition.schema.shape)
    .filter(([, schema]) => {
      const result = schema.safeParse(undefined);
      return result.success && result.data === undefined;
    })
    .map(([name]) => name);
}

// ===========================================
// Field kinds
// ===========================================

export function capabilityField() {
  return z.custom<LLMCapability>(isLLMCapability, { message: 'Expected an LLM capability' });
}

export function moduleField<M>(ctor: abstract new (...args: never[]) => M) {
  return z.custom<M>((value) => value instanceof ctor, { message: `Expected a ${ctor.name} module` });
}

export function nodeField<T>(schema: Schema<T>) {
  return z.custom<ValueNode<T>>(
    (value) => value instanceof ValueNode && schema.safeParse(value.value).success,
    { message: 'Expected a value node with a matching payload' }
  );
}

// ===========================================
// Parsing
// ===========================================

export type FieldParse<T> =
  | { success: true; fields: T; values: Map<string, unknown> }
  | { success: false; error: z.ZodError };

export function parseFields<S extends z.ZodTypeAny>(schema: S, input: unknown): FieldParse<z.output<S>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    return { success: false, error: result.error };
  }
  return { success: true, fields: result.data, values: new Map(Object.entries(result.data)) };
}
