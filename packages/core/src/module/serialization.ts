/**
 * Field value encoding
 *
 * Field values are written as JSON. Values that cannot travel as JSON become
 * references:
 *   { "$capability": name }
 *   { "$module": { type, fields } }
 *   { "$node": { datatype, value } }
 * A plain object that looks like a reference is wrapped as { "$json": value }.
 */

import { isJsonObject, isLLMCapability, ValidationError, type JsonObject, type JsonValue } from '@errata/shared';
import { ValueNode } from '../graph/value-node.js';
import type { SerializedModule } from './types.js';

export const REF_KEYS = ['$capability', '$module', '$node', '$json'] as const;
export type RefKey = (typeof REF_KEYS)[number];

export function isRefKey(key: string): key is RefKey {
  return (REF_KEYS as readonly string[]).includes(key);
}

/**
 * The single key of a reference-shaped object, if it is one
 */
export function refKeyOf(value: JsonObject): RefKey | null {
  const keys = Object.keys(value);
  const [key] = keys;
  return keys.length === 1 && key !== undefined && isRefKey(key) ? key : null;
}

export interface Serializable {
  serialize(): SerializedModule;
}

function isSerializable(value: object): value is Serializable {
  return 'serialize' in value && typeof value.serialize === 'function';
}

export function encodeField(value: unknown, path: string): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Field ${path} holds a non-finite number`, { path });
    }
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item, index) => encodeField(item, `${path}[${index}]`));
  }

  if (value instanceof ValueNode) {
    return { $node: { datatype: value.datatype, value: encodeField(value.value, `${path}.value`) } };
  }

  if (typeof value === 'object' && isSerializable(value)) {
    return { $module: value.serialize() };
  }

  if (isLLMCapability(value)) {
    return { $capability: value.name };
  }

  if (isPlainObject(value)) {
    const encoded: JsonObject = {};
    for (const [key, item] of Object.entries(value)) {
      encoded[key] = encodeField(item, `${path}.${key}`);
    }
    return refKeyOf(encoded) === null ? encoded : { $json: encoded };
  }

  throw new ValidationError(`Field ${path} is not serialisable`, {
    path,
    received: typeof value,
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isJsonObject(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
