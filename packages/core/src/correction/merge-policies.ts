/**
 * Merge policies fold the arrival-ordered corrections pending on a node into
 * the single payload its producer's backward phase receives.
 */

import { ValidationError, type MergePolicyName } from '@errata/shared';

export type MergePolicy = (payloads: readonly unknown[]) => unknown;

/**
 * Default policy: the payloads as an array, in arrival order
 */
export const collectPayloads: MergePolicy = (payloads) => [...payloads];

/**
 * Join textual feedback with newlines. Non-string payloads are JSON-encoded.
 */
export const concatText: MergePolicy = (payloads) =>
  payloads.map((payload) => (typeof payload === 'string' ? payload : JSON.stringify(payload))).join('\n');

/**
 * Apply object payloads left to right; later keys win
 */
export const shallowMerge: MergePolicy = (payloads) => {
  const merged: Record<string, unknown> = {};
  payloads.forEach((payload, index) => {
    if (!isPlainObject(payload)) {
      throw new ValidationError('shallow-merge policy only accepts object payloads', {
        index,
        received: Array.isArray(payload) ? 'array' : typeof payload,
      });
    }
    Object.assign(merged, payload);
  });
  return merged;
};

const POLICIES: Record<MergePolicyName, MergePolicy> = {
  collect: collectPayloads,
  'concat-text': concatText,
  'shallow-merge': shallowMerge,
};

export function mergePolicyByName(name: MergePolicyName): MergePolicy {
  return POLICIES[name];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
