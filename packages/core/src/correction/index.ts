export { Correction, combine, combineAll } from './correction.js';
export type { CorrectionEntry } from './correction.js';
export { collectPayloads, concatText, shallowMerge, mergePolicyByName } from './merge-policies.js';
export type { MergePolicy } from './merge-policies.js';
