export { Extractor, EXTRACTOR, feedbackAssignmentsSchema, sectionsOf } from './extractor.js';
export type { ExtractorConfig, ExtractOptions, FeedbackAssignments } from './extractor.js';
export { LeafReviser, LEAF_REVISER } from './leaf-reviser.js';
export type { LeafReviserConfig, RevisionReport } from './leaf-reviser.js';
export { applyLoss } from './losses.js';
