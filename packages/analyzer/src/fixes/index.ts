export { FixSynthesizer, POPULATE_MARKER } from './fix-synthesizer.js';
export { applyEdit, memberConfigEquals } from './edit-applier.js';
export { defaultValueFor } from './default-values.js';
export { findClosestMember } from './fuzzy-match.js';
export type { FuzzyCandidate } from './fuzzy-match.js';
