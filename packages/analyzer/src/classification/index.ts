export { CompatibilityClassifier, indexShapes } from './compatibility-classifier.js';
export type { ClassificationResult, ShapeIndex } from './compatibility-classifier.js';
export { checkCollectionCompatibility } from './collection-checker.js';
export type { CollectionVerdict } from './collection-checker.js';
export { detectRecursion, referencedTypeName } from './recursion-detector.js';
export type { RecursionFinding } from './recursion-detector.js';
export { buildOverrideMap } from './override-map.js';
export type { OverrideMap } from './override-map.js';
