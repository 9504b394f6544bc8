export { HazardDetector, resolveAccessorType } from './hazard-detector.js';
export type { HazardFinding, HazardRuleId } from './hazard-detector.js';
export {
  summarizeExpression,
  ENUMERATING_OPERATORS,
  DEFERRED_OPERATORS,
  MAX_DEPTH,
} from './expression-summary.js';
export type { ExpressionFact, ExpressionFactTag, ExpressionSummary } from './expression-summary.js';
export { classifyDependency, simpleTypeName, OPERATION_LABELS } from './dependency-patterns.js';
