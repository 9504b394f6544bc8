/**
 * @mapcheck/analyzer
 *
 * Static analysis of object-to-object mapping declarations: compatibility
 * classification, performance hazards and fix synthesis.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Registry
export { MappingRegistry } from './registry/index.js';
export type { DuplicateDeclaration } from './registry/index.js';

// Classification
export {
  CompatibilityClassifier,
  checkCollectionCompatibility,
  buildOverrideMap,
  detectRecursion,
  indexShapes,
  referencedTypeName,
} from './classification/index.js';
export type {
  ClassificationResult,
  CollectionVerdict,
  OverrideMap,
  RecursionFinding,
  ShapeIndex,
} from './classification/index.js';

// Hazards
export { HazardDetector, summarizeExpression, classifyDependency } from './hazards/index.js';
export type { ExpressionFact, ExpressionSummary, HazardFinding, HazardRuleId } from './hazards/index.js';

// Fixes
export { FixSynthesizer, POPULATE_MARKER, applyEdit, defaultValueFor, findClosestMember } from './fixes/index.js';

// Rules
export { RULES, PERFORMANCE_RULES, listRules, formatMessage } from './rules/index.js';
export type { RuleCategory, RuleDescriptor } from './rules/index.js';

// Analysis
import { MappingAnalyzer as _MappingAnalyzer } from './analysis/index.js';
import type { AnalysisLogger } from './interfaces/index.js';
import type { AnalyzerOptions } from './types/index.js';
export { MappingAnalyzer } from './analysis/index.js';

// Formatters
export { formatDiagnostic, formatReportAsText, formatReportForMcp } from './formatters/index.js';
export type { MCPSummary, MCPFormattedReport } from './formatters/index.js';

// Errors
export { FixError } from './errors/index.js';
export type { FixErrorCode, FixErrorDetails } from './errors/index.js';

/**
 * Factory function to create a MappingAnalyzer
 *
 * @param options - Rule severities, toggles and dependency patterns
 * @param logger - Receives per-member failures and pass statistics
 */
export function createMappingAnalyzer(options?: AnalyzerOptions, logger?: AnalysisLogger): _MappingAnalyzer {
  return new _MappingAnalyzer(options, logger);
}
