export { RULES, PERFORMANCE_RULES, listRules, ruleOrder, formatMessage } from './catalog.js';
export type { RuleCategory, RuleDescriptor } from './catalog.js';
export { buildDiagnostic } from './diagnostic-builder.js';
export type { DiagnosticFields } from './diagnostic-builder.js';
