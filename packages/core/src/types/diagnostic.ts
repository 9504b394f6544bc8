/**
 * Diagnostics produced by an analysis pass
 */

import type { SourceLocation } from './declaration.js';

export const RULE_IDS = [
  'PropertyTypeMismatch',
  'NullableCompatibility',
  'GenericTypeMismatch',
  'ComplexTypeMappingMissing',
  'InfiniteRecursion',
  'CaseSensitivityMismatch',
  'UnmappedRequiredProperty',
  'MissingDestinationProperty',
  'RedundantMapFrom',
  'ExpensiveOperationInMapFrom',
  'MultipleEnumeration',
  'NonDeterministicOperation',
  'TaskResultSynchronousAccess',
  'DuplicateMapping',
] as const;

export type RuleId = (typeof RULE_IDS)[number];

export const SEVERITIES = ['error', 'warning', 'info', 'hidden'] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface Diagnostic {
  ruleId: RuleId;
  severity: Severity;
  message: string;
  unitId: string;
  declarationId: string;
  /** Destination member; absent for declaration-level findings */
  member?: string;
  sourceType: string;
  destType: string;
  /** Display form of the source member type, e.g. `List<string>` */
  sourceMemberType?: string;
  destMemberType?: string;
  location?: SourceLocation;
  /** Rule-specific values: sourceMember, operation, collection, reason, members */
  properties: Record<string, string>;
}

export function isRuleId(value: string): value is RuleId {
  return RULE_IDS.some((id) => id === value);
}
