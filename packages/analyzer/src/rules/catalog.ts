/**
 * Rule catalog: ids, default severities and message templates
 *
 * Message wording is part of the output contract. Placeholders are
 * `{member}`, `{sourceType}`, `{destType}`, `{sourceMemberType}`,
 * `{destMemberType}` plus any diagnostic property (`{sourceMember}`,
 * `{operation}`, `{collection}`, `{reason}`).
 */

import { RULE_IDS, type RuleId, type Severity } from '@mapcheck/core';

export type RuleCategory = 'type-safety' | 'configuration' | 'performance' | 'maintainability';

export interface RuleDescriptor {
  id: RuleId;
  title: string;
  category: RuleCategory;
  defaultSeverity: Severity;
  messageTemplate: string;
  description: string;
}

export const RULES: Record<RuleId, RuleDescriptor> = {
  PropertyTypeMismatch: {
    id: 'PropertyTypeMismatch',
    title: 'Property type mismatch',
    category: 'type-safety',
    defaultSeverity: 'error',
    messageTemplate:
      "Property '{member}' type mismatch: {sourceType}.{member} is '{sourceMemberType}' but {destType}.{member} is '{destMemberType}'",
    description: 'Same-named members whose types have no implicit conversion.',
  },
  NullableCompatibility: {
    id: 'NullableCompatibility',
    title: 'Nullable to non-nullable mapping',
    category: 'type-safety',
    defaultSeverity: 'warning',
    messageTemplate:
      "Property '{member}' has nullable compatibility issue: {sourceType}.{member} ({sourceMemberType}) can be null but {destType}.{member} ({destMemberType}) is non-nullable",
    description: 'A nullable source member maps onto a non-nullable destination member.',
  },
  GenericTypeMismatch: {
    id: 'GenericTypeMismatch',
    title: 'Collection element type mismatch',
    category: 'type-safety',
    defaultSeverity: 'error',
    messageTemplate:
      "Property '{member}' has incompatible collection element types: {sourceType}.{member} ({sourceMemberType}) elements cannot be mapped to {destType}.{member} ({destMemberType}) elements without explicit conversion",
    description: 'Collections whose element types are not convertible.',
  },
  ComplexTypeMappingMissing: {
    id: 'ComplexTypeMappingMissing',
    title: 'Missing nested type mapping',
    category: 'type-safety',
    defaultSeverity: 'error',
    messageTemplate:
      "Property '{member}' requires mapping configuration between '{sourceMemberType}' and '{destMemberType}' ({sourceType}.{member} -> {destType}.{member})",
    description: 'Nested object members whose types have no declared mapping in the same unit.',
  },
  InfiniteRecursion: {
    id: 'InfiniteRecursion',
    title: 'Potential infinite recursion',
    category: 'type-safety',
    defaultSeverity: 'warning',
    messageTemplate:
      'Potential infinite recursion detected: {sourceType} to {destType} mapping may cause stack overflow due to {reason}',
    description:
      'Declarations whose member graph refers back to a type already being mapped, with no depth limit set.',
  },
  CaseSensitivityMismatch: {
    id: 'CaseSensitivityMismatch',
    title: 'Member names differ only by case',
    category: 'configuration',
    defaultSeverity: 'warning',
    messageTemplate:
      "Property '{sourceMember}' in source differs only in casing from destination property '{member}' - consider explicit mapping or case-insensitive configuration",
    description: 'Source and destination members whose names match only case-insensitively.',
  },
  UnmappedRequiredProperty: {
    id: 'UnmappedRequiredProperty',
    title: 'Unmapped required property',
    category: 'configuration',
    defaultSeverity: 'error',
    messageTemplate:
      "Required property '{member}' in destination is not mapped from any source property and will cause a runtime exception",
    description: 'Required destination members with no source counterpart and no configuration.',
  },
  MissingDestinationProperty: {
    id: 'MissingDestinationProperty',
    title: 'Source property not mapped',
    category: 'configuration',
    defaultSeverity: 'warning',
    messageTemplate: "Source property '{sourceMember}' will not be mapped - potential data loss",
    description:
      'Source members with no destination counterpart that no configuration reads and that are not explicitly ignored.',
  },
  RedundantMapFrom: {
    id: 'RedundantMapFrom',
    title: 'Redundant explicit mapping',
    category: 'maintainability',
    defaultSeverity: 'info',
    messageTemplate: "Explicit mapping for '{member}' is redundant because the property name matches the source",
    description: 'An explicit mapping that convention would produce anyway.',
  },
  ExpensiveOperationInMapFrom: {
    id: 'ExpensiveOperationInMapFrom',
    title: 'Expensive operation in mapping expression',
    category: 'performance',
    defaultSeverity: 'warning',
    messageTemplate:
      "Property '{member}' mapping contains {operation} that should be performed before mapping to avoid performance issues",
    description: 'Mapping expressions that call data-access, remote or file-system dependencies.',
  },
  MultipleEnumeration: {
    id: 'MultipleEnumeration',
    title: 'Multiple enumeration of a collection',
    category: 'performance',
    defaultSeverity: 'warning',
    messageTemplate:
      "Property '{member}' mapping enumerates collection '{collection}' multiple times. Consider caching the result with ToList() or ToArray().",
    description: 'The same source collection is enumerated more than once in one expression.',
  },
  NonDeterministicOperation: {
    id: 'NonDeterministicOperation',
    title: 'Non-deterministic operation in mapping expression',
    category: 'performance',
    defaultSeverity: 'info',
    messageTemplate:
      "Property '{member}' mapping uses {operation} which produces non-deterministic results. Consider computing before mapping for testability.",
    description: 'Mapping expressions that read the clock or generate random values.',
  },
  TaskResultSynchronousAccess: {
    id: 'TaskResultSynchronousAccess',
    title: 'Blocking wait on an asynchronous result',
    category: 'performance',
    defaultSeverity: 'error',
    messageTemplate:
      "Property '{member}' mapping blocks on an asynchronous result ({operation}). Perform async operations before mapping.",
    description: 'Mapping expressions that synchronously wait for an asynchronous operation.',
  },
  DuplicateMapping: {
    id: 'DuplicateMapping',
    title: 'Duplicate mapping declaration',
    category: 'configuration',
    defaultSeverity: 'warning',
    messageTemplate: "Mapping from '{sourceType}' to '{destType}' is declared more than once in this analysis unit",
    description: 'The same source and destination pair is declared twice.',
  },
};

export const PERFORMANCE_RULES: ReadonlySet<RuleId> = new Set<RuleId>([
  'ExpensiveOperationInMapFrom',
  'MultipleEnumeration',
  'NonDeterministicOperation',
  'TaskResultSynchronousAccess',
]);

export function listRules(): RuleDescriptor[] {
  return RULE_IDS.map((id) => RULES[id]);
}

/** Position of a rule in catalog order, used for stable sorting */
export function ruleOrder(ruleId: RuleId): number {
  return RULE_IDS.indexOf(ruleId);
}

/**
 * Fill a rule's template. Unknown placeholders are left as written.
 */
export function formatMessage(ruleId: RuleId, values: Record<string, string | undefined>): string {
  return RULES[ruleId].messageTemplate.replace(/\{(\w+)\}/g, (match, name: string) => values[name] ?? match);
}
