import type { Diagnostic, MappingDeclaration, RuleId } from '@mapcheck/core';
import { RULES, formatMessage } from './catalog.js';

export interface DiagnosticFields {
  member?: string;
  sourceMemberType?: string;
  destMemberType?: string;
  properties?: Record<string, string>;
}

/**
 * Build a diagnostic at the rule's default severity; policy is applied later
 */
export function buildDiagnostic(
  ruleId: RuleId,
  unitId: string,
  declaration: MappingDeclaration,
  fields: DiagnosticFields = {}
): Diagnostic {
  const properties = fields.properties ?? {};
  const message = formatMessage(ruleId, {
    ...properties,
    member: fields.member,
    sourceType: declaration.sourceType,
    destType: declaration.destType,
    sourceMemberType: fields.sourceMemberType,
    destMemberType: fields.destMemberType,
  });

  const configLocation = fields.member
    ? declaration.memberConfigs.filter((c) => c.destMember === fields.member).at(-1)?.location
    : undefined;
  const location = configLocation ?? declaration.location;

  return {
    ruleId,
    severity: RULES[ruleId].defaultSeverity,
    message,
    unitId,
    declarationId: declaration.id,
    ...(fields.member !== undefined ? { member: fields.member } : {}),
    sourceType: declaration.sourceType,
    destType: declaration.destType,
    ...(fields.sourceMemberType !== undefined ? { sourceMemberType: fields.sourceMemberType } : {}),
    ...(fields.destMemberType !== undefined ? { destMemberType: fields.destMemberType } : {}),
    ...(location ? { location } : {}),
    properties,
  };
}
