/**
 * Compatibility Classifier
 *
 * Applies the convention rules to every destination member of a
 * declaration, plus the redundant-mapping check over explicit configs and
 * the data-loss check over source members.
 * Each member is evaluated in isolation: a failure on one member is logged
 * and recorded, and the remaining members are still classified.
 */

import {
  accessorPath,
  containsUnresolved,
  displayTypeRef,
  effectiveType,
  isNumericWidening,
  isRequiredMember,
  readMembers,
  typeRefEquals,
  unwrapNullable,
  wrapError,
  type AnalysisUnit,
  type Diagnostic,
  type MappingDeclaration,
  type Member,
  type RuleId,
  type TypeRef,
  type TypeShape,
} from '@mapcheck/core';
import { noopLogger, type AnalysisLogger } from '../interfaces/index.js';
import type { MappingRegistry } from '../registry/index.js';
import { buildDiagnostic } from '../rules/index.js';
import type { AnalysisFailure } from '../types/index.js';
import { checkCollectionCompatibility } from './collection-checker.js';
import { buildOverrideMap, type OverrideMap } from './override-map.js';

export type ShapeIndex = ReadonlyMap<string, TypeShape>;

export function indexShapes(unit: AnalysisUnit): ShapeIndex {
  return new Map(unit.shapes.map((shape) => [shape.name, shape]));
}

type TypeRuleId = Extract<
  RuleId,
  'PropertyTypeMismatch' | 'NullableCompatibility' | 'GenericTypeMismatch' | 'ComplexTypeMappingMissing'
>;

type PairVerdict = { kind: 'compatible' } | { kind: 'finding'; ruleId: TypeRuleId };

const COMPATIBLE: PairVerdict = { kind: 'compatible' };

function finding(ruleId: TypeRuleId): PairVerdict {
  return { kind: 'finding', ruleId };
}

export interface ClassificationResult {
  diagnostics: Diagnostic[];
  failures: AnalysisFailure[];
}

export class CompatibilityClassifier {
  constructor(
    private readonly registry: MappingRegistry,
    private readonly logger: AnalysisLogger = noopLogger
  ) {}

  classifyDeclaration(
    declaration: MappingDeclaration,
    source: TypeShape,
    dest: TypeShape,
    overrides: OverrideMap = buildOverrideMap(declaration)
  ): ClassificationResult {
    const diagnostics: Diagnostic[] = [];
    const failures: AnalysisFailure[] = [];

    if (declaration.customConversion) {
      this.logger.debug('Skipping declaration with custom conversion', {
        unitId: this.registry.unitId,
        declarationId: declaration.id,
      });
      return { diagnostics, failures };
    }

    for (const member of dest.members) {
      try {
        const convention = this.classifyMember(declaration, source, member, overrides);
        if (convention) diagnostics.push(convention);

        const redundant = this.checkRedundantMapFrom(declaration, source, member, overrides);
        if (redundant) diagnostics.push(redundant);
      } catch (err) {
        const failure = wrapError(err, this.registry.unitId, 'MEMBER_CLASSIFICATION_FAILED');
        this.logger.warn('Member classification failed', {
          unitId: this.registry.unitId,
          declarationId: declaration.id,
          member: member.name,
          error: failure.message,
        });
        failures.push({
          declarationId: declaration.id,
          member: member.name,
          code: failure.code,
          message: failure.message,
        });
      }
    }

    diagnostics.push(...this.checkMissingDestinations(declaration, source, dest, overrides));
    return { diagnostics, failures };
  }

  /**
   * Source members that reach no destination member: no name match in any
   * case, not read by an effective configuration, not explicitly ignored.
   */
  checkMissingDestinations(
    declaration: MappingDeclaration,
    source: TypeShape,
    dest: TypeShape,
    overrides: OverrideMap
  ): Diagnostic[] {
    const destNames = new Set(dest.members.map((m) => m.name.toLowerCase()));
    const handled = new Set(declaration.ignoredSourceMembers ?? []);
    for (const config of overrides.values()) {
      if (config.kind === 'map-from') {
        readMembers(config.expression, config.parameter).forEach((name) => handled.add(name));
      } else if (config.kind === 'condition') {
        readMembers(config.predicate, config.parameter).forEach((name) => handled.add(name));
      }
    }

    return source.members
      .filter((m) => !destNames.has(m.name.toLowerCase()) && !handled.has(m.name))
      .map((m) =>
        buildDiagnostic('MissingDestinationProperty', this.registry.unitId, declaration, {
          sourceMemberType: displayTypeRef(effectiveType(m)),
          properties: { sourceMember: m.name },
        })
      );
  }

  /**
   * Convention rules for one destination member. At most one diagnostic.
   */
  classifyMember(
    declaration: MappingDeclaration,
    source: TypeShape,
    destMember: Member,
    overrides: OverrideMap
  ): Diagnostic | undefined {
    if (overrides.has(destMember.name)) return undefined;
    if (!destMember.settable && !destMember.required) return undefined;

    const exact = source.members.find((m) => m.name === destMember.name);
    if (exact) {
      return this.compareMembers(declaration, exact, destMember);
    }

    const lowered = destMember.name.toLowerCase();
    const caseMatch = source.members.find((m) => m.name.toLowerCase() === lowered);
    if (caseMatch) {
      return buildDiagnostic('CaseSensitivityMismatch', this.registry.unitId, declaration, {
        member: destMember.name,
        sourceMemberType: displayTypeRef(effectiveType(caseMatch)),
        destMemberType: displayTypeRef(effectiveType(destMember)),
        properties: { sourceMember: caseMatch.name },
      });
    }

    if (isRequiredMember(destMember)) {
      return buildDiagnostic('UnmappedRequiredProperty', this.registry.unitId, declaration, {
        member: destMember.name,
        destMemberType: displayTypeRef(effectiveType(destMember)),
      });
    }

    return undefined;
  }

  /**
   * `MapFrom(src => src.X)` onto destination `X` of the same type
   */
  checkRedundantMapFrom(
    declaration: MappingDeclaration,
    source: TypeShape,
    destMember: Member,
    overrides: OverrideMap
  ): Diagnostic | undefined {
    const config = overrides.get(destMember.name);
    if (!config || config.kind !== 'map-from') return undefined;

    const path = accessorPath(config.expression);
    if (!path || path.root !== config.parameter) return undefined;
    if (path.path.length !== 1 || path.path[0] !== destMember.name) return undefined;

    const sourceMember = source.members.find((m) => m.name === destMember.name);
    if (!sourceMember) return undefined;

    const sourceType = effectiveType(sourceMember);
    const destType = effectiveType(destMember);
    if (containsUnresolved(sourceType) || containsUnresolved(destType)) return undefined;
    if (!typeRefEquals(sourceType, destType)) return undefined;

    return buildDiagnostic('RedundantMapFrom', this.registry.unitId, declaration, {
      member: destMember.name,
      sourceMemberType: displayTypeRef(sourceType),
      destMemberType: displayTypeRef(destType),
    });
  }

  private compareMembers(
    declaration: MappingDeclaration,
    sourceMember: Member,
    destMember: Member
  ): Diagnostic | undefined {
    const sourceType = effectiveType(sourceMember);
    const destType = effectiveType(destMember);

    if (containsUnresolved(sourceType) || containsUnresolved(destType)) {
      return undefined;
    }

    const verdict = this.compareTypes(sourceType, destType);
    if (verdict.kind === 'compatible') return undefined;

    return buildDiagnostic(verdict.ruleId, this.registry.unitId, declaration, {
      member: destMember.name,
      sourceMemberType: displayTypeRef(sourceType),
      destMemberType: displayTypeRef(destType),
    });
  }

  /**
   * Nullability is checked first: a nullable source whose underlying type
   * fits the non-nullable destination is a nullability finding. Otherwise
   * the underlying verdict stands, so `List<string>?` into `List<int>` is
   * still a generic mismatch.
   */
  private compareTypes(source: TypeRef, dest: TypeRef): PairVerdict {
    if (typeRefEquals(source, dest)) return COMPATIBLE;

    if (source.kind === 'nullable' && dest.kind !== 'nullable') {
      const inner = this.comparePair(unwrapNullable(source), dest);
      return inner.kind === 'compatible' ? finding('NullableCompatibility') : inner;
    }

    return this.comparePair(unwrapNullable(source), unwrapNullable(dest));
  }

  private comparePair(source: TypeRef, dest: TypeRef): PairVerdict {
    if (typeRefEquals(source, dest) || isNumericWidening(source, dest)) {
      return COMPATIBLE;
    }

    if (source.kind === 'collection' && dest.kind === 'collection') {
      const verdict = checkCollectionCompatibility(source, dest, this.registry);
      if (verdict.kind === 'unclassified') {
        this.logger.debug('Collection element types not classified', {
          unitId: this.registry.unitId,
          source: displayTypeRef(source),
          dest: displayTypeRef(dest),
          reason: verdict.reason,
        });
      }
      return verdict.kind === 'mismatch' ? finding('GenericTypeMismatch') : COMPATIBLE;
    }

    if (source.kind === 'user-defined' && dest.kind === 'user-defined') {
      return this.registry.isEffectivelyMapped(source.name, dest.name)
        ? COMPATIBLE
        : finding('ComplexTypeMappingMissing');
    }

    return finding('PropertyTypeMismatch');
  }
}
