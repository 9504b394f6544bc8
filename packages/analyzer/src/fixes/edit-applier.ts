/**
 * Edit applier
 *
 * Applies an Edit to the in-memory model and returns a new unit; the input
 * is never mutated. Every operation is idempotent, so applying the same
 * edit twice yields the same unit as applying it once.
 */

import {
  exprEquals,
  typeRefEquals,
  type AnalysisUnit,
  type DeclarationComment,
  type Edit,
  type EditOperation,
  type MappingDeclaration,
  type MemberConfig,
} from '@mapcheck/core';
import { FixError } from '../errors/index.js';

export function memberConfigEquals(a: MemberConfig, b: MemberConfig): boolean {
  if (a.destMember !== b.destMember) return false;
  switch (a.kind) {
    case 'map-from':
      return b.kind === 'map-from' && a.parameter === b.parameter && exprEquals(a.expression, b.expression);
    case 'ignore':
      return b.kind === 'ignore';
    case 'condition':
      return b.kind === 'condition' && a.parameter === b.parameter && exprEquals(a.predicate, b.predicate);
    case 'constant':
      return b.kind === 'constant' && exprEquals(a.value, b.value);
  }
}

function anchorNotFound(message: string, context: Record<string, unknown>): FixError {
  return new FixError({
    code: 'EDIT_ANCHOR_NOT_FOUND',
    message,
    suggestion: 'Re-run the analysis and request fixes against the current unit',
    context,
  });
}

function updateDeclaration(
  unit: AnalysisUnit,
  declarationId: string,
  update: (declaration: MappingDeclaration) => MappingDeclaration
): AnalysisUnit {
  return {
    ...unit,
    declarations: unit.declarations.map((d) => (d.id === declarationId ? update(d) : d)),
  };
}

function applyOperation(unit: AnalysisUnit, declarationId: string, op: EditOperation): AnalysisUnit {
  switch (op.kind) {
    case 'append-member-config':
      return updateDeclaration(unit, declarationId, (declaration) => {
        const current = declaration.memberConfigs.filter((c) => c.destMember === op.config.destMember).at(-1);
        if (current && memberConfigEquals(current, op.config)) return declaration;
        return { ...declaration, memberConfigs: [...declaration.memberConfigs, op.config] };
      });

    case 'remove-member-config':
      return updateDeclaration(unit, declarationId, (declaration) => ({
        ...declaration,
        memberConfigs: declaration.memberConfigs.filter((c) => c.destMember !== op.destMember),
      }));

    case 'rewrite-expression':
      return updateDeclaration(unit, declarationId, (declaration) => {
        const configs = declaration.memberConfigs;
        let index = -1;
        configs.forEach((c, i) => {
          if (c.destMember === op.destMember) index = i;
        });
        const target = configs[index];
        if (!target || target.kind !== 'map-from') {
          throw new FixError({
            code: 'FIX_NOT_APPLICABLE',
            message: `Member '${op.destMember}' has no expression mapping to rewrite in declaration '${declarationId}'`,
            context: { declarationId, destMember: op.destMember },
          });
        }
        const rewritten: MemberConfig = { ...target, expression: op.expression };
        return {
          ...declaration,
          memberConfigs: configs.map((c, i) => (i === index ? rewritten : c)),
        };
      });

    case 'insert-comment':
      return updateDeclaration(unit, declarationId, (declaration) => {
        const comments: DeclarationComment[] = [...(declaration.comments ?? [])];
        for (const text of op.lines) {
          const exists = comments.some((c) => c.destMember === op.destMember && c.text === text);
          if (!exists) comments.push(op.destMember !== undefined ? { destMember: op.destMember, text } : { text });
        }
        return { ...declaration, comments };
      });

    case 'insert-source-member': {
      const shape = unit.shapes.find((s) => s.name === op.typeName);
      if (!shape) {
        throw anchorNotFound(`Type '${op.typeName}' is not in unit '${unit.id}'`, { typeName: op.typeName });
      }
      const existing = shape.members.find((m) => m.name === op.member.name);
      if (existing) {
        if (typeRefEquals(existing.type, op.member.type)) return unit;
        throw new FixError({
          code: 'FIX_NOT_APPLICABLE',
          message: `${op.typeName}.${op.member.name} already exists with a different type`,
          context: { typeName: op.typeName, member: op.member.name },
        });
      }
      return {
        ...unit,
        shapes: unit.shapes.map((s) =>
          s.name === op.typeName ? { ...s, members: [...s.members, op.member] } : s
        ),
      };
    }

    case 'remove-declaration':
      return {
        ...unit,
        declarations: unit.declarations.filter((d) => d.id !== op.declarationId),
      };

    case 'ignore-source-member':
      return updateDeclaration(unit, declarationId, (declaration) => {
        const ignored = declaration.ignoredSourceMembers ?? [];
        if (ignored.includes(op.sourceMember)) return declaration;
        return { ...declaration, ignoredSourceMembers: [...ignored, op.sourceMember] };
      });

    case 'set-max-depth':
      return updateDeclaration(unit, declarationId, (declaration) =>
        declaration.maxDepth === op.depth ? declaration : { ...declaration, maxDepth: op.depth }
      );

    default: {
      const exhaustive: never = op;
      throw new Error(`Unhandled edit operation: ${JSON.stringify(exhaustive)}`);
    }
  }
}

export function applyEdit(unit: AnalysisUnit, edit: Edit): AnalysisUnit {
  const { anchor } = edit;
  if (anchor.unitId !== unit.id) {
    throw anchorNotFound(`Edit targets unit '${anchor.unitId}', not '${unit.id}'`, { unitId: anchor.unitId });
  }

  const removesAnchor = edit.operations.some(
    (op) => op.kind === 'remove-declaration' && op.declarationId === anchor.declarationId
  );
  const declaration = unit.declarations.find((d) => d.id === anchor.declarationId);
  if (!declaration) {
    // An already-removed declaration means the edit has been applied
    if (removesAnchor) return unit;
    throw anchorNotFound(`Declaration '${anchor.declarationId}' is not in unit '${unit.id}'`, {
      declarationId: anchor.declarationId,
    });
  }

  return edit.operations.reduce((current, op) => applyOperation(current, anchor.declarationId, op), unit);
}
