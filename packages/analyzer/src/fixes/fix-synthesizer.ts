/**
 * Fix Synthesizer
 *
 * Turns one diagnostic into the independent edits that resolve it. Fixes
 * are always computed against the unit exactly as given and never assume
 * that another fix has been applied.
 */

import {
  accessor,
  containsExpr,
  displayTypeRef,
  effectiveType,
  isNumericType,
  isStringType,
  local,
  memberAccess,
  methodCall,
  normalizePrimitiveName,
  printExpr,
  printMemberConfig,
  replaceExpr,
  typeRefEquals,
  typeRoot,
  unwrapNullable,
  type AnalysisUnit,
  type Diagnostic,
  type Edit,
  type EditAnchor,
  type EditOperation,
  type Expr,
  type MapFromConfig,
  type MappingDeclaration,
  type Member,
  type TypeRef,
  type TypeShape,
} from '@mapcheck/core';
import { FixError } from '../errors/index.js';
import { DEFAULT_FUZZY_MATCH, type FuzzyMatchOptions } from '../types/index.js';
import { defaultValueFor } from './default-values.js';
import { findClosestMember } from './fuzzy-match.js';

/** Depth limit proposed for recursive member graphs */
const RECURSION_DEPTH_LIMIT = 2;

/** Annotation placed on source members introduced by hoisting fixes */
export const POPULATE_MARKER = 'Populate before mapping';

const PARSABLE_PRIMITIVES = new Set(['bool', 'DateTime', 'DateTimeOffset', 'TimeSpan', 'Guid']);

interface FixContext {
  diagnostic: Diagnostic;
  declaration: MappingDeclaration;
  source: TypeShape;
  dest: TypeShape;
  /** Source lambda parameter name for new expressions */
  parameter: string;
  anchor: EditAnchor;
}

function isParsable(type: TypeRef): boolean {
  if (isNumericType(type)) return true;
  return type.kind === 'primitive' && PARSABLE_PRIMITIVES.has(normalizePrimitiveName(type.name));
}

function parseCall(type: TypeRef, value: Expr): Expr {
  return { kind: 'call', callee: memberAccess(typeRoot(displayTypeRef(type)), 'Parse'), args: [value] };
}

function materializerFor(container: string): string {
  if (container === '[]') return 'ToArray';
  if (container === 'HashSet' || container === 'ISet') return 'ToHashSet';
  return 'ToList';
}

function lowerFirst(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

function namesIn(expr: Expr, into: Set<string>): void {
  switch (expr.kind) {
    case 'local':
    case 'parameter':
    case 'captured':
      into.add(expr.name);
      return;
    case 'lambda':
      expr.params.forEach((p) => into.add(p));
      namesIn(expr.body, into);
      return;
    case 'block':
      for (const binding of expr.bindings) {
        into.add(binding.name);
        namesIn(binding.value, into);
      }
      namesIn(expr.result, into);
      return;
    case 'member':
      namesIn(expr.object, into);
      return;
    case 'call':
      namesIn(expr.callee, into);
      expr.args.forEach((arg) => namesIn(arg, into));
      return;
    case 'new':
      expr.args.forEach((arg) => namesIn(arg, into));
      return;
    case 'binary':
      namesIn(expr.left, into);
      namesIn(expr.right, into);
      return;
    case 'conditional':
      namesIn(expr.test, into);
      namesIn(expr.whenTrue, into);
      namesIn(expr.whenFalse, into);
      return;
    case 'type':
    case 'literal':
    case 'opaque':
      return;
  }
}

function uniqueLocalName(base: string, expr: Expr, parameter: string): string {
  const used = new Set<string>([parameter]);
  namesIn(expr, used);
  let name = base;
  for (let i = 2; used.has(name); i++) {
    name = `${base}${i}`;
  }
  return name;
}

export class FixSynthesizer {
  private readonly fuzzyMatch: FuzzyMatchOptions;

  constructor(options: { fuzzyMatch?: FuzzyMatchOptions } = {}) {
    this.fuzzyMatch = options.fuzzyMatch ?? DEFAULT_FUZZY_MATCH;
  }

  synthesize(diagnostic: Diagnostic, unit: AnalysisUnit): Edit[] {
    const context = this.resolveContext(diagnostic, unit);

    switch (diagnostic.ruleId) {
      case 'PropertyTypeMismatch':
        return this.typeMismatchFixes(context);
      case 'GenericTypeMismatch':
        return this.collectionFixes(context);
      case 'NullableCompatibility':
        return this.nullableFixes(context);
      case 'ComplexTypeMappingMissing':
        return [];
      case 'InfiniteRecursion':
        return this.recursionFixes(context);
      case 'CaseSensitivityMismatch':
        return this.caseFixes(context);
      case 'UnmappedRequiredProperty':
        return this.unmappedFixes(context);
      case 'MissingDestinationProperty':
        return this.missingDestinationFixes(context);
      case 'RedundantMapFrom':
        return this.redundantFixes(context);
      case 'ExpensiveOperationInMapFrom':
      case 'NonDeterministicOperation':
      case 'TaskResultSynchronousAccess':
        return this.hoistFixes(context);
      case 'MultipleEnumeration':
        return this.enumerationFixes(context);
      case 'DuplicateMapping':
        return [
          {
            title: `Remove duplicate mapping ${context.declaration.sourceType} -> ${context.declaration.destType}`,
            equivalenceKey: 'DuplicateMapping:remove-declaration',
            anchor: context.anchor,
            operations: [{ kind: 'remove-declaration', declarationId: context.declaration.id }],
            preview: `Remove declaration '${context.declaration.id}'`,
          },
        ];
      default: {
        const exhaustive: never = diagnostic.ruleId;
        throw new FixError({ code: 'UNKNOWN_FIX', message: `No fixes known for rule ${String(exhaustive)}` });
      }
    }
  }

  private resolveContext(diagnostic: Diagnostic, unit: AnalysisUnit): FixContext {
    if (diagnostic.unitId !== unit.id) {
      throw new FixError({
        code: 'EDIT_ANCHOR_NOT_FOUND',
        message: `Diagnostic belongs to unit '${diagnostic.unitId}', not '${unit.id}'`,
        suggestion: 'Request fixes against the unit the diagnostic was reported for',
      });
    }

    const declaration = unit.declarations.find((d) => d.id === diagnostic.declarationId);
    const source = unit.shapes.find((s) => s.name === declaration?.sourceType);
    const dest = unit.shapes.find((s) => s.name === declaration?.destType);
    if (!declaration || !source || !dest) {
      throw new FixError({
        code: 'EDIT_ANCHOR_NOT_FOUND',
        message: `Declaration '${diagnostic.declarationId}' or its shapes are not in unit '${unit.id}'`,
        suggestion: 'Re-run the analysis; the unit may have changed since the diagnostic was reported',
        context: { declarationId: diagnostic.declarationId },
      });
    }

    const existingParameter = declaration.memberConfigs.find(
      (c): c is MapFromConfig => c.kind === 'map-from'
    )?.parameter;

    return {
      diagnostic,
      declaration,
      source,
      dest,
      parameter: existingParameter ?? 'src',
      anchor: {
        unitId: unit.id,
        declarationId: declaration.id,
        ...(diagnostic.member !== undefined ? { destMember: diagnostic.member } : {}),
        ...(diagnostic.location ? { location: diagnostic.location } : {}),
      },
    };
  }

  private destMember(context: FixContext): Member | undefined {
    const name = context.diagnostic.member;
    return name === undefined ? undefined : context.dest.members.find((m) => m.name === name);
  }

  private sourceMember(context: FixContext, name = context.diagnostic.member): Member | undefined {
    return name === undefined ? undefined : context.source.members.find((m) => m.name === name);
  }

  private mapFromEdit(context: FixContext, key: string, title: string, member: string, expression: Expr): Edit {
    const config: MapFromConfig = { kind: 'map-from', destMember: member, parameter: context.parameter, expression };
    return {
      title,
      equivalenceKey: `${context.diagnostic.ruleId}:${key}`,
      anchor: context.anchor,
      operations: [{ kind: 'append-member-config', config }],
      preview: printMemberConfig(config),
    };
  }

  private ignoreEdit(context: FixContext, member: string): Edit {
    const config = { kind: 'ignore', destMember: member } as const;
    return {
      title: `Ignore ${member}`,
      equivalenceKey: `${context.diagnostic.ruleId}:ignore`,
      anchor: context.anchor,
      operations: [{ kind: 'append-member-config', config }],
      preview: printMemberConfig(config),
    };
  }

  private commentEdit(
    context: FixContext,
    key: string,
    title: string,
    member: string | undefined,
    lines: string[]
  ): Edit {
    return {
      title,
      equivalenceKey: `${context.diagnostic.ruleId}:${key}`,
      anchor: context.anchor,
      operations: [
        member !== undefined ? { kind: 'insert-comment', destMember: member, lines } : { kind: 'insert-comment', lines },
      ],
      preview: lines.map((line) => `// ${line}`).join('\n'),
    };
  }

  private typeMismatchFixes(context: FixContext): Edit[] {
    const destMember = this.destMember(context);
    const sourceMember = this.sourceMember(context);
    if (!destMember || !sourceMember) return [];

    const edits: Edit[] = [];
    const value = accessor(context.parameter, sourceMember.name);
    const destType = unwrapNullable(effectiveType(destMember));
    const sourceType = unwrapNullable(effectiveType(sourceMember));

    if (isStringType(destType)) {
      edits.push(
        this.mapFromEdit(context, 'to-string', `Convert ${destMember.name} with ToString()`, destMember.name, methodCall(value, 'ToString'))
      );
    } else if (isStringType(sourceType) && isParsable(destType)) {
      edits.push(
        this.mapFromEdit(
          context,
          'parse',
          `Parse ${destMember.name} as ${displayTypeRef(destType)}`,
          destMember.name,
          parseCall(destType, value)
        )
      );
    }

    edits.push(this.ignoreEdit(context, destMember.name));
    return edits;
  }

  private collectionFixes(context: FixContext): Edit[] {
    const destMember = this.destMember(context);
    const sourceMember = this.sourceMember(context);
    if (!destMember || !sourceMember) return [];

    const edits: Edit[] = [];
    const destType = unwrapNullable(effectiveType(destMember));
    const sourceType = unwrapNullable(effectiveType(sourceMember));

    if (destType.kind === 'collection' && sourceType.kind === 'collection') {
      const destElement = unwrapNullable(destType.element);
      const sourceElement = unwrapNullable(sourceType.element);
      let projection: Expr | undefined;
      let title: string | undefined;
      let key: string | undefined;

      if (isStringType(destElement)) {
        projection = methodCall(local('x'), 'ToString');
        title = `Convert ${destMember.name} elements with ToString()`;
        key = 'to-string';
      } else if (isStringType(sourceElement) && isParsable(destElement)) {
        projection = parseCall(destElement, local('x'));
        title = `Parse ${destMember.name} elements as ${displayTypeRef(destElement)}`;
        key = 'parse';
      }

      if (projection && title && key) {
        const selected = methodCall(accessor(context.parameter, sourceMember.name), 'Select', [
          { kind: 'lambda', params: ['x'], body: projection },
        ]);
        edits.push(
          this.mapFromEdit(context, key, title, destMember.name, methodCall(selected, materializerFor(destType.container)))
        );
      }
    }

    edits.push(this.ignoreEdit(context, destMember.name));
    return edits;
  }

  private nullableFixes(context: FixContext): Edit[] {
    const destMember = this.destMember(context);
    const sourceMember = this.sourceMember(context);
    if (!destMember || !sourceMember) return [];

    const fallback = defaultValueFor(effectiveType(destMember));
    if (!fallback) return [];

    const expression: Expr = {
      kind: 'binary',
      operator: '??',
      left: accessor(context.parameter, sourceMember.name),
      right: fallback,
    };
    return [
      this.mapFromEdit(
        context,
        'coalesce',
        `Use ${printExpr(fallback)} when ${context.declaration.sourceType}.${sourceMember.name} is null`,
        destMember.name,
        expression
      ),
    ];
  }

  private caseFixes(context: FixContext): Edit[] {
    const destMember = this.destMember(context);
    const sourceName = context.diagnostic.properties.sourceMember;
    if (!destMember || !sourceName) return [];

    const { sourceType, destType } = context.declaration;
    return [
      this.mapFromEdit(
        context,
        'explicit-mapping',
        `Map ${destMember.name} from ${sourceName}`,
        destMember.name,
        accessor(context.parameter, sourceName)
      ),
      this.commentEdit(context, 'naming-convention', 'Recommend case-insensitive member matching', destMember.name, [
        `${sourceType}.${sourceName} and ${destType}.${destMember.name} differ only by case.`,
        'Configure case-insensitive member name matching for this profile.',
      ]),
      this.commentEdit(context, 'rename-source', `Recommend renaming ${sourceType}.${sourceName}`, destMember.name, [
        `Rename ${sourceType}.${sourceName} to ${destMember.name} to match ${destType}.${destMember.name}.`,
      ]),
    ];
  }

  private unmappedFixes(context: FixContext): Edit[] {
    const destMember = this.destMember(context);
    if (!destMember) return [];

    const edits: Edit[] = [];
    const fallback = defaultValueFor(effectiveType(destMember));
    if (fallback) {
      edits.push(
        this.mapFromEdit(
          context,
          'default-value',
          `Map ${destMember.name} from ${printExpr(fallback)}`,
          destMember.name,
          fallback
        )
      );
    }

    const closest = findClosestMember(destMember.name, context.source.members, this.fuzzyMatch);
    const lines = closest
      ? [
          `${context.declaration.sourceType}.${closest.member.name} looks like a match for ${destMember.name}.`,
          `Consider ${printMemberConfig({
            kind: 'map-from',
            destMember: destMember.name,
            parameter: context.parameter,
            expression: accessor(context.parameter, closest.member.name),
          })}.`,
        ]
      : [
          `No source member resembles ${destMember.name}.`,
          `Add ${destMember.name} to ${context.declaration.sourceType} or map it explicitly.`,
        ];
    edits.push(this.commentEdit(context, 'suggest-source-member', 'Suggest a source member', destMember.name, lines));

    return edits;
  }

  /**
   * Keep the source member out of the mapping on purpose, route it onto a
   * similarly named destination member, or leave a note
   */
  private missingDestinationFixes(context: FixContext): Edit[] {
    const name = context.diagnostic.properties.sourceMember;
    if (name === undefined || !this.sourceMember(context, name)) return [];

    const edits: Edit[] = [
      {
        title: `Ignore source property '${name}'`,
        equivalenceKey: 'MissingDestinationProperty:ignore-source',
        anchor: context.anchor,
        operations: [{ kind: 'ignore-source-member', sourceMember: name }],
        preview: `ForSourceMember(${context.parameter} => ${context.parameter}.${name}, opt => opt.DoNotValidate())`,
      },
    ];

    const configured = new Set(context.declaration.memberConfigs.map((c) => c.destMember));
    const unconfigured = context.dest.members.filter((m) => !configured.has(m.name));
    const closest = findClosestMember(name, unconfigured, this.fuzzyMatch);
    if (closest) {
      edits.push(
        this.mapFromEdit(
          context,
          'map-to-closest',
          `Map '${name}' onto ${closest.member.name}`,
          closest.member.name,
          accessor(context.parameter, name)
        )
      );
    }

    edits.push(
      this.commentEdit(context, 'comment', `Add a note about unmapped source property '${name}'`, undefined, [
        `${context.declaration.sourceType}.${name} has no destination member.`,
        `Add it to ${context.declaration.destType} or map it onto an existing member.`,
      ])
    );
    return edits;
  }

  /**
   * Bound the nesting depth, or stop mapping the members that recurse
   */
  private recursionFixes(context: FixContext): Edit[] {
    const members = (context.diagnostic.properties.members ?? '').split(', ').filter((m) => m.length > 0);
    const edits: Edit[] = [
      {
        title: `Limit mapping depth with MaxDepth(${RECURSION_DEPTH_LIMIT})`,
        equivalenceKey: 'InfiniteRecursion:max-depth',
        anchor: context.anchor,
        operations: [{ kind: 'set-max-depth', depth: RECURSION_DEPTH_LIMIT }],
        preview: `MaxDepth(${RECURSION_DEPTH_LIMIT})`,
      },
    ];

    if (members.length > 0) {
      const configs = members.map((destMember) => ({ kind: 'ignore', destMember }) as const);
      edits.push({
        title: `Ignore recursive ${members.length === 1 ? 'member' : 'members'} ${members.join(', ')}`,
        equivalenceKey: 'InfiniteRecursion:ignore',
        anchor: context.anchor,
        operations: configs.map((config): EditOperation => ({ kind: 'append-member-config', config })),
        preview: configs.map((config) => printMemberConfig(config)).join('\n'),
      });
    }
    return edits;
  }

  private redundantFixes(context: FixContext): Edit[] {
    const member = context.diagnostic.member;
    if (member === undefined) return [];
    return [
      {
        title: `Remove redundant mapping for ${member}`,
        equivalenceKey: 'RedundantMapFrom:remove',
        anchor: context.anchor,
        operations: [{ kind: 'remove-member-config', destMember: member }],
        preview: `Remove configuration for ${member}`,
      },
    ];
  }

  /**
   * Move the computation out of the mapping: drop the config and give the
   * source type a same-named member to be populated beforehand
   */
  private hoistFixes(context: FixContext): Edit[] {
    const destMember = this.destMember(context);
    if (!destMember) return [];

    const existing = this.sourceMember(context);
    if (existing && !typeRefEquals(effectiveType(existing), effectiveType(destMember))) {
      return [];
    }

    const operations: EditOperation[] = [{ kind: 'remove-member-config', destMember: destMember.name }];
    if (!existing) {
      operations.push({
        kind: 'insert-source-member',
        typeName: context.source.name,
        member: {
          name: destMember.name,
          type: destMember.type,
          settable: true,
          required: false,
          nullable: destMember.nullable,
          annotation: POPULATE_MARKER,
        },
      });
    }

    return [
      {
        title: `Compute ${destMember.name} before mapping`,
        equivalenceKey: `${context.diagnostic.ruleId}:hoist`,
        anchor: context.anchor,
        operations,
        preview: existing
          ? `Remove configuration for ${destMember.name}; map it from ${context.source.name}.${existing.name}`
          : `Remove configuration for ${destMember.name}; add ${displayTypeRef(effectiveType(destMember))} ${destMember.name} to ${context.source.name} (${POPULATE_MARKER})`,
      },
    ];
  }

  private enumerationFixes(context: FixContext): Edit[] {
    const member = context.diagnostic.member;
    const collection = context.diagnostic.properties.collection;
    if (member === undefined || !collection) return [];

    const config = context.declaration.memberConfigs.filter((c) => c.destMember === member).at(-1);
    if (!config || config.kind !== 'map-from') return [];

    const path = collection.split('.');
    const target = accessor(config.parameter, ...path);
    if (!containsExpr(config.expression, target)) return [];

    const last = path[path.length - 1] ?? collection;
    const name = uniqueLocalName(lowerFirst(last), config.expression, config.parameter);
    const binding = { name, value: methodCall(target, 'ToList') };
    const replacement = local(name);
    const expression = config.expression;

    const rewritten: Expr =
      expression.kind === 'block'
        ? {
            kind: 'block',
            bindings: [
              binding,
              ...expression.bindings.map((b) => ({ name: b.name, value: replaceExpr(b.value, target, replacement) })),
            ],
            result: replaceExpr(expression.result, target, replacement),
          }
        : { kind: 'block', bindings: [binding], result: replaceExpr(expression, target, replacement) };

    return [
      {
        title: `Materialize ${collection} once`,
        equivalenceKey: 'MultipleEnumeration:materialize',
        anchor: context.anchor,
        operations: [{ kind: 'rewrite-expression', destMember: member, expression: rewritten }],
        preview: printMemberConfig({ ...config, expression: rewritten }),
      },
    ];
  }
}
