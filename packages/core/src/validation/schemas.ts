/**
 * Zod schemas for validating analysis units
 */

import { z } from 'zod';
import type { AnalysisUnit, Binding, Expr, TypeRef } from '../types/index.js';
import { AnalysisError } from '../errors/index.js';

/** Type descriptor (recursive) */
export const typeRefSchema: z.ZodType<TypeRef> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('primitive'), name: z.string().min(1) }),
    z.object({ kind: z.literal('nullable'), of: typeRefSchema }),
    z.object({
      kind: z.literal('collection'),
      container: z.string().min(1),
      element: typeRefSchema,
    }),
    z.object({ kind: z.literal('user-defined'), name: z.string().min(1) }),
    z.object({
      kind: z.literal('generic'),
      name: z.string().min(1),
      args: z.array(typeRefSchema),
    }),
    z.object({ kind: z.literal('unresolved'), text: z.string() }),
  ])
);

export const literalValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const bindingSchema: z.ZodType<Binding> = z.lazy(() =>
  z.object({ name: z.string().min(1), value: exprSchema })
);

/** Expression summary (recursive) */
export const exprSchema: z.ZodType<Expr> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('parameter'), name: z.string().min(1) }),
    z.object({ kind: z.literal('local'), name: z.string().min(1) }),
    z.object({
      kind: z.literal('captured'),
      name: z.string().min(1),
      typeName: z.string().min(1).optional(),
    }),
    z.object({ kind: z.literal('type'), name: z.string().min(1) }),
    z.object({ kind: z.literal('member'), object: exprSchema, name: z.string().min(1) }),
    z.object({
      kind: z.literal('call'),
      callee: exprSchema,
      args: z.array(exprSchema),
      async: z.boolean().optional(),
    }),
    z.object({ kind: z.literal('new'), typeName: z.string().min(1), args: z.array(exprSchema) }),
    z.object({ kind: z.literal('literal'), value: literalValueSchema }),
    z.object({
      kind: z.literal('binary'),
      operator: z.string().min(1),
      left: exprSchema,
      right: exprSchema,
    }),
    z.object({
      kind: z.literal('conditional'),
      test: exprSchema,
      whenTrue: exprSchema,
      whenFalse: exprSchema,
    }),
    z.object({ kind: z.literal('lambda'), params: z.array(z.string().min(1)), body: exprSchema }),
    z.object({ kind: z.literal('block'), bindings: z.array(bindingSchema), result: exprSchema }),
    z.object({ kind: z.literal('opaque'), text: z.string() }),
  ])
);

export const sourceLocationSchema = z.object({
  file: z.string().min(1),
  line: z.number().int().min(1),
  column: z.number().int().min(1),
});

export const memberSchema = z.object({
  name: z.string().min(1),
  type: typeRefSchema,
  settable: z.boolean().default(true),
  required: z.boolean().default(false),
  nullable: z.boolean().default(false),
  annotation: z.string().optional(),
});

export const typeShapeSchema = z.object({
  name: z.string().min(1),
  members: z.array(memberSchema),
});

const memberConfigBase = z.object({
  destMember: z.string().min(1),
  location: sourceLocationSchema.optional(),
});

export const memberConfigSchema = z.discriminatedUnion('kind', [
  memberConfigBase.extend({
    kind: z.literal('map-from'),
    parameter: z.string().min(1),
    expression: exprSchema,
  }),
  memberConfigBase.extend({ kind: z.literal('ignore') }),
  memberConfigBase.extend({
    kind: z.literal('condition'),
    parameter: z.string().min(1),
    predicate: exprSchema,
  }),
  memberConfigBase.extend({ kind: z.literal('constant'), value: exprSchema }),
]);

export const mappingDeclarationSchema = z.object({
  id: z.string().min(1),
  sourceType: z.string().min(1),
  destType: z.string().min(1),
  memberConfigs: z.array(memberConfigSchema).default([]),
  hasReverseMap: z.boolean().default(false),
  customConversion: z.boolean().optional(),
  ignoredSourceMembers: z.array(z.string().min(1)).optional(),
  maxDepth: z.number().int().min(1).optional(),
  comments: z
    .array(z.object({ destMember: z.string().min(1).optional(), text: z.string() }))
    .optional(),
  location: sourceLocationSchema.optional(),
});

export const analysisUnitSchema = z
  .object({
    id: z.string().min(1),
    shapes: z.array(typeShapeSchema),
    declarations: z.array(mappingDeclarationSchema),
  })
  .superRefine((value, ctx) => {
    const shapeNames = new Set<string>();
    value.shapes.forEach((shape, i) => {
      if (shapeNames.has(shape.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate shape name: ${shape.name}`,
          path: ['shapes', i, 'name'],
        });
      }
      shapeNames.add(shape.name);

      const memberNames = new Set<string>();
      shape.members.forEach((member, j) => {
        if (memberNames.has(member.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Duplicate member name: ${shape.name}.${member.name}`,
            path: ['shapes', i, 'members', j, 'name'],
          });
        }
        memberNames.add(member.name);
      });
    });

    const declarationIds = new Set<string>();
    value.declarations.forEach((declaration, i) => {
      if (declarationIds.has(declaration.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate declaration id: ${declaration.id}`,
          path: ['declarations', i, 'id'],
        });
      }
      declarationIds.add(declaration.id);
    });
  });

/**
 * Validate an unknown value as an AnalysisUnit
 * @throws AnalysisError with code INVALID_UNIT listing every issue
 */
export function parseAnalysisUnit(input: unknown, origin?: string): AnalysisUnit {
  const result = analysisUnitSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    });
    throw new AnalysisError({
      code: 'INVALID_UNIT',
      message: `Invalid analysis unit${origin ? ` (${origin})` : ''}:\n${issues.join('\n')}`,
      suggestion: 'Regenerate the unit with the declaration collector or fix the listed fields',
      context: { origin, issueCount: result.error.issues.length },
    });
  }
  return result.data;
}
