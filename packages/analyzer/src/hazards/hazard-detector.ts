/**
 * Performance Hazard Detector
 *
 * Matches expression facts against the hazard rules. Every rule fires at
 * most once per mapping expression. Expressions too complex to summarize
 * produce no hazards.
 */

import {
  effectiveType,
  unwrapNullable,
  type AccessorPath,
  type MapFromConfig,
  type RuleId,
  type TypeRef,
  type TypeShape,
} from '@mapcheck/core';
import type { ShapeIndex } from '../classification/index.js';
import type { DependencyPatterns } from '../types/index.js';
import { OPERATION_LABELS } from './dependency-patterns.js';
import { summarizeExpression } from './expression-summary.js';

export type HazardRuleId = Extract<
  RuleId,
  | 'ExpensiveOperationInMapFrom'
  | 'MultipleEnumeration'
  | 'NonDeterministicOperation'
  | 'TaskResultSynchronousAccess'
>;

export interface HazardFinding {
  ruleId: HazardRuleId;
  properties: Record<string, string>;
}

interface EnumerationCount {
  accessor: AccessorPath;
  count: number;
}

/**
 * Type reached by following `path` from the source shape, or undefined
 * when any step cannot be resolved
 */
export function resolveAccessorType(
  source: TypeShape,
  path: string[],
  shapes: ShapeIndex
): TypeRef | undefined {
  let shape: TypeShape | undefined = source;
  let type: TypeRef | undefined;

  for (const name of path) {
    if (!shape) return undefined;
    const member = shape.members.find((m) => m.name === name);
    if (!member) return undefined;
    type = unwrapNullable(effectiveType(member));
    shape = type.kind === 'user-defined' ? shapes.get(type.name) : undefined;
  }

  return type;
}

export class HazardDetector {
  constructor(private readonly patterns: DependencyPatterns) {}

  detect(config: MapFromConfig, source: TypeShape, shapes: ShapeIndex): HazardFinding[] {
    const summary = summarizeExpression(config.expression, config.parameter, this.patterns);
    if (summary.kind === 'too-complex') return [];

    let operation: string | undefined;
    let primitive: string | undefined;
    let blockingForm: string | undefined;
    const enumerations = new Map<string, EnumerationCount>();

    for (const fact of summary.facts) {
      switch (fact.tag) {
        case 'bare-access':
          break;
        case 'enumeration-site': {
          const key = fact.accessor.path.join('.');
          const entry = enumerations.get(key);
          if (entry) entry.count++;
          else enumerations.set(key, { accessor: fact.accessor, count: 1 });
          break;
        }
        case 'dependency-call':
          operation ??= OPERATION_LABELS[fact.category];
          break;
        case 'non-deterministic':
          primitive ??= fact.primitive;
          break;
        case 'blocking-unwrap':
          blockingForm ??= fact.form;
          break;
        default: {
          const exhaustive: never = fact;
          throw new Error(`Unhandled expression fact: ${JSON.stringify(exhaustive)}`);
        }
      }
    }

    const findings: HazardFinding[] = [];

    if (operation) {
      findings.push({ ruleId: 'ExpensiveOperationInMapFrom', properties: { operation } });
    }

    for (const [key, entry] of enumerations) {
      if (entry.count < 2) continue;
      const type = resolveAccessorType(source, entry.accessor.path, shapes);
      if (type?.kind !== 'collection') continue;
      findings.push({ ruleId: 'MultipleEnumeration', properties: { collection: key } });
      break;
    }

    if (primitive) {
      findings.push({ ruleId: 'NonDeterministicOperation', properties: { operation: primitive } });
    }

    if (blockingForm) {
      findings.push({ ruleId: 'TaskResultSynchronousAccess', properties: { operation: blockingForm } });
    }

    return findings;
  }
}
