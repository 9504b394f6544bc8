/**
 * Recursion Detector
 *
 * Finds destination members whose nested mapping leads back to a type that
 * is already being mapped. A declaration with a depth limit is exempt.
 */

import { unwrapNullable, type MappingDeclaration, type TypeRef, type TypeShape } from '@mapcheck/core';
import type { ShapeIndex } from './compatibility-classifier.js';
import type { OverrideMap } from './override-map.js';

export interface RecursionFinding {
  /** `self-referencing type 'Node'` or `circular references` */
  reason: string;
  /** Destination members that recurse, in destination order */
  members: string[];
}

/**
 * User-defined type a member refers to, looking through nullables and
 * collection elements
 */
export function referencedTypeName(type: TypeRef): string | undefined {
  const inner = unwrapNullable(type);
  if (inner.kind === 'user-defined') return inner.name;
  if (inner.kind === 'collection') return referencedTypeName(inner.element);
  return undefined;
}

/**
 * Depth-first walk over the member graph with `onPath` marking the types on
 * the current path. Reaching one of them again closes a cycle.
 */
function reachesCycle(typeName: string, shapes: ShapeIndex, onPath: Set<string>, done: Set<string>): boolean {
  if (onPath.has(typeName)) return true;
  if (done.has(typeName)) return false;
  const shape = shapes.get(typeName);
  if (!shape) return false;

  onPath.add(typeName);
  for (const member of shape.members) {
    const next = referencedTypeName(member.type);
    if (next !== undefined && reachesCycle(next, shapes, onPath, done)) return true;
  }
  onPath.delete(typeName);
  done.add(typeName);
  return false;
}

export function detectRecursion(
  declaration: MappingDeclaration,
  source: TypeShape,
  dest: TypeShape,
  shapes: ShapeIndex,
  overrides: OverrideMap
): RecursionFinding | undefined {
  if (declaration.maxDepth !== undefined) return undefined;

  let selfType: string | undefined;
  const members: string[] = [];

  for (const destMember of dest.members) {
    if (overrides.get(destMember.name)?.kind === 'ignore') continue;
    const sourceMember = source.members.find((m) => m.name === destMember.name);
    if (!sourceMember) continue;

    const sourceRef = referencedTypeName(sourceMember.type);
    const destRef = referencedTypeName(destMember.type);
    if (sourceRef === undefined || destRef === undefined) continue;

    if (sourceRef === source.name || destRef === dest.name) {
      selfType ??= sourceRef === source.name ? source.name : dest.name;
      members.push(destMember.name);
    } else if (reachesCycle(sourceRef, shapes, new Set([source.name]), new Set())) {
      members.push(destMember.name);
    }
  }

  if (members.length === 0) return undefined;
  return {
    reason: selfType !== undefined ? `self-referencing type '${selfType}'` : 'circular references',
    members,
  };
}
