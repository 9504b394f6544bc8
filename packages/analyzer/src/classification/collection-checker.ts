/**
 * Collection Compatibility Checker
 *
 * Compares two single-argument containers by element type. Container kinds
 * may differ freely (List<T> to T[] is fine); only elements matter.
 */

import {
  containsUnresolved,
  isNumericWidening,
  typeRefEquals,
  unwrapNullable,
  type CollectionTypeRef,
  type TypeRef,
} from '@mapcheck/core';
import type { MappingRegistry } from '../registry/index.js';

export type CollectionVerdict =
  | { kind: 'compatible' }
  | { kind: 'mismatch' }
  /** Not classified: nested generics or unresolved elements */
  | { kind: 'unclassified'; reason: string };

function isNested(type: TypeRef): boolean {
  const inner = unwrapNullable(type);
  return inner.kind === 'collection' || inner.kind === 'generic';
}

export function checkCollectionCompatibility(
  source: CollectionTypeRef,
  dest: CollectionTypeRef,
  registry: MappingRegistry
): CollectionVerdict {
  const sourceElement = source.element;
  const destElement = dest.element;

  if (typeRefEquals(sourceElement, destElement)) {
    return { kind: 'compatible' };
  }

  if (containsUnresolved(sourceElement) || containsUnresolved(destElement)) {
    return { kind: 'unclassified', reason: 'unresolved element type' };
  }

  if (isNested(sourceElement) || isNested(destElement)) {
    return { kind: 'unclassified', reason: 'nested generic element type' };
  }

  // T elements into T? elements are fine; the reverse loses nullability
  if (sourceElement.kind === 'nullable' && destElement.kind !== 'nullable') {
    return { kind: 'mismatch' };
  }
  const from = unwrapNullable(sourceElement);
  const target = unwrapNullable(destElement);

  if (typeRefEquals(from, target) || isNumericWidening(from, target)) {
    return { kind: 'compatible' };
  }

  if (
    from.kind === 'user-defined' &&
    target.kind === 'user-defined' &&
    registry.isEffectivelyMapped(from.name, target.name)
  ) {
    return { kind: 'compatible' };
  }

  return { kind: 'mismatch' };
}
