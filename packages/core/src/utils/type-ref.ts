/**
 * TypeRef comparison and display
 */

import type { Member, TypeRef } from '../types/index.js';

const PRIMITIVE_ALIASES: Record<string, string> = {
  Int16: 'short',
  Int32: 'int',
  Int64: 'long',
  UInt16: 'ushort',
  UInt32: 'uint',
  UInt64: 'ulong',
  Byte: 'byte',
  SByte: 'sbyte',
  Single: 'float',
  Double: 'double',
  Decimal: 'decimal',
  Boolean: 'bool',
  Char: 'char',
  String: 'string',
  Object: 'object',
};

/** Implicit numeric conversions that never lose magnitude */
const NUMERIC_WIDENING: Record<string, readonly string[]> = {
  sbyte: ['short', 'int', 'long', 'float', 'double', 'decimal'],
  byte: ['short', 'ushort', 'int', 'uint', 'long', 'ulong', 'float', 'double', 'decimal'],
  short: ['int', 'long', 'float', 'double', 'decimal'],
  ushort: ['int', 'uint', 'long', 'ulong', 'float', 'double', 'decimal'],
  int: ['long', 'float', 'double', 'decimal'],
  uint: ['long', 'ulong', 'float', 'double', 'decimal'],
  long: ['float', 'double', 'decimal'],
  ulong: ['float', 'double', 'decimal'],
  char: ['ushort', 'int', 'uint', 'long', 'ulong', 'float', 'double', 'decimal'],
  float: ['double'],
};

const NUMERIC_PRIMITIVES = new Set([
  'sbyte',
  'byte',
  'short',
  'ushort',
  'int',
  'uint',
  'long',
  'ulong',
  'float',
  'double',
  'decimal',
]);

/** Primitives whose default value is not an acceptable stand-in */
const NO_IMPLICIT_DEFAULT = new Set(['string', 'object']);

/**
 * Canonical primitive name: `System.Int32` and `Int32` become `int`
 */
export function normalizePrimitiveName(name: string): string {
  const bare = name.startsWith('System.') ? name.slice('System.'.length) : name;
  return PRIMITIVE_ALIASES[bare] ?? bare;
}

/**
 * Effective type of a member: a member flagged nullable is nullable-of its type
 */
export function effectiveType(member: Member): TypeRef {
  if (member.nullable && member.type.kind !== 'nullable') {
    return { kind: 'nullable', of: member.type };
  }
  return member.type;
}

export function unwrapNullable(type: TypeRef): TypeRef {
  let current = type;
  while (current.kind === 'nullable') {
    current = current.of;
  }
  return current;
}

export function isNullable(type: TypeRef): boolean {
  return type.kind === 'nullable';
}

export function isPrimitive(type: TypeRef, name: string): boolean {
  return type.kind === 'primitive' && normalizePrimitiveName(type.name) === name;
}

export function isStringType(type: TypeRef): boolean {
  return isPrimitive(type, 'string');
}

export function isNumericType(type: TypeRef): boolean {
  return type.kind === 'primitive' && NUMERIC_PRIMITIVES.has(normalizePrimitiveName(type.name));
}

/**
 * True when the type mentions an unresolved descriptor anywhere
 */
export function containsUnresolved(type: TypeRef): boolean {
  switch (type.kind) {
    case 'unresolved':
      return true;
    case 'nullable':
      return containsUnresolved(type.of);
    case 'collection':
      return containsUnresolved(type.element);
    case 'generic':
      return type.args.some(containsUnresolved);
    case 'primitive':
    case 'user-defined':
      return false;
  }
}

/**
 * Structural equality. Nested nullables collapse and primitive aliases
 * compare equal; container names must match exactly.
 */
export function typeRefEquals(a: TypeRef, b: TypeRef): boolean {
  if (a.kind === 'nullable' && a.of.kind === 'nullable') return typeRefEquals(a.of, b);
  if (b.kind === 'nullable' && b.of.kind === 'nullable') return typeRefEquals(a, b.of);

  switch (a.kind) {
    case 'primitive':
      return b.kind === 'primitive' && normalizePrimitiveName(a.name) === normalizePrimitiveName(b.name);
    case 'nullable':
      return b.kind === 'nullable' && typeRefEquals(a.of, b.of);
    case 'collection':
      return (
        b.kind === 'collection' &&
        a.container === b.container &&
        typeRefEquals(a.element, b.element)
      );
    case 'user-defined':
      return b.kind === 'user-defined' && a.name === b.name;
    case 'generic':
      return (
        b.kind === 'generic' &&
        a.name === b.name &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => {
          const other = b.args[i];
          return other !== undefined && typeRefEquals(arg, other);
        })
      );
    case 'unresolved':
      return b.kind === 'unresolved' && a.text === b.text;
  }
}

/**
 * Implicit numeric widening, e.g. int to long or float to double
 */
export function isNumericWidening(from: TypeRef, to: TypeRef): boolean {
  if (from.kind !== 'primitive' || to.kind !== 'primitive') return false;
  const targets = NUMERIC_WIDENING[normalizePrimitiveName(from.name)];
  return targets !== undefined && targets.includes(normalizePrimitiveName(to.name));
}

/**
 * Whether an unassigned member of this type gets a usable default value.
 * Value primitives, nullables and collections do; strings, objects,
 * user-defined and generic types do not. Unresolved types are given the
 * benefit of the doubt.
 */
export function hasImplicitDefault(type: TypeRef): boolean {
  switch (type.kind) {
    case 'nullable':
    case 'collection':
    case 'unresolved':
      return true;
    case 'primitive':
      return !NO_IMPLICIT_DEFAULT.has(normalizePrimitiveName(type.name));
    case 'user-defined':
    case 'generic':
      return false;
  }
}

/**
 * Required means flagged required, or non-nullable with no acceptable default
 */
export function isRequiredMember(member: Member): boolean {
  if (member.required) return true;
  const type = effectiveType(member);
  return !hasImplicitDefault(type);
}

export function displayTypeRef(type: TypeRef): string {
  switch (type.kind) {
    case 'primitive':
      return type.name;
    case 'nullable':
      return `${displayTypeRef(type.of)}?`;
    case 'collection':
      return type.container === '[]'
        ? `${displayTypeRef(type.element)}[]`
        : `${type.container}<${displayTypeRef(type.element)}>`;
    case 'user-defined':
      return type.name;
    case 'generic':
      return `${type.name}<${type.args.map(displayTypeRef).join(', ')}>`;
    case 'unresolved':
      return type.text;
  }
}
