import { describe, expect, it } from 'vitest';
import type { Member, TypeRef } from '../src/types/index.js';
import {
  displayTypeRef,
  effectiveType,
  hasImplicitDefault,
  isNumericWidening,
  isRequiredMember,
  typeRefEquals,
  unwrapNullable,
} from '../src/utils/type-ref.js';

const int: TypeRef = { kind: 'primitive', name: 'int' };
const str: TypeRef = { kind: 'primitive', name: 'string' };
const listOf = (element: TypeRef): TypeRef => ({ kind: 'collection', container: 'List', element });

function member(name: string, type: TypeRef, overrides: Partial<Member> = {}): Member {
  return { name, type, settable: true, required: false, nullable: false, ...overrides };
}

describe('typeRefEquals', () => {
  it('treats primitive aliases as the same type', () => {
    expect(typeRefEquals(int, { kind: 'primitive', name: 'Int32' })).toBe(true);
    expect(typeRefEquals(str, { kind: 'primitive', name: 'System.String' })).toBe(true);
  });

  it('compares collections by container and element', () => {
    expect(typeRefEquals(listOf(str), listOf(str))).toBe(true);
    expect(typeRefEquals(listOf(str), listOf(int))).toBe(false);
    expect(
      typeRefEquals(listOf(str), { kind: 'collection', container: 'IEnumerable', element: str })
    ).toBe(false);
  });

  it('collapses nested nullables', () => {
    const twice: TypeRef = { kind: 'nullable', of: { kind: 'nullable', of: int } };
    expect(typeRefEquals(twice, { kind: 'nullable', of: int })).toBe(true);
    expect(typeRefEquals({ kind: 'nullable', of: int }, int)).toBe(false);
  });

  it('compares generic arguments pairwise', () => {
    const a: TypeRef = { kind: 'generic', name: 'Dictionary', args: [str, int] };
    const b: TypeRef = { kind: 'generic', name: 'Dictionary', args: [str, str] };
    expect(typeRefEquals(a, a)).toBe(true);
    expect(typeRefEquals(a, b)).toBe(false);
  });
});

describe('displayTypeRef', () => {
  it('renders containers, arrays and nullables', () => {
    expect(displayTypeRef(listOf(str))).toBe('List<string>');
    expect(displayTypeRef({ kind: 'collection', container: '[]', element: int })).toBe('int[]');
    expect(displayTypeRef({ kind: 'nullable', of: int })).toBe('int?');
    expect(
      displayTypeRef({ kind: 'generic', name: 'Dictionary', args: [str, listOf(int)] })
    ).toBe('Dictionary<string, List<int>>');
  });
});

describe('member helpers', () => {
  it('wraps nullable-flagged members', () => {
    const type = effectiveType(member('Name', str, { nullable: true }));
    expect(type).toEqual({ kind: 'nullable', of: str });
    expect(unwrapNullable(type)).toEqual(str);
  });

  it('detects numeric widening in one direction only', () => {
    expect(isNumericWidening(int, { kind: 'primitive', name: 'long' })).toBe(true);
    expect(isNumericWidening({ kind: 'primitive', name: 'long' }, int)).toBe(false);
    expect(isNumericWidening(int, str)).toBe(false);
  });

  it('knows which types fall back to a usable default', () => {
    expect(hasImplicitDefault(int)).toBe(true);
    expect(hasImplicitDefault(listOf(str))).toBe(true);
    expect(hasImplicitDefault(str)).toBe(false);
    expect(hasImplicitDefault({ kind: 'user-defined', name: 'Address' })).toBe(false);
  });

  it('derives required from the flag or a missing default', () => {
    expect(isRequiredMember(member('Count', int))).toBe(false);
    expect(isRequiredMember(member('Count', int, { required: true }))).toBe(true);
    expect(isRequiredMember(member('Title', str))).toBe(true);
    expect(isRequiredMember(member('Title', str, { nullable: true }))).toBe(false);
  });
});
