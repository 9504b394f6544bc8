import {
  accessor,
  type AnalysisUnit,
  type Expr,
  type MapFromConfig,
  type MappingDeclaration,
  type Member,
  type TypeRef,
  type TypeShape,
} from '@mapcheck/core';

export const int: TypeRef = { kind: 'primitive', name: 'int' };
export const long: TypeRef = { kind: 'primitive', name: 'long' };
export const str: TypeRef = { kind: 'primitive', name: 'string' };
export const bool: TypeRef = { kind: 'primitive', name: 'bool' };
export const dateTime: TypeRef = { kind: 'primitive', name: 'DateTime' };
export const decimal: TypeRef = { kind: 'primitive', name: 'decimal' };

export const nullable = (of: TypeRef): TypeRef => ({ kind: 'nullable', of });
export const listOf = (element: TypeRef): TypeRef => ({ kind: 'collection', container: 'List', element });
export const arrayOf = (element: TypeRef): TypeRef => ({ kind: 'collection', container: '[]', element });
export const userType = (name: string): TypeRef => ({ kind: 'user-defined', name });
export const unresolved = (text: string): TypeRef => ({ kind: 'unresolved', text });

export function member(name: string, type: TypeRef, overrides: Partial<Member> = {}): Member {
  return { name, type, settable: true, required: false, nullable: false, ...overrides };
}

export function shape(name: string, ...members: Member[]): TypeShape {
  return { name, members };
}

export function declaration(
  id: string,
  sourceType: string,
  destType: string,
  overrides: Partial<MappingDeclaration> = {}
): MappingDeclaration {
  return { id, sourceType, destType, memberConfigs: [], hasReverseMap: false, ...overrides };
}

export function mapFrom(destMember: string, expression: Expr, parameter = 'src'): MapFromConfig {
  return { kind: 'map-from', destMember, parameter, expression };
}

/** `src => src.<path>` */
export function mapFromSource(destMember: string, ...path: string[]): MapFromConfig {
  return mapFrom(destMember, accessor('src', ...path));
}

export function unit(shapes: TypeShape[], declarations: MappingDeclaration[], id = 'test-unit'): AnalysisUnit {
  return { id, shapes, declarations };
}
