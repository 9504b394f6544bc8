/**
 * Type descriptors as reported by the shape extractor
 */

export type TypeRef =
  | PrimitiveTypeRef
  | NullableTypeRef
  | CollectionTypeRef
  | UserDefinedTypeRef
  | GenericTypeRef
  | UnresolvedTypeRef;

/** Built-in scalar: int, long, string, bool, DateTime, Guid... */
export interface PrimitiveTypeRef {
  kind: 'primitive';
  name: string;
}

export interface NullableTypeRef {
  kind: 'nullable';
  of: TypeRef;
}

/**
 * Single-argument container. `container` is the container name
 * (List, IEnumerable, HashSet...) or `[]` for arrays.
 */
export interface CollectionTypeRef {
  kind: 'collection';
  container: string;
  element: TypeRef;
}

/** A type declared in the analyzed program, described by a TypeShape */
export interface UserDefinedTypeRef {
  kind: 'user-defined';
  name: string;
}

/** Multi-argument or non-collection generic (Dictionary<K, V>, Result<T>) */
export interface GenericTypeRef {
  kind: 'generic';
  name: string;
  args: TypeRef[];
}

/** Anything the extractor could not resolve */
export interface UnresolvedTypeRef {
  kind: 'unresolved';
  text: string;
}

export type TypeRefKind = TypeRef['kind'];
