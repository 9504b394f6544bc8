import {
  displayTypeRef,
  literal,
  memberAccess,
  methodCall,
  normalizePrimitiveName,
  typeRoot,
  unwrapNullable,
  type Expr,
  type TypeRef,
} from '@mapcheck/core';

const STATIC_DEFAULTS: Record<string, [string, string]> = {
  DateTime: ['DateTime', 'MinValue'],
  DateTimeOffset: ['DateTimeOffset', 'MinValue'],
  TimeSpan: ['TimeSpan', 'Zero'],
  Guid: ['Guid', 'Empty'],
  char: ['char', 'MinValue'],
};

/**
 * Literal standing in for "no value" of a type: `""`, `0`, `false`,
 * `DateTime.MinValue`, `Guid.Empty`, `new T()`. Undefined when no
 * sensible literal exists.
 */
export function defaultValueFor(type: TypeRef): Expr | undefined {
  const target = unwrapNullable(type);
  switch (target.kind) {
    case 'primitive': {
      const name = normalizePrimitiveName(target.name);
      if (name === 'string') return literal('');
      if (name === 'bool') return literal(false);
      if (name === 'object') return { kind: 'new', typeName: 'object', args: [] };
      if (['sbyte', 'byte', 'short', 'ushort', 'int', 'uint', 'long', 'ulong', 'float', 'double', 'decimal'].includes(name)) {
        return literal(0);
      }
      const staticDefault = STATIC_DEFAULTS[name];
      if (staticDefault) {
        return memberAccess(typeRoot(staticDefault[0]), staticDefault[1]);
      }
      return undefined;
    }
    case 'collection':
      if (target.container === '[]') {
        return methodCall(typeRoot('Array'), `Empty<${displayTypeRef(target.element)}>`);
      }
      return { kind: 'new', typeName: displayTypeRef(target), args: [] };
    case 'user-defined':
    case 'generic':
      return { kind: 'new', typeName: displayTypeRef(target), args: [] };
    case 'nullable':
    case 'unresolved':
      return undefined;
  }
}
