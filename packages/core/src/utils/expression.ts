/**
 * Expression tree helpers: construction, traversal, equality and printing
 */

import type { Expr, LiteralValue, MemberConfig } from '../types/index.js';

export function parameter(name: string): Expr {
  return { kind: 'parameter', name };
}

export function local(name: string): Expr {
  return { kind: 'local', name };
}

export function literal(value: LiteralValue): Expr {
  return { kind: 'literal', value };
}

export function typeRoot(name: string): Expr {
  return { kind: 'type', name };
}

/** `object.name` */
export function memberAccess(object: Expr, name: string): Expr {
  return { kind: 'member', object, name };
}

/** `receiver.method(args)` */
export function methodCall(receiver: Expr, method: string, args: Expr[] = []): Expr {
  return { kind: 'call', callee: memberAccess(receiver, method), args };
}

/**
 * Builds `root.a.b.c` from a parameter name and a member path
 */
export function accessor(root: string, ...path: string[]): Expr {
  return path.reduce<Expr>((object, name) => memberAccess(object, name), parameter(root));
}

export function childrenOf(expr: Expr): Expr[] {
  switch (expr.kind) {
    case 'member':
      return [expr.object];
    case 'call':
      return [expr.callee, ...expr.args];
    case 'new':
      return expr.args;
    case 'binary':
      return [expr.left, expr.right];
    case 'conditional':
      return [expr.test, expr.whenTrue, expr.whenFalse];
    case 'lambda':
      return [expr.body];
    case 'block':
      return [...expr.bindings.map((b) => b.value), expr.result];
    case 'parameter':
    case 'local':
    case 'captured':
    case 'type':
    case 'literal':
    case 'opaque':
      return [];
  }
}

/**
 * Rebuilds a node with each direct child passed through `fn`
 */
export function mapChildren(expr: Expr, fn: (child: Expr) => Expr): Expr {
  switch (expr.kind) {
    case 'member':
      return { ...expr, object: fn(expr.object) };
    case 'call':
      return { ...expr, callee: fn(expr.callee), args: expr.args.map(fn) };
    case 'new':
      return { ...expr, args: expr.args.map(fn) };
    case 'binary':
      return { ...expr, left: fn(expr.left), right: fn(expr.right) };
    case 'conditional':
      return {
        ...expr,
        test: fn(expr.test),
        whenTrue: fn(expr.whenTrue),
        whenFalse: fn(expr.whenFalse),
      };
    case 'lambda':
      return { ...expr, body: fn(expr.body) };
    case 'block':
      return {
        ...expr,
        bindings: expr.bindings.map((b) => ({ name: b.name, value: fn(b.value) })),
        result: fn(expr.result),
      };
    case 'parameter':
    case 'local':
    case 'captured':
    case 'type':
    case 'literal':
    case 'opaque':
      return expr;
  }
}

/**
 * Replaces every occurrence of `target` (structurally) with `replacement`
 */
export function replaceExpr(expr: Expr, target: Expr, replacement: Expr): Expr {
  if (exprEquals(expr, target)) return replacement;
  return mapChildren(expr, (child) => replaceExpr(child, target, replacement));
}

export function containsExpr(expr: Expr, target: Expr): boolean {
  if (exprEquals(expr, target)) return true;
  return childrenOf(expr).some((child) => containsExpr(child, target));
}

function listEquals(a: Expr[], b: Expr[]): boolean {
  return (
    a.length === b.length &&
    a.every((item, i) => {
      const other = b[i];
      return other !== undefined && exprEquals(item, other);
    })
  );
}

export function exprEquals(a: Expr, b: Expr): boolean {
  switch (a.kind) {
    case 'parameter':
      return b.kind === 'parameter' && a.name === b.name;
    case 'local':
      return b.kind === 'local' && a.name === b.name;
    case 'captured':
      return b.kind === 'captured' && a.name === b.name && a.typeName === b.typeName;
    case 'type':
      return b.kind === 'type' && a.name === b.name;
    case 'member':
      return b.kind === 'member' && a.name === b.name && exprEquals(a.object, b.object);
    case 'call':
      return (
        b.kind === 'call' &&
        Boolean(a.async) === Boolean(b.async) &&
        exprEquals(a.callee, b.callee) &&
        listEquals(a.args, b.args)
      );
    case 'new':
      return b.kind === 'new' && a.typeName === b.typeName && listEquals(a.args, b.args);
    case 'literal':
      return b.kind === 'literal' && a.value === b.value;
    case 'binary':
      return (
        b.kind === 'binary' &&
        a.operator === b.operator &&
        exprEquals(a.left, b.left) &&
        exprEquals(a.right, b.right)
      );
    case 'conditional':
      return (
        b.kind === 'conditional' &&
        exprEquals(a.test, b.test) &&
        exprEquals(a.whenTrue, b.whenTrue) &&
        exprEquals(a.whenFalse, b.whenFalse)
      );
    case 'lambda':
      return (
        b.kind === 'lambda' &&
        a.params.length === b.params.length &&
        a.params.every((p, i) => p === b.params[i]) &&
        exprEquals(a.body, b.body)
      );
    case 'block':
      return (
        b.kind === 'block' &&
        a.bindings.length === b.bindings.length &&
        a.bindings.every((binding, i) => {
          const other = b.bindings[i];
          return other !== undefined && other.name === binding.name && exprEquals(binding.value, other.value);
        }) &&
        exprEquals(a.result, b.result)
      );
    case 'opaque':
      return b.kind === 'opaque' && a.text === b.text;
  }
}

export interface AccessorPath {
  /** Lambda parameter the chain starts from */
  root: string;
  /** Member names read off the root, outermost last */
  path: string[];
}

/**
 * Decomposes `src.A.B` into `{ root: 'src', path: ['A', 'B'] }`.
 * Returns undefined for anything that is not a pure member chain on a parameter.
 */
export function accessorPath(expr: Expr): AccessorPath | undefined {
  if (expr.kind === 'parameter') return { root: expr.name, path: [] };
  if (expr.kind !== 'member') return undefined;
  const inner = accessorPath(expr.object);
  if (!inner) return undefined;
  return { root: inner.root, path: [...inner.path, expr.name] };
}

/**
 * First-level members of `parameter` read anywhere in `expr`:
 * `src.Address.City` and `src.Items.Count()` read `Address` and `Items`.
 */
export function readMembers(expr: Expr, parameter: string): string[] {
  const found = new Set<string>();
  const visit = (node: Expr): void => {
    if (node.kind === 'lambda' && node.params.includes(parameter)) return;
    const path = accessorPath(node);
    const first = path?.path[0];
    if (path && path.root === parameter && first !== undefined) {
      found.add(first);
      return;
    }
    childrenOf(node).forEach(visit);
  };
  visit(expr);
  return [...found];
}

export function exprDepth(expr: Expr): number {
  const children = childrenOf(expr);
  if (children.length === 0) return 1;
  return 1 + Math.max(...children.map(exprDepth));
}

function needsParens(expr: Expr): boolean {
  return expr.kind === 'binary' || expr.kind === 'conditional' || expr.kind === 'lambda';
}

function printOperand(expr: Expr): string {
  const text = printExpr(expr);
  return needsParens(expr) ? `(${text})` : text;
}

function printLiteral(value: LiteralValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  return String(value);
}

export function printExpr(expr: Expr): string {
  switch (expr.kind) {
    case 'parameter':
    case 'local':
    case 'captured':
    case 'type':
      return expr.name;
    case 'member':
      return `${printOperand(expr.object)}.${expr.name}`;
    case 'call':
      return `${printOperand(expr.callee)}(${expr.args.map(printExpr).join(', ')})`;
    case 'new':
      return `new ${expr.typeName}(${expr.args.map(printExpr).join(', ')})`;
    case 'literal':
      return printLiteral(expr.value);
    case 'binary':
      return `${printOperand(expr.left)} ${expr.operator} ${printOperand(expr.right)}`;
    case 'conditional':
      return `${printOperand(expr.test)} ? ${printOperand(expr.whenTrue)} : ${printOperand(expr.whenFalse)}`;
    case 'lambda': {
      const params = expr.params.length === 1 ? (expr.params[0] ?? '') : `(${expr.params.join(', ')})`;
      return `${params} => ${printExpr(expr.body)}`;
    }
    case 'block': {
      const statements = expr.bindings.map((b) => `var ${b.name} = ${printExpr(b.value)};`);
      statements.push(`return ${printExpr(expr.result)};`);
      return `{ ${statements.join(' ')} }`;
    }
    case 'opaque':
      return expr.text;
  }
}

/**
 * Renders a member configuration in fluent form, e.g.
 * `ForMember(dest => dest.Name, opt => opt.MapFrom(src => src.FullName))`
 */
export function printMemberConfig(config: MemberConfig): string {
  const target = `dest => dest.${config.destMember}`;
  switch (config.kind) {
    case 'map-from':
      return `ForMember(${target}, opt => opt.MapFrom(${config.parameter} => ${printExpr(config.expression)}))`;
    case 'ignore':
      return `ForMember(${target}, opt => opt.Ignore())`;
    case 'condition':
      return `ForMember(${target}, opt => opt.Condition(${config.parameter} => ${printExpr(config.predicate)}))`;
    case 'constant':
      return `ForMember(${target}, opt => opt.UseValue(${printExpr(config.value)}))`;
  }
}
