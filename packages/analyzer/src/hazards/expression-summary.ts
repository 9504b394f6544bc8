/**
 * Expression summaries
 *
 * Reduces a mapping expression to a closed set of facts the hazard rules
 * match on. An expression containing an opaque node, or nested deeper than
 * MAX_DEPTH, is reported as too complex and produces no facts at all.
 */

import { accessorPath, type AccessorPath, type Expr } from '@mapcheck/core';
import type { DependencyCategory, DependencyPatterns } from '../types/index.js';
import { classifyDependency } from './dependency-patterns.js';

export type ExpressionFact =
  | { tag: 'bare-access'; accessor: AccessorPath }
  | { tag: 'enumeration-site'; accessor: AccessorPath; operator: string }
  | { tag: 'dependency-call'; category: DependencyCategory; target: string }
  | { tag: 'non-deterministic'; primitive: string }
  | { tag: 'blocking-unwrap'; form: string };

export type ExpressionFactTag = ExpressionFact['tag'];

export type ExpressionSummary =
  | { kind: 'summarized'; facts: ExpressionFact[] }
  | { kind: 'too-complex'; reason: string };

export const MAX_DEPTH = 64;

/** Operators that force a full enumeration of their receiver */
export const ENUMERATING_OPERATORS: ReadonlySet<string> = new Set([
  'Count',
  'LongCount',
  'Sum',
  'Average',
  'Min',
  'Max',
  'Any',
  'All',
  'First',
  'FirstOrDefault',
  'Last',
  'LastOrDefault',
  'Single',
  'SingleOrDefault',
  'ToList',
  'ToArray',
  'ToDictionary',
  'ToHashSet',
  'Aggregate',
  'ForEach',
  'Contains',
  'ElementAt',
]);

/** Lazily evaluated operators, looked through to find the enumerated source */
export const DEFERRED_OPERATORS: ReadonlySet<string> = new Set([
  'Where',
  'Select',
  'SelectMany',
  'OrderBy',
  'OrderByDescending',
  'ThenBy',
  'ThenByDescending',
  'Skip',
  'Take',
  'Distinct',
  'Reverse',
  'Cast',
  'OfType',
  'AsEnumerable',
]);

const RANDOM_SOURCES: ReadonlySet<string> = new Set(['Random', 'RandomNumberGenerator']);

class TooComplexError extends Error {}

interface MethodCall {
  receiver: Expr;
  method: string;
}

function asMethodCall(expr: Expr): MethodCall | undefined {
  if (expr.kind !== 'call' || expr.callee.kind !== 'member') return undefined;
  return { receiver: expr.callee.object, method: expr.callee.name };
}

function stripDeferred(expr: Expr): Expr {
  let current = expr;
  for (let call = asMethodCall(current); call && DEFERRED_OPERATORS.has(call.method); call = asMethodCall(current)) {
    current = call.receiver;
  }
  return current;
}

/** Innermost object of a member/call chain */
function chainRoot(expr: Expr): Expr {
  let current = expr;
  for (;;) {
    if (current.kind === 'member') current = current.object;
    else if (current.kind === 'call') current = current.callee;
    else return current;
  }
}

function isTypeRoot(expr: Expr, ...names: string[]): boolean {
  return expr.kind === 'type' && names.includes(expr.name);
}

function isAsyncOperation(expr: Expr): boolean {
  if (expr.kind === 'call') {
    if (expr.async) return true;
    return expr.callee.kind === 'member' && expr.callee.name.endsWith('Async');
  }
  if (expr.kind === 'captured' && expr.typeName) {
    return /^(Task|ValueTask)\b/.test(expr.typeName);
  }
  return false;
}

function nonDeterministicPrimitive(expr: Expr): string | undefined {
  if (expr.kind === 'member') {
    if (isTypeRoot(expr.object, 'DateTime') && ['Now', 'UtcNow', 'Today'].includes(expr.name)) {
      return `DateTime.${expr.name}`;
    }
    if (isTypeRoot(expr.object, 'DateTimeOffset') && ['Now', 'UtcNow'].includes(expr.name)) {
      return `DateTimeOffset.${expr.name}`;
    }
    return undefined;
  }

  if (expr.kind === 'new') {
    if (expr.typeName === 'Random') return 'Random';
    if (expr.typeName === 'Date' && expr.args.length === 0) return 'new Date()';
    return undefined;
  }

  const call = asMethodCall(expr);
  if (call) {
    if (isTypeRoot(call.receiver, 'Guid') && call.method === 'NewGuid') return 'Guid.NewGuid()';
    if (isTypeRoot(call.receiver, 'Math') && call.method === 'random') return 'Math.random()';
    if (isTypeRoot(call.receiver, 'Date') && call.method === 'now') return 'Date.now()';
    if (isTypeRoot(call.receiver, 'crypto') && call.method === 'randomUUID') return 'crypto.randomUUID()';
  }

  // Random.Shared.Next(), _random.Next()
  const root = chainRoot(expr);
  if (root.kind === 'type' && RANDOM_SOURCES.has(root.name)) return root.name;
  if (root.kind === 'captured' && root.typeName && RANDOM_SOURCES.has(root.typeName)) return root.typeName;
  return undefined;
}

function blockingForm(expr: Expr): string | undefined {
  if (expr.kind === 'member' && expr.name === 'Result' && isAsyncOperation(expr.object)) {
    return '.Result';
  }

  const call = asMethodCall(expr);
  if (!call) return undefined;
  if (call.method === 'Wait' && isAsyncOperation(call.receiver)) {
    return '.Wait()';
  }
  if (call.method === 'GetResult') {
    const awaiter = asMethodCall(call.receiver);
    if (awaiter && awaiter.method === 'GetAwaiter') return '.GetAwaiter().GetResult()';
  }
  return undefined;
}

function dependencyTarget(expr: Expr): string | undefined {
  if (expr.kind === 'new') return expr.typeName;
  if (expr.kind !== 'member' && expr.kind !== 'call') return undefined;
  const root = chainRoot(expr);
  if (root.kind === 'captured') return root.typeName;
  if (root.kind === 'type') return root.name;
  return undefined;
}

function visit(
  expr: Expr,
  parameter: string,
  patterns: DependencyPatterns,
  depth: number,
  facts: ExpressionFact[]
): void {
  if (depth > MAX_DEPTH) {
    throw new TooComplexError(`expression nested deeper than ${MAX_DEPTH}`);
  }

  switch (expr.kind) {
    case 'opaque':
      throw new TooComplexError(`opaque expression: ${expr.text}`);
    case 'parameter':
    case 'local':
    case 'captured':
    case 'type':
    case 'literal':
      return;
    case 'member':
      collectNodeFacts(expr, parameter, patterns, facts);
      visit(expr.object, parameter, patterns, depth + 1, facts);
      return;
    case 'call':
      collectNodeFacts(expr, parameter, patterns, facts);
      visit(expr.callee, parameter, patterns, depth + 1, facts);
      for (const arg of expr.args) visit(arg, parameter, patterns, depth + 1, facts);
      return;
    case 'new':
      collectNodeFacts(expr, parameter, patterns, facts);
      for (const arg of expr.args) visit(arg, parameter, patterns, depth + 1, facts);
      return;
    case 'binary':
      visit(expr.left, parameter, patterns, depth + 1, facts);
      visit(expr.right, parameter, patterns, depth + 1, facts);
      return;
    case 'conditional':
      visit(expr.test, parameter, patterns, depth + 1, facts);
      visit(expr.whenTrue, parameter, patterns, depth + 1, facts);
      visit(expr.whenFalse, parameter, patterns, depth + 1, facts);
      return;
    case 'lambda':
      visit(expr.body, parameter, patterns, depth + 1, facts);
      return;
    case 'block':
      for (const binding of expr.bindings) visit(binding.value, parameter, patterns, depth + 1, facts);
      visit(expr.result, parameter, patterns, depth + 1, facts);
      return;
  }
}

function collectNodeFacts(
  expr: Expr,
  parameter: string,
  patterns: DependencyPatterns,
  facts: ExpressionFact[]
): void {
  const call = asMethodCall(expr);
  if (call && ENUMERATING_OPERATORS.has(call.method)) {
    const accessor = accessorPath(stripDeferred(call.receiver));
    if (accessor && accessor.root === parameter && accessor.path.length > 0) {
      facts.push({ tag: 'enumeration-site', accessor, operator: call.method });
    }
  }

  const primitive = nonDeterministicPrimitive(expr);
  if (primitive) {
    facts.push({ tag: 'non-deterministic', primitive });
  }

  const form = blockingForm(expr);
  if (form) {
    facts.push({ tag: 'blocking-unwrap', form });
  }

  const target = dependencyTarget(expr);
  if (target) {
    const category = classifyDependency(target, patterns);
    if (category) facts.push({ tag: 'dependency-call', category, target });
  }
}

/**
 * Summarize a mapping expression whose source lambda parameter is `parameter`
 */
export function summarizeExpression(
  expr: Expr,
  parameter: string,
  patterns: DependencyPatterns
): ExpressionSummary {
  const facts: ExpressionFact[] = [];

  const bare = accessorPath(expr);
  if (bare && bare.root === parameter && bare.path.length > 0) {
    facts.push({ tag: 'bare-access', accessor: bare });
  }

  try {
    visit(expr, parameter, patterns, 1, facts);
  } catch (err) {
    if (err instanceof TooComplexError) {
      return { kind: 'too-complex', reason: err.message };
    }
    throw err;
  }

  return { kind: 'summarized', facts };
}
