/**
 * Expression-shape summaries of mapping lambdas
 *
 * The declaration collector reduces each mapping expression to this tree.
 * Lambda parameters of the mapping itself appear as `parameter`; parameters
 * of nested lambdas and block bindings appear as `local`; variables closed
 * over from the enclosing scope appear as `captured`. Anything the collector
 * could not reduce is `opaque`.
 */

export type LiteralValue = string | number | boolean | null;

export type Expr =
  | { kind: 'parameter'; name: string }
  | { kind: 'local'; name: string }
  | { kind: 'captured'; name: string; typeName?: string }
  | { kind: 'type'; name: string }
  | { kind: 'member'; object: Expr; name: string }
  | { kind: 'call'; callee: Expr; args: Expr[]; async?: boolean }
  | { kind: 'new'; typeName: string; args: Expr[] }
  | { kind: 'literal'; value: LiteralValue }
  | { kind: 'binary'; operator: string; left: Expr; right: Expr }
  | { kind: 'conditional'; test: Expr; whenTrue: Expr; whenFalse: Expr }
  | { kind: 'lambda'; params: string[]; body: Expr }
  | { kind: 'block'; bindings: Binding[]; result: Expr }
  | { kind: 'opaque'; text: string };

export interface Binding {
  name: string;
  value: Expr;
}

export type ExprKind = Expr['kind'];
