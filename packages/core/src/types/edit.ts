/**
 * Edits: model-level changes proposed by fixes
 */

import type { Expr } from './expression.js';
import type { MemberConfig, SourceLocation } from './declaration.js';
import type { Member } from './shape.js';

export interface EditAnchor {
  unitId: string;
  declarationId: string;
  destMember?: string;
  location?: SourceLocation;
}

export type EditOperation =
  | { kind: 'append-member-config'; config: MemberConfig }
  | { kind: 'remove-member-config'; destMember: string }
  | { kind: 'rewrite-expression'; destMember: string; expression: Expr }
  | { kind: 'insert-comment'; destMember?: string; lines: string[] }
  | { kind: 'insert-source-member'; typeName: string; member: Member }
  | { kind: 'remove-declaration'; declarationId: string }
  | { kind: 'ignore-source-member'; sourceMember: string }
  | { kind: 'set-max-depth'; depth: number };

export type EditOperationKind = EditOperation['kind'];

export interface Edit {
  title: string;
  /** Identifies the alternative among those offered for one diagnostic */
  equivalenceKey: string;
  anchor: EditAnchor;
  /** Applied in order, as one change */
  operations: EditOperation[];
  /** Human-readable rendering of the change */
  preview?: string;
}
