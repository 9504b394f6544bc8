/**
 * Mapping declarations and analysis units
 */

import type { Expr } from './expression.js';
import type { TypeShape } from './shape.js';

export interface SourceLocation {
  file: string;
  line: number;
  column: number;
}

interface MemberConfigBase {
  /** Destination member this configuration targets */
  destMember: string;
  location?: SourceLocation;
}

export interface MapFromConfig extends MemberConfigBase {
  kind: 'map-from';
  /** Name of the source lambda parameter (`src` in `src => src.Name`) */
  parameter: string;
  expression: Expr;
}

export interface IgnoreConfig extends MemberConfigBase {
  kind: 'ignore';
}

export interface ConditionConfig extends MemberConfigBase {
  kind: 'condition';
  parameter: string;
  predicate: Expr;
}

export interface ConstantConfig extends MemberConfigBase {
  kind: 'constant';
  value: Expr;
}

export type MemberConfig =
  | MapFromConfig
  | IgnoreConfig
  | ConditionConfig
  | ConstantConfig;

export type MemberConfigKind = MemberConfig['kind'];

export interface DeclarationComment {
  /** Member the comment is attached to; absent for declaration-level notes */
  destMember?: string;
  text: string;
}

export interface MappingDeclaration {
  /** Stable id, unique within the unit */
  id: string;
  sourceType: string;
  destType: string;
  /** Member configurations in declaration order; the last one per member wins */
  memberConfigs: MemberConfig[];
  /** Also registers the inverse mapping */
  hasReverseMap: boolean;
  /** Uses a custom converter or constructor; convention rules do not apply */
  customConversion?: boolean;
  /** Source members deliberately left out of the destination */
  ignoredSourceMembers?: string[];
  /** Nesting limit for self-referencing graphs */
  maxDepth?: number;
  comments?: DeclarationComment[];
  location?: SourceLocation;
}

/**
 * The visibility boundary for one analysis pass. Declarations in different
 * units never satisfy each other.
 */
export interface AnalysisUnit {
  id: string;
  shapes: TypeShape[];
  declarations: MappingDeclaration[];
}
