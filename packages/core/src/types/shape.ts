/**
 * Type shapes: the structural view of a type used for compatibility checks
 */

import type { TypeRef } from './type-ref.js';

export interface Member {
  /** Member name, case preserved */
  name: string;
  type: TypeRef;
  /** Whether the mapping engine can assign this member */
  settable: boolean;
  /** Declared as required (must be assigned on construction) */
  required: boolean;
  /** Declared nullable; equivalent to wrapping `type` in a nullable */
  nullable: boolean;
  /** Free-form marker, e.g. set by fixes on members they introduce */
  annotation?: string;
}

export interface TypeShape {
  name: string;
  /** Members in declaration order */
  members: Member[];
}
