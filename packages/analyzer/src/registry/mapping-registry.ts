/**
 * Mapping Registry
 *
 * One-hop edge set of declared mappings for a single analysis unit.
 * `A -> B` exists when a declaration maps A to B, or when a declaration
 * maps B to A with reverse mapping enabled. Edges are never chained.
 */

import type { AnalysisUnit, MappingDeclaration } from '@mapcheck/core';

export interface DuplicateDeclaration {
  declaration: MappingDeclaration;
  /** The first declaration of the same pair */
  original: MappingDeclaration;
}

function pairKey(source: string, dest: string): string {
  return `${source}\u0000${dest}`;
}

export class MappingRegistry {
  readonly unitId: string;
  private readonly edges = new Map<string, Set<string>>();
  private readonly firstDeclared = new Map<string, MappingDeclaration>();
  private readonly duplicates: DuplicateDeclaration[] = [];

  constructor(unit: AnalysisUnit) {
    this.unitId = unit.id;

    for (const declaration of unit.declarations) {
      const key = pairKey(declaration.sourceType, declaration.destType);
      const original = this.firstDeclared.get(key);
      if (original) {
        this.duplicates.push({ declaration, original });
      } else {
        this.firstDeclared.set(key, declaration);
      }

      this.addEdge(declaration.sourceType, declaration.destType);
      if (declaration.hasReverseMap) {
        this.addEdge(declaration.destType, declaration.sourceType);
      }
    }
  }

  private addEdge(source: string, dest: string): void {
    let targets = this.edges.get(source);
    if (!targets) {
      targets = new Set();
      this.edges.set(source, targets);
    }
    targets.add(dest);
  }

  isEffectivelyMapped(source: string, dest: string): boolean {
    return this.edges.get(source)?.has(dest) ?? false;
  }

  targetsOf(source: string): string[] {
    return Array.from(this.edges.get(source) ?? []);
  }

  /**
   * Declarations that repeat an already declared source/destination pair.
   * Reverse edges are not declarations and never count.
   */
  findDuplicates(): DuplicateDeclaration[] {
    return [...this.duplicates];
  }

  get edgeCount(): number {
    let count = 0;
    for (const targets of this.edges.values()) count += targets.size;
    return count;
  }
}
