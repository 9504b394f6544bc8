import { AnalysisError, type AnalysisUnit } from '@mapcheck/core';
import type { AnalysisReport } from '@mapcheck/analyzer';

interface StoredUnit {
  unit: AnalysisUnit;
  origin?: string;
  /** Latest report for the unit as currently stored */
  report?: AnalysisReport;
}

export interface UnitInfo {
  id: string;
  origin?: string;
  shapes: number;
  declarations: number;
  analyzed: boolean;
}

/**
 * Session copy of the loaded units. Applied fixes replace the stored unit
 * and discard its report; files on disk are never written.
 */
export class UnitStore {
  private readonly units = new Map<string, StoredUnit>();

  add(unit: AnalysisUnit, origin?: string): void {
    this.units.set(unit.id, { unit, ...(origin ? { origin } : {}) });
  }

  has(id: string): boolean {
    return this.units.has(id);
  }

  list(): UnitInfo[] {
    return Array.from(this.units.values(), ({ unit, origin, report }) => ({
      id: unit.id,
      ...(origin ? { origin } : {}),
      shapes: unit.shapes.length,
      declarations: unit.declarations.length,
      analyzed: report !== undefined,
    }));
  }

  getOrThrow(id: string): AnalysisUnit {
    return this.entry(id).unit;
  }

  replace(unit: AnalysisUnit): void {
    const current = this.entry(unit.id);
    this.units.set(unit.id, { unit, ...(current.origin ? { origin: current.origin } : {}) });
  }

  getReport(id: string): AnalysisReport | undefined {
    return this.entry(id).report;
  }

  /**
   * Store `report` only while `unit` is still the stored unit. A pass that
   * finishes after a fix replaced the unit describes an old version.
   */
  setReport(unit: AnalysisUnit, report: AnalysisReport): boolean {
    const current = this.entry(unit.id);
    if (current.unit !== unit) return false;
    this.units.set(unit.id, { ...current, report });
    return true;
  }

  private entry(id: string): StoredUnit {
    const stored = this.units.get(id);
    if (!stored) {
      throw new AnalysisError({
        code: 'UNIT_NOT_FOUND',
        message: `Unit '${id}' is not loaded`,
        unitId: id,
        suggestion: `Use list_units to see available units (${Array.from(this.units.keys()).join(', ') || 'none'})`,
      });
    }
    return stored;
  }
}
