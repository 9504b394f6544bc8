/**
 * Tool handlers
 *
 * Transport-independent implementations of the MCP tools. Each handler
 * returns plain data or throws; the server turns both into tool results.
 */

import { AnalysisError, type AnalysisUnit, type Diagnostic } from '@mapcheck/core';
import {
  formatReportForMcp,
  listRules,
  type AnalysisFailure,
  type AnalysisReport,
  type MappingAnalyzer,
  type MCPSummary,
  type SeveritySetting,
} from '@mapcheck/analyzer';
import type { UnitInfo, UnitStore } from './unit-store.js';

export interface IndexedDiagnostic extends Diagnostic {
  index: number;
}

export interface AnalyzeUnitResult {
  unit_id: string;
  summary: MCPSummary;
  insights: string[];
  diagnostics: IndexedDiagnostic[];
  failures: AnalysisFailure[];
}

export interface FixSuggestion {
  equivalence_key: string;
  title: string;
  preview?: string;
}

export interface RuleInfo {
  id: string;
  title: string;
  category: string;
  defaultSeverity: string;
  effectiveSeverity: SeveritySetting;
  description: string;
}

function indexed(report: AnalysisReport): IndexedDiagnostic[] {
  return report.diagnostics.map((diagnostic, index) => ({ index, ...diagnostic }));
}

export class MappingTools {
  constructor(
    private readonly store: UnitStore,
    private readonly analyzer: MappingAnalyzer
  ) {}

  listUnits(): { units: UnitInfo[]; count: number } {
    const units = this.store.list();
    return { units, count: units.length };
  }

  listRules(): { rules: RuleInfo[]; count: number } {
    const rules = listRules().map((rule): RuleInfo => ({
      id: rule.id,
      title: rule.title,
      category: rule.category,
      defaultSeverity: rule.defaultSeverity,
      effectiveSeverity: this.analyzer.severityFor(rule.id, rule.defaultSeverity) ?? 'off',
      description: rule.description,
    }));
    return { rules, count: rules.length };
  }

  getUnit(unitId: string): AnalysisUnit {
    return this.store.getOrThrow(unitId);
  }

  async analyzeUnit(unitId: string, signal?: AbortSignal): Promise<AnalyzeUnitResult> {
    const { report } = await this.analyze(unitId, signal);
    const formatted = formatReportForMcp(report);
    return {
      unit_id: unitId,
      summary: formatted.summary,
      insights: formatted.insights,
      diagnostics: indexed(report),
      failures: report.failures,
    };
  }

  async suggestFixes(
    unitId: string,
    diagnosticIndex: number
  ): Promise<{ unit_id: string; diagnostic: IndexedDiagnostic; fixes: FixSuggestion[] }> {
    const { unit, diagnostic } = await this.resolveDiagnostic(unitId, diagnosticIndex);
    const fixes = this.analyzer.suggestFixes(unit, diagnostic).map((edit) => ({
      equivalence_key: edit.equivalenceKey,
      title: edit.title,
      ...(edit.preview !== undefined ? { preview: edit.preview } : {}),
    }));
    return { unit_id: unitId, diagnostic: { index: diagnosticIndex, ...diagnostic }, fixes };
  }

  /**
   * Apply one fix to the session copy of the unit and re-analyze it
   */
  async applyFix(
    unitId: string,
    diagnosticIndex: number,
    equivalenceKey: string
  ): Promise<{ unit_id: string; applied: string; result: AnalyzeUnitResult }> {
    const { unit, diagnostic } = await this.resolveDiagnostic(unitId, diagnosticIndex);
    if (this.store.getOrThrow(unitId) !== unit) {
      throw new AnalysisError({
        code: 'UNIT_CHANGED',
        message: `Unit '${unitId}' changed while the fix was being prepared`,
        unitId,
        suggestion: 'Run analyze_unit and retry with an index from the new report',
      });
    }
    const updated = this.analyzer.applyFix(unit, diagnostic, equivalenceKey);
    this.store.replace(updated);
    return { unit_id: unitId, applied: equivalenceKey, result: await this.analyzeUnit(unitId) };
  }

  private async analyze(
    unitId: string,
    signal?: AbortSignal
  ): Promise<{ unit: AnalysisUnit; report: AnalysisReport }> {
    const unit = this.store.getOrThrow(unitId);
    const report = await this.analyzer.analyze(unit, signal ? { signal } : {});
    this.store.setReport(unit, report);
    return { unit, report };
  }

  /**
   * Diagnostic indexes refer to the latest report of the stored unit
   */
  private async resolveDiagnostic(
    unitId: string,
    diagnosticIndex: number
  ): Promise<{ unit: AnalysisUnit; diagnostic: Diagnostic }> {
    const stored = this.store.getReport(unitId);
    const { unit, report } = stored
      ? { unit: this.store.getOrThrow(unitId), report: stored }
      : await this.analyze(unitId);
    const diagnostic = report.diagnostics[diagnosticIndex];
    if (!diagnostic) {
      throw new AnalysisError({
        code: 'DIAGNOSTIC_NOT_FOUND',
        message: `Unit '${unitId}' has no diagnostic at index ${diagnosticIndex} (${report.diagnostics.length} reported)`,
        unitId,
        suggestion: 'Run analyze_unit and use an index from its diagnostics list',
      });
    }
    return { unit, diagnostic };
  }
}
