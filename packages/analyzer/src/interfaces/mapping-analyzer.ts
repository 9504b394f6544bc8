/**
 * MappingAnalyzer Interface
 */

import type { AnalysisUnit, Diagnostic, Edit } from '@mapcheck/core';
import type { AnalysisReport } from '../types/index.js';

export interface AnalyzeOptions {
  /** Aborting rejects the pass with ANALYSIS_CANCELLED; nothing partial is returned */
  signal?: AbortSignal;
}

export interface IMappingAnalyzer {
  /**
   * Run one analysis pass over a unit
   */
  analyze(unit: AnalysisUnit, options?: AnalyzeOptions): Promise<AnalysisReport>;

  /**
   * Enumerate the independent fixes for one diagnostic, computed against
   * the unit as given
   */
  suggestFixes(unit: AnalysisUnit, diagnostic: Diagnostic): Edit[];

  /**
   * Apply the fix identified by `equivalenceKey` and return the new unit
   */
  applyFix(unit: AnalysisUnit, diagnostic: Diagnostic, equivalenceKey: string): AnalysisUnit;
}
