/**
 * Analysis report types
 */

import type { AnalysisErrorCode, Diagnostic, RuleId, Severity } from '@mapcheck/core';

/** A member or declaration whose evaluation failed; siblings still ran */
export interface AnalysisFailure {
  declarationId: string;
  member?: string;
  code: AnalysisErrorCode;
  message: string;
}

export interface AnalysisSummary {
  declarationCount: number;
  diagnosticCount: number;
  bySeverity: Record<Severity, number>;
  byRule: Partial<Record<RuleId, number>>;
  failureCount: number;
}

export interface AnalysisReport {
  unitId: string;
  /** Sorted by declaration order, then member order, then rule */
  diagnostics: Diagnostic[];
  failures: AnalysisFailure[];
  summary: AnalysisSummary;
  timestamp: Date;
  processingTimeMs: number;
}
