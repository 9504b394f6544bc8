/**
 * MCP Formatter
 *
 * Structured summary plus text for tool consumers.
 */

import type { RuleId } from '@mapcheck/core';
import { PERFORMANCE_RULES } from '../rules/index.js';
import type { AnalysisReport } from '../types/index.js';
import { formatReportAsText } from './report-formatter.js';

export interface MCPSummary {
  status: 'clean' | 'warnings' | 'errors';
  message: string;
  stats: {
    declarations: number;
    diagnostics: number;
    errors: number;
    warnings: number;
    info: number;
    failures: number;
  };
  topRules: Array<{ rule: RuleId; count: number }>;
}

export interface MCPFormattedReport {
  summary: MCPSummary;
  insights: string[];
  text: string;
}

function topRules(report: AnalysisReport): Array<{ rule: RuleId; count: number }> {
  const entries: Array<{ rule: RuleId; count: number }> = [];
  for (const diagnostic of report.diagnostics) {
    const entry = entries.find((e) => e.rule === diagnostic.ruleId);
    if (entry) entry.count++;
    else entries.push({ rule: diagnostic.ruleId, count: 1 });
  }
  return entries.sort((a, b) => b.count - a.count).slice(0, 5);
}

function formatSummary(report: AnalysisReport): MCPSummary {
  const { summary } = report;
  const errors = summary.bySeverity.error;
  const status: MCPSummary['status'] =
    errors > 0 ? 'errors' : summary.diagnosticCount > 0 ? 'warnings' : 'clean';

  const message =
    status === 'clean'
      ? `No mapping issues in ${summary.declarationCount} declarations of unit '${report.unitId}'`
      : `${summary.diagnosticCount} mapping issues in unit '${report.unitId}' (${errors} errors)`;

  return {
    status,
    message,
    stats: {
      declarations: summary.declarationCount,
      diagnostics: summary.diagnosticCount,
      errors,
      warnings: summary.bySeverity.warning,
      info: summary.bySeverity.info,
      failures: summary.failureCount,
    },
    topRules: topRules(report),
  };
}

function generateInsights(report: AnalysisReport): string[] {
  const insights: string[] = [];
  const { byRule } = report.summary;

  if (byRule.ComplexTypeMappingMissing) {
    insights.push(
      `${byRule.ComplexTypeMappingMissing} nested members need their own mapping declaration (no automatic fix)`
    );
  }

  const hazards = report.diagnostics.filter((d) => PERFORMANCE_RULES.has(d.ruleId)).length;
  if (hazards > 0) {
    insights.push(`${hazards} mapping expressions do work that belongs before mapping`);
  }

  if (byRule.UnmappedRequiredProperty) {
    insights.push(`${byRule.UnmappedRequiredProperty} required destination members will fail at runtime`);
  }

  if (report.failures.length > 0) {
    insights.push(`${report.failures.length} members or declarations could not be evaluated; see failures`);
  }

  return insights;
}

/**
 * Format an analysis report for MCP consumption
 */
export function formatReportForMcp(report: AnalysisReport): MCPFormattedReport {
  return {
    summary: formatSummary(report),
    insights: generateInsights(report),
    text: formatReportAsText(report),
  };
}
