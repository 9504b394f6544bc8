/**
 * Analysis Report Formatter
 *
 * Plain-text rendering for the CLI and tool output.
 */

import type { Diagnostic } from '@mapcheck/core';
import type { AnalysisFailure, AnalysisReport } from '../types/index.js';
import { formatSubject } from './utils.js';

/**
 * One line per diagnostic: `file:line:column: severity RuleId: message`,
 * or `unit/declaration` when the diagnostic has no source location
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.location
    ? `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    : `${diagnostic.unitId}/${diagnostic.declarationId}`;
  return `${where}: ${diagnostic.severity} ${diagnostic.ruleId}: ${diagnostic.message}`;
}

function formatFailure(failure: AnalysisFailure): string {
  const subject = failure.member ? `${failure.declarationId}.${failure.member}` : failure.declarationId;
  return `- ${subject} [${failure.code}]: ${failure.message}`;
}

export function formatReportAsText(report: AnalysisReport): string {
  const lines: string[] = [];
  const { summary } = report;

  lines.push(`## Mapping Analysis Report`);
  lines.push(`Unit: ${report.unitId}`);
  lines.push(`Generated: ${report.timestamp.toISOString()}`);
  lines.push('');

  lines.push(`### Summary`);
  lines.push(`- Declarations: ${summary.declarationCount}`);
  lines.push(`- Diagnostics: ${summary.diagnosticCount}`);
  lines.push(`- Errors: ${summary.bySeverity.error}`);
  lines.push(`- Warnings: ${summary.bySeverity.warning}`);
  lines.push(`- Info: ${summary.bySeverity.info}`);
  lines.push(`- Failures: ${summary.failureCount}`);
  lines.push(`- Processing Time: ${report.processingTimeMs}ms`);
  lines.push('');

  if (report.diagnostics.length === 0) {
    lines.push('No mapping issues found.');
  } else {
    lines.push(`### Diagnostics by Rule`);
    const sortedRules = Object.entries(summary.byRule).sort((a, b) => (b[1] ?? 0) - (a[1] ?? 0));
    for (const [rule, count] of sortedRules) {
      lines.push(`- ${rule}: ${count}`);
    }
    lines.push('');

    lines.push(`### Diagnostics`);
    for (const diagnostic of report.diagnostics) {
      lines.push(`- [${diagnostic.severity}] ${diagnostic.ruleId} at ${formatSubject(diagnostic)}: ${diagnostic.message}`);
    }
  }

  if (report.failures.length > 0) {
    lines.push('');
    lines.push(`### Failures`);
    for (const failure of report.failures) {
      lines.push(formatFailure(failure));
    }
  }

  return lines.join('\n');
}
