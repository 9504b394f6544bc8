/**
 * Command-line argument handling and batch report rendering
 */

import { formatReportAsText, type AnalysisReport, type MappingAnalyzer } from '@mapcheck/analyzer';
import type { AnalysisUnit } from '@mapcheck/core';

export type OutputFormat = 'text' | 'json';

export interface CliArgs {
  configPath?: string;
  format: OutputFormat;
  serve: boolean;
  help: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: mapcheck --config <mapcheck.json> [--format text|json]
       mapcheck --config <mapcheck.json> --serve

Analyzes every unit listed in the config file and exits with status 1 when
any error-severity diagnostic is reported. --serve starts an MCP server on
stdio instead.`;

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { format: 'text', serve: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config': {
        const value = argv[++i];
        if (!value) throw new UsageError('--config requires a path');
        args.configPath = value;
        break;
      }
      case '--format': {
        const value = argv[++i] ?? '';
        if (!isOutputFormat(value)) throw new UsageError(`Unknown format '${value}' (expected text or json)`);
        args.format = value;
        break;
      }
      case '--serve':
        args.serve = true;
        break;
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${arg}`);
    }
  }

  return args;
}

export async function analyzeAll(analyzer: MappingAnalyzer, units: AnalysisUnit[]): Promise<AnalysisReport[]> {
  const reports: AnalysisReport[] = [];
  for (const unit of units) {
    reports.push(await analyzer.analyze(unit));
  }
  return reports;
}

export function renderReports(reports: AnalysisReport[], format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify({ reports }, null, 2);
  }
  return reports.map(formatReportAsText).join('\n\n');
}

export function hasErrors(reports: AnalysisReport[]): boolean {
  return reports.some((report) => report.summary.bySeverity.error > 0);
}
