/**
 * Logging seam for the analyzer
 *
 * Structurally compatible with the server's Logger, so the analyzer never
 * depends on where log lines go.
 */

export interface AnalysisLogger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
}

export const noopLogger: AnalysisLogger = {
  debug() {},
  warn() {},
};
