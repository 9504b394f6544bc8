/**
 * @mapcheck/mcp-server
 *
 * Command-line runner and MCP server for mapping analysis
 */

export { createServer, runServer } from './server.js';
export type { ServerConfig } from './server.js';
export { MappingTools } from './tools.js';
export type { AnalyzeUnitResult, FixSuggestion, IndexedDiagnostic, RuleInfo } from './tools.js';
export { UnitStore } from './unit-store.js';
export type { UnitInfo } from './unit-store.js';
export { loadUnitFile, loadUnits } from './unit-loader.js';
export type { LoadedUnit } from './unit-loader.js';
export {
  ConfigError,
  configFileSchema,
  expandEnvVars,
  formatZodError,
  loadConfig,
  parseConfig,
  toAnalyzerOptions,
} from './config.js';
export type { ConfigFile, LoadedConfig } from './config.js';
export { Logger, createTraceId, redactSecrets } from './logger.js';
export type { LogFormat, LogLevel, LoggerOptions } from './logger.js';
export { analyzeAll, hasErrors, parseArgs, renderReports } from './run.js';
