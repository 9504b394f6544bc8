export type { AnalysisLogger } from './logger.js';
export { noopLogger } from './logger.js';
export type { AnalyzeOptions, IMappingAnalyzer } from './mapping-analyzer.js';
