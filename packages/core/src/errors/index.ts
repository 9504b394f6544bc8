export { AnalysisError, wrapError } from './analysis-error.js';
export type { AnalysisErrorCode, AnalysisErrorDetails } from './analysis-error.js';
