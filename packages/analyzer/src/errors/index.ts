/**
 * Error exports for the analyzer
 */

export { FixError } from './fix-error.js';
export type { FixErrorCode, FixErrorDetails } from './fix-error.js';
