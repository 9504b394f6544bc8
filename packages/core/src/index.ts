/**
 * @mapcheck/core
 *
 * Data model, validation and shared utilities for mapping analysis
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Utilities
export * from './utils/index.js';
