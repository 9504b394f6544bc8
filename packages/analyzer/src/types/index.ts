export * from './options.js';
export * from './report.js';
