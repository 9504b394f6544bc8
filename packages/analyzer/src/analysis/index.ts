export { MappingAnalyzer } from './mapping-analyzer.js';
