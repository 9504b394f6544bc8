export { MappingRegistry } from './mapping-registry.js';
export type { DuplicateDeclaration } from './mapping-registry.js';
