export * from './type-ref.js';
export * from './shape.js';
export * from './expression.js';
export * from './declaration.js';
export * from './diagnostic.js';
export * from './edit.js';
