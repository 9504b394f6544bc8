export * from './type-ref.js';
export * from './expression.js';
