export * from './postgres-vector-index.js';
export * from './vector-index.errors.js';
export * from './vector-index.module.js';
export * from './vector-index.types.js';
