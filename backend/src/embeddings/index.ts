export * from './embedding.service.js';
export * from './embeddings.errors.js';
export * from './embeddings.module.js';
