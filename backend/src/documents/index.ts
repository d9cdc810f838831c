export * from './chunker.js';
export * from './document-ingestion.service.js';
export * from './documents.module.js';
export * from './retrieval.service.js';
export * from './text-extractor.service.js';
