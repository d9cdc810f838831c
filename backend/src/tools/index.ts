export * from './tool-descriptors.js';
export * from './tool-registry.js';
export * from './tools.module.js';
