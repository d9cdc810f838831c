export * from './configuration.js';
export * from './env.validation.js';
export * from './config.module.js';
