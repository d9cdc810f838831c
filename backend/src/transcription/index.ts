export * from './transcription.controller.js';
export * from './transcription.module.js';
