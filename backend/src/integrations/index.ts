export * from './google/gmail.service.js';
export * from './google/google-calendar.service.js';
export * from './google/google-credentials.service.js';
export * from './integration.types.js';
export * from './integrations.module.js';
export * from './notes/apple-notes.service.js';
