export * from './chat.module.js';
export * from './conversation-orchestrator.service.js';
