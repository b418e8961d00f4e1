export * from './agents.js';
export * from './orchestrator.js';
export * from './services.js';
